import { describe, it, expect, afterEach, vi } from 'vitest';
import { fileURLToPath } from 'node:url';
import { LoadProfileCatalog, LoadProfileCatalogFile } from '../src/Services/ProfileCatalogLoader.js';
import { NotFoundError, ValidationError } from '../src/Common/Errors.js';
import { MAIN_EVENT_BUS } from '../src/Events/MainEventBus.js';
import { EVENT_NAMES } from '../src/Domain/index.js';
import { DIMMER_RECEIVER, KEY_SENDER, MakeCatalogSource, MOTION_SENDER, SWITCH_RECEIVER } from './fixtures/catalog.js';

function SingleProfileCatalog(profile: Record<string, unknown>): Record<string, unknown> {
    return { [SWITCH_RECEIVER]: { [KEY_SENDER]: { profiles: [profile] } } };
}

describe('ProfileCatalogLoader', () => {
    afterEach(() => {
        MAIN_EVENT_BUS.removeAllListeners(EVENT_NAMES.catalogLoaded);
    });

    describe('LoadProfileCatalog', () => {
        it('should build a catalog that preserves profile order', () => {
            const catalog = LoadProfileCatalog(MakeCatalogSource());

            expect(catalog.pairCount).toBe(3);
            expect(catalog.get(KEY_SENDER, SWITCH_RECEIVER)?.map(profile => profile.id)).toEqual([1, 2]);
            expect(catalog.get(KEY_SENDER, DIMMER_RECEIVER)?.map(profile => profile.id)).toEqual([3, 4]);
            expect(catalog.get(MOTION_SENDER, SWITCH_RECEIVER)).toEqual([]);
            expect(catalog.get(MOTION_SENDER, DIMMER_RECEIVER)).toBeUndefined();
        });

        it('should convert constraints into their tagged form', () => {
            const catalog = LoadProfileCatalog(MakeCatalogSource());
            const dimmer = catalog.get(KEY_SENDER, DIMMER_RECEIVER)?.[0];

            expect(dimmer?.params.SHORT_JT_ON).toEqual({ kind: 'fixed', value: 3 });
            expect(dimmer?.params.SHORT_ON_LEVEL).toEqual({ kind: 'range', min: 0, max: 1, default: 1 });
            expect(dimmer?.params.SHORT_RAMPON_TIME_FACTOR).toEqual({ kind: 'list', values: [0, 2, 5], default: 5 });
            expect(Object.isFrozen(dimmer)).toBe(true);
        });

        it('should announce the loaded catalog', () => {
            const listener = vi.fn();
            MAIN_EVENT_BUS.On(EVENT_NAMES.catalogLoaded, listener);

            LoadProfileCatalog(MakeCatalogSource());

            expect(listener).toHaveBeenCalledWith(3, 4);
        });

        it('should reserve id 0 for the Expert profile', () => {
            const source = SingleProfileCatalog({ id: 0, params: { MODE: { constraint_type: 'fixed', value: 1 } } });

            expect(() => LoadProfileCatalog(source)).toThrow(/0 is reserved for the Expert profile/);
        });

        it('should reject duplicate profile ids within a pair', () => {
            const source = {
                [SWITCH_RECEIVER]: { [KEY_SENDER]: { profiles: [{ id: 1 }, { id: 1 }] } },
            };

            expect(() => LoadProfileCatalog(source)).toThrow('duplicate profile id 1');
        });

        it('should reject a list default that is not one of its values', () => {
            const source = SingleProfileCatalog({
                id: 1,
                params: { LEVEL: { constraint_type: 'list', values: [0, 1], default: 2 } },
            });

            expect(() => LoadProfileCatalog(source)).toThrow('list constraint default 2 is not one of its values');
        });

        it('should reject an inverted range', () => {
            const source = SingleProfileCatalog({
                id: 1,
                params: { LEVEL: { constraint_type: 'range', min_value: 5, max_value: 1, default: 3 } },
            });

            expect(() => LoadProfileCatalog(source)).toThrow('range constraint has min 5 greater than max 1');
        });

        it('should reject a range default outside the range', () => {
            const source = SingleProfileCatalog({
                id: 1,
                params: { LEVEL: { constraint_type: 'range', min_value: 0, max_value: 1, default: 2 } },
            });

            expect(() => LoadProfileCatalog(source)).toThrow('range constraint default 2 is outside [0, 1]');
        });

        it('should reject fixed time values that do not decode', () => {
            const unknownBase = SingleProfileCatalog({
                id: 1,
                params: {
                    SHORT_ON_TIME_BASE: { constraint_type: 'fixed', value: 9 },
                    SHORT_ON_TIME_FACTOR: { constraint_type: 'fixed', value: 1 },
                },
            });
            const negativeFactor = SingleProfileCatalog({
                id: 1,
                params: { LONG_OFF_TIME_FACTOR: { constraint_type: 'fixed', value: -2 } },
            });
            const textualBase = SingleProfileCatalog({
                id: 1,
                params: { ON_TIME_BASE: { constraint_type: 'fixed', value: 'long' } },
            });

            expect(() => LoadProfileCatalog(unknownBase)).toThrow('fixed time base 9 is not one of 0-7');
            expect(() => LoadProfileCatalog(negativeFactor)).toThrow('fixed time factor -2 is not a non-negative integer');
            expect(() => LoadProfileCatalog(textualBase)).toThrow('fixed time base long is not one of 0-7');
        });

        it('should decode HTML entities in names and descriptions', () => {
            const source = SingleProfileCatalog({
                id: 1,
                name: { de: 'T&uuml;r &ouml;ffnen &amp; schlie&szlig;en' },
                description: { en: 'Opens &lt;briefly&gt;' },
            });
            const [profile] = LoadProfileCatalog(source).get(KEY_SENDER, SWITCH_RECEIVER) ?? [];

            expect(profile.name).toEqual({ de: 'Tür öffnen & schließen' });
            expect(profile.description).toEqual({ en: 'Opens <briefly>' });
        });

        it('should reject fields that do not belong to the constraint type', () => {
            const extraValues = SingleProfileCatalog({
                id: 1,
                params: { MODE: { constraint_type: 'fixed', value: 'ON', values: ['ON'] } },
            });
            const missingValue = SingleProfileCatalog({ id: 1, params: { MODE: { constraint_type: 'fixed' } } });

            expect(() => LoadProfileCatalog(extraValues)).toThrow(ValidationError);
            expect(() => LoadProfileCatalog(missingValue)).toThrow(ValidationError);
        });

        it('should reject a malformed structure', () => {
            expect(() => LoadProfileCatalog({ [SWITCH_RECEIVER]: { [KEY_SENDER]: { profiles: 'none' } } })).toThrow(
                ValidationError,
            );
            expect(() => LoadProfileCatalog(null)).toThrow(ValidationError);
        });
    });

    describe('LoadProfileCatalogFile', () => {
        it('should load a YAML catalog from disk', async () => {
            const path = fileURLToPath(new URL('./fixtures/catalog.yaml', import.meta.url));
            const catalog = await LoadProfileCatalogFile(path);

            expect(catalog.pairCount).toBe(2);
            expect(catalog.get(KEY_SENDER, SWITCH_RECEIVER)?.map(profile => profile.id)).toEqual([1, 2]);
        });

        it('should report a missing file', async () => {
            const path = fileURLToPath(new URL('./fixtures/missing.yaml', import.meta.url));

            await expect(LoadProfileCatalogFile(path)).rejects.toBeInstanceOf(NotFoundError);
        });
    });
});
