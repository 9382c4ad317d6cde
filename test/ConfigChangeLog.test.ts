import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigChangeLog, DEFAULT_MAX_ENTRIES } from '../src/Services/ConfigChangeLog.js';
import { ValidationError } from '../src/Common/Errors.js';
import type { ChangeLogInput } from '../src/Domain/index.js';

function MakeInput(entryId: string, overrides: Partial<ChangeLogInput> = {}): ChangeLogInput {
    return {
        entryId,
        interfaceId: 'hmip-local',
        channelAddress: 'VCU0000001:1',
        deviceName: 'Living room thermostat',
        deviceModel: 'HmIP-eTRV-2',
        paramsetKey: 'MASTER',
        changes: { TEMPERATURE_OFFSET: { old: 1.5, new: 2 } },
        source: 'manual',
        ...overrides,
    };
}

describe('ConfigChangeLog', () => {
    beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'));
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    describe('capacity', () => {
        it('should default to the standard capacity', () => {
            expect(new ConfigChangeLog().maxEntries).toBe(DEFAULT_MAX_ENTRIES);
            expect(DEFAULT_MAX_ENTRIES).toBe(500);
        });

        it('should reject a non-positive capacity', () => {
            expect(() => new ConfigChangeLog({ maxEntries: 0 })).toThrow(ValidationError);
            expect(() => new ConfigChangeLog({ maxEntries: 2.5 })).toThrow(ValidationError);
        });

        it('should keep the last max entries in insertion order', () => {
            const changeLog = new ConfigChangeLog({ maxEntries: 3 });
            ['e1', 'e2', 'e3', 'e4', 'e5'].forEach(id => changeLog.Add(MakeInput(id)));

            expect(changeLog.size).toBe(3);
            expect(changeLog.ToDicts().map(record => record.entry_id)).toEqual(['e3', 'e4', 'e5']);
        });
    });

    describe('Add', () => {
        it('should stamp the current time and freeze the entry', () => {
            const changeLog = new ConfigChangeLog();
            const entry = changeLog.Add(MakeInput('cfg-1'));

            expect(entry.timestamp).toBe('2026-03-01T10:00:00.000Z');
            expect(entry.entryId).toBe('cfg-1');
            expect(Object.isFrozen(entry)).toBe(true);
            expect(Object.isFrozen(entry.changes)).toBe(true);
        });

        it('should not keep a reference to the caller diff', () => {
            const changeLog = new ConfigChangeLog();
            const input = MakeInput('cfg-1');
            changeLog.Add(input);
            input.changes.TEMPERATURE_OFFSET = { old: 0, new: 3 };

            expect(changeLog.GetEntries().entries[0].changes).toEqual({ TEMPERATURE_OFFSET: { old: 1.5, new: 2 } });
        });
    });

    describe('immutability', () => {
        it('should not let readers change a stored diff', () => {
            const changeLog = new ConfigChangeLog();
            const entry = changeLog.Add(MakeInput('cfg-1', { changes: { LEVEL: { old: 0, new: 1 } } }));
            const [listed] = changeLog.GetEntries().entries;

            expect(Object.isFrozen(entry.changes.LEVEL)).toBe(true);
            expect(Reflect.set(entry.changes.LEVEL, 'new', 99)).toBe(false);
            expect(Reflect.set(listed.changes.LEVEL, 'old', 42)).toBe(false);
            expect(changeLog.ToDicts()[0].changes).toEqual({ LEVEL: { old: 0, new: 1 } });
        });

        it('should freeze restored entries as well', () => {
            const changeLog = new ConfigChangeLog();
            changeLog.LoadEntries([{ entry_id: 'restored', changes: { MODE: { old: 'AUTO', new: 'MANUAL' } } }]);
            const [restored] = changeLog.GetEntries().entries;

            expect(Object.isFrozen(restored.changes.MODE)).toBe(true);
            expect(Reflect.set(restored.changes.MODE, 'new', 'BOOST')).toBe(false);
            expect(changeLog.ToDicts()[0].changes).toEqual({ MODE: { old: 'AUTO', new: 'MANUAL' } });
        });
    });

    describe('GetEntries', () => {
        let changeLog: ConfigChangeLog;

        beforeEach(() => {
            changeLog = new ConfigChangeLog();
            changeLog.Add(MakeInput('a'));
            changeLog.Add(MakeInput('b', { channelAddress: 'VCU0000002:1' }));
            changeLog.Add(MakeInput('a', { source: 'import' }));
            changeLog.Add(MakeInput('c'));
        });

        it('should return entries newest first with the total', () => {
            const page = changeLog.GetEntries();

            expect(page.total).toBe(4);
            expect(page.entries.map(entry => entry.entryId)).toEqual(['c', 'a', 'b', 'a']);
        });

        it('should filter by entry id and channel address', () => {
            expect(changeLog.GetEntries({ entryId: 'a' }).entries.map(entry => entry.source)).toEqual(['import', 'manual']);
            expect(changeLog.GetEntries({ channelAddress: 'VCU0000002:1' }).entries.map(entry => entry.entryId)).toEqual([
                'b',
            ]);
        });

        it('should count matches before the limit', () => {
            const page = changeLog.GetEntries({ limit: 2 });

            expect(page.total).toBe(4);
            expect(page.entries.map(entry => entry.entryId)).toEqual(['c', 'a']);
            expect(changeLog.GetEntries({ limit: 0 })).toEqual({ entries: [], total: 4 });
        });

        it('should reject an invalid limit', () => {
            expect(() => changeLog.GetEntries({ limit: -1 })).toThrow(ValidationError);
        });
    });

    describe('clearing', () => {
        it('should remove entries by id and keep the order of the rest', () => {
            const changeLog = new ConfigChangeLog();
            ['a', 'b', 'a', 'c'].forEach(id => changeLog.Add(MakeInput(id)));

            expect(changeLog.ClearByEntryId('a')).toBe(2);
            expect(changeLog.ClearByEntryId('missing')).toBe(0);
            expect(changeLog.ToDicts().map(record => record.entry_id)).toEqual(['b', 'c']);
        });

        it('should remove everything on clear', () => {
            const changeLog = new ConfigChangeLog();
            changeLog.Add(MakeInput('a'));
            changeLog.Clear();

            expect(changeLog.GetEntries()).toEqual({ entries: [], total: 0 });
        });
    });

    describe('persistence', () => {
        it('should serialize entries with persisted field names', () => {
            const changeLog = new ConfigChangeLog();
            changeLog.Add(MakeInput('cfg-1', { changes: { MODE: { old: null, new: 'AUTO' } } }));

            expect(changeLog.ToDicts()).toEqual([
                {
                    timestamp: '2026-03-01T10:00:00.000Z',
                    entry_id: 'cfg-1',
                    interface_id: 'hmip-local',
                    channel_address: 'VCU0000001:1',
                    device_name: 'Living room thermostat',
                    device_model: 'HmIP-eTRV-2',
                    paramset_key: 'MASTER',
                    changes: { MODE: { old: null, new: 'AUTO' } },
                    source: 'manual',
                },
            ]);
        });

        it('should restore a serialized log', () => {
            const source = new ConfigChangeLog();
            source.Add(MakeInput('a'));
            source.Add(MakeInput('b'));

            const restored = new ConfigChangeLog();
            restored.Add(MakeInput('discarded'));
            restored.LoadEntries(JSON.parse(JSON.stringify(source.ToDicts())));

            expect(restored.ToDicts()).toEqual(source.ToDicts());
        });

        it('should default fields missing from legacy records', () => {
            const changeLog = new ConfigChangeLog();
            changeLog.LoadEntries([{ entry_id: 'legacy', changes: { LEVEL: { new: 0.5 } } }]);

            expect(changeLog.ToDicts()).toEqual([
                {
                    timestamp: '',
                    entry_id: 'legacy',
                    interface_id: '',
                    channel_address: '',
                    device_name: '',
                    device_model: '',
                    paramset_key: '',
                    changes: { LEVEL: { old: null, new: 0.5 } },
                    source: '',
                },
            ]);
        });

        it('should keep only the newest records when loading more than the capacity', () => {
            const changeLog = new ConfigChangeLog({ maxEntries: 2 });
            changeLog.LoadEntries([{ entry_id: 'x' }, { entry_id: 'y' }, { entry_id: 'z' }]);

            expect(changeLog.ToDicts().map(record => record.entry_id)).toEqual(['y', 'z']);
        });

        it('should reject malformed data and leave the log untouched', () => {
            const changeLog = new ConfigChangeLog();
            changeLog.Add(MakeInput('kept'));

            expect(() => changeLog.LoadEntries({ entry_id: 'not-a-list' })).toThrow(ValidationError);
            expect(() => changeLog.LoadEntries([{ entry_id: 5 }])).toThrow(ValidationError);
            expect(() => changeLog.LoadEntries([{ entry_id: 'x', unexpected: true }])).toThrow(ValidationError);
            expect(changeLog.ToDicts().map(record => record.entry_id)).toEqual(['kept']);
        });
    });
});
