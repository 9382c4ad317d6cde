import { describe, it, expect } from 'vitest';
import {
    DecodeTimeValue,
    EncodeTimeValue,
    GetTimePresets,
    ParseTimePresets,
    PRESETS_BY_TYPE,
} from '../src/Common/TimeCodec.js';
import { ValidationError } from '../src/Common/Errors.js';

describe('TimeCodec', () => {
    describe('DecodeTimeValue', () => {
        it('should multiply the base unit by the factor', () => {
            expect(DecodeTimeValue(7, 1)).toBe(3600);
            expect(DecodeTimeValue(4, 2)).toBe(120);
            expect(DecodeTimeValue(1, 30)).toBe(30);
            expect(DecodeTimeValue(0, 1)).toBe(0.1);
            expect(DecodeTimeValue(3, 0)).toBe(0);
        });

        it('should reject an unknown base', () => {
            expect(() => DecodeTimeValue(8, 1)).toThrow(ValidationError);
            expect(() => DecodeTimeValue(-1, 1)).toThrow('Unknown time base: -1');
        });

        it('should reject a negative or fractional factor', () => {
            expect(() => DecodeTimeValue(1, -1)).toThrow(ValidationError);
            expect(() => DecodeTimeValue(1, 1.5)).toThrow(ValidationError);
        });
    });

    describe('EncodeTimeValue', () => {
        it('should encode one hour as base 7, factor 1', () => {
            expect(EncodeTimeValue(3600, 'timeOnOff')).toEqual([7, 1]);
        });

        it('should snap to the nearest preset', () => {
            expect(EncodeTimeValue(7, 'timeOnOff')).toEqual([2, 1]);
            expect(EncodeTimeValue(0.3, 'rampOnOff')).toEqual([0, 2]);
            expect(EncodeTimeValue(10000, 'delay')).toEqual([7, 1]);
        });

        it('should prefer the earlier preset on a tie', () => {
            // 7.5 s is 2.5 s away from both the 5 s and the 10 s delay presets
            expect(EncodeTimeValue(7.5, 'delay')).toEqual([2, 1]);
        });

        it('should encode zero as the inactive preset', () => {
            expect(EncodeTimeValue(0, 'delay')).toEqual([0, 0]);
        });

        it('should reject negative and non-finite durations', () => {
            expect(() => EncodeTimeValue(-1, 'timeOnOff')).toThrow(ValidationError);
            expect(() => EncodeTimeValue(Number.NaN, 'timeOnOff')).toThrow(ValidationError);
            expect(() => EncodeTimeValue(Number.POSITIVE_INFINITY, 'delay')).toThrow(ValidationError);
        });
    });

    describe('presets', () => {
        it('should load every selector family', () => {
            expect(PRESETS_BY_TYPE.timeOnOff).toHaveLength(21);
            expect(PRESETS_BY_TYPE.delay).toHaveLength(10);
            expect(PRESETS_BY_TYPE.rampOnOff).toHaveLength(9);
        });

        it('should localize labels and fall back to English', () => {
            expect(GetTimePresets('delay', 'de')[0]).toEqual({ base: 0, factor: 0, label: 'Nicht aktiv' });
            expect(GetTimePresets('delay')[0]).toEqual({ base: 0, factor: 0, label: 'Not active' });
            expect(GetTimePresets('timeOnOff', 'fr')[13]).toEqual({ base: 7, factor: 1, label: '1 h' });
        });

        it('should reject a malformed preset table', () => {
            const table = {
                timeOnOff: [{ base: 9, factor: 1, label: { en: 'x' } }],
                delay: [],
                rampOnOff: [{ base: 0, factor: 0, label: { en: 'Off' } }],
            };

            expect(() => ParseTimePresets(table)).toThrow(ValidationError);
        });
    });
});
