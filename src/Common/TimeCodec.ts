/**
 * Conversion between a duration in seconds and the base/factor pair used by device link parameters
 * (`*_TIME_BASE` / `*_TIME_FACTOR`).
 *
 * Decoding is exact. Encoding snaps to the nearest preset of the selector type, so it may lose
 * precision: `EncodeTimeValue(7, 'timeOnOff')` yields the 5 s preset.
 */
import Joi from 'joi';
import { readFileSync } from 'fs';
import { FromJoiError, ValidationError } from './Errors.js';

/** Preset list families, one per kind of time parameter. */
export const TIME_SELECTOR_TYPES = {
    timeOnOff: 'timeOnOff',
    delay: 'delay',
    rampOnOff: 'rampOnOff',
} as const;

export type TimeSelectorType = (typeof TIME_SELECTOR_TYPES)[keyof typeof TIME_SELECTOR_TYPES];

/** One selectable base/factor pair with its display labels. */
export interface TimePreset {
    readonly base: number;
    readonly factor: number;
    readonly label: Readonly<Record<string, string>>;
}

/** Preset option localized for display. */
export interface TimePresetOption {
    base: number;
    factor: number;
    label: string;
}

/** Seconds per unit, indexed by TIME_BASE value. */
export const TIME_BASE_UNITS: readonly number[] = Object.freeze([0.1, 1, 5, 10, 60, 300, 600, 3600]);

const _presetSchema = Joi.object<TimePreset>({
    base: Joi.number()
        .integer()
        .min(0)
        .max(TIME_BASE_UNITS.length - 1)
        .required(),
    factor: Joi.number().integer().min(0).required(),
    label: Joi.object().pattern(Joi.string(), Joi.string()).required(),
});

const _presetFileSchema = Joi.object<Record<TimeSelectorType, TimePreset[]>>({
    timeOnOff: Joi.array().items(_presetSchema).min(1).required(),
    delay: Joi.array().items(_presetSchema).min(1).required(),
    rampOnOff: Joi.array().items(_presetSchema).min(1).required(),
});

/**
 * Parses and validates the bundled preset table.
 * @param raw unknown - Parsed JSON content
 * @returns Record<TimeSelectorType, readonly TimePreset[]>
 * @throws ValidationError when the table is malformed
 */
export function ParseTimePresets(raw: unknown): Record<TimeSelectorType, readonly TimePreset[]> {
    const { error, value } = _presetFileSchema.validate(raw, { abortEarly: false });

    if (error) {
        throw FromJoiError(`time preset table`, error);
    }
    return Object.freeze({
        timeOnOff: Object.freeze(value.timeOnOff),
        delay: Object.freeze(value.delay),
        rampOnOff: Object.freeze(value.rampOnOff),
    });
}

/** Preset lists by selector type, loaded from data/time-presets.json. */
export const PRESETS_BY_TYPE: Record<TimeSelectorType, readonly TimePreset[]> = ParseTimePresets(
    JSON.parse(readFileSync(new URL('../../data/time-presets.json', import.meta.url), 'utf-8')),
);

/**
 * Converts a base/factor pair to seconds.
 * @param base number - TIME_BASE value (0-7)
 * @param factor number - TIME_FACTOR value (non-negative integer)
 * @returns number - Duration in seconds
 * @throws ValidationError for an unknown base or an invalid factor
 * @example
 * DecodeTimeValue(7, 1); // 3600
 * DecodeTimeValue(0, 1); // 0.1
 */
export function DecodeTimeValue(base: number, factor: number): number {
    if (!Number.isInteger(base) || base < 0 || base >= TIME_BASE_UNITS.length) {
        throw new ValidationError(`Unknown time base: ${base}`, { base });
    }

    if (!Number.isInteger(factor) || factor < 0) {
        throw new ValidationError(`Time factor must be a non-negative integer, got ${factor}`, { factor });
    }
    return TIME_BASE_UNITS[base] * factor;
}

/**
 * Finds the preset of the selector type whose duration is closest to `seconds`.
 * Ties go to the earlier preset, which carries the smaller base.
 * @param seconds number - Target duration (finite, non-negative)
 * @param selectorType TimeSelectorType - Which preset family to search
 * @returns [base, factor]
 * @example
 * EncodeTimeValue(3600, 'timeOnOff'); // [7, 1]
 * EncodeTimeValue(7, 'timeOnOff'); // [2, 1] -> decodes to 5 s
 */
export function EncodeTimeValue(seconds: number, selectorType: TimeSelectorType): [number, number] {
    if (!Number.isFinite(seconds) || seconds < 0) {
        throw new ValidationError(`Duration must be a finite, non-negative number of seconds, got ${seconds}`, {
            seconds,
        });
    }
    let best: [number, number] = [0, 0];
    let bestDiff = Number.POSITIVE_INFINITY;

    for (const preset of PRESETS_BY_TYPE[selectorType]) {
        const diff = Math.abs(DecodeTimeValue(preset.base, preset.factor) - seconds);

        if (diff < bestDiff) {
            bestDiff = diff;
            best = [preset.base, preset.factor];
        }
    }
    return best;
}

/**
 * Preset options for a selector, labelled for the locale (German for 'de', English otherwise).
 * @example
 * GetTimePresets('delay', 'de')[0]; // { base: 0, factor: 0, label: 'Nicht aktiv' }
 */
export function GetTimePresets(selectorType: TimeSelectorType, locale: string = `en`): TimePresetOption[] {
    return PRESETS_BY_TYPE[selectorType].map(preset => {
        return {
            base: preset.base,
            factor: preset.factor,
            label: (locale === `de` ? preset.label.de : undefined) ?? preset.label.en ?? `${preset.base}/${preset.factor}`,
        };
    });
}
