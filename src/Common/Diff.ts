import type { ChangeDiff, ParameterValue, ValueSet } from '../Domain/index.js';

/**
 * Equality used for parameter values. Values are scalars, so strict equality is identity.
 * @param a ParameterValue | undefined
 * @param b ParameterValue | undefined
 * @returns boolean
 */
export function ValuesEqual(a: ParameterValue | null | undefined, b: ParameterValue | null | undefined): boolean {
    return a === b;
}

/**
 * True when both value sets hold the same keys with equal values.
 * @example
 * ValueSetsEqual({ A: 1 }, { A: 1 }); // true
 */
export function ValueSetsEqual(left: ValueSet, right: ValueSet): boolean {
    const leftKeys = Object.keys(left);

    if (leftKeys.length !== Object.keys(right).length) {
        return false;
    }
    return leftKeys.every(key => Object.hasOwn(right, key) && ValuesEqual(left[key], right[key]));
}

/**
 * Builds a field-by-field change diff between two value sets.
 * Every key of `newValues` whose value differs from `oldValues` is reported; a key missing from
 * `oldValues` is reported with `old: null`. Keys only present in `oldValues` are not reported.
 * @param oldValues ValueSet - Baseline values
 * @param newValues ValueSet - Values to compare against the baseline
 * @returns ChangeDiff - Changed keys only; empty when nothing differs
 * @example
 * BuildChangeDiff({ LEVEL: 1 }, { LEVEL: 2, MODE: 'ON' });
 * // { LEVEL: { old: 1, new: 2 }, MODE: { old: null, new: 'ON' } }
 */
export function BuildChangeDiff(oldValues: ValueSet, newValues: ValueSet): ChangeDiff {
    const changes: ChangeDiff = {};

    for (const [param, newValue] of Object.entries(newValues)) {
        const oldValue = Object.hasOwn(oldValues, param) ? oldValues[param] : null;

        if (!ValuesEqual(oldValue, newValue)) {
            changes[param] = { old: oldValue, new: newValue };
        }
    }
    return changes;
}
