/**
 * Value model shared by the session engine, the change log and persistence callers.
 */

/** Opaque scalar stored under a parameter id. Only identity and equality are relied upon. */
export type ParameterValue = boolean | number | string;

/** Mapping from parameter id to value; represents initial, current or changes-only state. */
export type ValueSet = Record<string, ParameterValue>;

/**
 * Old/new pair for one parameter.
 * `old` is null when the parameter was absent from the old value set.
 */
export interface ValueChange {
    old: ParameterValue | null;
    new: ParameterValue;
}

/** Field-by-field difference between two value sets, keyed by parameter id. */
export type ChangeDiff = Record<string, ValueChange>;

/** ChangeDiff as held by a committed log entry; nothing in it can be reassigned. */
export type FrozenChangeDiff = Readonly<Record<string, Readonly<ValueChange>>>;

/** Single undo/redo record, owned by the session that produced it. */
export interface UndoEntry {
    readonly parameter: string;
    readonly oldValue: ParameterValue | undefined; // undefined when the parameter was not yet present
    readonly newValue: ParameterValue;
}
