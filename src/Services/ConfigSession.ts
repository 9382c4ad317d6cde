import { EventEmitter } from 'events';
import type {
    ChangeDiff,
    DescriptorSet,
    ParameterDescriptor,
    ParameterValidator,
    ParameterValue,
    UndoEntry,
    ValidationFailures,
    ValueSet,
} from '../Domain/index.js';
import { EVENT_NAMES } from '../Domain/index.js';
import { BuildChangeDiff, ValueSetsEqual, ValuesEqual } from '../Common/Diff.js';
import { log } from '../Common/Log.js';
import { DescriptorValidator } from './DescriptorValidator.js';

/** Construction options for a ConfigSession. */
export interface ConfigSessionOptions {
    /** Parameter descriptors supplied by the caller; never mutated. */
    descriptions: DescriptorSet;
    /** Values read from the device when the session opened. */
    initialValues: ValueSet;
    /** Descriptor validation collaborator [default: DescriptorValidator] */
    validator?: ParameterValidator;
}

/**
 * ConfigSession tracks one user's in-progress edit of a paramset.
 *
 * Provides change tracking, undo/redo along the most recent forward path, dirty state detection,
 * collecting validation, and export of the changed subset for a later device write.
 * Not synchronized: one editing context owns a session at a time.
 */
export class ConfigSession {
    /** Event bus for value change notifications (UI refresh, highlighting). */
    public readonly events: EventEmitter = new EventEmitter();

    private readonly _descriptions: DescriptorSet;
    private readonly _validator: ParameterValidator;
    private readonly _initialValues: Readonly<ValueSet>;
    private _currentValues: ValueSet;
    private _undoStack: UndoEntry[] = []; // unbounded; see DESIGN.md
    private _redoStack: UndoEntry[] = [];

    /**
     * @param options ConfigSessionOptions - Descriptors, initial values and optional validator
     * @example
     * const session = new ConfigSession({ descriptions, initialValues: { TEMPERATURE_OFFSET: 1.5 } });
     * session.Set('TEMPERATURE_OFFSET', 2);
     * session.GetChanges(); // { TEMPERATURE_OFFSET: 2 }
     */
    constructor(options: ConfigSessionOptions) {
        this._descriptions = options.descriptions;
        this._validator = options.validator ?? new DescriptorValidator();
        this._initialValues = Object.freeze({ ...options.initialValues });
        this._currentValues = { ...options.initialValues };
    }

    /** True if any parameter differs from its initial value. */
    public get isDirty(): boolean {
        return !ValueSetsEqual(this._currentValues, this._initialValues);
    }

    public get canUndo(): boolean {
        return this._undoStack.length > 0;
    }

    public get canRedo(): boolean {
        return this._redoStack.length > 0;
    }

    /** Number of entries that `Undo` can revert. */
    public get undoDepth(): number {
        return this._undoStack.length;
    }

    /**
     * Applied changes, oldest first. Replaying their `newValue`s onto the initial values yields the current values.
     * @returns readonly UndoEntry[] - Copy of the undo stack
     */
    public GetUndoHistory(): readonly UndoEntry[] {
        return [...this._undoStack];
    }

    /**
     * Sets a parameter value, recording the change for undo.
     * No-op when the value equals the current one. Otherwise the redo stack is cleared, since the
     * edit diverges from the redo path. Parameters absent from the initial values are accepted.
     * @param parameter string - Parameter id
     * @param value ParameterValue - New value
     */
    public Set(parameter: string, value: ParameterValue): void {
        const oldValue = Object.hasOwn(this._currentValues, parameter) ? this._currentValues[parameter] : undefined;

        if (ValuesEqual(oldValue, value)) {
            return;
        }
        this._undoStack.push({ parameter, oldValue, newValue: value });
        this._redoStack = [];
        this._currentValues[parameter] = value;
        this.events.emit(EVENT_NAMES.sessionValueChanged, parameter, value);
    }

    /**
     * Reverts the most recent change.
     * @returns boolean - False when there is nothing to undo
     */
    public Undo(): boolean {
        const entry = this._undoStack.pop();

        if (!entry) {
            return false;
        }
        this._redoStack.push(entry);
        this._apply(entry.parameter, entry.oldValue);
        return true;
    }

    /**
     * Re-applies the most recently undone change.
     * @returns boolean - False when there is nothing to redo
     */
    public Redo(): boolean {
        const entry = this._redoStack.pop();

        if (!entry) {
            return false;
        }
        this._undoStack.push(entry);
        this._apply(entry.parameter, entry.newValue);
        return true;
    }

    /** Current value of a parameter, or undefined when the session does not hold it. */
    public GetCurrentValue(parameter: string): ParameterValue | undefined {
        return Object.hasOwn(this._currentValues, parameter) ? this._currentValues[parameter] : undefined;
    }

    /** Copy of all current values. */
    public GetCurrentValues(): ValueSet {
        return { ...this._currentValues };
    }

    /** Copy of the values the session was opened with. */
    public GetInitialValues(): ValueSet {
        return { ...this._initialValues };
    }

    /**
     * Parameters whose current value differs from the initial one.
     * Suitable for a partial paramset write.
     * @returns ValueSet - Changed parameters with their current values
     */
    public GetChanges(): ValueSet {
        const changes: ValueSet = {};

        for (const [param, value] of Object.entries(this._currentValues)) {
            const initial = Object.hasOwn(this._initialValues, param) ? this._initialValues[param] : undefined;

            if (!ValuesEqual(initial, value)) {
                changes[param] = value;
            }
        }
        return changes;
    }

    /**
     * Detailed diff between initial and current values, restricted to described parameters.
     * New values that pass validation are reported in their coerced form.
     * @returns ChangeDiff
     */
    public GetChangedParameters(): ChangeDiff {
        const result: ChangeDiff = {};

        for (const [param, change] of Object.entries(BuildChangeDiff(this._initialValues, this._currentValues))) {
            const descriptor = this._descriptorFor(param);

            if (!descriptor) {
                log.debug(`Skipping undescribed parameter '${param}' in change diff`, `ConfigSession`);
                continue;
            }
            const outcome = this._validator.ValidateValue(descriptor, change.new);
            result[param] = { old: change.old, new: outcome.valid ? outcome.value : change.new };
        }
        return result;
    }

    /**
     * Validates every current value against its descriptor.
     * @returns ValidationFailures - Failures only; empty when everything is valid
     */
    public Validate(): ValidationFailures {
        return this._validateValues(this._currentValues, false);
    }

    /**
     * Validates only the changed values. Changed read-only parameters fail as well.
     * @returns ValidationFailures - Failures only; empty when everything is valid
     */
    public ValidateChanges(): ValidationFailures {
        return this._validateValues(this.GetChanges(), true);
    }

    /**
     * Sets every held parameter that has a descriptor default back to that default.
     * Each reset goes through `Set`, so it is undoable step by step.
     */
    public ResetToDefaults(): void {
        for (const [param, descriptor] of Object.entries(this._descriptions)) {
            const fallback = descriptor.defaultValue;

            if (fallback !== undefined && fallback !== null && Object.hasOwn(this._currentValues, param)) {
                this.Set(param, fallback);
            }
        }
    }

    /** Drops all edits and history. Not undoable. */
    public Discard(): void {
        this._currentValues = { ...this._initialValues };
        this._undoStack = [];
        this._redoStack = [];
        this.events.emit(EVENT_NAMES.sessionDiscarded);
    }

    private _descriptorFor(parameter: string): ParameterDescriptor | undefined {
        return Object.hasOwn(this._descriptions, parameter) ? this._descriptions[parameter] : undefined;
    }

    /** Restores a value; undefined removes a parameter that was absent before the edit. */
    private _apply(parameter: string, value: ParameterValue | undefined): void {
        if (value === undefined) {
            delete this._currentValues[parameter];
        } else {
            this._currentValues[parameter] = value;
        }
        this.events.emit(EVENT_NAMES.sessionValueChanged, parameter, value);
    }

    private _validateValues(values: ValueSet, checkWritable: boolean): ValidationFailures {
        const failures: ValidationFailures = {};

        for (const [param, value] of Object.entries(values)) {
            const descriptor = this._descriptorFor(param);

            if (!descriptor) {
                failures[param] = { valid: false, reason: `unknown parameter`, value };
                continue;
            }

            if (checkWritable && !descriptor.writable) {
                failures[param] = { valid: false, reason: `parameter is read-only`, value };
                continue;
            }
            const outcome = this._validator.ValidateValue(descriptor, value);

            if (!outcome.valid) {
                failures[param] = outcome;
            }
        }
        return failures;
    }
}
