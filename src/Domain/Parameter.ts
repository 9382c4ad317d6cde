/**
 * Parameter descriptor collaborator interfaces.
 * Descriptors are supplied by the caller; the session never constructs or owns them.
 */

import type { ParameterValue } from './Values.js';

/** Type tags a descriptor may carry. */
export const PARAMETER_TYPES = {
    bool: 'BOOL',
    integer: 'INTEGER',
    float: 'FLOAT',
    enum: 'ENUM',
    string: 'STRING',
    action: 'ACTION',
} as const;

export type ParameterType = (typeof PARAMETER_TYPES)[keyof typeof PARAMETER_TYPES];

/** Description of a single paramset parameter. */
export interface ParameterDescriptor {
    type: ParameterType;
    writable: boolean;
    defaultValue?: ParameterValue | null; // null when the device reports no default
    min?: number;
    max?: number;
    valueList?: string[]; // ENUM members in device order
    unit?: string;
}

/** Descriptors keyed by parameter id. */
export type DescriptorSet = Record<string, ParameterDescriptor>;

/** Result of validating one value; carries the coerced value on success. */
export type ValidationOutcome =
    | { valid: true; value: ParameterValue }
    | { valid: false; reason: string; value: unknown };

/** Failures keyed by parameter id. Empty means every checked value passed. */
export type ValidationFailures = Record<string, Extract<ValidationOutcome, { valid: false }>>;

/**
 * Checks one value against its descriptor.
 * Implementations must not throw for invalid values; they report them in the outcome.
 */
export interface ParameterValidator {
    ValidateValue(descriptor: ParameterDescriptor, value: unknown): ValidationOutcome;
}
