import Joi from 'joi';
import type { ParameterDescriptor, ParameterValidator, ParameterValue, ValidationOutcome } from '../Domain/index.js';
import { PARAMETER_TYPES } from '../Domain/index.js';

/** True for the scalar shapes a parameter may hold. */
export function IsParameterValue(value: unknown): value is ParameterValue {
    return (
        typeof value === `boolean` || typeof value === `string` || (typeof value === `number` && !Number.isNaN(value))
    );
}

/**
 * DescriptorValidator is the default descriptor-validation collaborator.
 * It builds a Joi schema per descriptor and validates with conversion enabled, so a valid outcome
 * carries the coerced value (e.g. the string '3' for an INTEGER parameter becomes 3).
 */
export class DescriptorValidator implements ParameterValidator {
    /** Compiled schemas, reused across calls for the same descriptor object. */
    private readonly _schemas = new WeakMap<ParameterDescriptor, Joi.AnySchema>();

    /**
     * Validates a value against its descriptor.
     * @param descriptor ParameterDescriptor - Type, bounds and value list of the parameter
     * @param value unknown - Candidate value
     * @returns ValidationOutcome - Coerced value on success, reason on failure
     * @example
     * new DescriptorValidator().ValidateValue({ type: 'INTEGER', writable: true, min: 0, max: 30 }, 40);
     * // { valid: false, reason: '"value" must be less than or equal to 30', value: 40 }
     */
    public ValidateValue(descriptor: ParameterDescriptor, value: unknown): ValidationOutcome {
        const { error, value: converted } = this._schemaFor(descriptor).validate(value, { convert: true });

        if (error) {
            return { valid: false, reason: error.message, value };
        }
        const result: unknown = converted;

        if (!IsParameterValue(result)) {
            return { valid: false, reason: `value is not a scalar`, value };
        }
        return { valid: true, value: result };
    }

    private _schemaFor(descriptor: ParameterDescriptor): Joi.AnySchema {
        const cached = this._schemas.get(descriptor);

        if (cached) {
            return cached;
        }
        const schema = this._buildSchema(descriptor).required().label(`value`);
        this._schemas.set(descriptor, schema);
        return schema;
    }

    private _buildSchema(descriptor: ParameterDescriptor): Joi.AnySchema {
        switch (descriptor.type) {
            case PARAMETER_TYPES.bool:
            case PARAMETER_TYPES.action:
                return Joi.boolean();
            case PARAMETER_TYPES.integer:
                return this._bounded(Joi.number().integer(), descriptor);
            case PARAMETER_TYPES.float:
                return this._bounded(Joi.number(), descriptor);
            case PARAMETER_TYPES.enum: {
                const members = descriptor.valueList ?? [];

                if (members.length === 0) {
                    return Joi.number().integer().min(0);
                }
                // Devices accept either the member name or its index
                return Joi.alternatives(
                    Joi.string().valid(...members),
                    Joi.number()
                        .integer()
                        .min(0)
                        .max(members.length - 1),
                );
            }
            case PARAMETER_TYPES.string:
                return Joi.string().allow(``);
        }
    }

    private _bounded(schema: Joi.NumberSchema, descriptor: ParameterDescriptor): Joi.NumberSchema {
        let bounded = schema;

        if (descriptor.min !== undefined) {
            bounded = bounded.min(descriptor.min);
        }

        if (descriptor.max !== undefined) {
            bounded = bounded.max(descriptor.max);
        }
        return bounded;
    }
}
