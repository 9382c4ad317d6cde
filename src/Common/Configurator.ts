import type { ObjectSchema } from 'joi';
import { FromJoiError } from './Errors.js';

/**
 * Configurator validates and stores configuration using a Joi schema.
 * @template T - The expected shape of the configuration object
 */
export class Configurator<T> {
    /** Joi schema used for validation */
    private readonly _schema: ObjectSchema<T>;
    /** Stored, validated configuration object */
    private readonly _config: T;

    /**
     * Creates a Configurator.
     * @param schema ObjectSchema<T> - Joi schema for validating the configuration
     * @param rawConfig unknown - Raw configuration object to validate
     * @throws ValidationError if validation fails
     * @example
     * const schema = Joi.object({ logLevel: Joi.string().default('info') });
     * const configurator = new Configurator(schema, {});
     */
    constructor(schema: ObjectSchema<T>, rawConfig: unknown) {
        this._schema = schema;
        this._config = this._validate(rawConfig);
    }

    /**
     * Retrieves the stored configuration.
     * @returns T - Validated configuration object
     */
    public getConfig(): T {
        return this._config;
    }

    private _validate(rawConfig: unknown): T {
        const { error, value } = this._schema.validate(rawConfig, { abortEarly: false });

        if (error) {
            throw FromJoiError(`configuration`, error);
        }
        return value;
    }
}
