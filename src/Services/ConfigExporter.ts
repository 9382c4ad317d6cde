/**
 * Configuration export and import for backup, transfer between devices of the same model, or comparison.
 */
import Joi from 'joi';
import type { ExportedConfiguration, ExportInput } from '../Domain/index.js';
import { EXPORT_FORMAT_VERSION } from '../Domain/index.js';
import { FromJoiError, UnsupportedVersionError, ValidationError } from '../Common/Errors.js';

const _exportSchema = Joi.object<ExportedConfiguration>({
    version: Joi.string().required(),
    exported_at: Joi.string().isoDate().required(),
    device_address: Joi.string().required(),
    model: Joi.string().required(),
    channel_address: Joi.string().required(),
    channel_type: Joi.string().required(),
    paramset_key: Joi.string().required(),
    values: Joi.object()
        .pattern(Joi.string(), Joi.alternatives(Joi.string().allow(``), Joi.number(), Joi.boolean()))
        .required(),
});

/**
 * Serializes a paramset snapshot as pretty-printed JSON, stamped with format version and time.
 * @param input ExportInput - Device identity, paramset key and values
 * @returns string - JSON document
 * @example
 * const json = ExportConfiguration({ device_address: 'VCU0000001', model: 'HmIP-eTRV-2',
 *     channel_address: 'VCU0000001:1', channel_type: 'HEATING_CLIMATECONTROL_TRANSCEIVER',
 *     paramset_key: 'MASTER', values: { TEMPERATURE_OFFSET: 1.5 } });
 */
export function ExportConfiguration(input: ExportInput): string {
    const document: ExportedConfiguration = {
        version: EXPORT_FORMAT_VERSION,
        exported_at: new Date().toISOString(),
        device_address: input.device_address,
        model: input.model,
        channel_address: input.channel_address,
        channel_type: input.channel_type,
        paramset_key: input.paramset_key,
        values: { ...input.values },
    };
    return JSON.stringify(document, null, 2);
}

/**
 * Parses an exported configuration.
 * @param json string - Document produced by ExportConfiguration
 * @returns ExportedConfiguration
 * @throws ValidationError for malformed JSON, a non-object document or a shape mismatch;
 * UnsupportedVersionError when the version is missing or differs from the current format
 */
export function ImportConfiguration(json: string): ExportedConfiguration {
    let data: unknown;

    try {
        data = JSON.parse(json);
    } catch (err) {
        throw new ValidationError(`Invalid configuration: not valid JSON`, undefined, err);
    }

    if (typeof data !== `object` || data === null || Array.isArray(data)) {
        throw new ValidationError(`Invalid configuration: expected a JSON object`);
    }
    const version = `version` in data ? data.version : undefined;

    if (version !== EXPORT_FORMAT_VERSION) {
        throw new UnsupportedVersionError(
            `Unsupported configuration version: ${JSON.stringify(version ?? ``)} (expected "${EXPORT_FORMAT_VERSION}")`,
            { version, expected: EXPORT_FORMAT_VERSION },
        );
    }
    const { error, value } = _exportSchema.validate(data, { convert: false, abortEarly: false });

    if (error) {
        throw FromJoiError(`configuration`, error);
    }
    return value;
}
