/**
 * Validation and loading of the static link profile catalog.
 * Structural problems are rejected here, at load time; the resolution engine assumes a valid catalog.
 */
import { decodeHTML } from 'entities';
import Joi from 'joi';
import type { LocalizedText, ParamConstraint, ParameterValue, ProfileCatalog, ProfileDef } from '../Domain/index.js';
import { EVENT_NAMES } from '../Domain/index.js';
import { readConfigFile } from '../Common/ConfigReader.js';
import { FromJoiError, ValidationError } from '../Common/Errors.js';
import { ClassifyLinkParameter, LINK_PARAM_CATEGORIES } from '../Common/LinkParamMetadata.js';
import { log } from '../Common/Log.js';
import { TIME_BASE_UNITS } from '../Common/TimeCodec.js';
import { MAIN_EVENT_BUS } from '../Events/MainEventBus.js';

/** Constraint as written in the catalog source. */
interface RawConstraint {
    constraint_type: `fixed` | `list` | `range`;
    value?: ParameterValue;
    values?: ParameterValue[];
    default?: ParameterValue;
    min_value?: number;
    max_value?: number;
}

interface RawProfile {
    id: number;
    name: Record<string, string>;
    description: Record<string, string>;
    params: Record<string, RawConstraint>;
}

/** receiver channel type -> sender channel type -> profile list */
type RawCatalog = Record<string, Record<string, { profiles: RawProfile[] }>>;

const _scalar = Joi.alternatives(Joi.number(), Joi.string(), Joi.boolean());
// Field required for the listed constraint types and forbidden for the others
const _onlyFor = (type: RawConstraint['constraint_type'] | RawConstraint['constraint_type'][], schema: Joi.AnySchema) =>
    Joi.when(`constraint_type`, { is: Joi.valid(...[type].flat()), then: schema.required(), otherwise: Joi.forbidden() });

const _constraintSchema = Joi.object<RawConstraint>({
    constraint_type: Joi.string().valid(`fixed`, `list`, `range`).required(),
    value: _onlyFor(`fixed`, _scalar),
    values: _onlyFor(`list`, Joi.array().items(_scalar).min(1)),
    default: _onlyFor([`list`, `range`], _scalar),
    min_value: _onlyFor(`range`, Joi.number()),
    max_value: _onlyFor(`range`, Joi.number()),
});

const _textSchema = Joi.object().pattern(Joi.string(), Joi.string().allow(``)).default({});

const _profileSchema = Joi.object<RawProfile>({
    id: Joi.number().integer().min(1).required().messages({
        'number.min': `{{#label}} must be at least 1 (0 is reserved for the Expert profile)`,
    }),
    name: _textSchema,
    description: _textSchema,
    params: Joi.object().pattern(Joi.string(), _constraintSchema).default({}),
});

const _catalogSchema = Joi.object<RawCatalog>()
    .pattern(
        Joi.string(),
        Joi.object().pattern(
            Joi.string(),
            Joi.object({
                profiles: Joi.array().items(_profileSchema).required(),
            }),
        ),
    )
    .required();

/** Frozen map-backed catalog. */
class StaticProfileCatalog implements ProfileCatalog {
    private readonly _byReceiver: ReadonlyMap<string, ReadonlyMap<string, readonly ProfileDef[]>>;
    public readonly pairCount: number;

    constructor(byReceiver: Map<string, Map<string, readonly ProfileDef[]>>) {
        this._byReceiver = byReceiver;
        this.pairCount = Array.from(byReceiver.values()).reduce((count, senders) => count + senders.size, 0);
    }

    public get(senderChannelType: string, receiverChannelType: string): readonly ProfileDef[] | undefined {
        return this._byReceiver.get(receiverChannelType)?.get(senderChannelType);
    }
}

function _toConstraint(raw: RawConstraint, where: Record<string, unknown>): ParamConstraint {
    switch (raw.constraint_type) {
        case `fixed`:
            if (raw.value === undefined) {
                throw new ValidationError(`fixed constraint without value`, where);
            }
            return Object.freeze({ kind: `fixed`, value: raw.value });
        case `list`: {
            const values = raw.values ?? [];
            const fallback = raw.default;

            if (fallback === undefined || !values.includes(fallback)) {
                throw new ValidationError(`list constraint default ${String(fallback)} is not one of its values`, where);
            }
            return Object.freeze({ kind: `list`, values: Object.freeze([...values]), default: fallback });
        }
        case `range`: {
            const { min_value: min, max_value: max, default: fallback } = raw;

            if (min === undefined || max === undefined || min > max) {
                throw new ValidationError(`range constraint has min ${min} greater than max ${max}`, where);
            }

            if (typeof fallback !== `number` || fallback < min || fallback > max) {
                throw new ValidationError(`range constraint default ${String(fallback)} is outside [${min}, ${max}]`, where);
            }
            return Object.freeze({ kind: `range`, min, max, default: fallback });
        }
    }
}

/** Fixed `*_TIME_BASE` values must index the unit table; fixed `*_TIME_FACTOR` values must be non-negative integers. */
function _checkFixedTime(parameter: string, constraint: ParamConstraint, where: Record<string, unknown>): void {
    if (constraint.kind !== `fixed` || ClassifyLinkParameter(parameter).category !== LINK_PARAM_CATEGORIES.time) {
        return;
    }
    const { value } = constraint;
    const isBase = parameter.toUpperCase().endsWith(`_BASE`);
    const count = typeof value === `number` && Number.isInteger(value) && value >= 0 ? value : undefined;

    if (isBase && (count === undefined || count >= TIME_BASE_UNITS.length)) {
        throw new ValidationError(`fixed time base ${String(value)} is not one of 0-${TIME_BASE_UNITS.length - 1}`, where);
    }

    if (!isBase && count === undefined) {
        throw new ValidationError(`fixed time factor ${String(value)} is not a non-negative integer`, where);
    }
}

// Catalogs generated from device UI sources carry HTML entities (e.g. `&auml;`)
function _decodeText(text: Record<string, string>): LocalizedText {
    const decoded: Record<string, string> = {};

    for (const [locale, value] of Object.entries(text)) {
        decoded[locale] = decodeHTML(value);
    }
    return Object.freeze(decoded);
}

function _toProfile(raw: RawProfile, receiverChannelType: string, senderChannelType: string): ProfileDef {
    const params: Record<string, ParamConstraint> = {};

    for (const [parameter, rawConstraint] of Object.entries(raw.params)) {
        const where = { receiverChannelType, senderChannelType, profileId: raw.id, parameter };
        const constraint = _toConstraint(rawConstraint, where);
        _checkFixedTime(parameter, constraint, where);
        params[parameter] = constraint;
    }
    return Object.freeze({
        id: raw.id,
        name: _decodeText(raw.name),
        description: _decodeText(raw.description),
        params: Object.freeze(params),
    });
}

/**
 * Validates a parsed catalog source and builds the immutable catalog.
 * @param raw unknown - `{ [receiverType]: { [senderType]: { profiles: [...] } } }`
 * @returns ProfileCatalog
 * @throws ValidationError on malformed shapes, reserved or duplicate profile ids, a list default
 * outside its values, a range with min > max or a default outside it, or a fixed time base/factor
 * that does not decode
 * @example
 * const catalog = LoadProfileCatalog(JSON.parse(source));
 */
export function LoadProfileCatalog(raw: unknown): ProfileCatalog {
    const { error, value } = _catalogSchema.validate(raw, { abortEarly: false, convert: false });

    if (error) {
        throw FromJoiError(`profile catalog`, error);
    }
    const byReceiver = new Map<string, Map<string, readonly ProfileDef[]>>();
    let profileCount = 0;

    for (const [receiverChannelType, senders] of Object.entries(value)) {
        const bySender = new Map<string, readonly ProfileDef[]>();

        for (const [senderChannelType, profileSet] of Object.entries(senders)) {
            const seen = new Set<number>();
            const profiles = profileSet.profiles.map(profile => {
                if (seen.has(profile.id)) {
                    throw new ValidationError(`duplicate profile id ${profile.id}`, {
                        receiverChannelType,
                        senderChannelType,
                        profileId: profile.id,
                    });
                }
                seen.add(profile.id);
                return _toProfile(profile, receiverChannelType, senderChannelType);
            });
            profileCount += profiles.length;
            bySender.set(senderChannelType, Object.freeze(profiles));
        }
        byReceiver.set(receiverChannelType, bySender);
    }
    const catalog = new StaticProfileCatalog(byReceiver);
    log.info(`Loaded ${profileCount} profiles for ${catalog.pairCount} channel type pairs`, `ProfileCatalogLoader`);
    MAIN_EVENT_BUS.Emit(EVENT_NAMES.catalogLoaded, catalog.pairCount, profileCount);
    return catalog;
}

/**
 * Reads a catalog source file (JSON or YAML) and loads it.
 * I/O happens here, before any resolution engine is built.
 * @param path string - Path to the catalog file
 * @returns Promise<ProfileCatalog>
 */
export async function LoadProfileCatalogFile(path: string): Promise<ProfileCatalog> {
    const raw = await readConfigFile(path);
    return LoadProfileCatalog(raw);
}
