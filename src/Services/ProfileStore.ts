import type {
    LocalizedText,
    ParamConstraint,
    ParameterValue,
    ProfileCatalog,
    ProfileDef,
    ResolvedProfile,
    ValueSet,
} from '../Domain/index.js';
import { EXPERT_PROFILE_ID } from '../Domain/index.js';
import { ClassifyLinkParameter, LINK_PARAM_CATEGORIES } from '../Common/LinkParamMetadata.js';
import { DecodeTimeValue } from '../Common/TimeCodec.js';
import { log } from '../Common/Log.js';

/** Locale used when a profile carries no text for the requested one. */
export const DEFAULT_LOCALE = `en`;

const _EXPERT_NAME: LocalizedText = { en: `Expert`, de: `Experte` };
const _EXPERT_DESCRIPTION: LocalizedText = {
    en: `Parameters are set individually; no predefined profile applies.`,
    de: `Die Parameter werden einzeln eingestellt; kein vordefiniertes Profil trifft zu.`,
};

/** Options for a ProfileStore. */
export interface ProfileStoreOptions {
    /** Fallback locale for names and descriptions [default: 'en'] */
    defaultLocale?: string;
}

/**
 * True when the current value satisfies the constraint. A missing value never does.
 * @param constraint ParamConstraint
 * @param current ParameterValue | undefined
 */
export function SatisfiesConstraint(constraint: ParamConstraint, current: ParameterValue | undefined): boolean {
    if (current === undefined) {
        return false;
    }

    switch (constraint.kind) {
        case `fixed`:
            return current === constraint.value;
        case `list`:
            return constraint.values.includes(current);
        case `range`:
            return typeof current === `number` && constraint.min <= current && current <= constraint.max;
    }
}

/**
 * ProfileStore resolves link profiles from an immutable catalog.
 * Safe to share between readers; it holds no mutable state.
 */
export class ProfileStore {
    private readonly _catalog: ProfileCatalog;
    private readonly _defaultLocale: string;

    /**
     * @param catalog ProfileCatalog - Catalog built once at startup (see LoadProfileCatalog)
     * @param options ProfileStoreOptions
     */
    constructor(catalog: ProfileCatalog, options: ProfileStoreOptions = {}) {
        this._catalog = catalog;
        this._defaultLocale = options.defaultLocale ?? DEFAULT_LOCALE;
    }

    /**
     * Profiles for a channel type pair, projected for a locale.
     * @param receiverChannelType string - Channel type of the link receiver (e.g. 'DIMMER_VIRTUAL_RECEIVER')
     * @param senderChannelType string - Channel type of the link sender (e.g. 'KEY_TRANSCEIVER')
     * @param locale string - Requested locale [default: store default locale]
     * @returns ResolvedProfile[] | null - null when the pair is not in the catalog; [] when the pair has no profiles
     */
    public GetProfiles(receiverChannelType: string, senderChannelType: string, locale?: string): ResolvedProfile[] | null {
        const profiles = this._catalog.get(senderChannelType, receiverChannelType);

        if (profiles === undefined) {
            log.debug(`No profiles for ${senderChannelType} -> ${receiverChannelType}`, `ProfileStore`);
            return null;
        }
        return profiles.map(profile => this._resolve(profile, locale ?? this._defaultLocale));
    }

    /**
     * Id of the first profile, in catalog order, whose every constraint the values satisfy.
     * Parameters a profile does not constrain are ignored; profiles without constraints never match.
     * @param receiverChannelType string
     * @param senderChannelType string
     * @param currentValues ValueSet - Current link paramset values
     * @returns number - Profile id, or 0 (Expert) when nothing matches or the pair is unknown
     */
    public MatchActiveProfile(receiverChannelType: string, senderChannelType: string, currentValues: ValueSet): number {
        const profiles = this._catalog.get(senderChannelType, receiverChannelType) ?? [];

        for (const profile of profiles) {
            const constraints = Object.entries(profile.params);

            if (constraints.length === 0) {
                continue;
            }
            const matches = constraints.every(([param, constraint]) => {
                const current = Object.hasOwn(currentValues, param) ? currentValues[param] : undefined;
                return SatisfiesConstraint(constraint, current);
            });

            if (matches) {
                return profile.id;
            }
        }
        return EXPERT_PROFILE_ID;
    }

    /**
     * The synthesized Expert profile (id 0), which stands for "no predefined profile".
     * @param locale string - Requested locale [default: store default locale]
     */
    public GetExpertProfile(locale?: string): ResolvedProfile {
        const requested = locale ?? this._defaultLocale;
        return {
            id: EXPERT_PROFILE_ID,
            name: this._localize(_EXPERT_NAME, requested) ?? _EXPERT_NAME.en,
            description: this._localize(_EXPERT_DESCRIPTION, requested) ?? _EXPERT_DESCRIPTION.en,
            editableParams: [],
            fixedParams: {},
            defaultValues: {},
            fixedDurations: {},
        };
    }

    private _localize(text: LocalizedText, locale: string): string | undefined {
        if (Object.hasOwn(text, locale) && text[locale]) {
            return text[locale];
        }
        return Object.hasOwn(text, this._defaultLocale) ? text[this._defaultLocale] : undefined;
    }

    private _resolve(profile: ProfileDef, locale: string): ResolvedProfile {
        const editableParams: string[] = [];
        const fixedParams: Record<string, ParameterValue> = {};
        const defaultValues: Record<string, ParameterValue> = {};

        for (const [param, constraint] of Object.entries(profile.params)) {
            if (constraint.kind === `fixed`) {
                fixedParams[param] = constraint.value;
            } else {
                editableParams.push(param);
                defaultValues[param] = constraint.default;
            }
        }
        return {
            id: profile.id,
            name: this._localize(profile.name, locale) ?? `Profile ${profile.id}`,
            description: this._localize(profile.description, locale) ?? ``,
            editableParams,
            fixedParams,
            defaultValues,
            fixedDurations: this._fixedDurations(fixedParams),
        };
    }

    /** Seconds for every time pair whose base and factor are both fixed to integers. */
    private _fixedDurations(fixedParams: Record<string, ParameterValue>): Record<string, number> {
        const pairs = new Map<string, { base?: number; factor?: number }>();

        for (const [param, value] of Object.entries(fixedParams)) {
            const meta = ClassifyLinkParameter(param);

            if (meta.category !== LINK_PARAM_CATEGORIES.time || !meta.timePairId || typeof value !== `number`) {
                continue;
            }
            const pair = pairs.get(meta.timePairId) ?? {};

            if (param.toUpperCase().endsWith(`_BASE`)) {
                pair.base = value;
            } else {
                pair.factor = value;
            }
            pairs.set(meta.timePairId, pair);
        }
        const durations: Record<string, number> = {};

        for (const [pairId, { base, factor }] of pairs) {
            if (base === undefined || factor === undefined) {
                continue;
            }

            // Checked by the catalog loader
            durations[pairId] = DecodeTimeValue(base, factor);
        }
        return durations;
    }
}
