/**
 * Classification of link paramset parameters by naming convention.
 */
import { TIME_SELECTOR_TYPES, type TimeSelectorType } from './TimeCodec.js';

export const LINK_PARAM_CATEGORIES = {
    time: 'time',
    level: 'level',
    jumpTarget: 'jump_target',
    condition: 'condition',
    action: 'action',
    other: 'other',
} as const;

export type LinkParamCategory = (typeof LINK_PARAM_CATEGORIES)[keyof typeof LINK_PARAM_CATEGORIES];

/** SHORT_/LONG_ keypress partition; `common` when the id has neither prefix. */
export const KEYPRESS_GROUPS = {
    short: 'short',
    long: 'long',
    common: 'common',
} as const;

export type KeypressGroup = (typeof KEYPRESS_GROUPS)[keyof typeof KEYPRESS_GROUPS];

export interface LinkParamMeta {
    category: LinkParamCategory;
    keypressGroup: KeypressGroup;
    displayAsPercent: boolean;
    hasLastValue: boolean;
    hiddenByDefault: boolean;
    timePairId?: string; // e.g. SHORT_ON_TIME for SHORT_ON_TIME_BASE
    timeSelectorType?: TimeSelectorType;
}

const _TIME_TYPE_MAP: Readonly<Partial<Record<string, TimeSelectorType>>> = {
    ON_TIME: TIME_SELECTOR_TYPES.timeOnOff,
    OFF_TIME: TIME_SELECTOR_TYPES.timeOnOff,
    ONDELAY_TIME: TIME_SELECTOR_TYPES.delay,
    OFFDELAY_TIME: TIME_SELECTOR_TYPES.delay,
    ON_DELAY_TIME: TIME_SELECTOR_TYPES.delay,
    OFF_DELAY_TIME: TIME_SELECTOR_TYPES.delay,
    RAMP_ON_TIME: TIME_SELECTOR_TYPES.rampOnOff,
    RAMP_OFF_TIME: TIME_SELECTOR_TYPES.rampOnOff,
    RAMPON_TIME: TIME_SELECTOR_TYPES.rampOnOff,
    RAMPOFF_TIME: TIME_SELECTOR_TYPES.rampOnOff,
};

const _LEVEL_SUFFIXES = [`_LEVEL`, `_DIM_MIN_LEVEL`, `_DIM_MAX_LEVEL`];
const _ACTION_SUFFIXES = [`_ACTION_TYPE`, `_MULTIEXECUTE`];

function _stripKeypressPrefix(upper: string): [KeypressGroup, string] {
    if (upper.startsWith(`SHORT_`)) {
        return [KEYPRESS_GROUPS.short, upper.slice(6)];
    }

    if (upper.startsWith(`LONG_`)) {
        return [KEYPRESS_GROUPS.long, upper.slice(5)];
    }
    return [KEYPRESS_GROUPS.common, upper];
}

function _meta(category: LinkParamCategory, keypressGroup: KeypressGroup, extra: Partial<LinkParamMeta> = {}): LinkParamMeta {
    return {
        category,
        keypressGroup,
        displayAsPercent: false,
        hasLastValue: false,
        hiddenByDefault: false,
        ...extra,
    };
}

/**
 * Classifies a link parameter by its id.
 * @param parameterId string - e.g. 'SHORT_ON_TIME_BASE', 'LONG_JT_OFF', 'SHORT_ON_LEVEL'
 * @returns LinkParamMeta
 * @example
 * ClassifyLinkParameter('SHORT_ON_TIME_FACTOR').timePairId; // 'SHORT_ON_TIME'
 */
export function ClassifyLinkParameter(parameterId: string): LinkParamMeta {
    const [keypressGroup, suffix] = _stripKeypressPrefix(parameterId.toUpperCase());

    // *_TIME_BASE / *_TIME_FACTOR pairs
    const timeMatch = /^(.+_TIME)_(BASE|FACTOR)$/.exec(suffix);

    if (timeMatch) {
        const stem = timeMatch[1];
        const timePairId = keypressGroup === KEYPRESS_GROUPS.common ? stem : `${keypressGroup.toUpperCase()}_${stem}`;
        return _meta(LINK_PARAM_CATEGORIES.time, keypressGroup, {
            timePairId,
            timeSelectorType: _TIME_TYPE_MAP[stem],
        });
    }

    if (suffix.includes(`JT_`)) {
        return _meta(LINK_PARAM_CATEGORIES.jumpTarget, keypressGroup, { hiddenByDefault: true });
    }

    if (suffix.includes(`CT_`)) {
        return _meta(LINK_PARAM_CATEGORIES.condition, keypressGroup, { hiddenByDefault: true });
    }

    if (suffix === `LEVEL` || _LEVEL_SUFFIXES.some(s => suffix.endsWith(s))) {
        return _meta(LINK_PARAM_CATEGORIES.level, keypressGroup, { displayAsPercent: true, hasLastValue: true });
    }

    if (suffix === `MULTIEXECUTE` || _ACTION_SUFFIXES.some(s => suffix.endsWith(s))) {
        return _meta(LINK_PARAM_CATEGORIES.action, keypressGroup, { hiddenByDefault: true });
    }
    return _meta(LINK_PARAM_CATEGORIES.other, keypressGroup);
}
