/**
 * Link profile interfaces.
 * A profile is a pre-canned combination of parameter constraints for a sender/receiver channel type pair.
 */

import type { ParameterValue } from './Values.js';

/** Locale code -> text. */
export type LocalizedText = Readonly<Record<string, string>>;

/** Parameter must equal `value` exactly. */
export interface FixedConstraint {
    readonly kind: `fixed`;
    readonly value: ParameterValue;
}

/** Parameter must be one of `values`; `default` is a member of `values`. */
export interface ListConstraint {
    readonly kind: `list`;
    readonly values: readonly ParameterValue[];
    readonly default: ParameterValue;
}

/** Parameter must lie in `[min, max]`; `default` lies in the range. */
export interface RangeConstraint {
    readonly kind: `range`;
    readonly min: number;
    readonly max: number;
    readonly default: number;
}

export type ParamConstraint = FixedConstraint | ListConstraint | RangeConstraint;

/** Validated profile definition. `id` 0 is reserved for the synthesized Expert profile. */
export interface ProfileDef {
    readonly id: number;
    readonly name: LocalizedText;
    readonly description: LocalizedText;
    readonly params: Readonly<Record<string, ParamConstraint>>;
}

/**
 * Immutable profile catalog.
 * Lookups are keyed by the channel type pair; the sequence order is the match priority.
 */
export interface ProfileCatalog {
    /** Profiles for the pair, or undefined when the pair is not defined at all. */
    get(senderChannelType: string, receiverChannelType: string): readonly ProfileDef[] | undefined;
    /** Number of channel type pairs in the catalog. */
    readonly pairCount: number;
}

/** Locale-specific projection of a profile for rendering. */
export interface ResolvedProfile {
    id: number;
    name: string;
    description: string;
    editableParams: string[]; // list and range constrained
    fixedParams: Record<string, ParameterValue>;
    defaultValues: Record<string, ParameterValue>;
    fixedDurations: Record<string, number>; // time pair id -> seconds, when base and factor are both fixed
}

/** Profile id reported when no predefined profile matches. */
export const EXPERT_PROFILE_ID = 0;
