/**
 * Domain interfaces and types for the configuration state library.
 */

// Values & diffs
export type { ParameterValue, ValueSet, ValueChange, ChangeDiff, FrozenChangeDiff, UndoEntry } from './Values.js';

// Parameter descriptors
export type {
    ParameterType,
    ParameterDescriptor,
    DescriptorSet,
    ValidationOutcome,
    ValidationFailures,
    ParameterValidator,
} from './Parameter.js';
export { PARAMETER_TYPES } from './Parameter.js';

// Profiles
export type {
    LocalizedText,
    FixedConstraint,
    ListConstraint,
    RangeConstraint,
    ParamConstraint,
    ProfileDef,
    ProfileCatalog,
    ResolvedProfile,
} from './Profile.js';
export { EXPERT_PROFILE_ID } from './Profile.js';

// Change log
export type { ChangeLogEntry, ChangeLogInput, ChangeLogRecord, ChangeLogQuery, ChangeLogPage } from './ChangeLog.js';

// Export / import
export type { ExportedConfiguration, ExportInput } from './Export.js';
export { EXPORT_FORMAT_VERSION } from './Export.js';

// Utility Types
export type { EventName } from './Utility.js';
export { EVENT_NAMES } from './Utility.js';
