/**
 * device-config-state: edit sessions, change log and link profile resolution for device paramsets.
 */

export * from './Domain/index.js';

// Errors & logging
export {
    AppError,
    ERROR_CODES,
    InternalError,
    NotFoundError,
    UnsupportedVersionError,
    ValidationError,
} from './Common/Errors.js';
export type { ErrorCode, ErrorDetails } from './Common/Errors.js';
export { GetLogLevel, LogLevel, SetLogLevel, log } from './Common/Log.js';
export type { LogLevelName } from './Common/Log.js';

// Pure helpers
export { BuildChangeDiff, ValueSetsEqual, ValuesEqual } from './Common/Diff.js';
export {
    DecodeTimeValue,
    EncodeTimeValue,
    GetTimePresets,
    PRESETS_BY_TYPE,
    TIME_BASE_UNITS,
    TIME_SELECTOR_TYPES,
} from './Common/TimeCodec.js';
export type { TimePreset, TimePresetOption, TimeSelectorType } from './Common/TimeCodec.js';
export { ClassifyLinkParameter, KEYPRESS_GROUPS, LINK_PARAM_CATEGORIES } from './Common/LinkParamMetadata.js';
export type { KeypressGroup, LinkParamCategory, LinkParamMeta } from './Common/LinkParamMetadata.js';

// Engines
export { ConfigSession } from './Services/ConfigSession.js';
export type { ConfigSessionOptions } from './Services/ConfigSession.js';
export { DescriptorValidator, IsParameterValue } from './Services/DescriptorValidator.js';
export { ConfigChangeLog, DEFAULT_MAX_ENTRIES } from './Services/ConfigChangeLog.js';
export type { ConfigChangeLogOptions } from './Services/ConfigChangeLog.js';
export { LoadProfileCatalog, LoadProfileCatalogFile } from './Services/ProfileCatalogLoader.js';
export { DEFAULT_LOCALE, ProfileStore, SatisfiesConstraint } from './Services/ProfileStore.js';
export type { ProfileStoreOptions } from './Services/ProfileStore.js';
export { ExportConfiguration, ImportConfiguration } from './Services/ConfigExporter.js';

// Configuration & bootstrap
export { ApplyEnvOverrides, CONFIG_ENV, LoadConfig } from './Config.js';
export type { RawConfig } from './Config.js';
export { CONFIG_SCHEMA, ConfigService } from './Services/ConfigService.js';
export type { ValidatedConfig } from './Types/Config.js';
export { MAIN_EVENT_BUS, MainEventBus } from './Events/MainEventBus.js';
export { BootstrapRuntime, CreateRuntime } from './Setup/Runtime.js';
export type { ConfigRuntime } from './Setup/Runtime.js';
