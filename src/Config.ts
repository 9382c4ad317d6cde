/**
 * Loads the library configuration file and applies environment overrides.
 * Validation happens in ConfigService.
 */

import { readConfigFile } from './Common/ConfigReader.js';
import { ValidationError } from './Common/Errors.js';
import { EVENT_NAMES } from './Domain/index.js';
import { MAIN_EVENT_BUS } from './Events/MainEventBus.js';

/** Raw, unvalidated configuration object. */
export type RawConfig = Record<string, unknown>;

/** Environment variables that override file settings (highest precedence). */
export const CONFIG_ENV = {
    logLevel: 'DEVCFG_LOG_LEVEL',
    defaultLocale: 'DEVCFG_DEFAULT_LOCALE',
    changeLogMaxEntries: 'DEVCFG_CHANGE_LOG_MAX_ENTRIES',
    profileCatalog: 'DEVCFG_PROFILE_CATALOG',
} as const;

function _isRecord(value: unknown): value is RawConfig {
    return typeof value === `object` && value !== null && !Array.isArray(value);
}

/**
 * Applies environment overrides to a raw configuration object.
 * @param parsed unknown - Parsed file content; null/undefined count as an empty object
 * @param env NodeJS.ProcessEnv - Environment to read [default: process.env]
 * @returns RawConfig - New object; the input is not mutated
 * @throws ValidationError if the parsed content is not an object
 */
export function ApplyEnvOverrides(parsed: unknown, env: NodeJS.ProcessEnv = process.env): RawConfig {
    let config: RawConfig;

    if (parsed === null || parsed === undefined) {
        config = {};
    } else if (_isRecord(parsed)) {
        config = { ...parsed };
    } else {
        throw new ValidationError(`Configuration root must be an object`);
    }

    const logLevel = env[CONFIG_ENV.logLevel];
    if (logLevel) {
        config.logLevel = logLevel;
    }

    const defaultLocale = env[CONFIG_ENV.defaultLocale];
    if (defaultLocale) {
        config.defaultLocale = defaultLocale;
    }

    const maxEntries = env[CONFIG_ENV.changeLogMaxEntries];
    if (maxEntries) {
        config.changeLog = { ...(_isRecord(config.changeLog) ? config.changeLog : {}), maxEntries };
    }

    const catalog = env[CONFIG_ENV.profileCatalog];
    if (catalog) {
        config.profileCatalogPath = catalog;
    }
    return config;
}

/**
 * Loads and parses the configuration file with environment overrides and event emission.
 * Supports JSON and YAML configuration formats.
 * @param configPath string - Path to configuration file (JSON or YAML format)
 * @returns Promise<RawConfig> - Parsed configuration object, not yet validated
 * @example
 * const raw = await LoadConfig('./config/config.yaml');
 */
export async function LoadConfig(configPath: string): Promise<RawConfig> {
    try {
        const parsedConfig = await readConfigFile(configPath);
        return ApplyEnvOverrides(parsedConfig);
    } catch (configError) {
        MAIN_EVENT_BUS.Emit(EVENT_NAMES.configError, configError);
        throw configError;
    }
}
