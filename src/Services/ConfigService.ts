import { EventEmitter } from 'events';
import Joi from 'joi';
import { dirname, resolve } from 'path';
import { ApplyEnvOverrides, LoadConfig } from '../Config.js';
import { Configurator } from '../Common/Configurator.js';
import { AppError, InternalError } from '../Common/Errors.js';
import { EVENT_NAMES } from '../Domain/index.js';
import type { ValidatedConfig } from '../Types/Config.js';
import { DEFAULT_MAX_ENTRIES } from './ConfigChangeLog.js';
import { DEFAULT_LOCALE } from './ProfileStore.js';

/** Joi schema for the library configuration. Unknown keys are tolerated. */
export const CONFIG_SCHEMA = Joi.object<ValidatedConfig>({
    logLevel: Joi.string().valid(`debug`, `info`, `warn`, `error`).default(`info`),
    defaultLocale: Joi.string().min(2).default(DEFAULT_LOCALE),
    changeLog: Joi.object({
        maxEntries: Joi.number().integer().positive().default(DEFAULT_MAX_ENTRIES),
    }).default({ maxEntries: DEFAULT_MAX_ENTRIES }),
    profileCatalogPath: Joi.string(),
}).unknown(true);

/**
 * Service responsible for loading and validating the library configuration.
 */
export class ConfigService {
    /** Event bus for emitting config-related events */
    private _eventBus: EventEmitter;

    /**
     * Constructs a ConfigService.
     * @param eventBus EventEmitter - Event bus used for emitting `config.loaded`.
     */
    constructor(eventBus: EventEmitter) {
        this._eventBus = eventBus;
    }

    /**
     * Loads and validates the configuration from a JSON or YAML file.
     * A relative `profileCatalogPath` is resolved against the config file's directory.
     * @param path string - Filesystem path to the config file. Example: './config/config.yaml'
     * @returns Promise<ValidatedConfig> - The validated config object.
     * @throws AppError if loading or validation fails.
     */
    public async Load(path: string): Promise<ValidatedConfig> {
        try {
            const rawConfig = await LoadConfig(path);
            return this._finish(rawConfig, dirname(resolve(path)));
        } catch (err) {
            if (err instanceof AppError) {
                throw err;
            }
            throw new InternalError(`Failed to load config from '${path}'`, { path }, err);
        }
    }

    /**
     * Validates an in-memory configuration object, with environment overrides applied.
     * @param raw unknown - Configuration object
     * @param baseDir string - Directory relative paths are resolved against [default: cwd]
     * @returns ValidatedConfig
     */
    public FromObject(raw: unknown, baseDir: string = process.cwd()): ValidatedConfig {
        return this._finish(ApplyEnvOverrides(raw), baseDir);
    }

    private _finish(rawConfig: unknown, baseDir: string): ValidatedConfig {
        const value = new Configurator<ValidatedConfig>(CONFIG_SCHEMA, rawConfig).getConfig();
        const validated: ValidatedConfig = {
            logLevel: value.logLevel,
            defaultLocale: value.defaultLocale,
            changeLog: { maxEntries: value.changeLog.maxEntries },
        };

        if (value.profileCatalogPath) {
            validated.profileCatalogPath = resolve(baseDir, value.profileCatalogPath);
        }
        this._eventBus.emit(EVENT_NAMES.configLoaded, validated);
        return validated;
    }
}
