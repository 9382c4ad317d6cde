/**
 * Runtime bootstrap: configuration, logging level, change log and, when configured, the profile store.
 */

import { SetLogLevel, log } from '../Common/Log.js';
import { MAIN_EVENT_BUS } from '../Events/MainEventBus.js';
import { ConfigChangeLog } from '../Services/ConfigChangeLog.js';
import { ConfigService } from '../Services/ConfigService.js';
import { LoadProfileCatalogFile } from '../Services/ProfileCatalogLoader.js';
import { ProfileStore } from '../Services/ProfileStore.js';
import type { ValidatedConfig } from '../Types/Config.js';

/** Long-lived, process-wide components. Sessions are created per edit by the caller. */
export interface ConfigRuntime {
    config: ValidatedConfig;
    changeLog: ConfigChangeLog;
    /** null when no profile catalog is configured */
    profileStore: ProfileStore | null;
}

/**
 * Builds the runtime from an already validated configuration.
 * All file I/O (the catalog) happens here, before the engines are handed out.
 * @param config ValidatedConfig
 * @returns Promise<ConfigRuntime>
 */
export async function CreateRuntime(config: ValidatedConfig): Promise<ConfigRuntime> {
    SetLogLevel(config.logLevel);
    const changeLog = new ConfigChangeLog({ maxEntries: config.changeLog.maxEntries });
    let profileStore: ProfileStore | null = null;

    if (config.profileCatalogPath) {
        const catalog = await LoadProfileCatalogFile(config.profileCatalogPath);
        profileStore = new ProfileStore(catalog, { defaultLocale: config.defaultLocale });
    } else {
        log.info(`No profile catalog configured; profile resolution disabled`, `Runtime`);
    }
    return { config, changeLog, profileStore };
}

/**
 * Loads the configuration file and builds the runtime.
 * @param configPath string - Path to the JSON/YAML config [default: $CONFIG_PATH or ./config/config.yaml]
 * @returns Promise<ConfigRuntime>
 * @example
 * const { changeLog, profileStore } = await BootstrapRuntime('./config/config.yaml');
 */
export async function BootstrapRuntime(configPath?: string): Promise<ConfigRuntime> {
    const path = configPath ?? process.env.CONFIG_PATH ?? `./config/config.yaml`;
    const config = await new ConfigService(MAIN_EVENT_BUS).Load(path);
    return CreateRuntime(config);
}
