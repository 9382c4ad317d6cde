import type { LogLevelName } from '../Common/Log.js';

/**
 * Validated configuration shape used across services.
 */
export interface ValidatedConfig {
    logLevel: LogLevelName;
    defaultLocale: string;
    changeLog: {
        maxEntries: number;
    };
    /** Absolute path of the profile catalog source, when one is configured. */
    profileCatalogPath?: string;
}
