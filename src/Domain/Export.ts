/**
 * Exported configuration snapshot used for backup and transfer between devices.
 */

import type { ValueSet } from './Values.js';

/** Current export format version. Imports carrying another version are rejected. */
export const EXPORT_FORMAT_VERSION = `1.0`;

export interface ExportedConfiguration {
    version: string;
    exported_at: string; // ISO-8601
    device_address: string;
    model: string;
    channel_address: string;
    channel_type: string;
    paramset_key: string;
    values: ValueSet;
}

/** Fields a caller supplies to `ExportConfiguration`. */
export type ExportInput = Omit<ExportedConfiguration, 'version' | 'exported_at'>;
