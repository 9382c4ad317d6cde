/**
 * Change log interfaces.
 */

import type { ChangeDiff, FrozenChangeDiff } from './Values.js';

/** Immutable record of one committed paramset change. */
export interface ChangeLogEntry {
    readonly timestamp: string; // ISO-8601
    readonly entryId: string;
    readonly interfaceId: string;
    readonly channelAddress: string;
    readonly deviceName: string;
    readonly deviceModel: string;
    readonly paramsetKey: string;
    readonly changes: FrozenChangeDiff; // frozen down to each {old, new} pair
    readonly source: string;
}

/** Fields a caller supplies to `ConfigChangeLog.Add`; the log stamps the timestamp and copies the diff. */
export type ChangeLogInput = Omit<ChangeLogEntry, 'timestamp' | 'changes'> & { changes: ChangeDiff };

/** Persisted shape of a change log entry, as handed to and read back from an external store. */
export interface ChangeLogRecord {
    timestamp: string;
    entry_id: string;
    interface_id: string;
    channel_address: string;
    device_name: string;
    device_model: string;
    paramset_key: string;
    changes: ChangeDiff;
    source: string;
}

/** Filters for `ConfigChangeLog.GetEntries`. */
export interface ChangeLogQuery {
    entryId?: string;
    channelAddress?: string;
    limit?: number;
}

/** Page of entries, newest first, with the match count before truncation. */
export interface ChangeLogPage {
    entries: ChangeLogEntry[];
    total: number;
}
