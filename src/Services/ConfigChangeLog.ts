import Joi from 'joi';
import type {
    ChangeDiff,
    ChangeLogEntry,
    ChangeLogInput,
    ChangeLogPage,
    ChangeLogQuery,
    ChangeLogRecord,
    FrozenChangeDiff,
    ValueChange,
} from '../Domain/index.js';
import { BoundedQueue } from '../Common/BoundedQueue.js';
import { FromJoiError, ValidationError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';

/** Capacity used when none is configured. */
export const DEFAULT_MAX_ENTRIES = 500;

// String first so that numeric strings stay strings
const _scalarSchema = Joi.alternatives(Joi.string().allow(``), Joi.number(), Joi.boolean());

const _changeSchema = Joi.object({
    old: _scalarSchema.allow(null).default(null),
    new: _scalarSchema.required(),
});

/** Persisted record shape; missing fields of legacy records fall back to empty values. */
const _recordSchema = Joi.object<ChangeLogRecord>({
    timestamp: Joi.string().isoDate().allow(``).default(``),
    entry_id: Joi.string().allow(``).default(``),
    interface_id: Joi.string().allow(``).default(``),
    channel_address: Joi.string().allow(``).default(``),
    device_name: Joi.string().allow(``).default(``),
    device_model: Joi.string().allow(``).default(``),
    paramset_key: Joi.string().allow(``).default(``),
    changes: Joi.object().pattern(Joi.string(), _changeSchema).default({}),
    source: Joi.string().allow(``).default(``),
});

const _recordListSchema = Joi.array<ChangeLogRecord[]>().items(_recordSchema).required();

/** Options for a ConfigChangeLog. */
export interface ConfigChangeLogOptions {
    /** Maximum number of retained entries [default: 500] */
    maxEntries?: number;
}

function _copyChanges(changes: FrozenChangeDiff): ChangeDiff {
    const copy: ChangeDiff = {};

    for (const [param, change] of Object.entries(changes)) {
        copy[param] = { old: change.old, new: change.new };
    }
    return copy;
}

function _freezeChanges(changes: FrozenChangeDiff): FrozenChangeDiff {
    const frozen: Record<string, Readonly<ValueChange>> = {};

    for (const [param, change] of Object.entries(changes)) {
        frozen[param] = Object.freeze({ old: change.old, new: change.new });
    }
    return Object.freeze(frozen);
}

function _freezeEntry(entry: ChangeLogEntry): ChangeLogEntry {
    return Object.freeze({ ...entry, changes: _freezeChanges(entry.changes) });
}

/**
 * ConfigChangeLog is an append-only, FIFO-capped history of committed paramset diffs.
 * When full, adding an entry evicts exactly the oldest one.
 * Mutations are not synchronized; callers sharing a log serialize `Add` / `ClearByEntryId` themselves.
 */
export class ConfigChangeLog {
    private readonly _entries: BoundedQueue<ChangeLogEntry>;

    /**
     * @param options ConfigChangeLogOptions - Capacity settings
     * @throws ValidationError when maxEntries is not a positive integer
     * @example
     * const changeLog = new ConfigChangeLog({ maxEntries: 100 });
     */
    constructor(options: ConfigChangeLogOptions = {}) {
        const maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;

        if (!Number.isInteger(maxEntries) || maxEntries <= 0) {
            throw new ValidationError(`maxEntries must be a positive integer, got ${maxEntries}`, { maxEntries });
        }
        this._entries = new BoundedQueue<ChangeLogEntry>(maxEntries);
    }

    public get maxEntries(): number {
        return this._entries.capacity;
    }

    /** Number of retained entries. */
    public get size(): number {
        return this._entries.size;
    }

    /**
     * Records a committed change, stamped with the current time.
     * @param input ChangeLogInput - Device identity, paramset key, diff and source
     * @returns ChangeLogEntry - The frozen entry that was appended
     * @example
     * changeLog.Add({ entryId: 'cfg-1', interfaceId: 'hmip', channelAddress: 'VCU001:1', deviceName: 'Hall',
     *     deviceModel: 'HmIP-BSM', paramsetKey: 'MASTER', changes: { LEVEL: { old: 0, new: 1 } }, source: 'manual' });
     */
    public Add(input: ChangeLogInput): ChangeLogEntry {
        const entry = _freezeEntry({
            timestamp: new Date().toISOString(),
            entryId: input.entryId,
            interfaceId: input.interfaceId,
            channelAddress: input.channelAddress,
            deviceName: input.deviceName,
            deviceModel: input.deviceModel,
            paramsetKey: input.paramsetKey,
            changes: input.changes,
            source: input.source,
        });
        const evicted = this._entries.Push(entry);

        if (evicted) {
            log.debug(`Evicted oldest change log entry '${evicted.entryId}' (${evicted.timestamp})`, `ConfigChangeLog`);
        }
        return entry;
    }

    /**
     * Entries matching the filters, newest first.
     * @param query ChangeLogQuery - Optional entryId / channelAddress filters and limit
     * @returns ChangeLogPage - `total` counts matches before the limit is applied
     */
    public GetEntries(query: ChangeLogQuery = {}): ChangeLogPage {
        const { entryId, channelAddress, limit } = query;

        if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
            throw new ValidationError(`limit must be a non-negative integer, got ${limit}`, { limit });
        }
        const matching = this._entries.ToArray().filter(entry => {
            return (
                (entryId === undefined || entry.entryId === entryId) &&
                (channelAddress === undefined || entry.channelAddress === channelAddress)
            );
        });
        const total = matching.length;
        const window = limit === undefined ? matching : matching.slice(Math.max(0, total - limit));
        return { entries: window.reverse(), total };
    }

    /**
     * Removes every entry with the given entry id; other entries keep their order.
     * @param entryId string
     * @returns number - How many entries were removed
     */
    public ClearByEntryId(entryId: string): number {
        const all = this._entries.ToArray();
        const kept = all.filter(entry => entry.entryId !== entryId);
        this._entries.Reset(kept);
        return all.length - kept.length;
    }

    /** Removes every entry. */
    public Clear(): void {
        this._entries.Clear();
    }

    /**
     * Serializes all entries, oldest first, for an external store.
     * @returns ChangeLogRecord[]
     */
    public ToDicts(): ChangeLogRecord[] {
        return this._entries.ToArray().map(entry => {
            return {
                timestamp: entry.timestamp,
                entry_id: entry.entryId,
                interface_id: entry.interfaceId,
                channel_address: entry.channelAddress,
                device_name: entry.deviceName,
                device_model: entry.deviceModel,
                paramset_key: entry.paramsetKey,
                changes: _copyChanges(entry.changes),
                source: entry.source,
            };
        });
    }

    /**
     * Replaces the log with previously serialized records (oldest first).
     * Missing fields default to empty values; only the newest `maxEntries` are kept.
     * @param rawEntries unknown - Output of `ToDicts`, typically read back from storage
     * @throws ValidationError when the data is not a record list or carries foreign fields or types;
     * the log is left untouched in that case
     */
    public LoadEntries(rawEntries: unknown): void {
        const { error, value } = _recordListSchema.validate(rawEntries, { convert: false, abortEarly: false });

        if (error) {
            log.warning(`Rejected persisted change log: ${error.message}`, `ConfigChangeLog`);
            throw FromJoiError(`persisted change log`, error);
        }
        const loaded = value.map(record => {
            return _freezeEntry({
                timestamp: record.timestamp,
                entryId: record.entry_id,
                interfaceId: record.interface_id,
                channelAddress: record.channel_address,
                deviceName: record.device_name,
                deviceModel: record.device_model,
                paramsetKey: record.paramset_key,
                changes: record.changes,
                source: record.source,
            });
        });

        if (loaded.length > this.maxEntries) {
            log.debug(`Truncating ${loaded.length} loaded entries to the newest ${this.maxEntries}`, `ConfigChangeLog`);
        }
        this._entries.Reset(loaded);
    }
}
