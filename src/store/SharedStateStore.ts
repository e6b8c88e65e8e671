/**
 * Interface to the shared key/value store that holds durable intermediate state: registry entries,
 * context snapshots, group state and the result side-channel.
 * 
 * Implementations must make every single-key and single-field operation atomic.
 * Absent keys, fields and sets read as undefined (or empty), never as errors.
 */
export interface SharedStateStore {

    getValue(key: string): Promise<unknown>;
    setValue(key: string, value: unknown): Promise<void>;

    /**
     * Hash-like access: a map of fields stored under one key.
     */
    getField(key: string, field: string): Promise<unknown>;
    setField(key: string, field: string, value: unknown): Promise<void>;
    getFields(key: string): Promise<Record<string, unknown>>;

    /**
     * Set membership.
     */
    addMember(key: string, member: string): Promise<void>;
    removeMember(key: string, member: string): Promise<void>;
    getMembers(key: string): Promise<string[]>;

    /**
     * Deletes every key (value, hash or set) matching a glob pattern where "*" matches any sequence of characters and "?" a single one.
     * Best-effort: used for cleanup only.
     * 
     * @returns the number of deleted keys
     */
    deleteByPattern(pattern: string): Promise<number>;
}
