import { SharedStateStore } from "../SharedStateStore";
import { globToRegExp } from "../Glob";

/**
 * In-process state store, used in local mode and in tests.
 * Values are deep-copied on the way in and out, like they would be on the wire.
 */
export class InMemoryStateStore implements SharedStateStore {

    private values = new Map<string, unknown>();
    private hashes = new Map<string, Map<string, unknown>>();
    private sets = new Map<string, Set<string>>();

    async getValue(key: string): Promise<unknown> {
        return copy(this.values.get(key));
    }

    async setValue(key: string, value: unknown): Promise<void> {
        this.values.set(key, copy(value));
    }

    async getField(key: string, field: string): Promise<unknown> {
        return copy(this.hashes.get(key)?.get(field));
    }

    async setField(key: string, field: string, value: unknown): Promise<void> {

        let hash = this.hashes.get(key);

        if (!hash) {
            hash = new Map();
            this.hashes.set(key, hash);
        }

        hash.set(field, copy(value));
    }

    async getFields(key: string): Promise<Record<string, unknown>> {

        const result: Record<string, unknown> = {};

        for (const [field, value] of this.hashes.get(key) ?? []) result[field] = copy(value);

        return result;
    }

    async addMember(key: string, member: string): Promise<void> {

        let set = this.sets.get(key);

        if (!set) {
            set = new Set();
            this.sets.set(key, set);
        }

        set.add(member);
    }

    async removeMember(key: string, member: string): Promise<void> {
        this.sets.get(key)?.delete(member);
    }

    async getMembers(key: string): Promise<string[]> {
        return Array.from(this.sets.get(key) ?? []);
    }

    async deleteByPattern(pattern: string): Promise<number> {

        const regex = globToRegExp(pattern);

        let deleted = 0;

        for (const map of [this.values, this.hashes, this.sets]) {
            for (const key of Array.from(map.keys())) {
                if (regex.test(key)) {
                    map.delete(key);
                    deleted++;
                }
            }
        }

        return deleted;
    }
}

function copy(value: unknown): unknown {

    if (value === undefined) return undefined;

    return JSON.parse(JSON.stringify(value));
}
