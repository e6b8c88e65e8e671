import { Db } from "mongodb";
import { SharedStateStore } from "../SharedStateStore";
import { globToRegExp } from "../Glob";

interface ValueDoc {
    _id: string;
    value: unknown;
}

interface HashFieldDoc {
    key: string;
    field: string;
    value: unknown;
}

interface SetDoc {
    _id: string;
    members: string[];
}

export interface StateStoreCollections {
    values: string;
    hashes: string;
    sets: string;
}

/**
 * Shared state store on MongoDB.
 * 
 * - values: one document per key
 * - hashes: one document per (key, field), so that field writes are independent upserts
 * - sets: one document per key with a members array, updated with $addToSet / $pull
 */
export class MongoStateStore implements SharedStateStore {

    constructor(private db: Db, private collections: StateStoreCollections) { }

    private values() { return this.db.collection<ValueDoc>(this.collections.values) }
    private hashes() { return this.db.collection<HashFieldDoc>(this.collections.hashes) }
    private sets() { return this.db.collection<SetDoc>(this.collections.sets) }

    async getValue(key: string): Promise<unknown> {

        const doc = await this.values().findOne({ _id: key });

        return doc?.value;
    }

    async setValue(key: string, value: unknown): Promise<void> {

        await this.values().updateOne({ _id: key }, { $set: { value: value } }, { upsert: true });
    }

    async getField(key: string, field: string): Promise<unknown> {

        const doc = await this.hashes().findOne({ key: key, field: field });

        return doc?.value;
    }

    async setField(key: string, field: string, value: unknown): Promise<void> {

        await this.hashes().updateOne({ key: key, field: field }, { $set: { value: value } }, { upsert: true });
    }

    async getFields(key: string): Promise<Record<string, unknown>> {

        const docs = await this.hashes().find({ key: key }).toArray();

        const result: Record<string, unknown> = {};

        for (const doc of docs) result[doc.field] = doc.value;

        return result;
    }

    async addMember(key: string, member: string): Promise<void> {

        await this.sets().updateOne({ _id: key }, { $addToSet: { members: member } }, { upsert: true });
    }

    async removeMember(key: string, member: string): Promise<void> {

        await this.sets().updateOne({ _id: key }, { $pull: { members: member } });
    }

    async getMembers(key: string): Promise<string[]> {

        const doc = await this.sets().findOne({ _id: key });

        return doc?.members ?? [];
    }

    async deleteByPattern(pattern: string): Promise<number> {

        const regex = globToRegExp(pattern);

        // Hashes count once per key, not once per field
        const hashKeys: string[] = await this.hashes().distinct("key", { key: { $regex: regex } });

        const [values, hashes, sets] = await Promise.all([
            this.values().deleteMany({ _id: { $regex: regex } }),
            this.hashes().deleteMany({ key: { $regex: regex } }),
            this.sets().deleteMany({ _id: { $regex: regex } }),
        ]);

        return values.deletedCount + sets.deletedCount + (hashes.deletedCount > 0 ? hashKeys.length : 0);
    }
}
