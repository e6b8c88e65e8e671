import { SharedStateStore } from "../../store/SharedStateStore";
import { StateKeys } from "../../bus/Channels";
import { DependencyError } from "../../model/error/DependencyError";
import { isPlainObject } from "../../util/Objects";

/**
 * Who produces a result key.
 * For nodes, taskGroupId is the node id and taskName the node name.
 */
export interface ResultKeyEntry {
    taskGroupId: string;
    taskGroupName: string;
    taskName: string;
    dependencies: string[];
    timestamp: string;
}

/**
 * Session-scoped map from result key to its producer, kept in the shared state store.
 * 
 * Entries are additive: a result key registered again points to the latest producer.
 * Entries are never deleted while the session lives.
 */
export class DependencyRegistry {

    constructor(private store: SharedStateStore, readonly sessionId: string) { }

    /**
     * Registers the producer of a result key.
     */
    async register(resultKey: string, producer: { taskGroupId: string, taskGroupName: string, taskName: string, dependencies?: string[] }): Promise<void> {

        const entry: ResultKeyEntry = {
            taskGroupId: producer.taskGroupId,
            taskGroupName: producer.taskGroupName,
            taskName: producer.taskName,
            dependencies: producer.dependencies ?? [],
            timestamp: new Date().toISOString(),
        }

        await this.store.setField(StateKeys.resultKeys(this.sessionId), resultKey, entry);
    }

    /**
     * Finds the producer of a result key.
     * 
     * @returns the entry, or null if nobody registered the key (yet)
     * @throws DependencyError if the store cannot be read or the entry is malformed
     */
    async lookup(resultKey: string): Promise<ResultKeyEntry | null> {

        let raw: unknown;

        try {
            raw = await this.store.getField(StateKeys.resultKeys(this.sessionId), resultKey);
        } catch (error) {
            throw new DependencyError(`Failed to look up producer of [${resultKey}]: ${error}`, { missingDependencies: [resultKey] });
        }

        if (raw === undefined || raw === null) return null;

        const entry = parseEntry(raw);

        if (!entry) throw new DependencyError(`Malformed registry entry for [${resultKey}]: ${JSON.stringify(raw)}`, { missingDependencies: [resultKey] });

        return entry;
    }

    /**
     * All the result keys registered in the session.
     */
    async entries(): Promise<Record<string, ResultKeyEntry>> {

        const raw = await this.store.getFields(StateKeys.resultKeys(this.sessionId));

        const result: Record<string, ResultKeyEntry> = {};

        for (const [resultKey, value] of Object.entries(raw)) {

            const entry = parseEntry(value);

            if (entry) result[resultKey] = entry;
        }

        return result;
    }
}

function parseEntry(raw: unknown): ResultKeyEntry | null {

    // Some producers store the entry as a JSON string
    let value = raw;

    if (typeof value === "string") {
        try {
            value = JSON.parse(value);
        } catch (error) {
            return null;
        }
    }

    if (!isPlainObject(value)) return null;

    const { taskGroupId, taskGroupName, taskName, dependencies, timestamp } = value;

    if (typeof taskGroupId !== "string" || !taskGroupId) return null;

    return {
        taskGroupId: taskGroupId,
        taskGroupName: typeof taskGroupName === "string" ? taskGroupName : "",
        taskName: typeof taskName === "string" ? taskName : "",
        dependencies: Array.isArray(dependencies) ? dependencies.filter((d): d is string => typeof d === "string") : [],
        timestamp: typeof timestamp === "string" ? timestamp : "",
    }
}
