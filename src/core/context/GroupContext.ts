import { Mutex } from "../../util/Mutex";
import { ContextMap } from "../../util/Objects";
import { deepMerge, serializeContext } from "./ContextMerge";

/**
 * The shared context of a group.
 * 
 * Concurrent task completions all merge into it: merges go through mergeInto, one at a time,
 * and the last writer wins at the leaf level.
 */
export class GroupContext {

    private data: ContextMap;
    private mutex = new Mutex();

    constructor(initial: ContextMap = {}) {
        this.data = deepMerge({}, initial);
    }

    async mergeInto(partial: ContextMap): Promise<void> {

        await this.mutex.runExclusive(async () => {
            deepMerge(this.data, partial);
        });
    }

    has(key: string): boolean {
        return Object.prototype.hasOwnProperty.call(this.data, key);
    }

    get(key: string): unknown {
        return this.data[key];
    }

    /**
     * A JSON-safe copy of the context, safe to hand to an agent or to persist.
     */
    snapshot(): ContextMap {
        return serializeContext(this.data);
    }

    serialize(): string {
        return JSON.stringify(this.snapshot());
    }
}
