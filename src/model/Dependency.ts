import { ConfigurationError } from "./error/ConfigurationError";
import { getPath, isPlainObject } from "../util/Objects";

/**
 * Something a unit of work (or a task) needs before it can run.
 * 
 * The dependency is identified by the result key of the producer (contextKey). When the producer
 * publishes, the value found at propertyPath in the payload is stored in output.
 */
export class Dependency {

    contextKey: string;             // The result key that satisfies this dependency
    propertyName: string;           // Name under which the value is exposed to the dependent
    propertyPath: string;           // Dotted path into the produced payload. Empty means "the whole payload"
    required: boolean;
    output: unknown = null;         // Last received value
    isMet: boolean = false;

    constructor({ contextKey, propertyName, propertyPath, required }: { contextKey: string, propertyName?: string, propertyPath?: string, required?: boolean }) {
        this.contextKey = contextKey;
        this.propertyName = propertyName ?? contextKey;
        this.propertyPath = propertyPath ?? "";
        this.required = required ?? true;
    }

    /**
     * Marks the dependency as met with the given produced payload.
     * 
     * Idempotent: once met, further notifications are ignored.
     * 
     * @param payload the value published by the producer
     * @returns true if this call satisfied the dependency, false if it was already met
     */
    markMet(payload: unknown): boolean {

        if (this.isMet) return false;

        this.output = this.propertyPath ? getPath(payload, this.propertyPath) : payload;
        this.isMet = true;

        return true;
    }

    /**
     * Returns the dependency to its unmet state (used when its owner is re-initialized).
     */
    reset(): void {
        this.output = null;
        this.isMet = false;
    }

    static fromJSON(data: unknown): Dependency {

        if (typeof data === "string") {

            if (!data.trim()) throw new ConfigurationError("Empty dependency name", { field: "dependencies", suggestions: ["Remove empty dependency", "Check for accidental whitespace"] });

            return new Dependency({ contextKey: data });
        }

        if (!isPlainObject(data) || typeof data.contextKey !== "string" || !data.contextKey.trim()) {
            throw new ConfigurationError(`Invalid dependency: ${JSON.stringify(data)}`, { field: "dependencies", suggestions: ["A dependency needs a non-empty contextKey"] });
        }

        const dependency = new Dependency({
            contextKey: data.contextKey,
            propertyName: typeof data.propertyName === "string" ? data.propertyName : undefined,
            propertyPath: typeof data.propertyPath === "string" ? data.propertyPath : undefined,
            required: typeof data.required === "boolean" ? data.required : undefined,
        });

        if (data.isMet === true) dependency.markMet(data.output);

        return dependency;
    }

    toJSON() {
        return {
            contextKey: this.contextKey,
            propertyName: this.propertyName,
            propertyPath: this.propertyPath,
            required: this.required,
            output: this.output,
            isMet: this.isMet,
        }
    }
}

/**
 * True when every required dependency is met. Optional dependencies never block.
 */
export function requiredDependenciesMet(dependencies: Dependency[]): boolean {
    return dependencies.every(d => d.isMet || !d.required);
}
