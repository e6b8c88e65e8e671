import { ContextMap, isPlainObject } from "../../util/Objects";

/**
 * Keys holding bookkeeping objects that never travel with a serialized context.
 */
export const INTERNAL_CONTEXT_KEYS = ["contextInfo", "context_info", "taskGroups", "task_groups"];

/**
 * Keys that would reach into an object's prototype when assigned. Never merged nor serialized.
 */
const UNSAFE_KEYS = ["__proto__", "constructor", "prototype"];

const CIRCULAR = "[Circular]";

/**
 * Merges source into target, recursively.
 * 
 * Nested maps merge key by key. Any other value, lists included, replaces the target's value:
 * lists are never concatenated here. A map that contains itself is cut where it loops back.
 * 
 * @returns the target, modified
 */
export function deepMerge(target: ContextMap, source: ContextMap): ContextMap {
    return mergeMaps(target, source, new Set<object>());
}

function mergeMaps(target: ContextMap, source: ContextMap, ancestors: Set<object>): ContextMap {

    ancestors.add(source);

    for (const [key, value] of Object.entries(source)) {

        if (UNSAFE_KEYS.includes(key)) continue;

        if (isPlainObject(value) && ancestors.has(value)) {
            target[key] = CIRCULAR;
            continue;
        }

        const current = Object.prototype.hasOwnProperty.call(target, key) ? target[key] : undefined;

        if (isPlainObject(current) && isPlainObject(value)) mergeMaps(current, value, ancestors);
        else target[key] = isPlainObject(value) ? mergeMaps({}, value, ancestors) : value;
    }

    ancestors.delete(source);

    return target;
}

/**
 * Produces a JSON-safe copy of a context, for persistence and publishing.
 * 
 * Internal keys are left out. Values JSON cannot carry are stringified instead of being dropped:
 * functions, symbols, bigints, non-finite numbers and circular references.
 * Sets become lists and Maps become objects.
 */
export function serializeContext(context: ContextMap): ContextMap {

    const result: ContextMap = {};
    const ancestors = new Set<object>([context]);

    for (const [key, value] of Object.entries(context)) {

        if (INTERNAL_CONTEXT_KEYS.includes(key) || UNSAFE_KEYS.includes(key)) continue;

        result[key] = toSerializable(value, ancestors);
    }

    return result;
}

/**
 * JSON-safe copy of a single value, with the same rules as serializeContext.
 */
export function serializeValue(value: unknown): unknown {
    return toSerializable(value, new Set<object>());
}

function toSerializable(value: unknown, ancestors: Set<object>): unknown {

    if (value === null || typeof value === "string" || typeof value === "boolean") return value;

    if (typeof value === "number") return Number.isFinite(value) ? value : String(value);

    if (typeof value === "undefined") return null;

    if (typeof value === "bigint" || typeof value === "symbol") return value.toString();

    if (typeof value === "function") return `[Function ${value.name || "anonymous"}]`;

    if (typeof value !== "object") return String(value);

    if (value instanceof Date) return value.toISOString();

    if (ancestors.has(value)) return CIRCULAR;

    ancestors.add(value);

    try {

        if (Array.isArray(value) || value instanceof Set) return Array.from(value).map(item => toSerializable(item, ancestors));

        const entries: [unknown, unknown][] = value instanceof Map ? Array.from(value.entries()) : Object.entries(value);

        const result: ContextMap = {};

        for (const [key, item] of entries) {

            if (UNSAFE_KEYS.includes(String(key))) continue;

            result[String(key)] = toSerializable(item, ancestors);
        }

        return result;

    } finally {
        ancestors.delete(value);
    }
}
