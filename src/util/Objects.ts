export type ContextMap = Record<string, unknown>;

export function isPlainObject(value: unknown): value is Record<string, unknown> {

    if (value === null || typeof value !== "object") return false;

    const proto = Object.getPrototypeOf(value);

    return proto === Object.prototype || proto === null;
}

/**
 * Reads a value at a dotted path (e.g. "report.sections.0.title").
 * Numeric segments index into arrays.
 * 
 * @returns the value, or undefined when any segment is missing
 */
export function getPath(obj: unknown, path: string | string[]): unknown {

    const parts = Array.isArray(path) ? path : path.split(".").filter(p => p.length > 0);

    let current: unknown = obj;

    for (const part of parts) {

        if (isPlainObject(current)) current = current[part];
        else if (Array.isArray(current) && /^\d+$/.test(part)) current = current[Number(part)];
        else return undefined;
    }

    return current;
}

/**
 * Parses a JSON string.
 * 
 * @returns the parsed value, or undefined if the string is not JSON
 */
export function tryParseJSON(value: string): unknown {

    try {
        return JSON.parse(value);
    } catch (error) {
        return undefined;
    }
}
