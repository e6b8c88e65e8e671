import { TaskInfo } from "../../model/TaskInfo";
import { ContextMap, getPath, isPlainObject, tryParseJSON } from "../../util/Objects";
import { Logger } from "../../util/Logger";
import { ResultMap } from "../agents/AgentExecutor";

export interface ExpansionOutcome {
    tasks: TaskInfo[];
    degraded: boolean;      // True when the task could not be expanded and is returned as it is
}

interface ArrayDependency {
    dependency: string;
    items: unknown[];
}

/**
 * Fans a task with an expansion config out into one task per element of an array dependency.
 */
export class TaskExpansion {

    constructor(private logger: Logger, private cid: string) { }

    /**
     * Expands a task over the array dependencies found in the context.
     * 
     * Never throws: a task that cannot be expanded is returned unchanged, flagged as degraded.
     * 
     * @param task the task to expand
     * @param context the current context, as a map or as its JSON serialization
     */
    expand(task: TaskInfo, context: ContextMap | string): ExpansionOutcome {

        const config = task.expansionConfig;

        if (!config) return { tasks: [task], degraded: false };

        // 1. Parse the context
        let ctx: ContextMap;

        if (typeof context === "string") {

            const parsed = tryParseJSON(context);

            if (!isPlainObject(parsed)) {
                this.logger.compute(this.cid, `Failed to parse context for expansion of task [${task.name}]`, "error");
                return { tasks: [task], degraded: false };
            }

            ctx = parsed;
        }
        else ctx = context;

        // 2. Find the array dependencies, 3. retrying once on re-parsed values
        let arrays = this.findArrayDependencies(task, ctx);

        if (arrays.length === 0) {

            ctx = reparseValues(ctx);

            arrays = this.findArrayDependencies(task, ctx);
        }

        // 4. Degraded
        if (arrays.length === 0) {
            this.logger.compute(this.cid, `[EXPANSION DEGRADED] No array dependency found for task [${task.name}]. Dependencies: [${task.dependencies.join(", ")}], context keys: [${Object.keys(ctx).join(", ")}]`, "warn");
            return { tasks: [task], degraded: true };
        }

        // 5. One task per item
        const expanded: TaskInfo[] = [];

        for (const { dependency, items } of arrays) {

            for (const item of items) {

                const replacements = this.buildReplacements(task, dependency, item);

                if (Object.keys(replacements).length === 0) {
                    this.logger.compute(this.cid, `No replacements for an item of [${dependency}] in task [${task.name}]: item skipped`, "warn");
                    continue;
                }

                expanded.push(new TaskInfo({
                    ...task,
                    // 6. Unique name, no further expansion
                    key: `${task.key}_${expanded.length + 1}`,
                    name: `${task.name}_${expanded.length + 1}`,
                    messageTemplate: replaceTemplateVars(task.messageTemplate, replacements, ctx),
                    sharedInstructions: replaceTemplateVars(task.sharedInstructions, replacements, ctx),
                    description: replaceTemplateVars(task.description, replacements, ctx),
                    expansionConfig: undefined,
                    isExpandedTask: true,
                    parentTaskKey: task.key,
                }));
            }
        }

        if (expanded.length === 0) {
            this.logger.compute(this.cid, `[EXPANSION DEGRADED] No item of the array dependencies of task [${task.name}] could be expanded`, "warn");
            return { tasks: [task], degraded: true };
        }

        this.logger.compute(this.cid, `Task [${task.name}] expanded into ${expanded.length} tasks`);

        return { tasks: expanded, degraded: false };
    }

    /**
     * Dependencies of the task that are mapped in the expansion config and whose value in the context is a list.
     * JSON-encoded values are parsed.
     */
    findArrayDependencies(task: TaskInfo, context: ContextMap): ArrayDependency[] {

        const mapped = Object.values(task.expansionConfig?.arrayMapping ?? {});

        const result: ArrayDependency[] = [];

        for (const dependency of task.dependencies) {

            if (!mapped.includes(dependency) || !(dependency in context)) continue;

            let value = context[dependency];

            if (typeof value === "string") value = tryParseJSON(value);

            if (Array.isArray(value)) result.push({ dependency, items: value });
        }

        return result;
    }

    /**
     * Computes the placeholder values for one item.
     * 
     * Identifier paths have the form "arrayName.field": arrayName is a logical name of the array mapping
     * and only applies to the array it maps to. A path without a logical name reads directly from the item.
     * Scalar items fill the first identifier (or "url" when there is none).
     */
    private buildReplacements(task: TaskInfo, dependency: string, item: unknown): Record<string, unknown> {

        const { arrayMapping, identifiers } = task.expansionConfig ?? { arrayMapping: {}, identifiers: {} };

        const replacements: Record<string, unknown> = {};

        if (!isPlainObject(item)) {

            const placeholder = Object.keys(identifiers)[0] ?? "url";

            replacements[placeholder] = item;

            return replacements;
        }

        for (const [placeholder, path] of Object.entries(identifiers)) {

            const [head, ...rest] = path.split(".");

            let value: unknown;

            if (head in arrayMapping) {

                // Identifier of another array
                if (arrayMapping[head] !== dependency) continue;

                value = rest.length > 0 ? getPath(item, rest) : item;
            }
            else value = getPath(item, path);

            if (value !== undefined) replacements[placeholder] = value;
        }

        return replacements;
    }
}

/**
 * Replaces {placeholder} tokens in a template.
 * 
 * Per-item replacements take precedence over the context. Lists are joined with ", " and maps are
 * JSON-encoded. Tokens with no value are left as they are.
 */
export function replaceTemplateVars(template: string, replacements: Record<string, unknown>, context: ContextMap = {}): string {

    const values: Record<string, unknown> = { ...context, ...replacements };

    return template.replace(/\{([A-Za-z_][\w.-]*)\}/g, (token: string, name: string) => {

        if (!Object.prototype.hasOwnProperty.call(values, name)) return token;

        return formatValue(values[name]);
    });
}

function formatValue(value: unknown): string {

    if (typeof value === "string") return value;

    if (Array.isArray(value)) return value.map(item => formatValue(item)).join(", ");

    if (isPlainObject(value)) return JSON.stringify(value);

    return String(value);
}

function reparseValues(context: ContextMap): ContextMap {

    const result: ContextMap = {};

    for (const [key, value] of Object.entries(context)) {

        const parsed = typeof value === "string" ? tryParseJSON(value) : undefined;

        result[key] = parsed === undefined ? value : parsed;
    }

    return result;
}

/**
 * Merges the results of expanded tasks. Every key ends up holding a list: list values extend it,
 * other values are appended.
 */
export function aggregateResults(results: ResultMap[]): ResultMap {

    const aggregate: Record<string, unknown[]> = {};

    for (const result of results) {

        for (const [key, value] of Object.entries(result)) {

            const list = aggregate[key] ?? (aggregate[key] = []);

            if (Array.isArray(value)) list.push(...value);
            else list.push(value);
        }
    }

    return aggregate;
}
