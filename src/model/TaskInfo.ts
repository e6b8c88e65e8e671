import { ConfigurationError } from "./error/ConfigurationError";
import { isPlainObject } from "../util/Objects";

/**
 * How a task fans out over an array-valued dependency.
 * 
 * - arrayMapping: logical name -> dependency key (e.g. { "pages": "urls" })
 * - identifiers: template placeholder -> path into the array item (e.g. { "url": "url" } or { "title": "pages.title" })
 */
export interface ExpansionConfig {
    arrayMapping: Record<string, string>;
    identifiers: Record<string, string>;
}

const VALIDATOR_TOOL_SUFFIX = "Tool";

/**
 * One executable unit inside a task group.
 */
export class TaskInfo {

    key: string;
    name: string;                               // Unique within the group
    agentClass: string;                         // Name of the execution strategy, resolved through the AgentRegistry
    description: string;
    messageTemplate: string;                    // Prompt template, with {placeholder} tokens
    sharedInstructions: string;
    resultKeys: string[];                       // At least one
    optionalResultKeys: string[];
    tools: string[];
    dependencies: string[];                     // Result keys that must exist before the task can run
    optionalDependencies: string[];             // Result keys that are used when present, never waited for
    validatorPrompt?: string;
    validatorTool?: string;
    expansionConfig?: ExpansionConfig;
    isExpandedTask: boolean;
    parentTaskKey?: string;

    constructor(data: {
        key?: string, name: string, agentClass: string, description?: string, messageTemplate: string, sharedInstructions?: string,
        resultKeys: string[], optionalResultKeys?: string[], tools?: string[], dependencies?: string[], optionalDependencies?: string[],
        validatorPrompt?: string, validatorTool?: string, expansionConfig?: ExpansionConfig, isExpandedTask?: boolean, parentTaskKey?: string
    }) {

        this.key = data.key ?? data.name;
        this.name = data.name;
        this.agentClass = data.agentClass;
        this.description = data.description ?? "";
        this.messageTemplate = data.messageTemplate;
        this.sharedInstructions = data.sharedInstructions ?? "";
        this.resultKeys = data.resultKeys;
        this.optionalResultKeys = data.optionalResultKeys ?? [];
        this.tools = data.tools ?? [];
        this.dependencies = data.dependencies ?? [];
        this.optionalDependencies = data.optionalDependencies ?? [];
        this.validatorPrompt = data.validatorPrompt;
        this.validatorTool = data.validatorTool;
        this.expansionConfig = data.expansionConfig;
        this.isExpandedTask = data.isExpandedTask ?? false;
        this.parentTaskKey = data.parentTaskKey;

        this.validate();
    }

    /**
     * All the keys this task can publish, required first.
     */
    allResultKeys(): string[] {
        return [...this.resultKeys, ...this.optionalResultKeys];
    }

    /**
     * Checks the construction invariants.
     * 
     * @throws ConfigurationError on the first violated invariant
     */
    private validate(): void {

        if (!this.name || !this.name.trim()) throw new ConfigurationError("Task name cannot be empty", { field: "name" });

        if (!this.agentClass || !this.agentClass.trim()) throw new ConfigurationError(`Task [${this.name}] has an empty agent class`, { field: "agentClass", suggestions: ["Set the name of a registered agent"] });

        if (!this.messageTemplate || !this.messageTemplate.trim()) throw new ConfigurationError(`Task [${this.name}] has an empty message template`, { field: "messageTemplate" });

        for (const tool of this.tools) {
            if (typeof tool !== "string" || !tool.trim()) throw new ConfigurationError(`Task [${this.name}] has an invalid tool name: ${JSON.stringify(tool)}`, { field: "tools", suggestions: ["Tool names must be non-empty strings"] });
        }

        if (this.resultKeys.length === 0) throw new ConfigurationError(`Task [${this.name}] must declare at least one result key`, { field: "resultKeys", suggestions: ["Add the key under which the task publishes its output"] });

        for (const resultKey of this.allResultKeys()) {
            if (typeof resultKey !== "string" || !resultKey.trim()) throw new ConfigurationError(`Task [${this.name}] has an empty result key`, { field: "resultKeys" });
        }

        for (const dependency of [...this.dependencies, ...this.optionalDependencies]) {
            if (typeof dependency !== "string" || !dependency.trim()) throw new ConfigurationError(`Task [${this.name}] has an empty dependency name`, { field: "dependencies", suggestions: ["Remove empty dependency", "Check for accidental whitespace"] });
        }

        // Validator prompt and tool go together
        if (!!this.validatorPrompt !== !!this.validatorTool) {
            throw new ConfigurationError(`Task [${this.name}] must set both validatorPrompt and validatorTool, or neither`, { field: this.validatorTool ? "validatorPrompt" : "validatorTool" });
        }

        if (this.validatorTool && !this.validatorTool.endsWith(VALIDATOR_TOOL_SUFFIX)) {
            throw new ConfigurationError(`Task [${this.name}] has an invalid validator tool name [${this.validatorTool}]`, { field: "validatorTool", suggestions: [`Validator tool names end with "${VALIDATOR_TOOL_SUFFIX}"`] });
        }

        if (this.expansionConfig) {

            const { arrayMapping, identifiers } = this.expansionConfig;

            if (Object.keys(arrayMapping).length === 0) throw new ConfigurationError(`Task [${this.name}] has an expansion config without arrayMapping`, { field: "expansionConfig.arrayMapping" });

            for (const value of [...Object.values(arrayMapping), ...Object.values(identifiers)]) {
                if (!value.trim()) throw new ConfigurationError(`Task [${this.name}] has an empty expansion mapping`, { field: "expansionConfig" });
            }
        }
    }

    /**
     * Builds a TaskInfo from an untyped payload (a control message, a persisted definition).
     * 
     * @throws ConfigurationError if a field has the wrong shape or an invariant is violated
     */
    static fromJSON(data: unknown): TaskInfo {

        if (!isPlainObject(data)) throw new ConfigurationError(`Invalid task definition: ${JSON.stringify(data)}`, { field: "tasks" });

        return new TaskInfo({
            key: optionalString(data, "key"),
            name: requiredString(data, "name"),
            agentClass: requiredString(data, "agentClass"),
            description: optionalString(data, "description"),
            messageTemplate: requiredString(data, "messageTemplate"),
            sharedInstructions: optionalString(data, "sharedInstructions"),
            resultKeys: stringList(data, "resultKeys"),
            optionalResultKeys: stringList(data, "optionalResultKeys"),
            tools: stringList(data, "tools"),
            dependencies: stringList(data, "dependencies"),
            optionalDependencies: stringList(data, "optionalDependencies"),
            validatorPrompt: optionalString(data, "validatorPrompt"),
            validatorTool: optionalString(data, "validatorTool"),
            expansionConfig: parseExpansionConfig(data.expansionConfig),
            isExpandedTask: data.isExpandedTask === true,
            parentTaskKey: optionalString(data, "parentTaskKey"),
        });
    }
}

function requiredString(data: Record<string, unknown>, field: string): string {

    const value = data[field];

    if (typeof value !== "string") throw new ConfigurationError(`Missing or invalid ${field}`, { field });

    return value;
}

function optionalString(data: Record<string, unknown>, field: string): string | undefined {

    const value = data[field];

    if (value === undefined || value === null) return undefined;

    if (typeof value !== "string") throw new ConfigurationError(`Invalid ${field}: expected a string`, { field });

    return value;
}

function stringList(data: Record<string, unknown>, field: string): string[] {

    const value = data[field];

    if (value === undefined || value === null) return [];

    if (!Array.isArray(value)) throw new ConfigurationError(`Invalid ${field}: expected a list`, { field });

    return value.map(item => {
        if (typeof item !== "string") throw new ConfigurationError(`Invalid ${field}: ${JSON.stringify(item)} is not a string`, { field });
        return item;
    });
}

function stringMap(value: unknown, field: string): Record<string, string> {

    if (value === undefined || value === null) return {};

    if (!isPlainObject(value)) throw new ConfigurationError(`Invalid ${field}: expected a map`, { field });

    const result: Record<string, string> = {};

    for (const [k, v] of Object.entries(value)) {
        if (typeof v !== "string") throw new ConfigurationError(`Invalid ${field}: value of [${k}] is not a string`, { field });
        result[k] = v;
    }

    return result;
}

function parseExpansionConfig(value: unknown): ExpansionConfig | undefined {

    if (value === undefined || value === null) return undefined;

    if (!isPlainObject(value)) throw new ConfigurationError("Invalid expansionConfig: expected a map", { field: "expansionConfig" });

    return {
        arrayMapping: stringMap(value.arrayMapping, "expansionConfig.arrayMapping"),
        identifiers: stringMap(value.identifiers, "expansionConfig.identifiers"),
    }
}
