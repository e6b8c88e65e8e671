import { ConfigurationError } from "../../model/error/ConfigurationError";

/**
 * A tool an agent can use. Tools exposing validate() can also act as a task's result validator.
 */
export interface Tool {

    name: string;
    description?: string;

    /**
     * Accepts or rejects the results of a task.
     * 
     * @param results the result map of the task
     * @param prompt the task's validator prompt
     */
    validate?(results: Record<string, unknown>, prompt: string): Promise<boolean> | boolean;
}

/**
 * Tools by name, populated at startup.
 */
export class ToolRegistry {

    private tools = new Map<string, Tool>();

    register(tool: Tool): void {
        this.tools.set(tool.name, tool);
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    /**
     * @throws ConfigurationError naming the first unknown tool
     */
    resolve(names: string[]): Tool[] {

        return names.map(name => {

            const tool = this.tools.get(name);

            if (!tool) throw new ConfigurationError(`Unknown tool [${name}]`, { field: "tools", suggestions: [`Registered tools: ${Array.from(this.tools.keys()).join(", ") || "none"}`] });

            return tool;
        });
    }
}
