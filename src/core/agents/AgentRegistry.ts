import { ConfigurationError } from "../../model/error/ConfigurationError";
import { AgentExecutor } from "./AgentExecutor";

export type AgentFactory = () => AgentExecutor;

/**
 * Agent execution strategies by name (a task's agentClass), populated at startup.
 */
export class AgentRegistry {

    private factories = new Map<string, AgentFactory>();

    register(name: string, factory: AgentFactory): void {
        this.factories.set(name, factory);
    }

    has(name: string): boolean {
        return this.factories.has(name);
    }

    names(): string[] {
        return Array.from(this.factories.keys());
    }

    /**
     * Creates the executor registered under the given name.
     * 
     * @throws ConfigurationError if the name is unknown
     */
    create(name: string): AgentExecutor {

        const factory = this.factories.get(name);

        if (!factory) throw new ConfigurationError(`Unknown agent class [${name}]`, { field: "agentClass", suggestions: [`Registered agents: ${this.names().join(", ") || "none"}`] });

        return factory();
    }
}
