import { AgentEndpoint } from "./AgentEndpoint";
import { ConfigurationError } from "./error/ConfigurationError";
import { isPlainObject } from "../util/Objects";

export class AgentDefinition {

    name: string = ""; // The name of the Agent. Tasks refer to it through their agentClass.
    description: string = ""; // The description of the Agent.
    endpoint: AgentEndpoint = new AgentEndpoint(""); // The endpoint (URL) where the Agent can be reached.

    static fromJSON(data: unknown): AgentDefinition {

        if (!isPlainObject(data) || typeof data.name !== "string" || !data.name || !data.endpoint) throw new ConfigurationError(`Invalid AgentDefinition JSON: missing required fields. Received ${JSON.stringify(data)}.`, { field: "name" });

        const def = new AgentDefinition();
        def.name = data.name;
        def.description = typeof data.description === "string" ? data.description : "";
        def.endpoint = AgentEndpoint.fromJSON(data.endpoint);

        return def;
    }

    static fromBSON(data: unknown): AgentDefinition {
        return AgentDefinition.fromJSON(data);
    }
}
