import { ConfigurationError } from "./error/ConfigurationError";
import { isPlainObject } from "../util/Objects";

export class AgentEndpoint {

    baseURL: string; // The base URL of the Agent. E.g., "https://myagents.example.com/researcher"
    executionPath: string; // The path to execute tasks. E.g., "/tasks" that will be used with a POST request. 

    constructor(baseURL: string, executionPath: string = "/tasks") {
        this.baseURL = baseURL;
        this.executionPath = executionPath;
    }

    url(): string {
        return `${this.baseURL}${this.executionPath}`;
    }

    static fromJSON(data: unknown): AgentEndpoint {

        if (!isPlainObject(data) || typeof data.baseURL !== "string") throw new ConfigurationError(`Invalid agent endpoint: ${JSON.stringify(data)}`, { field: "endpoint" });

        return new AgentEndpoint(
            data.baseURL,
            typeof data.executionPath === "string" ? data.executionPath : undefined
        );
    }

}
