import http from "request";
import { AgentDefinition } from "../model/AgentDefinition";
import { AgentExecutionRequest, AgentExecutor, ResultMap } from "../core/agents/AgentExecutor";
import { TaskExecutionError } from "../model/error/TaskExecutionError";
import { AgentResponseError } from "../model/error/AgentResponseError";
import { ContextMap, isPlainObject, tryParseJSON } from "../util/Objects";
import { Logger } from "../util/Logger";

/**
 * Agent reached over HTTP.
 * 
 * The task is POSTed to the agent's execution endpoint. The agent answers with {results: {...}} or with {error: "..."}.
 */
export class HttpAgentExecutor implements AgentExecutor {

    constructor(private agentDefinition: AgentDefinition, private logger: Logger, private bearerToken?: string) { }

    /**
     * Executes the task on the remote agent.
     * @param request the task and where it comes from
     * @param context the context snapshot the agent works with
     * @returns a promise that resolves to the agent's result map
     */
    async execute(request: AgentExecutionRequest, context: ContextMap): Promise<ResultMap> {

        const url = this.agentDefinition.endpoint.url();

        this.logger.compute(request.cid, `Calling Agent [${this.agentDefinition.name}] at [${url}] for task [${request.task.name}]`);

        const headers: Record<string, string> = {
            'x-correlation-id': request.cid,
            'Content-Type': 'application/json'
        }

        if (this.bearerToken) headers['Authorization'] = `Bearer ${this.bearerToken}`;

        const body = JSON.stringify({
            taskName: request.task.name,
            description: request.task.description,
            message: request.task.messageTemplate,
            instructions: request.task.sharedInstructions,
            resultKeys: request.task.resultKeys,
            tools: request.tools.map(tool => tool.name),
            sessionId: request.sessionId,
            ownerId: request.ownerId,
            context: context,
        });

        return new Promise<ResultMap>((success, failure) => {

            http({
                uri: url,
                method: 'POST',
                headers: headers,
                body: body
            }, (err: Error | null, resp: http.Response, responseBody: unknown) => {

                if (err) {
                    this.logger.compute(request.cid, `Call to Agent [${this.agentDefinition.name}] failed: ${err.message}`, "error");
                    failure(new TaskExecutionError(request.task.name, `agent [${this.agentDefinition.name}] unreachable: ${err.message}`));
                    return;
                }

                if (resp.statusCode != 200) {
                    failure(new TaskExecutionError(request.task.name, `agent [${this.agentDefinition.name}] responded with status code ${resp.statusCode}: ${responseBody}`));
                    return;
                }

                // Parse the output
                try {
                    success(this.parseResponse(request.task.name, responseBody));
                }
                catch (error) {
                    failure(error);
                }
            })
        })
    }

    private parseResponse(taskName: string, body: unknown): ResultMap {

        const data = typeof body === "string" ? tryParseJSON(body) : body;

        if (!isPlainObject(data)) throw new AgentResponseError(this.agentDefinition.name, `expected a JSON object, got ${String(body)}`);

        if (data.error) throw new TaskExecutionError(taskName, `agent [${this.agentDefinition.name}] reported an error: ${typeof data.error === "string" ? data.error : JSON.stringify(data.error)}`);

        if (!isPlainObject(data.results)) throw new AgentResponseError(this.agentDefinition.name, "missing results");

        return data.results;
    }
}
