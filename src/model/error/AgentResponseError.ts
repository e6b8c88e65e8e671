export class AgentResponseError extends Error {

    name: string = "AgentResponseError";
    code: number = 502;
    agentName: string;

    constructor(agentName: string, message: string) {
        super(`Invalid response from Agent [${agentName}]: ${message}`);
        this.agentName = agentName;
    }
}
