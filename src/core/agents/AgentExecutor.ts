import { TaskInfo } from "../../model/TaskInfo";
import { ContextMap } from "../../util/Objects";
import { Tool } from "./ToolRegistry";

export type ResultMap = Record<string, unknown>;

/**
 * What an agent needs to know about the work it executes.
 * Tasks are handed over as they are. Units of work build one from their own fields.
 */
export type AgentTask = Pick<TaskInfo, "name" | "agentClass" | "description" | "messageTemplate" | "sharedInstructions" | "resultKeys">;

export interface AgentExecutionRequest {
    task: AgentTask;
    tools: Tool[];
    sessionId: string;
    ownerId: string;        // The group (or the unit of work) the task belongs to
    cid: string;
}

/**
 * The agent execution capability.
 * 
 * Must be callable concurrently. A rejection is a failure of the task, never of the group.
 */
export interface AgentExecutor {

    execute(request: AgentExecutionRequest, context: ContextMap): Promise<ResultMap>;
}
