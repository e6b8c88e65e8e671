import { ContextInfo } from "./ContextInfo";
import { TaskInfo } from "./TaskInfo";
import { ConfigurationError } from "./error/ConfigurationError";
import { ContextMap, isPlainObject } from "../util/Objects";

/**
 * What a task group is made of, as received in an "initialize" control message.
 */
export class TaskGroupDefinition {

    key: string;
    id: string;
    name: string;
    sessionId: string;
    tasks: TaskInfo[];
    contextInfo: ContextInfo;
    context: ContextMap;

    constructor(data: { key: string, id: string, name: string, sessionId: string, tasks: TaskInfo[], contextInfo?: ContextInfo, context?: ContextMap }) {
        this.key = data.key;
        this.id = data.id;
        this.name = data.name;
        this.sessionId = data.sessionId;
        this.tasks = data.tasks;
        this.contextInfo = data.contextInfo ?? new ContextInfo();
        this.context = data.context ?? {};
    }
}

/**
 * Control message for task groups: {key, action, object: {id, name, sessionId, tasks, contextInfo}, context}
 */
export class TaskGroupControlMessage {

    constructor(public action: string, public key: string, private object: Record<string, unknown>, private context: ContextMap) { }

    /**
     * Reads the envelope. The group itself is only parsed by definition(), for the actions that need it.
     */
    static fromJSON(data: unknown): TaskGroupControlMessage {

        if (!isPlainObject(data)) throw new ConfigurationError("Invalid task group control message", { field: "payload" });

        const { action, key, object, context } = data;

        if (typeof action !== "string") throw new ConfigurationError("Missing action in task group control message", { field: "action" });

        return new TaskGroupControlMessage(
            action,
            typeof key === "string" ? key : "",
            isPlainObject(object) ? object : {},
            isPlainObject(context) ? context : {}
        );
    }

    /**
     * Builds the group definition carried by the message.
     * 
     * @throws ConfigurationError if the group or one of its tasks is malformed
     */
    definition(): TaskGroupDefinition {

        const { id, name, sessionId, tasks, contextInfo } = this.object;

        if (typeof id !== "string" || !id) throw new ConfigurationError("Task group without id", { field: "object.id" });
        if (typeof name !== "string" || !name) throw new ConfigurationError(`Task group [${id}] without name`, { field: "object.name" });
        if (typeof sessionId !== "string" || !sessionId) throw new ConfigurationError(`Task group [${name}] without session id`, { field: "object.sessionId" });
        if (!Array.isArray(tasks) || tasks.length === 0) throw new ConfigurationError(`Task group [${name}] has no tasks`, { field: "object.tasks" });

        const info = ContextInfo.fromJSON(contextInfo);

        return new TaskGroupDefinition({
            key: this.key || `task_group:${id}`,
            id: id,
            name: name,
            sessionId: sessionId,
            tasks: tasks.map(task => TaskInfo.fromJSON(task)),
            contextInfo: info,
            context: { ...info.context, ...this.context },
        });
    }
}
