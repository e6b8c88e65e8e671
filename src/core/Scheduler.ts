import { v4 as uuidv4 } from "uuid";
import { IMessageBus, SchedulerMessage, Subscription } from "../bus/MessageBus";
import { StateKeys } from "../bus/Channels";
import { SharedStateStore } from "../store/SharedStateStore";
import { SchedulerConfig } from "../Config";
import { AgentRegistry } from "./agents/AgentRegistry";
import { ToolRegistry } from "./agents/ToolRegistry";
import { TaskGroup, TaskGroupOptions } from "./task/TaskGroup";
import { Node } from "./node/Node";
import { ControlMessageHandler } from "../evt/handlers/ControlMessageHandler";
import { TaskGroupControlMessage } from "../model/TaskGroupDefinition";
import { ExecutionContext } from "../model/ExecutionContext";
import { isPlainObject } from "../util/Objects";
import { Logger } from "../util/Logger";

export interface SchedulerCollaborators {
    config: SchedulerConfig;
    bus: IMessageBus;
    store: SharedStateStore;
    agents: AgentRegistry;
    tools: ToolRegistry;
    logger: Logger;
}

/**
 * Holds everything the scheduling needs and hands it explicitly to the groups and nodes it starts.
 * 
 * Groups and nodes run in the background: a control message is handled (and acknowledged) as soon as
 * its group or node has been started.
 */
export class Scheduler {

    private controlSubscription: Subscription | null = null;
    private running = new Map<string, Promise<void>>();

    constructor(private collaborators: SchedulerCollaborators, private groupOptions: TaskGroupOptions = {}) { }

    /**
     * Starts listening on the control channel.
     */
    async start(): Promise<void> {

        const { bus, config, logger } = this.collaborators;

        this.controlSubscription = await bus.subscribe(config.controlChannel, (payload) => this.onControlMessage(payload));

        logger.compute("", `Scheduler listening on control channel [${config.controlChannel}]`);
    }

    /**
     * Stops listening and closes the bus. Groups and nodes still running are not interrupted.
     */
    async stop(): Promise<void> {

        if (this.controlSubscription) {
            await this.controlSubscription.unsubscribe();
            this.controlSubscription = null;
        }

        await this.collaborators.bus.close();
    }

    /**
     * Waits for every group and node started so far to end.
     */
    async idle(): Promise<void> {
        while (this.running.size > 0) await Promise.all(Array.from(this.running.values()));
    }

    /**
     * Handles a task group control message. Only "initialize" is acted upon.
     * 
     * @throws ConfigurationError if the group definition is malformed
     */
    async handleGroupMessage(msg: SchedulerMessage): Promise<void> {

        const { logger } = this.collaborators;

        const control = TaskGroupControlMessage.fromJSON(msg.payload);

        if (control.action !== "initialize") {
            logger.compute(msg.cid, `Ignoring task group action [${control.action}]`, "warn");
            return;
        }

        const definition = control.definition();

        if (this.running.has(definition.id)) {
            logger.compute(msg.cid, `Task group [${definition.name}] (${definition.id}) is already running`, "warn");
            return;
        }

        const execContext = new ExecutionContext(logger, msg.cid, this.collaborators.config);

        const group = new TaskGroup(definition, { ...this.collaborators, execContext }, this.groupOptions);

        this.track(definition.id, group.execute().then(() => undefined), execContext);
    }

    /**
     * Handles a unit of work control message: {action, sessionId, object}. Only "initialize" is acted upon.
     * 
     * @throws ConfigurationError if the node is malformed
     */
    async handleNodeMessage(msg: SchedulerMessage): Promise<void> {

        const { logger, bus, store, agents, config } = this.collaborators;

        const { action, sessionId, object } = msg.payload;

        if (action !== "initialize") {
            logger.compute(msg.cid, `Ignoring node action [${String(action)}]`, "warn");
            return;
        }

        if (typeof sessionId !== "string" || !sessionId) {
            logger.compute(msg.cid, `Ignoring node message without session id`, "warn");
            return;
        }

        const execContext = new ExecutionContext(logger, msg.cid, config);

        const node = Node.fromJSON(object, { bus, store, agents, execContext, sessionId });

        if (this.running.has(node.id)) {
            logger.compute(msg.cid, `Node [${node.name}] (${node.id}) is already running`, "warn");
            return;
        }

        this.track(node.id, node.run().then(() => undefined), execContext);
    }

    /**
     * Deletes the shared state of a session. Best-effort.
     * 
     * @returns the number of deleted keys
     */
    async cleanupSession(sessionId: string): Promise<number> {

        const { store, logger } = this.collaborators;

        try {

            const deleted = await store.deleteByPattern(StateKeys.sessionPattern(sessionId));

            logger.compute("", `Cleaned up ${deleted} keys of session [${sessionId}]`);

            return deleted;

        } catch (error) {

            logger.compute("", `Cleanup of session [${sessionId}] failed: ${error}`, "warn");

            return 0;
        }
    }

    private async onControlMessage(payload: unknown): Promise<void> {

        const { logger } = this.collaborators;

        // Each message gets its own correlation id, unless the sender provided one
        const envelope = isPlainObject(payload) && !payload.cid ? { ...payload, cid: uuidv4() } : payload;

        const msg = SchedulerMessage.fromPayload(envelope);

        if (!msg) {
            logger.compute("", `Ignoring invalid control message ${JSON.stringify(payload)}`, "warn");
            return;
        }

        try {
            await new ControlMessageHandler(this, logger).onMessage(msg);
        } catch (error) {
            logger.compute(msg.cid, `Failed to handle control message of type [${msg.type}]: ${error}`, "error");
        }
    }

    private track(id: string, run: Promise<void>, execContext: ExecutionContext): void {

        const tracked = run.catch(error => {
            // The initiator is told through the partial results channel
            execContext.logger.compute(execContext.cid, `[${id}] ended with an error: ${error}`, "error");
        }).finally(() => {
            this.running.delete(id);
        });

        this.running.set(id, tracked);
    }
}
