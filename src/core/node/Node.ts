import { v4 as uuidv4 } from "uuid";
import { IMessageBus } from "../../bus/MessageBus";
import { Channels, StateKeys } from "../../bus/Channels";
import { SharedStateStore } from "../../store/SharedStateStore";
import { DependencyRegistry } from "../registry/DependencyRegistry";
import { DependencyResolver, DependencyWaiter } from "../dependency/DependencyResolver";
import { AgentRegistry } from "../agents/AgentRegistry";
import { deepMerge, serializeContext, serializeValue } from "../context/ContextMerge";
import { ContextInfo } from "../../model/ContextInfo";
import { Dependency, requiredDependenciesMet } from "../../model/Dependency";
import { NodeStatus, canTransition, isNodeStatus, isTerminalStatus } from "../../model/NodeStatus";
import { ExecutionContext } from "../../model/ExecutionContext";
import { ConfigurationError } from "../../model/error/ConfigurationError";
import { DependencyError } from "../../model/error/DependencyError";
import { InvalidTransitionError } from "../../model/error/InvalidTransitionError";
import { Signal } from "../../util/Signal";
import { ContextMap, isPlainObject } from "../../util/Objects";

export const NODE_KINDS = ["step", "workflow", "model", "lifecycle", "goal"] as const;

export type NodeKind = typeof NODE_KINDS[number];

/**
 * What a unit of work needs from the outside world.
 */
export interface NodeRuntime {
    bus: IMessageBus;
    store: SharedStateStore;
    agents: AgentRegistry;
    execContext: ExecutionContext;
    sessionId: string;
}

export interface StatusChange {
    nodeId: string;
    name: string;
    status: NodeStatus;
    previousStatus: NodeStatus;
    timestamp: string;
}

/**
 * A unit of work: a step, a model, a lifecycle stage...
 *
 * Its status only moves forward (or to "failed") and every move is announced on the node's status channel
 * and on the global status channel.
 * A node can own children: they run one after the other once the node itself has executed.
 */
export class Node {

    id: string;
    name: string;
    readonly kind: NodeKind;
    description: string;
    contextInfo: ContextInfo;
    dependencies: Dependency[];
    children: Node[];
    agentClass?: string;
    outputKeys: string[];
    status: NodeStatus = "created";

    private registry: DependencyRegistry;
    private resolver: DependencyResolver;
    private readySignal = new Signal();
    private notified = new Set<string>();   // Output keys already published in this cycle

    constructor(data: { id?: string, name: string, kind: NodeKind, description?: string, contextInfo?: ContextInfo, dependencies?: Dependency[], children?: Node[], agentClass?: string, outputKeys?: string[] }, private runtime: NodeRuntime) {

        this.id = data.id ?? uuidv4();
        this.name = data.name;
        this.kind = data.kind;
        this.description = data.description ?? "";
        this.contextInfo = data.contextInfo ?? new ContextInfo();
        this.dependencies = data.dependencies ?? [];
        this.children = data.children ?? [];
        this.agentClass = data.agentClass;
        this.outputKeys = data.outputKeys ?? [];

        this.registry = new DependencyRegistry(runtime.store, runtime.sessionId);
        this.resolver = new DependencyResolver(runtime.bus, runtime.store, this.registry, runtime.execContext);
    }

    /**
     * Moves the node to a new status and announces it.
     * Regressions are refused.
     *
     * @returns true if the status changed
     */
    async setStatus(status: NodeStatus): Promise<boolean> {

        const { logger, cid } = this.runtime.execContext;

        if (!canTransition(this.status, status)) {
            logger.compute(cid, `Node [${this.name}] cannot move from [${this.status}] to [${status}]`, "warn");
            return false;
        }

        const change: StatusChange = {
            nodeId: this.id,
            name: this.name,
            status: status,
            previousStatus: this.status,
            timestamp: new Date().toISOString(),
        }

        this.status = status;

        // Announced even on the failure path. A failed announcement does not undo the transition.
        for (const channel of [Channels.nodeStatusUpdates(), Channels.nodeStatus(this.id)]) {
            try {
                await this.runtime.bus.publishMessage(channel, change);
            } catch (error) {
                logger.compute(cid, `Failed to announce status [${status}] of node [${this.name}] on [${channel}]: ${error}`, "error");
            }
        }

        return true;
    }

    /**
     * Moves the node to a status the lifecycle requires.
     *
     * @throws InvalidTransitionError if the move is refused
     */
    private async advance(status: NodeStatus): Promise<void> {

        const from = this.status;

        if (!(await this.setStatus(status))) throw new InvalidTransitionError(this.name, from, status);
    }

    /**
     * Initializes the node: registers the keys it will produce, so that others can find it.
     */
    async initialize(): Promise<void> {

        await this.advance("pre_initializing");
        await this.advance("initializing");

        for (const outputKey of this.outputKeys) {
            await this.registry.register(outputKey, {
                taskGroupId: this.id,
                taskGroupName: this.name,
                taskName: this.name,
                dependencies: this.dependencies.map(d => d.contextKey),
            });
        }

        await this.advance("initialized");
    }

    /**
     * Starts watching the dependencies.
     *
     * @returns true if the dependencies are already met
     */
    async resolveDependencies(): Promise<boolean> {

        await this.advance("resolving_dependencies");

        if (this.dependencies.length === 0) {
            await this.persistContext();
            return this.checkDependencies();
        }

        await this.resolver.watch(this.waiter());

        return this.checkDependencies();
    }

    /**
     * True when every required dependency is met.
     */
    dependenciesMet(): boolean {
        return requiredDependenciesMet(this.dependencies);
    }

    /**
     * Advances to "dependencies_resolved" if the node was resolving and everything it needs is there.
     */
    async checkDependencies(): Promise<boolean> {

        if (!this.dependenciesMet()) return false;

        if (this.status === "resolving_dependencies") await this.setStatus("dependencies_resolved");

        return true;
    }

    /**
     * Receives the value of a dependency. Does not change the status.
     */
    onDependencyUpdate(dependency: Dependency, value: unknown): void {
        deepMerge(this.contextInfo.output, { [dependency.propertyName]: value });
    }

    /**
     * Waits for the required dependencies, re-checking the registry every poll interval for producers
     * that registered late.
     *
     * @throws DependencyError listing the missing dependencies when the timeout expires
     */
    async waitForDependencies(timeoutMs: number, pollIntervalMs: number = this.runtime.execContext.config.pollIntervalMs): Promise<void> {

        const deadline = Date.now() + timeoutMs;

        while (!(await this.checkDependencies())) {

            const remaining = deadline - Date.now();

            if (remaining <= 0) {

                const missing = this.dependencies.filter(d => d.required && !d.isMet).map(d => d.contextKey);

                throw new DependencyError(`Node [${this.name}] timed out waiting for [${missing.join(", ")}]`, { taskName: this.name, missingDependencies: missing });
            }

            const woken = await this.readySignal.wait(Math.min(pollIntervalMs, remaining));

            if (!woken) await this.resolver.watch(this.waiter());
        }
    }

    /**
     * Executes the node through its agent, then its children, one after the other.
     * Any failure marks the node as failed and is thrown back.
     */
    async assignAndExecute(): Promise<void> {

        const { logger, cid } = this.runtime.execContext;

        await this.advance("executing");

        try {

            if (this.agentClass) {

                const agent = this.runtime.agents.create(this.agentClass);

                const results = await agent.execute({
                    task: {
                        name: this.name,
                        agentClass: this.agentClass,
                        description: this.description,
                        messageTemplate: this.contextInfo.actionSummary || this.description,
                        sharedInstructions: this.contextInfo.inputDescription,
                        resultKeys: this.outputKeys,
                    },
                    tools: [],
                    sessionId: this.runtime.sessionId,
                    ownerId: this.id,
                    cid: cid,
                }, this.snapshot());

                deepMerge(this.contextInfo.output, results);
            }

            if (this.children.length > 0) {

                await this.advance("monitoring");

                for (const child of this.children) {

                    child.contextInfo.context = deepMerge(deepMerge(deepMerge({}, this.contextInfo.context), this.contextInfo.output), child.contextInfo.context);

                    const childOutput = await child.run();

                    deepMerge(this.contextInfo.output, childOutput);
                }
            }

            await this.advance("completed");

        } catch (error) {

            logger.compute(cid, `Node [${this.name}] failed: ${error}`, "error");

            await this.setStatus("failed");

            throw error;
        }
    }

    /**
     * Publishes each output key the node produced on its result channel, once per cycle.
     */
    async publishOutputs(): Promise<void> {

        for (const outputKey of this.outputKeys) {

            if (this.notified.has(outputKey) || !(outputKey in this.contextInfo.output)) continue;

            const value = serializeValue(this.contextInfo.output[outputKey]);

            await this.runtime.store.setValue(StateKeys.result(this.id, outputKey), value);

            await this.runtime.bus.publishMessage(Channels.result(this.id, outputKey), {
                taskName: this.name,
                resultKey: outputKey,
                value: value,
                isArray: Array.isArray(value),
                taskGroupId: this.id,
                sessionId: this.runtime.sessionId,
                timestamp: new Date().toISOString(),
            });

            this.notified.add(outputKey);
        }
    }

    /**
     * Publishes the whole node on its own channel and starts a new notification cycle.
     */
    async publishUpdates(): Promise<void> {

        await this.runtime.bus.publishMessage(Channels.nodeUpdates(this.id), this.toJSON());

        this.notified.clear();
    }

    /**
     * Stops watching and forgets the dependencies.
     */
    async clearDependencies(): Promise<void> {

        await this.resolver.release(this.id);

        this.dependencies = [];
    }

    /**
     * Drives the whole lifecycle of the node.
     * Only a node that has not started yet can run. Any failure along the way leaves the node "failed".
     *
     * @returns the node's output
     * @throws InvalidTransitionError if the node already started (or failed)
     */
    async run(): Promise<ContextMap> {

        const { logger, cid, config } = this.runtime.execContext;

        if (this.status === "completed") return this.contextInfo.output;

        if (!canTransition(this.status, "pre_initializing")) throw new InvalidTransitionError(this.name, this.status, "pre_initializing");

        try {

            await this.initialize();

            if (!(await this.resolveDependencies())) await this.waitForDependencies(config.nodeDependencyTimeoutMs);

            await this.advance("ready");
            await this.advance("assigning");
            await this.advance("assigned");
            await this.advance("pre_execute");

            await this.assignAndExecute();

            await this.publishOutputs();
            await this.publishUpdates();

            return this.contextInfo.output;

        } catch (error) {

            if (!isTerminalStatus(this.status)) {

                logger.compute(cid, `Node [${this.name}] failed in status [${this.status}]: ${error}`, "error");

                await this.setStatus("failed");
            }

            throw error;

        } finally {
            await this.resolver.close();
        }
    }

    snapshot(): ContextMap {
        return serializeContext(deepMerge(deepMerge({}, this.contextInfo.context), this.contextInfo.output));
    }

    private async persistContext(): Promise<void> {
        await this.runtime.store.setValue(StateKeys.nodeContext(this.id), serializeContext(this.contextInfo.context));
    }

    private waiter(): DependencyWaiter {

        return {
            waiterId: this.id,
            dependencies: this.dependencies,
            onDependencyUpdate: (dependency: Dependency, value: unknown) => this.onDependencyUpdate(dependency, value),
            onDependenciesReady: () => this.readySignal.notify(),
        }
    }

    toJSON(): ContextMap {

        return {
            id: this.id,
            name: this.name,
            kind: this.kind,
            description: this.description,
            status: this.status,
            agentClass: this.agentClass ?? null,
            outputKeys: this.outputKeys,
            contextInfo: {
                inputDescription: this.contextInfo.inputDescription,
                actionSummary: this.contextInfo.actionSummary,
                outcomeDescription: this.contextInfo.outcomeDescription,
                feedback: this.contextInfo.feedback,
                output: serializeContext(this.contextInfo.output),
                context: serializeContext(this.contextInfo.context),
            },
            dependencies: this.dependencies.map(d => d.toJSON()),
            children: this.children.map(c => c.toJSON()),
        }
    }

    /**
     * Builds a node (and its children) from an untyped payload.
     *
     * @throws ConfigurationError if a field has the wrong shape
     */
    static fromJSON(data: unknown, runtime: NodeRuntime): Node {

        if (!isPlainObject(data)) throw new ConfigurationError(`Invalid node: ${JSON.stringify(data)}`, { field: "node" });

        const { id, name, kind, description, contextInfo, dependencies, children, agentClass, outputKeys, status } = data;

        if (typeof name !== "string" || !name.trim()) throw new ConfigurationError("Node without name", { field: "name" });

        const nodeKind = NODE_KINDS.find(k => k === kind);

        if (!nodeKind) throw new ConfigurationError(`Node [${name}] has an invalid kind [${kind}]`, { field: "kind", suggestions: [`Use one of ${NODE_KINDS.join(", ")}`] });

        if (dependencies !== undefined && !Array.isArray(dependencies)) throw new ConfigurationError(`Node [${name}] has invalid dependencies`, { field: "dependencies" });
        if (children !== undefined && !Array.isArray(children)) throw new ConfigurationError(`Node [${name}] has invalid children`, { field: "children" });
        if (outputKeys !== undefined && (!Array.isArray(outputKeys) || outputKeys.some(k => typeof k !== "string" || !k))) throw new ConfigurationError(`Node [${name}] has invalid output keys`, { field: "outputKeys" });
        if (agentClass !== undefined && agentClass !== null && typeof agentClass !== "string") throw new ConfigurationError(`Node [${name}] has an invalid agent class`, { field: "agentClass" });

        const dependencyList: unknown[] = Array.isArray(dependencies) ? dependencies : [];
        const childList: unknown[] = Array.isArray(children) ? children : [];
        const outputKeyList: unknown[] = Array.isArray(outputKeys) ? outputKeys : [];

        const node = new Node({
            id: typeof id === "string" && id ? id : undefined,
            name: name,
            kind: nodeKind,
            description: typeof description === "string" ? description : "",
            contextInfo: ContextInfo.fromJSON(contextInfo),
            dependencies: dependencyList.map(d => Dependency.fromJSON(d)),
            children: childList.map(c => Node.fromJSON(c, runtime)),
            agentClass: typeof agentClass === "string" && agentClass ? agentClass : undefined,
            outputKeys: outputKeyList.map(k => String(k)),
        }, runtime);

        if (isNodeStatus(status)) node.status = status;

        return node;
    }
}
