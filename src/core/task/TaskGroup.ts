import { IMessageBus } from "../../bus/MessageBus";
import { Channels, StateKeys } from "../../bus/Channels";
import { SharedStateStore } from "../../store/SharedStateStore";
import { DependencyRegistry } from "../registry/DependencyRegistry";
import { DependencyResolver, DependencyWaiter } from "../dependency/DependencyResolver";
import { TaskExpansion, aggregateResults } from "../expansion/TaskExpansion";
import { GroupContext } from "../context/GroupContext";
import { GroupStateTracker } from "../tracking/GroupStateTracker";
import { AgentRegistry } from "../agents/AgentRegistry";
import { Tool, ToolRegistry } from "../agents/ToolRegistry";
import { AgentExecutor, ResultMap } from "../agents/AgentExecutor";
import { TaskInfo } from "../../model/TaskInfo";
import { TaskGroupDefinition } from "../../model/TaskGroupDefinition";
import { ContextInfo } from "../../model/ContextInfo";
import { Dependency } from "../../model/Dependency";
import { FailedTask, TaskGroupStatus } from "../../model/TaskGroupState";
import { ExecutionContext } from "../../model/ExecutionContext";
import { ConfigurationError } from "../../model/error/ConfigurationError";
import { TaskExecutionError } from "../../model/error/TaskExecutionError";
import { TaskGroupExecutionError } from "../../model/error/TaskGroupExecutionError";
import { Mutex } from "../../util/Mutex";
import { Signal } from "../../util/Signal";
import { ContextMap, isPlainObject } from "../../util/Objects";
import { deepMerge, serializeValue } from "../context/ContextMerge";

/**
 * Result keys in these namespaces are internal: they are merged in the context but never published.
 */
const FILTERED_RESULT_PREFIXES = ["task:", "task_result:"];

export interface TaskGroupCollaborators {
    bus: IMessageBus;
    store: SharedStateStore;
    agents: AgentRegistry;
    tools: ToolRegistry;
    execContext: ExecutionContext;
}

export interface TaskGroupOptions {
    timeoutMs?: number;         // Overall deadline of the group
    pollIntervalMs?: number;    // Fallback re-check when no event wakes the group
}

/**
 * Notification published for every result key a task produces.
 */
export interface DependencyUpdate {
    taskName: string;
    resultKey: string;
    value: unknown;
    isArray: boolean;
    taskGroupId: string;
    sessionId: string;
    timestamp: string;
}

/**
 * Runs the tasks of a group to completion under one deadline.
 *
 * Each cycle computes the pending tasks, checks their dependencies and launches the ready ones concurrently.
 * A cycle runs whenever a task ends or a dependency is met, and at least every poll interval.
 *
 * The bookkeeping sets (completed, running, failed) only change under the group mutex, and a task is
 * added to the running set under the same lock that computed it as pending: a task never runs twice at the same time.
 */
export class TaskGroup {

    key: string;
    id: string;
    name: string;
    sessionId: string;
    contextInfo: ContextInfo;
    tasks: TaskInfo[];
    context: GroupContext;

    tasksCompleted = new Set<string>();
    tasksFailed: FailedTask[] = [];
    runningTasks = new Set<string>();

    private timeoutMs: number;
    private pollIntervalMs: number;

    private mutex = new Mutex();
    private signal = new Signal();
    private inFlight = new Set<Promise<void>>();
    private taskDependencies = new Map<string, Dependency[]>();

    private registry: DependencyRegistry;
    private resolver: DependencyResolver;
    private stateTracker: GroupStateTracker;
    private expansion: TaskExpansion;

    constructor(definition: TaskGroupDefinition, private collaborators: TaskGroupCollaborators, options: TaskGroupOptions = {}) {

        this.key = definition.key;
        this.id = definition.id;
        this.name = definition.name;
        this.sessionId = definition.sessionId;
        this.contextInfo = definition.contextInfo;
        this.tasks = definition.tasks;
        this.context = new GroupContext(definition.context);

        const execContext = collaborators.execContext;

        this.timeoutMs = options.timeoutMs ?? execContext.config.groupTimeoutMs;
        this.pollIntervalMs = options.pollIntervalMs ?? execContext.config.pollIntervalMs;

        this.registry = new DependencyRegistry(collaborators.store, this.sessionId);
        this.resolver = new DependencyResolver(collaborators.bus, collaborators.store, this.registry, execContext);
        this.stateTracker = new GroupStateTracker(collaborators.store, execContext);
        this.expansion = new TaskExpansion(execContext.logger, execContext.cid);

        const names = new Set<string>();

        for (const task of this.tasks) {

            if (names.has(task.name)) throw new ConfigurationError(`Duplicate task name [${task.name}] in group [${this.name}]`, { field: "tasks", suggestions: ["Task names must be unique within a group"] });

            names.add(task.name);

            this.taskDependencies.set(task.name, [
                ...task.dependencies.map(d => new Dependency({ contextKey: d })),
                ...task.optionalDependencies.map(d => new Dependency({ contextKey: d, required: false })),
            ]);
        }
    }

    /**
     * Runs the group.
     *
     * @returns the serialized context of the completed group
     * @throws ConfigurationError if a task refers to an unknown agent or tool
     * @throws TaskGroupExecutionError on timeout or on a failure of the group's own bookkeeping
     */
    async execute(): Promise<ContextMap> {

        const logger = this.collaborators.execContext.logger;
        const cid = this.collaborators.execContext.cid;

        this.validateConfiguration();

        const deadline = Date.now() + this.timeoutMs;

        logger.compute(cid, `Starting task group [${this.name}] (${this.id}) with ${this.tasks.length} tasks`);

        try {

            await this.start();

            while (!this.isComplete()) {

                await this.runCycle();

                if (this.isComplete()) break;

                const remaining = deadline - Date.now();

                if (remaining <= 0) return await this.onTimeout();

                const woken = await this.signal.wait(Math.min(this.pollIntervalMs, remaining));

                // Fallback poll: pick up what sibling groups learned meanwhile
                if (!woken) await this.syncSessionContext();
            }

            return await this.onCompleted();

        } catch (error) {

            if (error instanceof TaskGroupExecutionError) throw error;

            logger.compute(cid, `Task group [${this.name}] failed: ${error}`, "error");

            await this.publishPartialResults("error");

            throw new TaskGroupExecutionError(`Task group [${this.name}] failed: ${error instanceof Error ? error.message : String(error)}`, {
                groupId: this.id,
                reason: "error",
                completedTasks: Array.from(this.tasksCompleted),
                failedTasks: [...this.tasksFailed],
            });

        } finally {
            await this.resolver.close();
        }
    }

    /**
     * Makes a failed task eligible to run again. Failed tasks are never retried automatically.
     *
     * @returns true if the task had failed
     */
    async retrigger(taskName: string): Promise<boolean> {

        const found = await this.mutex.runExclusive(() => {

            const before = this.tasksFailed.length;

            this.tasksFailed = this.tasksFailed.filter(f => f.taskName !== taskName);

            return this.tasksFailed.length < before;
        });

        if (found) {
            this.collaborators.execContext.logger.compute(this.collaborators.execContext.cid, `Task [${taskName}] of group [${this.name}] re-triggered`);
            this.signal.notify();
        }

        return found;
    }

    /**
     * Waits for every task launched so far to end.
     */
    async settle(): Promise<void> {
        while (this.inFlight.size > 0) await Promise.all(Array.from(this.inFlight));
    }

    isComplete(): boolean {
        return this.tasks.every(task => this.tasksCompleted.has(task.name));
    }

    /**
     * Checks that every agent class and tool the tasks refer to is registered.
     */
    private validateConfiguration(): void {

        const { agents, tools } = this.collaborators;

        for (const task of this.tasks) {

            if (!agents.has(task.agentClass)) throw new ConfigurationError(`Task [${task.name}] refers to unknown agent class [${task.agentClass}]`, { field: "agentClass", suggestions: [`Registered agents: ${agents.names().join(", ") || "none"}`] });

            tools.resolve(task.tools);

            if (task.validatorTool) {

                const [validator] = tools.resolve([task.validatorTool]);

                if (!validator.validate) throw new ConfigurationError(`Tool [${task.validatorTool}] of task [${task.name}] cannot validate results`, { field: "validatorTool" });
            }
        }
    }

    /**
     * 1. Registers the result keys of every task
     * 2. Joins the session
     * 3. Restores the saved state, if the group ran before
     * 4. Syncs the context with the sibling groups
     */
    private async start(): Promise<void> {

        const logger = this.collaborators.execContext.logger;
        const cid = this.collaborators.execContext.cid;

        // 1. Result keys
        for (const task of this.tasks) {
            for (const resultKey of task.allResultKeys()) {
                await this.registry.register(resultKey, { taskGroupId: this.id, taskGroupName: this.name, taskName: task.name, dependencies: task.dependencies });
            }
        }

        // 2. Session
        await this.stateTracker.joinSession(this.sessionId, this.id);

        // 3. Saved state
        const saved = await this.stateTracker.load(this.id);

        if (saved) {

            const names = new Set(this.tasks.map(t => t.name));

            for (const taskName of saved.tasksCompleted) if (names.has(taskName)) this.tasksCompleted.add(taskName);

            const snapshot = await this.stateTracker.loadContextSnapshot(this.sessionId, this.id);

            if (snapshot) await this.context.mergeInto(snapshot);

            logger.compute(cid, `Task group [${this.name}] resumed with ${this.tasksCompleted.size} completed tasks`);
        }

        // 4. Siblings
        await this.syncSessionContext();
    }

    /**
     * Deep-merges the context snapshots of the other groups of the session into this group's context.
     */
    private async syncSessionContext(): Promise<void> {

        const snapshots = await this.stateTracker.siblingSnapshots(this.sessionId, this.id);

        if (snapshots.length === 0) return;

        const merged: ContextMap = {};

        for (const snapshot of snapshots) deepMerge(merged, snapshot);

        await this.context.mergeInto(merged);
    }

    /**
     * One scheduling cycle.
     */
    private async runCycle(): Promise<void> {

        const ready = await this.mutex.runExclusive(async () => {

            const failed = new Set(this.tasksFailed.map(f => f.taskName));

            // 1. Pending tasks
            const pending = this.tasks.filter(t => !this.tasksCompleted.has(t.name) && !this.runningTasks.has(t.name) && !failed.has(t.name));

            // 2. Dependencies
            const ready: TaskInfo[] = [];

            for (const task of pending) {

                this.satisfyLocally(task, pending);

                if (await this.resolver.watch(this.waiterFor(task))) ready.push(task);
            }

            // 3. Running, before being launched
            for (const task of ready) this.runningTasks.add(task.name);

            return ready;
        });

        for (const task of ready) {

            const run: Promise<void> = this.launch(task).then(() => { this.inFlight.delete(run); });

            this.inFlight.add(run);
        }
    }

    /**
     * Marks as met the dependencies already present in the context, unless a task of this group that
     * produces them is still to run (its output would replace the current value).
     */
    private satisfyLocally(task: TaskInfo, pending: TaskInfo[]): void {

        for (const dependency of this.taskDependencies.get(task.name) ?? []) {

            if (dependency.isMet || !this.context.has(dependency.contextKey)) continue;

            const producedHere = this.tasks.some(t =>
                (pending.includes(t) || this.runningTasks.has(t.name)) && t.allResultKeys().includes(dependency.contextKey)
            );

            if (!producedHere) dependency.markMet(this.context.get(dependency.contextKey));
        }
    }

    private waiterFor(task: TaskInfo): DependencyWaiter {

        return {
            waiterId: `${this.id}:${task.name}`,
            dependencies: this.taskDependencies.get(task.name) ?? [],
            onDependencyUpdate: async (dependency: Dependency, value: unknown) => {
                await this.context.mergeInto({ [dependency.contextKey]: value });
            },
            onDependenciesReady: () => this.signal.notify(),
        }
    }

    /**
     * Runs one task and records its outcome. Never rejects.
     */
    private async launch(task: TaskInfo): Promise<void> {

        const logger = this.collaborators.execContext.logger;
        const cid = this.collaborators.execContext.cid;

        try {

            let results: ResultMap;

            try {

                logger.compute(cid, `Running task [${task.name}] of group [${this.name}]`);

                results = await this.executeTask(task);

                await this.context.mergeInto(results);

                await this.mutex.runExclusive(() => {
                    this.tasksCompleted.add(task.name);
                    this.runningTasks.delete(task.name);
                });

                logger.compute(cid, `Task [${task.name}] of group [${this.name}] completed`);

            } catch (error) {

                const message = error instanceof Error ? error.message : String(error);

                logger.compute(cid, `Task [${task.name}] of group [${this.name}] failed: ${message}`, "error");

                await this.mutex.runExclusive(() => {
                    this.tasksFailed.push({ taskName: task.name, error: message });
                    this.runningTasks.delete(task.name);
                });

                await this.saveState();

                return;
            }

            await this.publishResults(task, results);

            await this.saveState();

            await this.resolver.release(`${this.id}:${task.name}`);

        } catch (error) {
            // Log and continue: the task's outcome is recorded, only its notifications are lost
            logger.compute(cid, `Post-processing of task [${task.name}] failed: ${error}`, "error");
        } finally {
            this.signal.notify();
        }
    }

    /**
     * Expands (when configured) and executes a task, then checks its results.
     */
    private async executeTask(task: TaskInfo): Promise<ResultMap> {

        const { agents, tools, execContext } = this.collaborators;

        const agent = agents.create(task.agentClass);
        const taskTools = tools.resolve(task.tools);
        const snapshot = this.context.snapshot();

        let results: ResultMap;

        if (task.expansionConfig) {

            const outcome = this.expansion.expand(task, snapshot);

            const itemResults = await Promise.all(outcome.tasks.map(item => this.callAgent(agent, item, taskTools, snapshot)));

            results = outcome.tasks.some(t => t.isExpandedTask) ? aggregateResults(itemResults) : itemResults[0];
        }
        else results = await this.callAgent(agent, task, taskTools, snapshot);

        const missing = task.resultKeys.filter(key => !(key in results));

        if (missing.length > 0) throw new TaskExecutionError(task.name, `missing result keys [${missing.join(", ")}]`);

        if (task.validatorTool) {

            const [validator] = tools.resolve([task.validatorTool]);

            const accepted = validator.validate ? await validator.validate(results, task.validatorPrompt ?? "") : false;

            if (!accepted) throw new TaskExecutionError(task.name, `results rejected by validator [${task.validatorTool}]`);

            execContext.logger.compute(execContext.cid, `Results of task [${task.name}] accepted by [${task.validatorTool}]`, "debug");
        }

        return results;
    }

    private async callAgent(agent: AgentExecutor, task: TaskInfo, taskTools: Tool[], snapshot: ContextMap): Promise<ResultMap> {

        const results = await agent.execute({
            task: task,
            tools: taskTools,
            sessionId: this.sessionId,
            ownerId: this.id,
            cid: this.collaborators.execContext.cid,
        }, snapshot);

        if (!isPlainObject(results)) throw new TaskExecutionError(task.name, `agent [${task.agentClass}] returned no result map`);

        return results;
    }

    /**
     * Stores each produced result in the side-channel and announces it on its channel.
     */
    private async publishResults(task: TaskInfo, results: ResultMap): Promise<void> {

        const { bus, store } = this.collaborators;

        for (const resultKey of task.allResultKeys()) {

            if (!(resultKey in results)) continue;

            if (FILTERED_RESULT_PREFIXES.some(prefix => resultKey.startsWith(prefix))) continue;

            const value = serializeValue(results[resultKey]);

            await store.setValue(StateKeys.result(this.id, resultKey), value);

            const update: DependencyUpdate = {
                taskName: task.name,
                resultKey: resultKey,
                value: value,
                isArray: Array.isArray(value),
                taskGroupId: this.id,
                sessionId: this.sessionId,
                timestamp: new Date().toISOString(),
            }

            await bus.publishMessage(Channels.result(this.id, resultKey), update);
        }
    }

    private async saveState(): Promise<void> {

        try {

            const state = await this.mutex.runExclusive(() => ({
                id: this.id,
                name: this.name,
                sessionId: this.sessionId,
                tasksCompleted: Array.from(this.tasksCompleted),
                tasksFailed: [...this.tasksFailed],
                runningTasks: Array.from(this.runningTasks),
            }));

            await this.stateTracker.save(state);
            await this.stateTracker.saveContextSnapshot(this.sessionId, this.id, this.context.snapshot());

        } catch (error) {
            this.collaborators.execContext.logger.compute(this.collaborators.execContext.cid, `Failed to save state of group [${this.name}]: ${error}`, "warn");
        }
    }

    private async onCompleted(): Promise<ContextMap> {

        const logger = this.collaborators.execContext.logger;
        const cid = this.collaborators.execContext.cid;

        const snapshot = this.context.snapshot();

        await this.collaborators.bus.publishMessage(Channels.completion(this.key), {
            status: "completed",
            groupId: this.id,
            sessionId: this.sessionId,
            completedTasks: Array.from(this.tasksCompleted),
            context: snapshot,
        });

        await this.stateTracker.saveContextSnapshot(this.sessionId, this.id, snapshot);
        await this.stateTracker.clear(this.id);

        logger.compute(cid, `Task group [${this.name}] completed`);

        return snapshot;
    }

    private async onTimeout(): Promise<never> {

        const logger = this.collaborators.execContext.logger;
        const cid = this.collaborators.execContext.cid;

        logger.compute(cid, `Task group [${this.name}] timed out after ${this.timeoutMs} ms. Completed: [${Array.from(this.tasksCompleted).join(", ")}]`, "error");

        await this.publishPartialResults("timeout");

        throw new TaskGroupExecutionError(`Task group [${this.name}] timed out after ${this.timeoutMs} ms`, {
            groupId: this.id,
            reason: "timeout",
            completedTasks: Array.from(this.tasksCompleted),
            failedTasks: [...this.tasksFailed],
        });
    }

    private async publishPartialResults(status: TaskGroupStatus): Promise<void> {

        try {

            await this.collaborators.bus.publishMessage(Channels.partialResults(this.key), {
                status: status,
                groupId: this.id,
                sessionId: this.sessionId,
                completedTasks: Array.from(this.tasksCompleted),
                failedTasks: [...this.tasksFailed],
                context: this.context.snapshot(),
            });

        } catch (error) {
            this.collaborators.execContext.logger.compute(this.collaborators.execContext.cid, `Failed to publish partial results of group [${this.name}]: ${error}`, "error");
        }
    }
}
