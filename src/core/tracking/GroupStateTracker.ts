import { SharedStateStore } from "../../store/SharedStateStore";
import { StateKeys } from "../../bus/Channels";
import { FailedTask, TaskGroupState } from "../../model/TaskGroupState";
import { ExecutionContext } from "../../model/ExecutionContext";
import { ContextMap, isPlainObject } from "../../util/Objects";

const STATE_VERSION = "1";

/**
 * Persists the bookkeeping and the context of task groups, so that a group can resume after being
 * re-initialized and sibling groups of a session can share what they learned.
 */
export class GroupStateTracker {

    constructor(private store: SharedStateStore, private execContext: ExecutionContext) { }

    /**
     * Saves the state of a group.
     */
    async save(state: Omit<TaskGroupState, "timestamp" | "version">): Promise<void> {

        const record: TaskGroupState = {
            ...state,
            timestamp: new Date().toISOString(),
            version: STATE_VERSION,
        }

        await this.store.setValue(StateKeys.groupState(state.id), record);
    }

    /**
     * Loads the saved state of a group.
     * 
     * @returns the state, or null if there is none (or it cannot be read)
     */
    async load(groupId: string): Promise<TaskGroupState | null> {

        const raw = await this.store.getValue(StateKeys.groupState(groupId));

        if (raw === undefined || raw === null) return null;

        const state = parseState(raw);

        if (!state) this.execContext.logger.compute(this.execContext.cid, `Ignoring malformed saved state of group [${groupId}]`, "warn");

        return state;
    }

    async clear(groupId: string): Promise<void> {
        await this.store.deleteByPattern(StateKeys.groupState(groupId));
    }

    async saveContextSnapshot(sessionId: string, groupId: string, context: ContextMap): Promise<void> {
        await this.store.setValue(StateKeys.groupContext(sessionId, groupId), context);
    }

    async loadContextSnapshot(sessionId: string, groupId: string): Promise<ContextMap | null> {

        const raw = await this.store.getValue(StateKeys.groupContext(sessionId, groupId));

        return isPlainObject(raw) ? raw : null;
    }

    /**
     * Adds the group to its session's group set.
     */
    async joinSession(sessionId: string, groupId: string): Promise<void> {
        await this.store.addMember(StateKeys.sessionGroups(sessionId), groupId);
    }

    /**
     * Context snapshots of the other groups of the session, in the order the store lists them.
     */
    async siblingSnapshots(sessionId: string, groupId: string): Promise<ContextMap[]> {

        const members = await this.store.getMembers(StateKeys.sessionGroups(sessionId));

        const snapshots: ContextMap[] = [];

        for (const member of members) {

            if (member === groupId) continue;

            const snapshot = await this.loadContextSnapshot(sessionId, member);

            if (snapshot) snapshots.push(snapshot);
        }

        return snapshots;
    }
}

function parseState(raw: unknown): TaskGroupState | null {

    if (!isPlainObject(raw)) return null;

    const { id, name, sessionId, tasksCompleted, tasksFailed, runningTasks, timestamp, version } = raw;

    if (typeof id !== "string" || !Array.isArray(tasksCompleted)) return null;

    const failed: FailedTask[] = [];

    if (Array.isArray(tasksFailed)) {
        for (const item of tasksFailed) {
            if (isPlainObject(item) && typeof item.taskName === "string") failed.push({ taskName: item.taskName, error: String(item.error) });
        }
    }

    return {
        id: id,
        name: typeof name === "string" ? name : "",
        sessionId: typeof sessionId === "string" ? sessionId : "",
        tasksCompleted: tasksCompleted.filter((t): t is string => typeof t === "string"),
        tasksFailed: failed,
        runningTasks: Array.isArray(runningTasks) ? runningTasks.filter((t): t is string => typeof t === "string") : [],
        timestamp: typeof timestamp === "string" ? timestamp : "",
        version: typeof version === "string" ? version : STATE_VERSION,
    }
}
