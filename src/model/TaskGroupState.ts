export interface FailedTask {
    taskName: string;
    error: string;
}

/**
 * Persisted snapshot of a group's bookkeeping, used to resume a re-initialized group.
 */
export interface TaskGroupState {
    id: string;
    name: string;
    sessionId: string;
    tasksCompleted: string[];
    tasksFailed: FailedTask[];
    runningTasks: string[];
    timestamp: string;
    version: string;
}

export type TaskGroupStatus = "completed" | "timeout" | "error";
