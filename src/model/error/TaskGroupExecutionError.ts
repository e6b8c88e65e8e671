import { FailedTask } from "../TaskGroupState";

export type TaskGroupFailureReason = "timeout" | "error";

/**
 * Terminal failure of a whole task group: the group deadline expired or the group's own
 * bookkeeping broke. Carries what was achieved before the failure.
 */
export class TaskGroupExecutionError extends Error {

    name: string = "TaskGroupExecutionError";
    code: number = 500;
    groupId: string;
    reason: TaskGroupFailureReason;
    completedTasks: string[];
    failedTasks: FailedTask[];

    constructor(message: string, details: { groupId: string, reason: TaskGroupFailureReason, completedTasks: string[], failedTasks: FailedTask[] }) {
        super(message);
        this.groupId = details.groupId;
        this.reason = details.reason;
        this.completedTasks = details.completedTasks;
        this.failedTasks = details.failedTasks;
    }
}
