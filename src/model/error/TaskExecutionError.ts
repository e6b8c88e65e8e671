/**
 * A single task failed. Recorded against the task, never fatal for the group.
 */
export class TaskExecutionError extends Error {

    name: string = "TaskExecutionError";
    code: number = 500;
    taskName: string;

    constructor(taskName: string, message: string) {
        super(`Task [${taskName}] failed: ${message}`);
        this.taskName = taskName;
    }
}
