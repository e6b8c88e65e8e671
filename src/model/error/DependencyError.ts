/**
 * Raised when a dependency cannot be looked up or is not satisfied in time.
 */
export class DependencyError extends Error {

    name: string = "DependencyError";
    code: number = 424;
    taskName?: string;
    missingDependencies: string[];

    constructor(message: string, details: { taskName?: string, missingDependencies?: string[] } = {}) {
        super(message);
        this.taskName = details.taskName;
        this.missingDependencies = details.missingDependencies ?? [];
    }
}
