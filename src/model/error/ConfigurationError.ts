/**
 * Raised when a task, group or scheduler configuration is malformed.
 * 
 * Fatal at construction: configuration errors are never retried.
 */
export class ConfigurationError extends Error {

    name: string = "ConfigurationError";
    code: number = 400;
    field?: string;
    suggestions: string[];

    constructor(message: string, details: { field?: string, suggestions?: string[] } = {}) {
        super(details.field ? `${message} (field: ${details.field})` : message);
        this.field = details.field;
        this.suggestions = details.suggestions ?? [];
    }
}
