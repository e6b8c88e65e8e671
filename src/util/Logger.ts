import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Correlation-aware logger.
 * 
 * Every line carries the correlation id (cid) of the message that caused it, so that a whole
 * group execution can be followed across tasks, notifications and agent calls.
 */
export class Logger {

    private log: pino.Logger;

    constructor(apiName: string, level: string = process.env.LOG_LEVEL ?? "info") {
        this.log = pino({ name: apiName, level: level });
    }

    /**
     * Logs a message.
     * 
     * @param cid the correlation id
     * @param message the message to log
     * @param level the log level. Defaults to "info"
     */
    compute(cid: string, message: string, level: LogLevel = "info"): void {

        switch (level) {
            case "debug":
                this.log.debug({ cid }, message);
                break;
            case "warn":
                this.log.warn({ cid }, message);
                break;
            case "error":
                this.log.error({ cid }, message);
                break;
            default:
                this.log.info({ cid }, message);
        }
    }
}
