import { SchedulerConfig } from "../Config";
import { Logger } from "../util/Logger";

/**
 * What every operation triggered by one inbound message carries along: the logger, the correlation id
 * of the message and the configuration.
 */
export class ExecutionContext {

    constructor(public logger: Logger, public cid: string, public config: SchedulerConfig) { }
}
