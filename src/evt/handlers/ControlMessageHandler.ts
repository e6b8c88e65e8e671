import { SchedulerMessage } from "../../bus/MessageBus";
import { Scheduler } from "../../core/Scheduler";
import { Logger } from "../../util/Logger";

export class ControlMessageHandler {

    constructor(private scheduler: Scheduler, private logger: Logger) { }

    async onMessage(msg: SchedulerMessage): Promise<void> {

        const type: string = msg.type;

        this.logger.compute(msg.cid, `Handling Scheduler Message of type [${type}]`, "info");

        switch (msg.type) {
            case "task_group":
                await this.scheduler.handleGroupMessage(msg);
                break;
            case "node":
                await this.scheduler.handleNodeMessage(msg);
                break;
            default:
                this.logger.compute(msg.cid, `Unknown event type [${type}] received`, "warn");
        }

    }

}
