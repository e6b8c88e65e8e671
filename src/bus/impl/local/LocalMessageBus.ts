import { IMessageBus, MessageHandler, Subscription } from "../../MessageBus";
import { ChannelDispatcher } from "../../ChannelDispatcher";
import { Logger } from "../../../util/Logger";
import { tryParseJSON } from "../../../util/Objects";

/**
 * In-process message bus.
 * 
 * Used when running locally and in tests. Delivery is asynchronous (never inside publishMessage) and
 * payloads are serialized, so that handlers never share objects with the publisher.
 */
export class LocalMessageBus extends IMessageBus {

    private dispatcher: ChannelDispatcher;
    private closed = false;

    constructor(private logger: Logger) {
        super();
        this.dispatcher = new ChannelDispatcher(logger);
    }

    async publishMessage(channel: string, payload: unknown): Promise<void> {

        if (this.closed) throw new Error(`Cannot publish on channel [${channel}]: the bus is closed`);

        const data = JSON.stringify(payload);

        setImmediate(() => {
            this.dispatcher.dispatch(channel, this.decodeMessage(data)).catch(error => {
                this.logger.compute("", `Delivery on channel [${channel}] failed: ${error}`, "error");
            });
        });
    }

    async subscribe(channel: string, handler: MessageHandler): Promise<Subscription> {
        return this.dispatcher.add(channel, handler);
    }

    decodeMessage(raw: unknown): unknown {

        if (typeof raw !== "string") return raw;

        const parsed = tryParseJSON(raw);

        return parsed === undefined ? raw : parsed;
    }

    async close(): Promise<void> {
        this.closed = true;
        this.dispatcher.clear();
    }
}
