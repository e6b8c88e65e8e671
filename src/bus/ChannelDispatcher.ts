import { MessageHandler, Subscription } from "./MessageBus";
import { Logger } from "../util/Logger";

/**
 * Keeps the handlers registered on each channel of one process and delivers messages to them.
 * Shared by the bus adapters, which only differ in how messages reach the process.
 */
export class ChannelDispatcher {

    private handlers = new Map<string, Set<MessageHandler>>();

    constructor(private logger: Logger) { }

    add(channel: string, handler: MessageHandler): Subscription {

        let channelHandlers = this.handlers.get(channel);

        if (!channelHandlers) {
            channelHandlers = new Set();
            this.handlers.set(channel, channelHandlers);
        }

        // Wrap, so that the same function subscribed twice yields two subscriptions
        const entry: MessageHandler = (payload, ch) => handler(payload, ch);

        channelHandlers.add(entry);

        return {
            channel: channel,
            unsubscribe: async () => {

                const current = this.handlers.get(channel);

                if (!current) return;

                current.delete(entry);

                if (current.size === 0) this.handlers.delete(channel);
            }
        }
    }

    /**
     * Delivers a payload to every handler of the channel.
     * A failing handler is logged and does not prevent delivery to the others.
     */
    async dispatch(channel: string, payload: unknown): Promise<void> {

        const channelHandlers = this.handlers.get(channel);

        if (!channelHandlers) return;

        await Promise.all(Array.from(channelHandlers).map(async handler => {
            try {
                await handler(payload, channel);
            } catch (error) {
                this.logger.compute("", `Handler on channel [${channel}] failed: ${error}`, "error");
            }
        }));
    }

    hasHandlers(channel: string): boolean {
        return this.handlers.has(channel);
    }

    clear(): void {
        this.handlers.clear();
    }
}
