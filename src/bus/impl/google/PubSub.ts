import { Message, PubSub, Subscription as PubSubSubscription, Topic } from "@google-cloud/pubsub";
import { IMessageBus, MessageHandler, Subscription } from "../../MessageBus";
import { ChannelDispatcher } from "../../ChannelDispatcher";
import { Logger } from "../../../util/Logger";
import { tryParseJSON } from "../../../util/Objects";

const CHANNEL_ATTRIBUTE = "channel";

/**
 * Message bus on Google Cloud Pub/Sub.
 * 
 * All the logical channels travel on a single topic: the channel is a message attribute.
 * Each process listens on its own subscription and dispatches locally to the handlers of the channel.
 * Messages are acked once every handler has run.
 */
export class PubSubMessageBus extends IMessageBus {

    private pubsub: PubSub;
    private topic: Topic;
    private subscription: PubSubSubscription | null = null;
    private dispatcher: ChannelDispatcher;

    constructor(projectId: string | undefined, topicName: string, private subscriptionName: string, private logger: Logger) {
        super();
        this.pubsub = new PubSub({ projectId: projectId });
        this.topic = this.pubsub.topic(topicName);
        this.dispatcher = new ChannelDispatcher(logger);
    }

    /**
     * Publishes a payload on a logical channel
     * @param channel the logical channel
     * @param payload JSON-serializable payload
     */
    async publishMessage(channel: string, payload: unknown): Promise<void> {

        const message = JSON.stringify(payload);

        await this.topic.publishMessage({ data: Buffer.from(message), attributes: { [CHANNEL_ATTRIBUTE]: channel } });
    }

    async subscribe(channel: string, handler: MessageHandler): Promise<Subscription> {

        // Start listening on the first subscription
        if (!this.subscription) {

            this.subscription = this.pubsub.subscription(this.subscriptionName);

            this.subscription.on("message", (message: Message) => this.onMessage(message));
            this.subscription.on("error", (error: Error) => this.logger.compute("", `Pub/Sub subscription [${this.subscriptionName}] error: ${error.message}`, "error"));
        }

        return this.dispatcher.add(channel, handler);
    }

    decodeMessage(raw: unknown): unknown {

        const text = Buffer.isBuffer(raw) ? raw.toString("utf8") : raw;

        if (typeof text !== "string") return text;

        const parsed = tryParseJSON(text);

        return parsed === undefined ? text : parsed;
    }

    async close(): Promise<void> {

        this.dispatcher.clear();

        if (this.subscription) {

            this.subscription.removeAllListeners();

            await this.subscription.close();

            this.subscription = null;
        }

        await this.pubsub.close();
    }

    private onMessage(message: Message): void {

        const channel = message.attributes[CHANNEL_ATTRIBUTE];

        // Not ours: nothing in this process listens to it
        if (!channel || !this.dispatcher.hasHandlers(channel)) {
            message.ack();
            return;
        }

        this.dispatcher.dispatch(channel, this.decodeMessage(message.data)).then(() => message.ack()).catch(error => {
            this.logger.compute("", `Failed to dispatch message ${message.id} on channel [${channel}]: ${error}`, "error");
            message.nack();
        });
    }
}
