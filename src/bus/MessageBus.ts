import { SchedulerConfig } from "../Config";
import { Logger } from "../util/Logger";
import { isPlainObject } from "../util/Objects";

/**
 * This module provides asynchronous messaging capabilities. 
 * It represents an INTERFACE to a publish/subscribe broker (e.g. GCP Pub/Sub, Redis, an in-process bus)
 * 
 * It is compatible with different brokers via adapters.
 * Channels are logical names (see Channels): an adapter decides how to map them on the broker.
 */
export abstract class IMessageBus {

    /**
     * Publishes a payload on a channel. The payload must be JSON-serializable.
     */
    abstract publishMessage(channel: string, payload: unknown): Promise<void>;

    /**
     * Subscribes a handler to a channel. 
     * Several handlers can subscribe to the same channel: each receives every message.
     * Delivery is at-least-once: handlers must tolerate duplicates.
     */
    abstract subscribe(channel: string, handler: MessageHandler): Promise<Subscription>;

    /**
     * Decodes a raw message body received from the broker into its payload.
     * Bodies that are not JSON are returned as strings.
     */
    abstract decodeMessage(raw: unknown): unknown;

    /**
     * Used for cleanup during application shutdown.
     */
    abstract close(): Promise<void>;
}

export type MessageHandler = (payload: unknown, channel: string) => Promise<void> | void;

export interface Subscription {
    channel: string;
    unsubscribe(): Promise<void>;
}

/**
 * Factory for creating Message Bus instances based on the hyperscaler.
 */
export abstract class MessageBusFactory {

    abstract createMessageBus(config: SchedulerConfig, logger: Logger): IMessageBus;
}

/**
 * Control message received on the control channel.
 */
export class SchedulerMessage {

    type: SchedulerMessageType;     // The type of message
    cid: string;                    // A Correlation Id
    timestamp: number;              // A timestamp in milliseconds
    payload: Record<string, unknown>; // The message payload

    constructor(type: SchedulerMessageType, cid: string, payload: Record<string, unknown>, timestamp: number = Date.now()) {
        this.type = type;
        this.cid = cid;
        this.timestamp = timestamp;
        this.payload = payload;
    }

    /**
     * Validates the message structure, to make sure that it is compliant with the interface of Scheduler Message.
     * The timestamp is optional.
     * @param message the message to validate
     */
    static validate(message: unknown): message is { type: SchedulerMessageType, cid: string, timestamp?: number, payload: Record<string, unknown> } {

        if (!isPlainObject(message)) return false;

        const { type, cid, timestamp, payload } = message;

        if (type !== "task_group" && type !== "node") return false;
        if (typeof cid !== "string") return false;
        if (timestamp !== undefined && typeof timestamp !== "number") return false;
        if (!isPlainObject(payload)) return false;

        return true;
    }

    /**
     * Builds a Scheduler Message from a decoded payload.
     * 
     * Besides the envelope, a bare task group control message ({key, action, object, context}) is accepted:
     * it becomes a "task_group" message whose payload is the control message itself.
     * 
     * @returns the message, or null if the payload is not a valid Scheduler Message
     */
    static fromPayload(message: unknown): SchedulerMessage | null {

        if (SchedulerMessage.validate(message)) return new SchedulerMessage(message.type, message.cid, message.payload, message.timestamp);

        if (isPlainObject(message) && message.type === undefined && typeof message.action === "string" && isPlainObject(message.object)) {

            const { cid, ...control } = message;

            return new SchedulerMessage("task_group", typeof cid === "string" ? cid : "", control);
        }

        return null;
    }
}

export type SchedulerMessageType = "task_group" | "node";
