import { IMessageBus, Subscription } from "../../bus/MessageBus";
import { Channels, StateKeys } from "../../bus/Channels";
import { SharedStateStore } from "../../store/SharedStateStore";
import { DependencyRegistry } from "../registry/DependencyRegistry";
import { Dependency, requiredDependenciesMet } from "../../model/Dependency";
import { DependencyError } from "../../model/error/DependencyError";
import { ExecutionContext } from "../../model/ExecutionContext";
import { isPlainObject, tryParseJSON } from "../../util/Objects";

/**
 * Something that waits for dependencies: a task of a group or a unit of work.
 */
export interface DependencyWaiter {

    waiterId: string;
    dependencies: Dependency[];

    /**
     * Called every time one of the waiter's dependencies becomes met.
     */
    onDependencyUpdate(dependency: Dependency, value: unknown): Promise<void> | void;

    /**
     * Called once, when the last required dependency becomes met through a notification.
     */
    onDependenciesReady(): Promise<void> | void;
}

/**
 * Turns "I need X" into "I will be notified when X exists".
 * 
 * One resolver serves one scope (a group, a node): channel subscriptions are shared by all the waiters
 * of the scope and reference-counted, so that a channel is released only when nobody waits on it anymore.
 */
export class DependencyResolver {

    private waiters = new Map<string, DependencyWaiter>();
    private channelWaiters = new Map<string, Set<string>>();          // channel -> waiter ids
    private channelKeys = new Map<string, string>();                  // channel -> result key
    private subscriptions = new Map<string, Promise<Subscription>>(); // channel -> subscription (in flight or done)
    private readyNotified = new Set<string>();

    constructor(
        private bus: IMessageBus,
        private store: SharedStateStore,
        private registry: DependencyRegistry,
        private execContext: ExecutionContext
    ) { }

    /**
     * Starts (or refreshes) the watch of a waiter's unmet dependencies.
     * 
     * For each unmet dependency:
     * 1. Looks up its producer. An unknown producer is not an error: it may register later.
     * 2. Subscribes to the producer's channel, once per channel. A failed subscription leaves the dependency pending.
     * 3. Checks the result side-channel, in case the result was published before the subscription existed.
     * 
     * Can be called repeatedly: this is how a periodic re-check catches missed notifications.
     * 
     * @returns true if all the required dependencies are met
     */
    async watch(waiter: DependencyWaiter): Promise<boolean> {

        const logger = this.execContext.logger;
        const cid = this.execContext.cid;

        this.waiters.set(waiter.waiterId, waiter);

        for (const dependency of waiter.dependencies) {

            if (dependency.isMet) continue;

            let producerId: string;

            try {

                const producer = await this.registry.lookup(dependency.contextKey);

                if (!producer) {
                    logger.compute(cid, `[${waiter.waiterId}] Producer of [${dependency.contextKey}] not registered yet`, "debug");
                    continue;
                }

                producerId = producer.taskGroupId;

            } catch (error) {

                if (!(error instanceof DependencyError)) throw error;

                logger.compute(cid, `[${waiter.waiterId}] Dependency [${dependency.contextKey}] not ready: ${error.message}`, "warn");
                continue;
            }

            const channel = Channels.result(producerId, dependency.contextKey);

            this.attach(waiter.waiterId, channel, dependency.contextKey);

            try {
                await this.ensureSubscribed(channel);
            } catch (error) {
                // Not ready yet: the next watch subscribes again
                logger.compute(cid, `[${waiter.waiterId}] Failed to subscribe to [${channel}]: ${error}`, "warn");
                continue;
            }

            // 3. Side-channel: the result may already be there
            try {

                const stored = await this.store.getValue(StateKeys.result(producerId, dependency.contextKey));

                if (stored !== undefined && stored !== null) await this.deliver(channel, dependency.contextKey, stored);

            } catch (error) {
                logger.compute(cid, `[${waiter.waiterId}] Failed to read stored result of [${dependency.contextKey}]: ${error}`, "warn");
            }
        }

        return requiredDependenciesMet(waiter.dependencies);
    }

    /**
     * Handles a message received on a result channel.
     * Payloads can be structured ({resultKey, value} or {[resultKey]: value}), JSON strings or raw scalars.
     */
    async handleMessage(channel: string, payload: unknown): Promise<void> {

        const resultKey = this.channelKeys.get(channel);

        if (!resultKey) return;

        await this.deliver(channel, resultKey, extractValue(payload, resultKey));
    }

    /**
     * Stops watching for a waiter. Channels nobody else waits on are unsubscribed.
     */
    async release(waiterId: string): Promise<void> {

        this.waiters.delete(waiterId);
        this.readyNotified.delete(waiterId);

        const toClose: string[] = [];

        for (const [channel, ids] of this.channelWaiters) {

            if (!ids.delete(waiterId)) continue;

            if (ids.size === 0) toClose.push(channel);
        }

        for (const channel of toClose) await this.closeChannel(channel);
    }

    /**
     * Releases every waiter and every subscription.
     */
    async close(): Promise<void> {

        this.waiters.clear();
        this.readyNotified.clear();

        for (const channel of Array.from(this.channelWaiters.keys())) await this.closeChannel(channel);
    }

    /**
     * Channels currently subscribed, with the number of waiters on each.
     */
    activeChannels(): Map<string, number> {

        const result = new Map<string, number>();

        for (const [channel, ids] of this.channelWaiters) result.set(channel, ids.size);

        return result;
    }

    private attach(waiterId: string, channel: string, resultKey: string): void {

        let ids = this.channelWaiters.get(channel);

        if (!ids) {
            ids = new Set();
            this.channelWaiters.set(channel, ids);
        }

        ids.add(waiterId);

        this.channelKeys.set(channel, resultKey);
    }

    private async ensureSubscribed(channel: string): Promise<void> {

        let subscription = this.subscriptions.get(channel);

        if (!subscription) {

            subscription = this.bus.subscribe(channel, (payload) => this.handleMessage(channel, payload));

            this.subscriptions.set(channel, subscription);

            this.execContext.logger.compute(this.execContext.cid, `Subscribed to channel [${channel}]`, "debug");
        }

        try {
            await subscription;
        } catch (error) {
            // Let the next watch retry
            this.subscriptions.delete(channel);
            throw error;
        }
    }

    private async closeChannel(channel: string): Promise<void> {

        this.channelWaiters.delete(channel);
        this.channelKeys.delete(channel);

        const subscription = this.subscriptions.get(channel);

        this.subscriptions.delete(channel);

        if (!subscription) return;

        try {
            await (await subscription).unsubscribe();

            this.execContext.logger.compute(this.execContext.cid, `Unsubscribed from channel [${channel}]`, "debug");

        } catch (error) {
            this.execContext.logger.compute(this.execContext.cid, `Failed to unsubscribe from channel [${channel}]: ${error}`, "warn");
        }
    }

    /**
     * Marks the dependencies on the result key as met for every waiter of the channel.
     * Redelivery is harmless: a dependency is met once and readiness is notified once.
     */
    private async deliver(channel: string, resultKey: string, value: unknown): Promise<void> {

        const ids = this.channelWaiters.get(channel);

        if (!ids) return;

        for (const waiterId of Array.from(ids)) {

            const waiter = this.waiters.get(waiterId);

            if (!waiter) continue;

            let changed = false;

            for (const dependency of waiter.dependencies) {

                if (dependency.contextKey !== resultKey || !dependency.markMet(value)) continue;

                changed = true;

                await waiter.onDependencyUpdate(dependency, dependency.output);
            }

            if (changed && requiredDependenciesMet(waiter.dependencies) && !this.readyNotified.has(waiterId)) {

                this.readyNotified.add(waiterId);

                await waiter.onDependenciesReady();
            }
        }
    }
}

/**
 * Extracts the value of a result key from a notification payload.
 */
export function extractValue(payload: unknown, resultKey: string): unknown {

    let value = payload;

    if (typeof value === "string") {

        const parsed = tryParseJSON(value);

        // Raw scalar
        if (parsed === undefined) return value;

        value = parsed;
    }

    if (isPlainObject(value)) {

        if (value.resultKey === resultKey && "value" in value) return value.value;

        if (resultKey in value) return value[resultKey];
    }

    return value;
}
