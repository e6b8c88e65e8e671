import { expect } from "chai";
import { LocalMessageBus } from "../../src/bus/impl/local/LocalMessageBus";
import { SchedulerMessage } from "../../src/bus/MessageBus";
import { Channels, StateKeys } from "../../src/bus/Channels";
import { collect, testLogger, waitFor } from "../Mocks";

describe("LocalMessageBus", () => {

    let bus: LocalMessageBus;

    beforeEach(() => {
        bus = new LocalMessageBus(testLogger());
    });

    afterEach(async () => {
        await bus.close();
    });

    it("should deliver asynchronously to every handler of the channel", async () => {

        const first = await collect(bus, "news");
        const second = await collect(bus, "news");
        const other = await collect(bus, "other");

        await bus.publishMessage("news", { headline: "hello" });

        // Not delivered inside publishMessage
        expect(first).to.have.length(0);

        await waitFor(() => first.length === 1 && second.length === 1);

        expect(first[0]).to.deep.equal({ headline: "hello" });
        expect(other).to.have.length(0);
    });

    it("should not share objects between publisher and subscribers", async () => {

        const received = await collect(bus, "news");
        const payload = { items: [1] };

        await bus.publishMessage("news", payload);

        payload.items.push(2);

        await waitFor(() => received.length === 1);

        expect(received[0]).to.deep.equal({ items: [1] });
    });

    it("should stop delivering after unsubscribe", async () => {

        const received: unknown[] = [];

        const subscription = await bus.subscribe("news", (payload) => { received.push(payload); });
        const probe = await collect(bus, "news");

        await subscription.unsubscribe();
        await bus.publishMessage("news", "ping");

        await waitFor(() => probe.length === 1);

        expect(received).to.have.length(0);
    });

    it("should keep delivering when a handler fails", async () => {

        await bus.subscribe("news", () => { throw new Error("boom"); });

        const received = await collect(bus, "news");

        await bus.publishMessage("news", 42);

        await waitFor(() => received.length === 1);

        expect(received[0]).to.equal(42);
    });

    it("should decode JSON and leave other strings as they are", () => {

        expect(bus.decodeMessage('{"a":1}')).to.deep.equal({ a: 1 });
        expect(bus.decodeMessage("plain text")).to.equal("plain text");
        expect(bus.decodeMessage("b'{\"a\":1}'")).to.equal("b'{\"a\":1}'");
    });

    it("should refuse to publish once closed", async () => {

        await bus.close();

        let failed = false;

        try {
            await bus.publishMessage("news", 1);
        } catch (error) {
            failed = true;
        }

        expect(failed).to.equal(true);
    });
});

describe("SchedulerMessage", () => {

    it("should validate the envelope", () => {

        expect(SchedulerMessage.validate({ type: "task_group", cid: "c1", timestamp: 1, payload: {} })).to.equal(true);
        expect(SchedulerMessage.validate({ type: "task", cid: "c1", timestamp: 1, payload: {} })).to.equal(false);
        expect(SchedulerMessage.validate({ type: "node", cid: "c1", timestamp: "1", payload: {} })).to.equal(false);
        expect(SchedulerMessage.validate({ type: "node", cid: "c1", timestamp: 1, payload: "x" })).to.equal(false);
        expect(SchedulerMessage.validate({ type: "node", cid: "c1", payload: {} })).to.equal(true);
        expect(SchedulerMessage.validate(null)).to.equal(false);
    });

    it("should build a message from a valid payload", () => {

        const msg = SchedulerMessage.fromPayload({ type: "node", cid: "c1", timestamp: 5, payload: { action: "initialize" } });

        expect(msg).to.be.instanceOf(SchedulerMessage);
        expect(msg?.timestamp).to.equal(5);
        expect(SchedulerMessage.fromPayload({})).to.be.null;
    });

    it("should read bare task group control messages", () => {

        const before = Date.now();
        const msg = SchedulerMessage.fromPayload({ key: "task_group:g1", action: "initialize", object: { id: "g1" }, context: {}, cid: "c9" });

        expect(msg?.type).to.equal("task_group");
        expect(msg?.cid).to.equal("c9");
        expect(msg?.payload).to.deep.equal({ key: "task_group:g1", action: "initialize", object: { id: "g1" }, context: {} });
        expect(msg?.timestamp).to.be.at.least(before);
        expect(SchedulerMessage.fromPayload({ action: "initialize" })).to.be.null;
    });
});

describe("Channels", () => {

    it("should name channels and keys", () => {

        expect(Channels.result("g1", "summary")).to.equal("task_group_execute:g1:summary");
        expect(Channels.completion("task_group:g1")).to.equal("task_group:g1:completion");
        expect(Channels.partialResults("task_group:g1")).to.equal("task_group:g1:partial_results");
        expect(Channels.nodeStatusUpdates()).to.equal("node_status_updates");
        expect(StateKeys.resultKeys("s1")).to.equal("session:s1:result_keys");
        expect(StateKeys.groupContext("s1", "g1")).to.equal("session:s1:task_group:g1:context");
    });
});
