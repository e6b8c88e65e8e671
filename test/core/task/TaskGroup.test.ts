import { expect } from "chai";
import { TaskGroup, TaskGroupOptions } from "../../../src/core/task/TaskGroup";
import { TaskGroupDefinition } from "../../../src/model/TaskGroupDefinition";
import { TaskInfo, ExpansionConfig } from "../../../src/model/TaskInfo";
import { AgentRegistry } from "../../../src/core/agents/AgentRegistry";
import { ToolRegistry } from "../../../src/core/agents/ToolRegistry";
import { InMemoryStateStore } from "../../../src/store/impl/InMemoryStateStore";
import { LocalMessageBus } from "../../../src/bus/impl/local/LocalMessageBus";
import { Channels, StateKeys } from "../../../src/bus/Channels";
import { MessageHandler, Subscription } from "../../../src/bus/MessageBus";
import { ConfigurationError } from "../../../src/model/error/ConfigurationError";
import { TaskGroupExecutionError } from "../../../src/model/error/TaskGroupExecutionError";
import { ScriptedAgent, collect, sleep, testExecContext, testLogger, waitFor } from "../../Mocks";
import { ContextMap } from "../../../src/util/Objects";

interface TaskFields {
    name: string;
    resultKeys?: string[];
    dependencies?: string[];
    optionalDependencies?: string[];
    agentClass?: string;
    tools?: string[];
    validatorPrompt?: string;
    validatorTool?: string;
    expansionConfig?: ExpansionConfig;
    messageTemplate?: string;
}

function task(spec: TaskFields): TaskInfo {
    return new TaskInfo({
        name: spec.name,
        agentClass: spec.agentClass ?? "Scripted",
        messageTemplate: spec.messageTemplate ?? `Do ${spec.name}`,
        resultKeys: spec.resultKeys ?? [`${spec.name.toLowerCase()}_out`],
        dependencies: spec.dependencies,
        optionalDependencies: spec.optionalDependencies,
        tools: spec.tools,
        validatorPrompt: spec.validatorPrompt,
        validatorTool: spec.validatorTool,
        expansionConfig: spec.expansionConfig,
    });
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    throw new Error("Expected a rejection");
}

/**
 * Bus whose first subscription to a result key fails.
 */
class FlakyBus extends LocalMessageBus {

    failures = 1;

    constructor(private resultKey: string) {
        super(testLogger());
    }

    async subscribe(channel: string, handler: MessageHandler): Promise<Subscription> {

        if (this.failures > 0 && channel.endsWith(`:${this.resultKey}`)) {
            this.failures--;
            throw new Error("broker unavailable");
        }

        return super.subscribe(channel, handler);
    }
}

describe("TaskGroup", () => {

    let bus: LocalMessageBus;
    let store: InMemoryStateStore;
    let agent: ScriptedAgent;
    let agents: AgentRegistry;
    let tools: ToolRegistry;

    beforeEach(() => {

        bus = new LocalMessageBus(testLogger());
        store = new InMemoryStateStore();
        agent = new ScriptedAgent();
        agents = new AgentRegistry();
        tools = new ToolRegistry();

        agents.register("Scripted", () => agent);
    });

    afterEach(async () => {
        await bus.close();
    });

    function group(id: string, tasks: TaskInfo[], options: TaskGroupOptions = {}, context: ContextMap = {}): TaskGroup {

        const definition = new TaskGroupDefinition({ key: `task_group:${id}`, id: id, name: `group-${id}`, sessionId: "s1", tasks: tasks, context: context });

        return new TaskGroup(definition, { bus, store, agents, tools, execContext: testExecContext() }, { timeoutMs: 2000, pollIntervalMs: 20, ...options });
    }

    it("should run independent tasks and publish the completion", async () => {

        const completions = await collect(bus, Channels.completion("task_group:g1"));

        const context = await group("g1", [task({ name: "T1", resultKeys: ["k1"] }), task({ name: "T2", resultKeys: ["k2"] })]).execute();

        expect(context).to.deep.equal({ k1: "T1:k1", k2: "T2:k2" });

        await waitFor(() => completions.length === 1);

        expect(completions[0]).to.include({ status: "completed", groupId: "g1", sessionId: "s1" });
        expect(completions[0]).to.have.deep.property("context", { k1: "T1:k1", k2: "T2:k2" });
        expect(completions[0]).to.have.property("completedTasks").that.has.members(["T1", "T2"]);
    });

    it("should run independent tasks concurrently", async () => {

        agent.script("T1", async () => { await sleep(60); return { k1: 1 }; });
        agent.script("T2", async () => { await sleep(60); return { k2: 2 }; });

        await group("g1", [task({ name: "T1", resultKeys: ["k1"] }), task({ name: "T2", resultKeys: ["k2"] })]).execute();

        const [first] = agent.callsOf("T1");
        const [second] = agent.callsOf("T2");

        expect(second.startedAt).to.be.lessThan(first.endedAt ?? 0);
    });

    it("should run a task after the task it depends on", async () => {

        agent.script("T1", async () => { await sleep(30); return { k1: "facts" }; });

        const context = await group("g1", [task({ name: "T1", resultKeys: ["k1"] }), task({ name: "T2", resultKeys: ["k2"], dependencies: ["k1"] })]).execute();

        const [first] = agent.callsOf("T1");
        const [second] = agent.callsOf("T2");

        expect(second.startedAt).to.be.at.least(first.endedAt ?? Number.MAX_SAFE_INTEGER);
        expect(second.context.k1).to.equal("facts");
        expect(context).to.deep.equal({ k1: "facts", k2: "T2:k2" });
    });

    it("should never run a task twice at the same time", async () => {

        agent.script("T1", async () => { await sleep(80); return { k1: "done" }; });

        await group("g1", [task({ name: "T1", resultKeys: ["k1"] })], { pollIntervalMs: 5 }).execute();

        expect(agent.callsOf("T1")).to.have.length(1);
    });

    it("should time out when a dependency's producer failed", async () => {

        const partials = await collect(bus, Channels.partialResults("task_group:g1"));

        agent.script("T1", () => { throw new Error("boom"); });

        const tg = group("g1", [task({ name: "T1", resultKeys: ["k1"] }), task({ name: "T2", resultKeys: ["k2"], dependencies: ["k1"] })], { timeoutMs: 150 });

        const error = await captureError(tg.execute());

        expect(error).to.be.instanceOf(TaskGroupExecutionError);

        if (!(error instanceof TaskGroupExecutionError)) return;

        expect(error.reason).to.equal("timeout");
        expect(error.completedTasks).to.deep.equal([]);
        expect(error.failedTasks).to.deep.equal([{ taskName: "T1", error: "boom" }]);
        expect(agent.callsOf("T2")).to.have.length(0);

        await waitFor(() => partials.length === 1);

        expect(partials[0]).to.deep.equal({
            status: "timeout",
            groupId: "g1",
            sessionId: "s1",
            completedTasks: [],
            failedTasks: [{ taskName: "T1", error: "boom" }],
            context: {},
        });
    });

    it("should time out while a task is still running", async () => {

        agent.script("T1", async () => { await sleep(300); return { k1: "late" }; });

        const tg = group("g1", [task({ name: "T1", resultKeys: ["k1"] })], { timeoutMs: 100 });

        const startedAt = Date.now();
        const error = await captureError(tg.execute());

        expect(Date.now() - startedAt).to.be.lessThan(300);
        expect(error).to.be.instanceOf(TaskGroupExecutionError);
        expect(error instanceof TaskGroupExecutionError && error.completedTasks).to.deep.equal([]);

        await tg.settle();
    });

    it("should reject unknown agent classes before running anything", async () => {

        const error = await captureError(group("g1", [task({ name: "T1", agentClass: "Missing" })]).execute());

        expect(error).to.be.instanceOf(ConfigurationError);
        expect(agent.calls).to.have.length(0);
    });

    it("should reject unknown tools", async () => {

        const error = await captureError(group("g1", [task({ name: "T1", tools: ["SearchTool"] })]).execute());

        expect(error).to.be.instanceOf(ConfigurationError);
        expect(error instanceof ConfigurationError && error.message).to.equal("Unknown tool [SearchTool]");
    });

    it("should reject validator tools that cannot validate", async () => {

        tools.register({ name: "CheckTool" });

        const error = await captureError(group("g1", [task({ name: "T1", validatorPrompt: "Check it", validatorTool: "CheckTool" })]).execute());

        expect(error).to.be.instanceOf(ConfigurationError);
    });

    it("should refuse duplicate task names", () => {
        expect(() => group("g1", [task({ name: "T1" }), task({ name: "T1" })])).to.throw(ConfigurationError, "Duplicate task name [T1]");
    });

    it("should fail tasks that do not produce their result keys", async () => {

        agent.script("T1", () => ({ other: 1 }));

        const tg = group("g1", [task({ name: "T1", resultKeys: ["k1"] })], { timeoutMs: 100 });

        await captureError(tg.execute());

        expect(tg.tasksFailed).to.deep.equal([{ taskName: "T1", error: "Task [T1] failed: missing result keys [k1]" }]);
    });

    it("should fail tasks whose results are rejected by the validator", async () => {

        let prompt = "";

        tools.register({ name: "CheckTool", validate: (results, p) => { prompt = p; return results.k1 === "good"; } });

        agent.script("T1", () => ({ k1: "bad" }));

        const tg = group("g1", [task({ name: "T1", resultKeys: ["k1"], validatorPrompt: "Is it good?", validatorTool: "CheckTool" })], { timeoutMs: 100 });

        await captureError(tg.execute());

        expect(prompt).to.equal("Is it good?");
        expect(tg.tasksFailed).to.deep.equal([{ taskName: "T1", error: "Task [T1] failed: results rejected by validator [CheckTool]" }]);
    });

    it("should keep internal result keys out of the notifications", async () => {

        const internal = await collect(bus, Channels.result("g1", "task:notes"));
        const published = await collect(bus, Channels.result("g1", "k1"));

        agent.script("T1", () => ({ k1: "public", "task:notes": "private" }));

        const context = await group("g1", [task({ name: "T1", resultKeys: ["k1", "task:notes"] })]).execute();

        await waitFor(() => published.length === 1);
        await sleep(10);

        expect(internal).to.have.length(0);
        expect(context["task:notes"]).to.equal("private");
        expect(await store.getValue(StateKeys.result("g1", "task:notes"))).to.be.undefined;
        expect(await store.getValue(StateKeys.result("g1", "k1"))).to.equal("public");
        expect(published[0]).to.include({ taskName: "T1", resultKey: "k1", value: "public", isArray: false, taskGroupId: "g1", sessionId: "s1" });
    });

    it("should resume from the saved state", async () => {

        await store.setValue(StateKeys.groupState("g1"), { id: "g1", name: "group-g1", sessionId: "s1", tasksCompleted: ["T1"], tasksFailed: [], runningTasks: [] });
        await store.setValue(StateKeys.groupContext("s1", "g1"), { k1: "restored" });

        const context = await group("g1", [task({ name: "T1", resultKeys: ["k1"] }), task({ name: "T2", resultKeys: ["k2"], dependencies: ["k1"] })]).execute();

        expect(agent.callsOf("T1")).to.have.length(0);
        expect(agent.callsOf("T2")[0].context.k1).to.equal("restored");
        expect(context).to.deep.equal({ k1: "restored", k2: "T2:k2" });
        expect(await store.getValue(StateKeys.groupState("g1"))).to.be.undefined;
    });

    it("should see what sibling groups of the session learned", async () => {

        await store.addMember(StateKeys.sessionGroups("s1"), "g0");
        await store.setValue(StateKeys.groupContext("s1", "g0"), { market: { size: 10 } });

        await group("g1", [task({ name: "T1", resultKeys: ["k1"] })], {}, { market: { region: "EU" } }).execute();

        expect(agent.callsOf("T1")[0].context).to.deep.equal({ market: { region: "EU", size: 10 } });
        expect(await store.getMembers(StateKeys.sessionGroups("s1"))).to.deep.equal(["g0", "g1"]);
    });

    it("should wait for results produced by another group", async () => {

        agent.script("Produce", async () => { await sleep(50); return { facts: ["f1", "f2"] }; });

        const consumer = group("g2", [task({ name: "Consume", resultKeys: ["report"], dependencies: ["facts"] })]);
        const producer = group("g1", [task({ name: "Produce", resultKeys: ["facts"] })]);

        const [consumed] = await Promise.all([consumer.execute(), producer.execute()]);

        expect(agent.callsOf("Consume")[0].context.facts).to.deep.equal(["f1", "f2"]);
        expect(consumed.report).to.equal("Consume:report");
    });

    it("should not wait for optional dependencies", async () => {

        const context = await group("g1", [task({ name: "T1", resultKeys: ["k1"], optionalDependencies: ["nice_to_have"] })], { timeoutMs: 500 }).execute();

        expect(context).to.deep.equal({ k1: "T1:k1" });
    });

    it("should run a failed task again once re-triggered", async () => {

        let attempts = 0;

        agent.script("T1", () => {
            attempts++;
            if (attempts === 1) throw new Error("flaky");
            return { k1: "second time" };
        });

        const tg = group("g1", [task({ name: "T1", resultKeys: ["k1"] })]);

        const execution = tg.execute();

        await waitFor(() => tg.tasksFailed.length === 1);

        expect(await tg.retrigger("Unknown")).to.equal(false);
        expect(await tg.retrigger("T1")).to.equal(true);

        const context = await execution;

        expect(attempts).to.equal(2);
        expect(context).to.deep.equal({ k1: "second time" });
    });

    it("should fan expanded tasks out and aggregate their results", async () => {

        agent.script("Search", () => ({ urls: ["a.test", "b.test"] }));

        const fetch = task({
            name: "Fetch",
            resultKeys: ["pages"],
            dependencies: ["urls"],
            messageTemplate: "Fetch {url}",
            expansionConfig: { arrayMapping: { links: "urls" }, identifiers: {} },
        });

        const context = await group("g1", [task({ name: "Search", resultKeys: ["urls"] }), fetch]).execute();

        expect(agent.calls.filter(c => c.taskName.startsWith("Fetch_")).map(c => c.message).sort()).to.deep.equal(["Fetch a.test", "Fetch b.test"]);
        expect(context.pages).to.deep.equal(["Fetch_1:pages", "Fetch_2:pages"]);
    });

    it("should keep running when a dependency subscription fails", async () => {

        await bus.close();

        const flaky = new FlakyBus("k1");
        bus = flaky;

        const context = await group("g1", [task({ name: "T1", resultKeys: ["k1"] }), task({ name: "T2", resultKeys: ["k2"], dependencies: ["k1"] })]).execute();

        expect(flaky.failures).to.equal(0);
        expect(context).to.deep.equal({ k1: "T1:k1", k2: "T2:k2" });
    });

    it("should publish results that contain themselves", async () => {

        const loop: ContextMap = { name: "loop" };
        loop.self = loop;

        agent.script("T1", () => ({ k1: loop }));

        const published = await collect(bus, Channels.result("g1", "k1"));

        const context = await group("g1", [task({ name: "T1", resultKeys: ["k1"] })]).execute();

        const expected = { name: "loop", self: "[Circular]" };

        expect(context.k1).to.deep.equal(expected);

        await waitFor(() => published.length === 1);

        expect(published[0]).to.have.deep.property("value", expected);
        expect(await store.getValue(StateKeys.result("g1", "k1"))).to.deep.equal(expected);
    });
});
