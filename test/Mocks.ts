import { SchedulerConfig } from "../src/Config";
import { ExecutionContext } from "../src/model/ExecutionContext";
import { Logger } from "../src/util/Logger";
import { IMessageBus } from "../src/bus/MessageBus";
import { AgentExecutionRequest, AgentExecutor, ResultMap } from "../src/core/agents/AgentExecutor";
import { ContextMap } from "../src/util/Objects";

export function testConfig(env: Record<string, string> = {}): SchedulerConfig {
    return new SchedulerConfig(env);
}

export function testLogger(): Logger {
    return new Logger("taskloom-test", "silent");
}

export function testExecContext(cid: string = "test-cid"): ExecutionContext {
    return new ExecutionContext(testLogger(), cid, testConfig());
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Waits until the condition holds, checking every few milliseconds.
 */
export async function waitFor(condition: () => boolean, timeoutMs: number = 2000): Promise<void> {

    const deadline = Date.now() + timeoutMs;

    while (!condition()) {
        if (Date.now() > deadline) throw new Error("Condition not met in time");
        await sleep(5);
    }
}

/**
 * Collects every message published on a channel.
 */
export async function collect(bus: IMessageBus, channel: string): Promise<unknown[]> {

    const messages: unknown[] = [];

    await bus.subscribe(channel, (payload) => { messages.push(payload); });

    return messages;
}

export interface AgentCall {
    taskName: string;
    message: string;
    context: ContextMap;
    startedAt: number;
    endedAt?: number;
}

/**
 * Agent whose behaviour is scripted per task name.
 * Tasks without a script return {resultKey: "<taskName>:<resultKey>"} for each declared result key.
 */
export class ScriptedAgent implements AgentExecutor {

    calls: AgentCall[] = [];
    private scripts = new Map<string, (request: AgentExecutionRequest, context: ContextMap) => Promise<ResultMap> | ResultMap>();

    script(taskName: string, fn: (request: AgentExecutionRequest, context: ContextMap) => Promise<ResultMap> | ResultMap): ScriptedAgent {
        this.scripts.set(taskName, fn);
        return this;
    }

    callsOf(taskName: string): AgentCall[] {
        return this.calls.filter(c => c.taskName === taskName);
    }

    async execute(request: AgentExecutionRequest, context: ContextMap): Promise<ResultMap> {

        const call: AgentCall = { taskName: request.task.name, message: request.task.messageTemplate, context: context, startedAt: Date.now() };

        this.calls.push(call);

        try {

            const script = this.scripts.get(request.task.name);

            if (script) return await script(request, context);

            const results: ResultMap = {};

            for (const resultKey of request.task.resultKeys) results[resultKey] = `${request.task.name}:${resultKey}`;

            return results;

        } finally {
            call.endedAt = Date.now();
        }
    }
}
