import { SchedulerConfig } from "./Config";
import { IMessageBus, MessageBusFactory } from "./bus/MessageBus";
import { PubSubMessageBus } from "./bus/impl/google/PubSub";
import { LocalMessageBus } from "./bus/impl/local/LocalMessageBus";
import { SharedStateStore } from "./store/SharedStateStore";
import { MongoStateStore } from "./store/impl/MongoStateStore";
import { InMemoryStateStore } from "./store/impl/InMemoryStateStore";
import { AgentRegistry } from "./core/agents/AgentRegistry";
import { ToolRegistry } from "./core/agents/ToolRegistry";
import { AgentsCatalog } from "./core/catalog/AgentsCatalog";
import { Scheduler } from "./core/Scheduler";
import { HttpAgentExecutor } from "./api/AgentCall";
import { ExecutionContext } from "./model/ExecutionContext";
import { generateJWTToken } from "./util/GenerateJWTToken";
import { Logger } from "./util/Logger";

export const APINAME = "taskloom";

class TaskloomMessageBusFactory extends MessageBusFactory {

    createMessageBus(config: SchedulerConfig, logger: Logger): IMessageBus {
        switch (config.hyperscaler) {
            case "gcp":
                return new PubSubMessageBus(config.gcpProjectId, config.pubsubTopic, config.pubsubSubscription, logger);
            case "local":
                return new LocalMessageBus(logger);
        }
    }
}

const config = new SchedulerConfig();
const logger = new Logger(APINAME, config.logLevel);

async function bootstrap(): Promise<Scheduler> {

    const bus = new TaskloomMessageBusFactory().createMessageBus(config, logger);
    const agents = new AgentRegistry();
    const tools = new ToolRegistry();

    let store: SharedStateStore = new InMemoryStateStore();

    if (config.mongoHost) {

        const client = await config.getMongoClient();
        const db = client.db(config.getDBName());

        if (config.hyperscaler === "gcp") store = new MongoStateStore(db, config.getCollections());

        // Catalogued agents are reached over HTTP
        const token = config.jwtSigningKey ? generateJWTToken(APINAME, config.getSigningKey()) : undefined;

        const catalog = new AgentsCatalog(db, new ExecutionContext(logger, "bootstrap", config));

        for (const agent of await catalog.getAgents()) {
            agents.register(agent.name, () => new HttpAgentExecutor(agent, logger, token));
        }

        logger.compute("bootstrap", `Registered agents: [${agents.names().join(", ")}]`);
    }

    const scheduler = new Scheduler({ config, bus, store, agents, tools, logger });

    await scheduler.start();

    return scheduler;
}

bootstrap().then((scheduler) => {

    const shutdown = async () => {

        logger.compute("", 'Shutting down gracefully...');

        await scheduler.stop();

        await SchedulerConfig.closeMongoClient();

        process.exit(0);
    };

    const onSignal = () => {
        shutdown().catch((error) => {
            logger.compute("", `Shutdown failed: ${error}`, "error");
            process.exit(1);
        });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

}).catch((error) => {

    logger.compute("bootstrap", `Failed to start: ${error}`, "error");

    process.exit(1);
});
