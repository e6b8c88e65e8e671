import { MongoClient } from 'mongodb';
import { ConfigurationError } from './model/error/ConfigurationError';

const dbName = 'taskloom';
const collections = {
    agents: 'agents',
    values: 'values',
    hashes: 'hashes',
    sets: 'sets',
};

export type Hyperscaler = "gcp" | "local";

type Env = Record<string, string | undefined>;

/**
 * Scheduler configuration, read from the environment.
 */
export class SchedulerConfig {

    private static mongoClient: MongoClient | null = null;
    private static mongoClientPromise: Promise<MongoClient> | null = null;

    hyperscaler: Hyperscaler;

    mongoHost: string | undefined;
    private mongoUser: string | undefined;
    private mongoPwd: string | undefined;
    private mongoDb: string;

    gcpProjectId: string | undefined;
    pubsubTopic: string;
    pubsubSubscription: string;
    controlChannel: string;

    groupTimeoutMs: number;
    pollIntervalMs: number;
    nodeDependencyTimeoutMs: number;

    jwtSigningKey: string | undefined;
    logLevel: string;

    constructor(env: Env = process.env) {

        this.hyperscaler = parseHyperscaler(env.HYPERSCALER);

        this.mongoHost = env.MONGO_HOST;
        this.mongoUser = env.MONGO_USER;
        this.mongoPwd = env.MONGO_PWD;
        this.mongoDb = env.MONGO_DB || dbName;

        this.gcpProjectId = env.GCP_PID;
        this.pubsubTopic = env.PUBSUB_TOPIC || "taskloom-events";
        this.pubsubSubscription = env.PUBSUB_SUBSCRIPTION || "taskloom-events-sub";
        this.controlChannel = env.CONTROL_CHANNEL || "task_group_control";

        this.groupTimeoutMs = parseDuration(env, "GROUP_TIMEOUT_MS", 3600000);
        this.pollIntervalMs = parseDuration(env, "POLL_INTERVAL_MS", 5000);
        this.nodeDependencyTimeoutMs = parseDuration(env, "NODE_DEPENDENCY_TIMEOUT_MS", 600000);

        this.jwtSigningKey = env.JWT_SIGNING_KEY;
        this.logLevel = env.LOG_LEVEL || "info";

        if (this.hyperscaler === "gcp" && !this.mongoHost) throw new ConfigurationError("MONGO_HOST is required when HYPERSCALER is gcp", { field: "MONGO_HOST" });
    }

    getSigningKey(): string {

        if (!this.jwtSigningKey) throw new ConfigurationError("No JWT signing key configured", { field: "JWT_SIGNING_KEY" });

        return this.jwtSigningKey;
    }

    async getMongoClient(): Promise<MongoClient> {

        if (SchedulerConfig.mongoClient) return SchedulerConfig.mongoClient;

        // If connection is in progress, wait for it
        if (SchedulerConfig.mongoClientPromise) return SchedulerConfig.mongoClientPromise;

        const mongoUrl = `mongodb://${this.mongoUser}:${this.mongoPwd}@${this.mongoHost}:27017/${this.mongoDb}`;

        SchedulerConfig.mongoClientPromise = new MongoClient(mongoUrl, {
            serverSelectionTimeoutMS: 5000,    // Fail fast on network issues
            socketTimeoutMS: 30000,            // Kill hung queries
            maxPoolSize: 80,                   // Up to 80 connections in the pool
        }).connect().then(client => {

            SchedulerConfig.mongoClient = client;
            SchedulerConfig.mongoClientPromise = null;

            return client;

        }).catch(error => {

            SchedulerConfig.mongoClientPromise = null;

            throw error;
        });

        return SchedulerConfig.mongoClientPromise;
    }

    /**
     * Closes the MongoDB connection pool.
     * Call this during application shutdown.
     */
    static async closeMongoClient(): Promise<void> {

        if (SchedulerConfig.mongoClient) {

            await SchedulerConfig.mongoClient.close();

            SchedulerConfig.mongoClient = null;
        }
    }

    getDBName() { return this.mongoDb }
    getCollections() { return collections }

}

function parseHyperscaler(value: string | undefined): Hyperscaler {

    if (!value) return "local";

    if (value === "gcp" || value === "local") return value;

    throw new ConfigurationError(`Unsupported hyperscaler: ${value}`, { field: "HYPERSCALER", suggestions: ["Use gcp or local"] });
}

function parseDuration(env: Env, name: string, defaultValue: number): number {

    const raw = env[name];

    if (raw === undefined || raw === "") return defaultValue;

    const value = Number(raw);

    if (!Number.isFinite(value) || value <= 0) throw new ConfigurationError(`Invalid ${name}: ${raw}`, { field: name, suggestions: ["Use a positive number of milliseconds"] });

    return value;
}
