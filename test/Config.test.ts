import { expect } from "chai";
import { SchedulerConfig } from "../src/Config";
import { ConfigurationError } from "../src/model/error/ConfigurationError";

describe("SchedulerConfig", () => {

    it("should apply the defaults", () => {

        const config = new SchedulerConfig({});

        expect(config.hyperscaler).to.equal("local");
        expect(config.groupTimeoutMs).to.equal(3600000);
        expect(config.pollIntervalMs).to.equal(5000);
        expect(config.nodeDependencyTimeoutMs).to.equal(600000);
        expect(config.controlChannel).to.equal("task_group_control");
        expect(config.pubsubTopic).to.equal("taskloom-events");
        expect(config.getDBName()).to.equal("taskloom");
    });

    it("should read the environment", () => {

        const config = new SchedulerConfig({ HYPERSCALER: "gcp", MONGO_HOST: "db.local", GROUP_TIMEOUT_MS: "1000", CONTROL_CHANNEL: "control", MONGO_DB: "sched" });

        expect(config.hyperscaler).to.equal("gcp");
        expect(config.groupTimeoutMs).to.equal(1000);
        expect(config.controlChannel).to.equal("control");
        expect(config.getDBName()).to.equal("sched");
    });

    it("should reject invalid durations", () => {

        expect(() => new SchedulerConfig({ POLL_INTERVAL_MS: "0" })).to.throw(ConfigurationError, "Invalid POLL_INTERVAL_MS: 0");
        expect(() => new SchedulerConfig({ GROUP_TIMEOUT_MS: "soon" })).to.throw(ConfigurationError);
    });

    it("should reject unknown hyperscalers and gcp without a database", () => {

        expect(() => new SchedulerConfig({ HYPERSCALER: "aws" })).to.throw(ConfigurationError, "Unsupported hyperscaler: aws");
        expect(() => new SchedulerConfig({ HYPERSCALER: "gcp" })).to.throw(ConfigurationError);
    });

    it("should require a signing key to sign tokens", () => {

        expect(() => new SchedulerConfig({}).getSigningKey()).to.throw(ConfigurationError);
        expect(new SchedulerConfig({ JWT_SIGNING_KEY: "test-secret" }).getSigningKey()).to.equal("test-secret");
    });
});
