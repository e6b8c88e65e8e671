import { expect } from "chai";
import { NODE_STATUS_ORDER, canTransition, isNodeStatus, isTerminalStatus } from "../../src/model/NodeStatus";

describe("NodeStatus", () => {

    it("should allow every forward move", () => {

        for (let i = 0; i < NODE_STATUS_ORDER.length - 1; i++) {
            expect(canTransition(NODE_STATUS_ORDER[i], NODE_STATUS_ORDER[i + 1])).to.equal(true);
        }

        expect(canTransition("created", "executing")).to.equal(true);
    });

    it("should refuse regressions and staying in place", () => {

        expect(canTransition("executing", "ready")).to.equal(false);
        expect(canTransition("initialized", "initialized")).to.equal(false);
    });

    it("should allow failing from any non-terminal status", () => {

        for (const status of NODE_STATUS_ORDER.filter(s => s !== "completed")) {
            expect(canTransition(status, "failed")).to.equal(true);
        }
    });

    it("should freeze terminal statuses", () => {

        expect(isTerminalStatus("completed")).to.equal(true);
        expect(isTerminalStatus("failed")).to.equal(true);
        expect(canTransition("completed", "failed")).to.equal(false);
        expect(canTransition("failed", "completed")).to.equal(false);
    });

    it("should recognize status names", () => {

        expect(isNodeStatus("monitoring")).to.equal(true);
        expect(isNodeStatus("failed")).to.equal(true);
        expect(isNodeStatus("paused")).to.equal(false);
    });
});
