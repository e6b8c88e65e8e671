import { NodeStatus } from "../NodeStatus";

/**
 * A unit of work was asked to move to a status its current status does not lead to.
 */
export class InvalidTransitionError extends Error {

    name: string = "InvalidTransitionError";
    code: number = 409;
    nodeName: string;
    from: NodeStatus;
    to: NodeStatus;

    constructor(nodeName: string, from: NodeStatus, to: NodeStatus) {
        super(`Node [${nodeName}] cannot move from [${from}] to [${to}]`);
        this.nodeName = nodeName;
        this.from = from;
        this.to = to;
    }
}
