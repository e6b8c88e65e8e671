/**
 * Forward path of a unit of work. The position in this list is the ordering used to enforce
 * monotonic transitions. "failed" sits outside of it: it can be reached from any non-terminal status.
 */
export const NODE_STATUS_ORDER = [
    "created",
    "pending",
    "pre_initializing",
    "initializing",
    "initialized",
    "resolving_dependencies",
    "dependencies_resolved",
    "ready",
    "assigning",
    "assigned",
    "pre_execute",
    "executing",
    "monitoring",
    "completed",
] as const;

export type NodeStatus = typeof NODE_STATUS_ORDER[number] | "failed";

export function isTerminalStatus(status: NodeStatus): boolean {
    return status === "completed" || status === "failed";
}

/**
 * Tells whether a unit of work can move from one status to another.
 * 
 * Forward moves (skipping intermediate statuses is allowed) and moves into "failed" from a non-terminal
 * status are accepted. Everything else is a regression.
 */
export function canTransition(from: NodeStatus, to: NodeStatus): boolean {

    if (isTerminalStatus(from)) return false;

    if (to === "failed") return true;

    if (from === "failed") return false;

    return NODE_STATUS_ORDER.indexOf(to) > NODE_STATUS_ORDER.indexOf(from);
}

export function isNodeStatus(value: unknown): value is NodeStatus {
    return value === "failed" || NODE_STATUS_ORDER.some(s => s === value);
}
