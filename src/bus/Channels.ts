/**
 * Names of the broker channels and of the shared state keys.
 */
export const Channels = {

    /**
     * Channel on which a producer announces a result key. The owner is the producing group (or node).
     */
    result: (ownerId: string, resultKey: string) => `task_group_execute:${ownerId}:${resultKey}`,

    completion: (groupKey: string) => `${groupKey}:completion`,
    partialResults: (groupKey: string) => `${groupKey}:partial_results`,

    nodeStatusUpdates: () => "node_status_updates",
    nodeStatus: (nodeId: string) => `node:${nodeId}:status`,
    nodeUpdates: (nodeId: string) => `node:${nodeId}`,
}

export const StateKeys = {

    resultKeys: (sessionId: string) => `session:${sessionId}:result_keys`,
    sessionGroups: (sessionId: string) => `session:${sessionId}:task_groups`,
    groupContext: (sessionId: string, groupId: string) => `session:${sessionId}:task_group:${groupId}:context`,
    sessionPattern: (sessionId: string) => `session:${sessionId}:*`,

    result: (ownerId: string, resultKey: string) => `task_group:${ownerId}:results:${resultKey}`,
    groupState: (groupId: string) => `task_group:${groupId}:state`,

    nodeContext: (nodeId: string) => `node:${nodeId}:context`,
}
