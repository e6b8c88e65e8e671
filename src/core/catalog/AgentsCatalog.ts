import { Db } from "mongodb";
import { AgentDefinition } from "../../model/AgentDefinition";
import { ExecutionContext } from "../../model/ExecutionContext";

/**
 * The agents that can be reached over HTTP, stored in MongoDB.
 */
export class AgentsCatalog {

    constructor(private db: Db, private execContext: ExecutionContext) { }

    private agents() {
        return this.db.collection(this.execContext.config.getCollections().agents);
    }

    /**
     * Retrieves all registered agents.
     * Malformed entries are skipped.
     * 
     * @returns All registered agents
     */
    async getAgents(): Promise<AgentDefinition[]> {

        const agentsData = await this.agents().find({}).toArray();

        const agents: AgentDefinition[] = [];

        for (const agentData of agentsData) {
            try {
                agents.push(AgentDefinition.fromBSON(agentData));
            } catch (error) {
                this.execContext.logger.compute(this.execContext.cid, `Skipping catalogued agent ${agentData._id}: ${error}`, "warn");
            }
        }

        return agents;

    }
}
