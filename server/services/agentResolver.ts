import type { RunTarget } from "@shared/schema";
import { createLogger, errorMessage, type Logger } from "../logger";
import type { AgentsService } from "./agentsService";

export interface AgentResolverOptions {
  agentName: string;
  agentDescription: string;
  modelDeployment: string;
  logger?: Logger;
}

/**
 * Resolves the remote agent every batch of one analysis run executes against:
 * the first listed agent, or a newly created one when none exist. If listing or
 * creating fails, runs go straight to the model deployment instead.
 *
 * Resolution is single-flight: concurrent callers share one in-flight lookup,
 * so a run never creates more than one agent.
 */
export class AgentResolver {
  private pending: Promise<RunTarget> | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly service: AgentsService,
    private readonly options: AgentResolverOptions
  ) {
    this.logger = options.logger ?? createLogger("AgentResolver");
  }

  resolve(): Promise<RunTarget> {
    if (!this.pending) {
      this.pending = this.lookup();
    }
    return this.pending;
  }

  private async lookup(): Promise<RunTarget> {
    try {
      const agents = await this.service.listAgents();
      this.logger.info(`Available agents: ${agents.map((agent) => agent.id).join(", ") || "none"}`);

      if (agents.length > 0) {
        return { kind: "agent", agentId: agents[0].id };
      }

      this.logger.info("No agents found. Creating a new agent.");
      const agent = await this.service.createAgent({
        name: this.options.agentName,
        description: this.options.agentDescription,
        model: this.options.modelDeployment,
      });
      this.logger.info(`Created agent ${agent.id}`);
      return { kind: "agent", agentId: agent.id };
    } catch (error) {
      this.logger.error(`Error getting agent ID: ${errorMessage(error)}`);
      this.logger.warn(`Falling back to model deployment ${this.options.modelDeployment}`);
      return { kind: "model", model: this.options.modelDeployment };
    }
  }
}
