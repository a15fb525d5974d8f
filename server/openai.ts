// OpenAI-compatible Assistants endpoint (threads / messages / runs / assistants).
// Endpoint and key come from PROJECT_ENDPOINT and PROJECT_API_KEY.
import OpenAI from "openai";

import type { RunTarget } from "@shared/schema";
import type { AgentsConfig } from "./config";
import type { AgentsService, CreateAgentParams, RemoteAgent, ThreadMessage } from "./services/agentsService";

const AGENT_PAGE_SIZE = 20;

export function createOpenAIClient(config: AgentsConfig): OpenAI {
  return new OpenAI({
    baseURL: config.endpoint,
    apiKey: config.apiKey,
  });
}

export class OpenAIAgentsService implements AgentsService {
  constructor(private readonly client: OpenAI) {}

  async createThread(): Promise<string> {
    const thread = await this.client.beta.threads.create();
    return thread.id;
  }

  async createMessage(threadId: string, content: string): Promise<void> {
    await this.client.beta.threads.messages.create(threadId, {
      role: "user",
      content,
    });
  }

  async listAgents(): Promise<RemoteAgent[]> {
    const page = await this.client.beta.assistants.list({ limit: AGENT_PAGE_SIZE });
    return page.data.map((assistant) => ({ id: assistant.id, name: assistant.name }));
  }

  async createAgent(params: CreateAgentParams): Promise<RemoteAgent> {
    const assistant = await this.client.beta.assistants.create({
      name: params.name,
      description: params.description,
      model: params.model,
    });
    return { id: assistant.id, name: assistant.name };
  }

  async createRun(threadId: string, target: RunTarget): Promise<string> {
    // The runs endpoint always takes an assistant id; a bare-deployment run
    // passes the deployment name there and pins the model to it.
    const run = await this.client.beta.threads.runs.create(
      threadId,
      target.kind === "agent"
        ? { assistant_id: target.agentId }
        : { assistant_id: target.model, model: target.model }
    );
    return run.id;
  }

  async getRunStatus(threadId: string, runId: string): Promise<string> {
    const run = await this.client.beta.threads.runs.retrieve(threadId, runId);
    return run.status;
  }

  async listMessages(threadId: string): Promise<ThreadMessage[]> {
    const page = await this.client.beta.threads.messages.list(threadId, { order: "asc" });
    return page.data.map((message) => ({
      role: message.role,
      text: message.content
        .map((block) => (block.type === "text" ? block.text.value : ""))
        .filter((text) => text.length > 0)
        .join("\n"),
    }));
  }
}
