import type { RunTarget } from "@shared/schema";

/**
 * The remote conversational service as the run client sees it: threads,
 * messages, runs and agents. The OpenAI-backed implementation lives in
 * server/openai.ts; tests use an in-process fake.
 */

export interface RemoteAgent {
  id: string;
  name: string | null;
}

export interface ThreadMessage {
  role: "user" | "assistant";
  text: string;
}

export interface CreateAgentParams {
  name: string;
  description: string;
  model: string;
}

export interface AgentsService {
  createThread(): Promise<string>;
  createMessage(threadId: string, content: string): Promise<void>;
  listAgents(): Promise<RemoteAgent[]>;
  createAgent(params: CreateAgentParams): Promise<RemoteAgent>;
  createRun(threadId: string, target: RunTarget): Promise<string>;
  getRunStatus(threadId: string, runId: string): Promise<string>;
  // Oldest first
  listMessages(threadId: string): Promise<ThreadMessage[]>;
}
