import type { RunTarget } from "@shared/schema";
import type {
  AgentsService,
  CreateAgentParams,
  RemoteAgent,
  ThreadMessage,
} from "../../server/services/agentsService";

type Method = keyof AgentsService;

interface MockRun {
  threadId: string;
  target: RunTarget;
  statuses: string[];
  polls: number;
  replied: boolean;
}

/**
 * In-process stand-in for the remote agents service. Runs walk through a
 * scripted status sequence (the last status repeats); when a run reports
 * "completed" the responder's text is appended to the thread as the
 * assistant reply.
 */
export class MockAgentsService implements AgentsService {
  readonly agents: RemoteAgent[] = [];
  readonly createdAgents: CreateAgentParams[] = [];
  readonly threads = new Map<string, ThreadMessage[]>();
  readonly runs = new Map<string, MockRun>();
  readonly runTargets: RunTarget[] = [];
  readonly calls: Record<Method, number> = {
    createThread: 0,
    createMessage: 0,
    listAgents: 0,
    createAgent: 0,
    createRun: 0,
    getRunStatus: 0,
    listMessages: 0,
  };

  // Status sequence for runs without a queued script
  defaultStatuses: string[] = ["completed"];
  // Reply text for a completed run, given the user message; null posts no reply
  responder: (prompt: string) => string | null = () => "[]";
  listAgentsDelayMs = 0;

  private readonly statusScripts: string[][] = [];
  private readonly failures = new Map<Method, Error[]>();
  private nextId = 1;

  queueStatuses(...statuses: string[]): this {
    this.statusScripts.push(statuses);
    return this;
  }

  failNext(method: Method, error: Error = new Error(`${method} failed`)): this {
    const queued = this.failures.get(method) ?? [];
    queued.push(error);
    this.failures.set(method, queued);
    return this;
  }

  private enter(method: Method): void {
    this.calls[method]++;
    const error = this.failures.get(method)?.shift();
    if (error) throw error;
  }

  private id(prefix: string): string {
    return `${prefix}_${this.nextId++}`;
  }

  async createThread(): Promise<string> {
    this.enter("createThread");
    const threadId = this.id("thread");
    this.threads.set(threadId, []);
    return threadId;
  }

  async createMessage(threadId: string, content: string): Promise<void> {
    this.enter("createMessage");
    const thread = this.threads.get(threadId);
    if (!thread) throw new Error(`No thread ${threadId}`);
    thread.push({ role: "user", text: content });
  }

  async listAgents(): Promise<RemoteAgent[]> {
    this.enter("listAgents");
    if (this.listAgentsDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.listAgentsDelayMs));
    }
    return [...this.agents];
  }

  async createAgent(params: CreateAgentParams): Promise<RemoteAgent> {
    this.enter("createAgent");
    this.createdAgents.push(params);
    const agent = { id: this.id("asst"), name: params.name };
    this.agents.push(agent);
    return agent;
  }

  async createRun(threadId: string, target: RunTarget): Promise<string> {
    this.enter("createRun");
    const runId = this.id("run");
    this.runTargets.push(target);
    this.runs.set(runId, {
      threadId,
      target,
      statuses: this.statusScripts.shift() ?? [...this.defaultStatuses],
      polls: 0,
      replied: false,
    });
    return runId;
  }

  async getRunStatus(threadId: string, runId: string): Promise<string> {
    this.enter("getRunStatus");
    const run = this.runs.get(runId);
    if (!run || run.threadId !== threadId) throw new Error(`No run ${runId}`);

    const status = run.statuses[Math.min(run.polls, run.statuses.length - 1)];
    run.polls++;

    if (status === "completed" && !run.replied) {
      run.replied = true;
      const thread = this.threads.get(threadId) ?? [];
      const prompt = thread.filter((message) => message.role === "user").map((message) => message.text).join("\n");
      const reply = this.responder(prompt);
      if (reply !== null) thread.push({ role: "assistant", text: reply });
    }
    return status;
  }

  async listMessages(threadId: string): Promise<ThreadMessage[]> {
    this.enter("listMessages");
    return [...(this.threads.get(threadId) ?? [])];
  }
}
