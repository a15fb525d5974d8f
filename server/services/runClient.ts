import pRetry from "p-retry";

import { TERMINAL_FAILURE_STATUSES, type RunHandle, type RunTarget } from "@shared/schema";
import { createLogger, errorMessage, type Logger } from "../logger";
import type { AgentsService } from "./agentsService";
import { extractRecords } from "./responseExtractor";

export interface RunClientOptions {
  maxRetries: number;
  pollIntervalMs: number;
  maxPolls: number;
  retryDelayMs: number;
  logger?: Logger;
}

export interface SubmitOptions {
  target: RunTarget;
  maxRetries?: number;
}

class EmptyRunError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EmptyRunError";
  }
}

function isTerminalFailure(status: string): boolean {
  return (TERMINAL_FAILURE_STATUSES as readonly string[]).includes(status);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sends one prompt to the remote agent and returns the records parsed from
 * its reply. Each attempt starts from a fresh thread; an attempt that throws
 * or yields nothing is retried after a fixed delay. Exhausting the retries
 * returns an empty list rather than throwing.
 */
export class RunClient {
  private readonly logger: Logger;

  constructor(
    private readonly service: AgentsService,
    private readonly options: RunClientOptions
  ) {
    this.logger = options.logger ?? createLogger("RunClient");
  }

  async submit(systemPrompt: string, userPrompt: string, submitOptions: SubmitOptions): Promise<unknown[]> {
    const maxRetries = submitOptions.maxRetries ?? this.options.maxRetries;
    if (maxRetries < 1) {
      return [];
    }

    try {
      return await pRetry(
        async () => {
          let records: unknown[];
          try {
            records = await this.attempt(systemPrompt, userPrompt, submitOptions.target);
          } catch (error) {
            // p-retry gives up at once on a TypeError; every failed attempt is retryable here
            throw new Error(errorMessage(error), { cause: error });
          }
          if (records.length === 0) {
            throw new EmptyRunError("Polling completed but no results returned");
          }
          return records;
        },
        {
          retries: maxRetries - 1,
          minTimeout: this.options.retryDelayMs,
          maxTimeout: this.options.retryDelayMs,
          factor: 1,
          randomize: false,
          onFailedAttempt: (error) => {
            this.logger.warn(`Attempt ${error.attemptNumber}/${maxRetries} failed: ${error.message}`);
            if (error.retriesLeft > 0) {
              this.logger.info(`Retrying in ${this.options.retryDelayMs}ms...`);
            }
          },
        }
      );
    } catch (error) {
      this.logger.error(`Failed after ${maxRetries} attempts: ${errorMessage(error)}`);
      return [];
    }
  }

  private async attempt(systemPrompt: string, userPrompt: string, target: RunTarget): Promise<unknown[]> {
    const handle = await this.startRun(`${systemPrompt}\n\n${userPrompt}`, target);
    return this.pollForCompletion(handle);
  }

  private async startRun(content: string, target: RunTarget): Promise<RunHandle> {
    const threadId = await this.service.createThread();
    this.logger.info(`Created thread with ID: ${threadId}`);

    await this.service.createMessage(threadId, content);

    if (target.kind === "agent") {
      this.logger.info(`Creating run with agent_id: ${target.agentId}`);
    } else {
      this.logger.info(`Creating run with model: ${target.model}`);
    }
    const runId = await this.service.createRun(threadId, target);
    this.logger.info(`Created run with ID: ${runId}`);

    return { threadId, runId };
  }

  private async pollForCompletion(handle: RunHandle): Promise<unknown[]> {
    const { maxPolls, pollIntervalMs } = this.options;

    for (let poll = 1; poll <= maxPolls; poll++) {
      let status: string | null = null;
      try {
        status = await this.service.getRunStatus(handle.threadId, handle.runId);
        this.logger.debug(`Run ${handle.runId} status: ${status}`);
      } catch (error) {
        this.logger.error(`Error polling for completion: ${errorMessage(error)}`);
      }

      if (status === "completed") {
        return this.readReply(handle.threadId);
      }
      if (status !== null && isTerminalFailure(status)) {
        this.logger.error(`Run failed with status: ${status}`);
        return [];
      }

      if (poll < maxPolls) {
        await delay(pollIntervalMs);
      }
    }

    this.logger.error(`Run timed out after ${maxPolls} polls (${(maxPolls * pollIntervalMs) / 1000}s)`);
    return [];
  }

  private async readReply(threadId: string): Promise<unknown[]> {
    const messages = await this.service.listMessages(threadId);
    const replies = messages.filter((message) => message.role === "assistant");

    if (replies.length === 0) {
      this.logger.warn("No assistant messages found in the thread");
      return [];
    }

    return extractRecords(replies[replies.length - 1].text, this.logger.child("Extractor"));
  }
}
