import pLimit from "p-limit";

import type { EntityProfile } from "@shared/entities";
import type { Batch, BatchReport, RunTarget, SystemSummary } from "@shared/schema";
import { createLogger, errorMessage, type Logger } from "../logger";
import { buildClassificationPrompt, buildSystemPrompt } from "./promptBuilder";
import type { RunClient } from "./runClient";

export type PromptSubmitter = Pick<RunClient, "submit">;

export interface BatchSchedulerOptions {
  batchSize: number;
  maxConcurrentBatches: number;
  maxRetries: number;
  logger?: Logger;
}

export interface ClassificationRun {
  // Flattened in batch order
  records: unknown[];
  batches: BatchReport[];
}

export function partition<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Batch size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let offset = 0; offset < items.length; offset += size) {
    chunks.push(items.slice(offset, offset + size));
  }
  return chunks;
}

export class BatchScheduler {
  private readonly logger: Logger;

  constructor(
    private readonly submitter: PromptSubmitter,
    private readonly profile: EntityProfile,
    private readonly options: BatchSchedulerOptions
  ) {
    this.logger = options.logger ?? createLogger("BatchScheduler");
  }

  createBatches(summaries: readonly SystemSummary[]): Batch[] {
    return partition(summaries, this.options.batchSize).map((rows, index) => ({
      index,
      offset: index * this.options.batchSize,
      total: summaries.length,
      rows,
      prompt: buildClassificationPrompt(this.profile, rows),
    }));
  }

  /**
   * Classify every summary, one remote call per batch, all batches in flight
   * together. A batch that throws contributes no records and does not affect
   * the others.
   */
  async classify(summaries: readonly SystemSummary[], target: RunTarget): Promise<ClassificationRun> {
    const batches = this.createBatches(summaries);
    this.logger.info(`Processing ${summaries.length} systems in ${batches.length} batches of ${this.options.batchSize}`);

    const systemPrompt = buildSystemPrompt(this.profile);
    const limit = pLimit(this.options.maxConcurrentBatches);

    const settled = await Promise.allSettled(
      batches.map((batch) =>
        limit(() => {
          this.logger.info(`Sending batch ${batch.index + 1}/${batches.length} (${batch.rows.length} systems)`);
          return this.submitter.submit(systemPrompt, batch.prompt, {
            target,
            maxRetries: this.options.maxRetries,
          });
        })
      )
    );

    const records: unknown[] = [];
    const reports = settled.map((outcome, index): BatchReport => {
      const sent = batches[index].rows.length;

      if (outcome.status === "rejected") {
        const error = errorMessage(outcome.reason);
        this.logger.error(`Error processing batch ${index + 1}: ${error}`);
        return { index, sent, returned: 0, status: "failed", error };
      }

      const returned = outcome.value.length;
      records.push(...outcome.value);

      if (returned === 0) {
        this.logger.warn(`Batch ${index + 1} returned no results`);
        return { index, sent, returned, status: "empty" };
      }
      if (returned !== sent) {
        this.logger.warn(`Batch ${index + 1} returned ${returned} results for ${sent} systems`);
        return { index, sent, returned, status: "mismatch" };
      }
      return { index, sent, returned, status: "ok" };
    });

    this.logger.info(`Total results after processing: ${records.length}`);
    return { records, batches: reports };
  }
}
