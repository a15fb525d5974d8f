/**
 * Periodic workflow scheduler
 *
 * Runs the selected extraction/analysis workflows once at start and then every
 * `intervalMinutes`, for `durationMinutes` (0 runs until stopped).
 */

import { ENTITY_PROFILES, type EntityKind } from "@shared/entities";
import { createLogger, errorMessage, type Logger } from "./logger";

const MS_PER_MINUTE = 60_000;

export interface WorkflowRunner {
  runWorkflow(kind: EntityKind): Promise<boolean>;
}

export interface WorkflowSchedulerOptions {
  kinds: readonly EntityKind[];
  intervalMinutes: number;
  durationMinutes: number;
  logger?: Logger;
}

export interface SchedulerStats {
  ticks: number;
  skippedTicks: number;
  workflowRuns: number;
  failedRuns: number;
}

export class WorkflowScheduler {
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private durationHandle: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private isTicking = false;
  private startedAt = 0;
  private resolveFinished: (() => void) | null = null;
  private finished: Promise<void> | null = null;
  private readonly logger: Logger;

  readonly stats: SchedulerStats = { ticks: 0, skippedTicks: 0, workflowRuns: 0, failedRuns: 0 };

  constructor(
    private readonly runner: WorkflowRunner,
    private readonly options: WorkflowSchedulerOptions
  ) {
    if (!(options.intervalMinutes > 0)) {
      throw new Error(`Interval must be a positive number of minutes, got ${options.intervalMinutes}`);
    }
    if (!(options.durationMinutes >= 0)) {
      throw new Error(`Duration must be zero or a positive number of minutes, got ${options.durationMinutes}`);
    }
    this.logger = options.logger ?? createLogger("Scheduler");
  }

  get running(): boolean {
    return this.intervalHandle !== null;
  }

  /**
   * One pass over every selected workflow. A tick that fires while the previous
   * one is still running is skipped. Workflow failures are counted, never thrown.
   */
  async tick(): Promise<void> {
    if (this.isTicking) {
      this.stats.skippedTicks++;
      this.logger.warn("Previous run still in progress, skipping this tick");
      return;
    }

    this.isTicking = true;
    this.stats.ticks++;
    try {
      for (const kind of this.options.kinds) {
        const name = ENTITY_PROFILES[kind].displayName;
        let succeeded = false;
        try {
          succeeded = await this.runner.runWorkflow(kind);
        } catch (error) {
          this.logger.error(`${name} workflow threw: ${errorMessage(error)}`);
        }

        this.stats.workflowRuns++;
        if (succeeded) {
          this.logger.info(`${name} scheduled run succeeded`);
        } else {
          this.stats.failedRuns++;
          this.logger.error(`${name} scheduled run failed`);
        }
      }
    } finally {
      this.isTicking = false;
    }

    this.logProgress();
  }

  private logProgress(): void {
    const { durationMinutes, intervalMinutes } = this.options;
    if (durationMinutes > 0) {
      const elapsed = (Date.now() - this.startedAt) / MS_PER_MINUTE;
      const remaining = Math.max(0, Math.floor(durationMinutes - elapsed));
      this.logger.info(`Scheduler running. ${remaining} minutes remaining, next run in ${intervalMinutes} minutes`);
    } else {
      this.logger.info(`Scheduler running. Next run in ${intervalMinutes} minutes`);
    }
  }

  private runTick(): void {
    const overlapping = this.isTicking;
    const tick = this.tick().catch((error: unknown) => {
      this.logger.error(`Tick error: ${errorMessage(error)}`);
    });
    if (!overlapping) this.inFlight = tick;
  }

  /**
   * Start ticking. The returned promise settles once the scheduler has stopped,
   * either because the duration elapsed or `stop()` was called.
   */
  start(): Promise<void> {
    if (this.finished) {
      this.logger.info("Already running");
      return this.finished;
    }

    const { intervalMinutes, durationMinutes, kinds } = this.options;
    this.finished = new Promise<void>((resolve) => {
      this.resolveFinished = resolve;
    });
    this.startedAt = Date.now();

    this.logger.info(
      `Starting ${kinds.map((kind) => ENTITY_PROFILES[kind].displayName).join(", ")} every ${intervalMinutes} minutes ` +
        (durationMinutes > 0 ? `for ${durationMinutes} minutes` : "indefinitely")
    );

    this.intervalHandle = setInterval(() => this.runTick(), intervalMinutes * MS_PER_MINUTE);
    if (durationMinutes > 0) {
      this.durationHandle = setTimeout(() => {
        this.logger.info("Schedulers stopped after specified duration");
        void this.stop();
      }, durationMinutes * MS_PER_MINUTE);
    }
    this.runTick();

    return this.finished;
  }

  // Waits for a tick already in progress before settling
  async stop(): Promise<void> {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
    if (this.durationHandle) {
      clearTimeout(this.durationHandle);
      this.durationHandle = null;
    }

    if (this.inFlight) {
      await this.inFlight;
    }

    if (this.resolveFinished) {
      const resolve = this.resolveFinished;
      this.resolveFinished = null;
      this.finished = null;
      this.logger.info(
        `Stopped after ${this.stats.ticks} runs (${this.stats.failedRuns} of ${this.stats.workflowRuns} workflows failed)`
      );
      resolve();
    }
  }
}
