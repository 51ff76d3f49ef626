import type { TickSummary } from "@workshop-reminders/contracts";
import type { Logger } from "../lib/logger.js";

export interface TickRunner {
  runTick(): Promise<TickSummary>;
}

export interface SchedulerOptions {
  intervalMs: number;
  logger: Logger;
}

/**
 * Fixed-interval polling loop. The next tick is armed only after the
 * previous one settles, so ticks never overlap.
 */
export class ReminderScheduler {
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<void> | null = null;
  private running = false;

  public constructor(
    private readonly runner: TickRunner,
    private readonly options: SchedulerOptions,
  ) {}

  public get isRunning(): boolean {
    return this.running;
  }

  public start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    this.options.logger.info({ intervalMs: this.options.intervalMs }, "reminder scheduler started");
    this.fire();
  }

  public async stop(): Promise<void> {
    this.running = false;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (this.current) {
      await this.current;
    }

    this.options.logger.info("reminder scheduler stopped");
  }

  private fire(): void {
    this.timer = null;
    this.current = this.runOnce().finally(() => {
      this.current = null;
      if (this.running) {
        this.timer = setTimeout(() => this.fire(), this.options.intervalMs);
      }
    });
  }

  private async runOnce(): Promise<void> {
    try {
      await this.runner.runTick();
    } catch (error) {
      this.options.logger.error({ err: error }, "reminder tick failed");
    }
  }
}
