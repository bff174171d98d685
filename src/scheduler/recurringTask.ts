import type { Logger } from 'pino';
import pino from 'pino';

export type RecurringTaskOptions = {
  name: string;
  intervalMs: number;
  run: () => Promise<void>;
  logger?: Logger;
  /** Start the first run right away instead of after one interval. */
  runImmediately?: boolean;
};

/**
 * Runs `run` every `intervalMs`, measured from the end of the previous run,
 * so cycles never overlap. A failing run is logged and the schedule goes on.
 */
export class RecurringTask {
  private readonly name: string;
  private readonly intervalMs: number;
  private readonly task: () => Promise<void>;
  private readonly logger: Logger;
  private readonly runImmediately: boolean;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;
  private completedRuns = 0;

  constructor(options: RecurringTaskOptions) {
    this.name = options.name;
    this.intervalMs = options.intervalMs;
    this.task = options.run;
    this.logger = options.logger ?? pino({ name: 'recurring-task' });
    this.runImmediately = options.runImmediately ?? false;
  }

  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    this.logger.info({ task: this.name, intervalMs: this.intervalMs }, 'recurring task started');
    this.schedule(this.runImmediately ? 0 : this.intervalMs);
  }

  /** Cancels the next run and waits for the current one, if any, to finish. */
  async stop(): Promise<void> {
    this.running = false;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (this.inFlight) {
      await this.inFlight;
    }

    this.logger.info({ task: this.name, completedRuns: this.completedRuns }, 'recurring task stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  getCompletedRuns(): number {
    return this.completedRuns;
  }

  /** Runs once now; joins the in-flight run instead of starting a second one. */
  async runOnce(): Promise<void> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const current = (async () => {
      try {
        await this.task();
      } catch (error: unknown) {
        this.logger.error({ task: this.name, err: error }, 'recurring task run failed');
      } finally {
        this.completedRuns += 1;
      }
    })();

    this.inFlight = current;
    try {
      await current;
    } finally {
      this.inFlight = null;
    }
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    await this.runOnce();

    if (this.running) {
      this.schedule(this.intervalMs);
    }
  }
}
