import { log, logError } from '../log';
import type { PipelineSummary } from './pipeline';

/**
 * PIPELINE SCHEDULER
 *
 * Runs the listing pipeline on startup and then every interval.
 * A failed run is retried once after the retry delay; runs never overlap.
 */

export interface SchedulerOptions {
  intervalMs: number;
  retryDelayMs: number;
}

export interface SchedulerStatus {
  scheduled: boolean;
  running: boolean;
  lastRunAt: string | null;
  lastResult: 'success' | 'failure' | null;
  lastError: string | null;
  lastSummary: PipelineSummary | null;
  nextRunAt: string | null;
}

export class PipelineScheduler {
  private intervalHandle: NodeJS.Timeout | null = null;
  private retryHandle: NodeJS.Timeout | null = null;
  private isRunning = false;
  private lastRunAt: Date | null = null;
  private lastResult: SchedulerStatus['lastResult'] = null;
  private lastError: string | null = null;
  private lastSummary: PipelineSummary | null = null;
  private nextRunAt: Date | null = null;

  constructor(
    private readonly run: () => Promise<PipelineSummary>,
    private readonly options: SchedulerOptions,
  ) {}

  /**
   * Resolves false when a run is already in progress.
   */
  async runNow(): Promise<boolean> {
    if (this.isRunning) {
      log('Run already in progress, skipping...', 'SCHEDULER');
      return false;
    }

    this.isRunning = true;
    this.lastRunAt = new Date();
    try {
      this.lastSummary = await this.run();
      this.lastResult = 'success';
      this.lastError = null;
    } catch (error) {
      this.lastResult = 'failure';
      this.lastError = error instanceof Error ? error.message : String(error);
      logError('Run failed', 'SCHEDULER', error);
      this.scheduleRetry();
    } finally {
      this.isRunning = false;
    }
    return true;
  }

  /** Starts a run without waiting for it. False when one is in progress. */
  trigger(): boolean {
    if (this.isRunning) return false;
    this.runNow().catch(error => logError('Triggered run crashed', 'SCHEDULER', error));
    return true;
  }

  start(): void {
    if (this.intervalHandle) {
      log('Schedule already running', 'SCHEDULER');
      return;
    }

    const hours = (this.options.intervalMs / 3_600_000).toFixed(1);
    log(`📅 Pipeline schedule started (every ${hours}h)`, 'SCHEDULER');

    this.intervalHandle = setInterval(() => {
      this.nextRunAt = new Date(Date.now() + this.options.intervalMs);
      this.trigger();
    }, this.options.intervalMs);
    this.nextRunAt = new Date(Date.now() + this.options.intervalMs);

    this.trigger();
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
    if (this.retryHandle) {
      clearTimeout(this.retryHandle);
      this.retryHandle = null;
    }
    this.nextRunAt = null;
    log('🛑 Pipeline schedule stopped', 'SCHEDULER');
  }

  getStatus(): SchedulerStatus {
    return {
      scheduled: this.intervalHandle !== null,
      running: this.isRunning,
      lastRunAt: this.lastRunAt?.toISOString() ?? null,
      lastResult: this.lastResult,
      lastError: this.lastError,
      lastSummary: this.lastSummary,
      nextRunAt: this.nextRunAt?.toISOString() ?? null,
    };
  }

  private scheduleRetry(): void {
    if (!this.intervalHandle || this.retryHandle) return;
    const minutes = Math.round(this.options.retryDelayMs / 60_000);
    log(`Retrying in ${minutes} min`, 'SCHEDULER');
    this.retryHandle = setTimeout(() => {
      this.retryHandle = null;
      this.trigger();
    }, this.options.retryDelayMs);
  }
}
