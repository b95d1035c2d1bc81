import cron, { ScheduledTask } from 'node-cron';
import { ConfigError } from '../errors';
import { LinkRegistry } from '../registry/LinkRegistry';
import { AccessCoordinator } from '../services/AccessCoordinator';
import { CleanupConfig, SweepReport } from '../types';

/**
 * Six-field cron expression that fires every `intervalMs`. Only intervals
 * that divide a minute, an hour or a day evenly can be expressed.
 */
export function intervalToCron(intervalMs: number): string {
  const seconds = intervalMs / 1000;
  if (!Number.isInteger(seconds) || seconds < 1) {
    throw new ConfigError(`Cleanup interval must be a whole number of seconds (got ${intervalMs}ms)`);
  }

  if (seconds < 60) {
    if (60 % seconds === 0) return `*/${seconds} * * * * *`;
  } else if (seconds % 60 === 0) {
    const minutes = seconds / 60;
    if (minutes < 60) {
      if (60 % minutes === 0) return `0 */${minutes} * * * *`;
    } else if (minutes % 60 === 0) {
      const hours = minutes / 60;
      if (hours === 24) return '0 0 0 * * *';
      if (hours < 24 && 24 % hours === 0) return `0 0 */${hours} * * *`;
    }
  }

  throw new ConfigError(
    `Cleanup interval of ${seconds}s cannot be scheduled evenly; use a divisor of 60s, 60min or 24h, or set CLEANUP_SCHEDULE`
  );
}

/**
 * Periodically reclaims links whose TTL has passed, independent of download
 * traffic.
 */
export class ExpirySweeper {
  private task?: ScheduledTask;
  private isRunning = false;
  private lastRun?: Date;
  private lastReport?: SweepReport;
  readonly schedule: string;

  constructor(
    private readonly registry: LinkRegistry,
    private readonly coordinator: AccessCoordinator,
    cleanup: CleanupConfig,
    private readonly now: () => number = Date.now
  ) {
    this.schedule = cleanup.schedule ?? intervalToCron(cleanup.intervalMs);
    if (!cron.validate(this.schedule)) {
      throw new ConfigError(`Invalid cleanup schedule: ${this.schedule}`);
    }
  }

  start(): void {
    if (this.task) {
      return;
    }

    this.task = cron.schedule(this.schedule, async () => {
      await this.sweep();
    }, {
      scheduled: true,
      timezone: 'UTC'
    });

    console.log(`🕐 Expiry sweeper scheduled: ${this.schedule}`);
  }

  stop(): void {
    this.task?.stop();
    this.task = undefined;
  }

  async sweep(now: number = this.now()): Promise<SweepReport> {
    const report: SweepReport = { scanned: 0, removed: 0, failed: 0 };

    if (this.isRunning) {
      console.log('⏳ Sweep already running, skipping...');
      return report;
    }

    this.isRunning = true;
    this.lastRun = new Date(now);

    try {
      for (const id of this.registry.scanExpired(now)) {
        report.scanned++;
        try {
          const result = await this.coordinator.release(id);
          if (result === 'released') {
            report.removed++;
          } else if (result === 'blob_delete_failed') {
            report.removed++;
            report.failed++;
          }
        } catch (error) {
          report.failed++;
          console.error(`Sweep failed for link ${id}:`, error);
        }
      }
    } finally {
      this.isRunning = false;
    }

    this.lastReport = report;
    if (report.scanned > 0) {
      console.log(`🧹 Sweep completed: ${report.removed} expired links removed, ${report.failed} failures`);
    }
    return report;
  }

  getStatistics() {
    return {
      schedule: this.schedule,
      isScheduled: this.task !== undefined,
      isRunning: this.isRunning,
      lastRun: this.lastRun,
      lastReport: this.lastReport
    };
  }
}
