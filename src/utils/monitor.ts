import { Logger } from "./logger";

const NAME_COLUMN = 30;

/**
 * Wall-clock timings for named provisioning operations.
 */
export class PerformanceMonitor {
  private readonly startTimes = new Map<string, number>();
  private readonly durations = new Map<string, number>();
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(logger: Logger = new Logger(), now: () => number = () => performance.now()) {
    this.logger = logger;
    this.now = now;
  }

  start(operation: string): void {
    this.startTimes.set(operation, this.now());
    this.logger.info(`Starting: ${operation}`);
  }

  /** Returns the elapsed milliseconds, or 0 when `operation` was never started. */
  end(operation: string): number {
    const startedAt = this.startTimes.get(operation);
    if (startedAt === undefined) {
      return 0;
    }
    const duration = this.now() - startedAt;
    this.durations.set(operation, duration);
    this.startTimes.delete(operation);
    this.logger.info(`Completed: ${operation} in ${formatDuration(duration)}`);
    return duration;
  }

  getDuration(operation: string): number {
    return this.durations.get(operation) ?? 0;
  }

  async timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    this.start(operation);
    try {
      return await fn();
    } finally {
      this.end(operation);
    }
  }

  summary(): string[] {
    if (this.durations.size === 0) {
      return [];
    }

    const rule = `${"-".repeat(10).padEnd(NAME_COLUMN)} --------`;
    const lines = [`${"Operation".padEnd(NAME_COLUMN)} Duration`, rule];
    let total = 0;
    for (const [operation, duration] of this.durations) {
      lines.push(`${operation.padEnd(NAME_COLUMN)} ${formatDuration(duration)}`);
      total += duration;
    }
    lines.push(rule, `${"Total Time".padEnd(NAME_COLUMN)} ${formatDuration(total)}`);
    return lines;
  }

  printSummary(): void {
    const lines = this.summary();
    if (lines.length === 0) {
      return;
    }
    this.logger.info("Performance summary:");
    for (const line of lines) {
      this.logger.info(line);
    }
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
