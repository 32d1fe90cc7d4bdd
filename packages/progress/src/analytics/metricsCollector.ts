import { DEFAULT_SLOW_THRESHOLD_MS } from "@coursetrack/course-core";
import { silentLogger, type Logger } from "../logger";

export type MetricMetadata = Record<string, unknown>;

/** One logged sample. Frozen when recorded, metadata included. */
export interface Metric {
  readonly operation: string;
  readonly durationMs: number;
  readonly timestamp: number;
  readonly metadata: Readonly<MetricMetadata>;
}

export interface OperationSummary {
  count: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
  totalMs: number;
}

export type MetricsSummary = Record<string, OperationSummary>;

export interface TimerScope {
  readonly operation: string;
  /** Records the elapsed time once; later calls return the same duration. */
  end(): number;
}

export interface MetricsCollectorOptions {
  slowThresholdMs?: number;
  logger?: Logger;
  clock?: () => number;
}

/**
 * Latency log shared by every timed operation in the process. Samples above
 * the slow threshold are logged at warn and still counted.
 */
export class MetricsCollector {
  private log: Metric[] = [];
  private durations = new Map<string, number[]>();
  private readonly slowThresholdMs: number;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(options: MetricsCollectorOptions = {}) {
    this.slowThresholdMs = options.slowThresholdMs ?? DEFAULT_SLOW_THRESHOLD_MS;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => performance.now());
  }

  public record(
    operation: string,
    durationMs: number,
    metadata: MetricMetadata = {}
  ): Metric {
    const metric: Metric = Object.freeze({
      operation,
      durationMs,
      timestamp: Date.now(),
      metadata: Object.freeze({ ...metadata }),
    });
    this.log.push(metric);
    const list = this.durations.get(operation) ?? [];
    list.push(durationMs);
    this.durations.set(operation, list);

    if (durationMs > this.slowThresholdMs) {
      this.logger.warn(`SLOW: ${operation} took ${durationMs.toFixed(0)}ms`, metadata);
    } else {
      this.logger.debug(`${operation}: ${durationMs.toFixed(0)}ms`, metadata);
    }
    return metric;
  }

  public startTimer(operation: string, metadata: MetricMetadata = {}): TimerScope {
    const startedAt = this.clock();
    let elapsed: number | null = null;
    return {
      operation,
      end: () => {
        if (elapsed === null) {
          elapsed = this.clock() - startedAt;
          this.record(operation, elapsed, metadata);
        }
        return elapsed;
      },
    };
  }

  public time<T>(operation: string, task: () => T, metadata: MetricMetadata = {}): T {
    const timer = this.startTimer(operation, metadata);
    try {
      return task();
    } finally {
      timer.end();
    }
  }

  public async timeAsync<T>(
    operation: string,
    task: () => Promise<T>,
    metadata: MetricMetadata = {}
  ): Promise<T> {
    const timer = this.startTimer(operation, metadata);
    try {
      return await task();
    } finally {
      timer.end();
    }
  }

  public timed<Args extends unknown[], R>(
    operation: string,
    fn: (...args: Args) => R
  ): (...args: Args) => R {
    return (...args) => this.time(operation, () => fn(...args));
  }

  public timedAsync<Args extends unknown[], R>(
    operation: string,
    fn: (...args: Args) => Promise<R>
  ): (...args: Args) => Promise<R> {
    return (...args) => this.timeAsync(operation, () => fn(...args));
  }

  public summary(): MetricsSummary {
    const summary: MetricsSummary = {};
    this.durations.forEach((list, operation) => {
      if (list.length === 0) {
        return;
      }
      const totalMs = list.reduce((sum, value) => sum + value, 0);
      summary[operation] = {
        count: list.length,
        avgMs: totalMs / list.length,
        minMs: list.reduce((min, value) => Math.min(min, value), Infinity),
        maxMs: list.reduce((max, value) => Math.max(max, value), -Infinity),
        totalMs,
      };
    });
    return summary;
  }

  public metrics(): readonly Metric[] {
    return [...this.log];
  }

  public clear(): void {
    this.log = [];
    this.durations.clear();
  }
}
