/**
 * Observability utilities for the transfer client.
 */

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Writes one line per entry to the console: `<iso time> [transfer] LEVEL message {context}`.
 */
export class ConsoleLogger implements Logger {
  private readonly minRank: number;
  private readonly prefix: string;

  constructor(options: { level?: LogLevel; prefix?: string } = {}) {
    this.minRank = LEVEL_RANK[options.level ?? 'info'];
    this.prefix = options.prefix ?? '[transfer]';
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < this.minRank) {
      return;
    }
    const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    console[level](`${new Date().toISOString()} ${this.prefix} ${level.toUpperCase()} ${message}${suffix}`);
  }
}

/**
 * Discards every entry.
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * Metric names emitted by the client.
 */
export const MetricNames = {
  REQUESTS_TOTAL: 'transfer_requests_total',
  REQUEST_LATENCY: 'transfer_request_latency_ms',
  RETRIES_TOTAL: 'transfer_retries_total',
  CHUNKS_UPLOADED: 'transfer_chunks_uploaded_total',
  CHUNKS_DEDUPLICATED: 'transfer_chunks_deduplicated_total',
  BYTES_UPLOADED: 'transfer_bytes_uploaded_total',
  UPLOADS_COMPLETED: 'transfer_uploads_completed_total',
  UPLOADS_FAILED: 'transfer_uploads_failed_total',
} as const;

/**
 * Metrics collector interface
 */
export interface MetricsCollector {
  increment(name: string, value?: number, tags?: Record<string, string>): void;
  timing(name: string, durationMs: number, tags?: Record<string, string>): void;
}

type Tags = Record<string, string>;

function seriesKey(name: string, tags: Tags = {}): string {
  const labels = Object.keys(tags)
    .sort()
    .map((label) => `${label}=${tags[label]}`);
  return labels.length === 0 ? name : `${name}{${labels.join(',')}}`;
}

/**
 * Totals of the timings recorded for one series.
 */
export interface TimingSummary {
  count: number;
  totalMs: number;
  maxMs: number;
}

/**
 * Keeps counters and timing totals in memory, keyed by name and tags.
 */
export class InMemoryMetrics implements MetricsCollector {
  private readonly counters = new Map<string, number>();
  private readonly timings = new Map<string, TimingSummary>();

  increment(name: string, value = 1, tags?: Tags): void {
    const key = seriesKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  timing(name: string, durationMs: number, tags?: Tags): void {
    const key = seriesKey(name, tags);
    const summary = this.timings.get(key) ?? { count: 0, totalMs: 0, maxMs: 0 };
    this.timings.set(key, {
      count: summary.count + 1,
      totalMs: summary.totalMs + durationMs,
      maxMs: Math.max(summary.maxMs, durationMs),
    });
  }

  getCounter(name: string, tags?: Tags): number {
    return this.counters.get(seriesKey(name, tags)) ?? 0;
  }

  getTiming(name: string, tags?: Tags): TimingSummary {
    return this.timings.get(seriesKey(name, tags)) ?? { count: 0, totalMs: 0, maxMs: 0 };
  }
}

/**
 * No-op metrics collector
 */
export class NoopMetrics implements MetricsCollector {
  increment(): void {}
  timing(): void {}
}

/**
 * Logger and metrics bundle handed to every component.
 */
export interface Observability {
  logger: Logger;
  metrics: MetricsCollector;
}

/**
 * Creates an observability bundle that discards everything.
 */
export function createNoopObservability(): Observability {
  return {
    logger: new NoopLogger(),
    metrics: new NoopMetrics(),
  };
}
