/**
 * In-process counters for extraction runs
 */

export interface Metric {
  name: string;
  value: number;
  tags: Record<string, string>;
  timestamp: number;
}

const PREFIX = 'wearable_catalog.extract';

class MetricsCollector {
  private metrics: Metric[] = [];

  record(name: string, value: number, tags: Record<string, string> = {}): void {
    this.metrics.push({
      name,
      value,
      tags,
      timestamp: Date.now(),
    });
  }

  increment(name: string, tags: Record<string, string> = {}): void {
    this.record(name, 1, tags);
  }

  recordFileProcessed(table: string, rowsInserted: number): void {
    this.increment(`${PREFIX}.file_processed`, { table });
    this.record(`${PREFIX}.rows_inserted`, rowsInserted, { table });
  }

  recordFileSkipped(sourceFile: string, reason: string): void {
    this.increment(`${PREFIX}.file_skipped`, { sourceFile, reason });
  }

  /**
   * Rows whose idempotency key was already present in the table
   */
  recordDuplicates(table: string, sourceFile: string, count: number): void {
    this.record(`${PREFIX}.duplicate_rows`, count, { table, sourceFile });
  }

  recordTransactionRetry(sourceFile: string, attempt: number): void {
    this.increment(`${PREFIX}.transaction_retry`, {
      sourceFile,
      attempt: attempt.toString(),
    });
  }

  recordDuration(rootPath: string, durationMs: number): void {
    this.record(`${PREFIX}.duration_ms`, durationMs, { rootPath });
  }

  // For testing purposes
  getMetrics(): Metric[] {
    return [...this.metrics];
  }

  getMetricsByName(name: string): Metric[] {
    return this.metrics.filter((m) => m.name === name);
  }

  clearMetrics(): void {
    this.metrics = [];
  }
}

export const metrics = new MetricsCollector();
