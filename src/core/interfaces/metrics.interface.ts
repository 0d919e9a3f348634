/**
 * External metrics sink (StatsD, Prometheus bridge, ...)
 */
export interface MetricsCollector {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  histogram(metric: string, value: number, tags?: Record<string, string>): void;
}

/**
 * Counters the pipeline reports after a successful write
 */
export interface PipelineMetrics {
  recordPaymentEvent(provider: string, eventType: string): void;
  recordDisputeEvent(provider: string, eventType: string): void;
  recordLedgerEntry(sourceType: string): void;
}
