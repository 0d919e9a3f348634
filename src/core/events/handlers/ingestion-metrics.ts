import { MetricsCollector, PipelineMetrics } from '../../interfaces';

export interface IngestionMetricsSnapshot {
  paymentEvents: Record<string, number>;
  disputeEvents: Record<string, number>;
  ledgerEntries: Record<string, number>;
  totalEvents: number;
}

/**
 * In-memory counters keyed by provider and event type, optionally mirrored
 * to an external collector
 */
export class IngestionMetrics implements PipelineMetrics {
  private paymentEvents = new Map<string, number>();
  private disputeEvents = new Map<string, number>();
  private ledgerEntries = new Map<string, number>();

  constructor(private readonly metricsCollector?: MetricsCollector) {}

  recordPaymentEvent(provider: string, eventType: string): void {
    bump(this.paymentEvents, `${provider}.${eventType}`);
    this.metricsCollector?.increment('kassa.payment_event', { provider, eventType });
  }

  recordDisputeEvent(provider: string, eventType: string): void {
    bump(this.disputeEvents, `${provider}.${eventType}`);
    this.metricsCollector?.increment('kassa.dispute_event', { provider, eventType });
  }

  recordLedgerEntry(sourceType: string): void {
    const count = bump(this.ledgerEntries, sourceType);
    this.metricsCollector?.increment('kassa.ledger_entry', { sourceType });
    this.metricsCollector?.gauge('kassa.ledger_entries', count, { sourceType });
  }

  /**
   * Record how long an outbox event waited before delivery
   */
  recordDeliveryLag(milliseconds: number): void {
    this.metricsCollector?.histogram('kassa.outbox.delivery_lag', milliseconds);
  }

  getMetrics(): IngestionMetricsSnapshot {
    const paymentEvents = Object.fromEntries(this.paymentEvents);
    const disputeEvents = Object.fromEntries(this.disputeEvents);
    return {
      paymentEvents,
      disputeEvents,
      ledgerEntries: Object.fromEntries(this.ledgerEntries),
      totalEvents: sum(this.paymentEvents) + sum(this.disputeEvents),
    };
  }

  reset(): void {
    this.paymentEvents.clear();
    this.disputeEvents.clear();
    this.ledgerEntries.clear();
  }
}

function bump(counts: Map<string, number>, key: string): number {
  const next = (counts.get(key) ?? 0) + 1;
  counts.set(key, next);
  return next;
}

function sum(counts: Map<string, number>): number {
  let total = 0;
  for (const value of counts.values()) {
    total += value;
  }
  return total;
}
