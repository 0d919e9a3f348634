import { OutboxEventType, OutboxStatus } from '../enums';

/**
 * Payload of the ledger_entry_created notification
 */
export interface LedgerEntryCreatedPayload {
  ledger_entry_id: string;
  source_type: string;
  source_id: string;
}

/**
 * OutboxEvent - written in the same transaction as the fact it announces,
 * delivered later by the outbox processor
 */
export class OutboxEvent {
  constructor(
    public readonly id: string,
    public readonly tenantId: string,
    public readonly eventType: OutboxEventType,
    public readonly payload: LedgerEntryCreatedPayload,
    public readonly dedupeKey: string,
    public status: OutboxStatus = OutboxStatus.PENDING,
    public retryCount: number = 0,
    public readonly maxRetries: number = 3,
    public scheduledFor: Date = new Date(),
    public processedAt: Date | null = null,
    public error: string | null = null,
    public readonly createdAt: Date = new Date(),
  ) {}

  canRetry(): boolean {
    return this.retryCount < this.maxRetries;
  }
}

/**
 * Exponential backoff before a failed delivery is retried
 */
export function outboxRetryDelayMs(retryCount: number): number {
  return Math.pow(2, retryCount) * 60000;
}
