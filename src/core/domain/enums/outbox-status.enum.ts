export enum OutboxStatus {
  PENDING = 'pending',
  DELIVERED = 'delivered',
  FAILED = 'failed',
  DEAD_LETTER = 'dead_letter',
}

/**
 * Outbox event types published by the ledger
 */
export enum OutboxEventType {
  LEDGER_ENTRY_CREATED = 'ledger_entry_created',
}
