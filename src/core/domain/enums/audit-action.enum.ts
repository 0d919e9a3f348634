/**
 * Audit action types written by the ingestion pipeline
 */
export enum AuditAction {
  PAYMENT_RECEIVED = 'payment.received',
  PAYMENT_REFUNDED = 'payment.refunded',
  PAYMENT_FAILED = 'payment.failed',

  DISPUTE_OPENED = 'dispute.opened',
  DISPUTE_WITHDRAWN = 'dispute.withdrawn',
  DISPUTE_REINSTATED = 'dispute.reinstated',
  DISPUTE_CLOSED = 'dispute.closed',

  LEDGER_ENTRY_CREATED = 'ledger.entry_created',

  PROVIDER_CONFIG_UPSERTED = 'payment_provider.config_upserted',
  PROVIDER_CONFIG_DEACTIVATED = 'payment_provider.config_deactivated',
}

/**
 * Target types referenced by audit records
 */
export enum AuditTargetType {
  PAYMENT_EVENT = 'payment_event',
  PAYMENT_DISPUTE = 'payment_dispute',
  LEDGER_ENTRY = 'ledger_entry',
  PROVIDER_CONFIG = 'payment_provider_config',
}
