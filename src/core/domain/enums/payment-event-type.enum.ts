/**
 * Canonical payment event types produced by provider adapters
 */
export enum PaymentEventType {
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  REFUNDED = 'refunded',
}
