import { DisputeEventType, PaymentEventType } from '../enums';

/**
 * Provider-agnostic payment notification.
 * Produced by one adapter call and consumed by one processor call; never stored as-is.
 */
export interface PaymentEvent {
  provider: string;
  providerEventId: string;
  providerPaymentId: string;
  providerPaymentType: string;
  type: PaymentEventType;
  tenantId: string;
  customerId: string;
  /** Integer minor units. Zero is allowed for failed payments only */
  amount: number;
  currency: string;
  occurredAt: Date;
  rawPayload: Record<string, unknown>;
  invoiceId?: string;
}

/**
 * Provider-agnostic dispute notification
 */
export interface DisputeEvent {
  provider: string;
  providerEventId: string;
  providerDisputeId: string;
  type: DisputeEventType;
  tenantId: string;
  customerId: string;
  amount: number;
  currency: string;
  reason: string;
  occurredAt: Date;
  rawPayload: Record<string, unknown>;
}
