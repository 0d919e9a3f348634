import {
  AuditAction,
  AuditTargetType,
  DisputeStatus,
  LedgerDirection,
  LedgerSourceType,
  OutboxEventType,
  OutboxStatus,
  PaymentEventType,
} from '../domain/enums';
import {
  AuditMetadataValue,
  EncryptedEnvelope,
  LedgerEntryCreatedPayload,
} from '../domain/models';

/**
 * Common types used across storage adapters and services
 */

export interface CreatePaymentEventRecordDto {
  tenantId: string;
  provider: string;
  providerEventId: string;
  eventType: PaymentEventType;
  customerId: string;
  rawPayload: Record<string, unknown>;
  receivedAt: Date;
}

export interface CreateDisputeRecordDto {
  tenantId: string;
  provider: string;
  providerDisputeId: string;
  providerEventId: string;
  customerId: string;
  amount: number;
  currency: string;
  reason: string;
  status: DisputeStatus;
  rawPayload: Record<string, unknown>;
  receivedAt: Date;
}

export interface UpdateDisputeRecordDto {
  providerEventId: string;
  customerId: string;
  amount: number;
  currency: string;
  reason: string;
  status: DisputeStatus;
  rawPayload: Record<string, unknown>;
  receivedAt: Date;
}

export interface CreateLedgerAccountDto {
  tenantId: string;
  code: string;
  name: string;
}

export interface CreateLedgerEntryDto {
  tenantId: string;
  sourceType: LedgerSourceType;
  sourceId: string;
  currency: string;
  occurredAt: Date;
}

export interface CreateLedgerEntryLineDto {
  ledgerEntryId: string;
  accountId: string;
  direction: LedgerDirection;
  currency: string;
  amount: number;
}

export interface LedgerEntryQuery {
  tenantId?: string;
  sourceType?: LedgerSourceType;
  sourceId?: string;
}

/**
 * Signed receivable balance for one customer in one currency
 */
export interface CustomerBalanceQuery {
  tenantId: string;
  customerId: string;
  currency: string;
}

export interface UpdateInvoiceSettlementDto {
  amountPaid: number;
  paidAt: Date | null;
}

export interface UpsertProviderConfigDto {
  tenantId: string;
  provider: string;
  encryptedConfig: EncryptedEnvelope;
  isActive: boolean;
}

export interface CreateAuditLogDto {
  tenantId: string;
  action: AuditAction;
  targetType: AuditTargetType;
  targetId: string;
  metadata?: Record<string, AuditMetadataValue>;
}

export interface AuditLogQuery {
  tenantId?: string;
  action?: AuditAction;
  targetType?: AuditTargetType;
  targetId?: string;
}

export interface CreateOutboxEventDto {
  tenantId: string;
  eventType: OutboxEventType;
  payload: LedgerEntryCreatedPayload;
  dedupeKey: string;
  maxRetries?: number;
}

export interface OutboxQuery {
  status?: OutboxStatus;
  scheduledBefore?: Date;
  limit?: number;
}
