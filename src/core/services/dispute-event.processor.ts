import { Logger } from '@nestjs/common';
import {
  AuditAction,
  AuditTargetType,
  DisputeEventType,
  LedgerAccountCode,
  LedgerDirection,
  LedgerSourceType,
} from '../domain/enums';
import { DisputeEvent, DisputeRecord } from '../domain/models';
import {
  EventAlreadyProcessedError,
  InvalidAmountError,
  InvalidCurrencyError,
  InvalidCustomerError,
  InvalidEventError,
} from '../errors';
import { PipelineMetrics, StorageAdapter } from '../interfaces';
import { nextStatus, statusForEvent } from './dispute-status';
import { LEDGER_ACCOUNT_NAMES, LedgerService } from './ledger.service';

const DISPUTE_TYPES: ReadonlySet<string> = new Set(Object.values(DisputeEventType));

const AUDIT_ACTIONS: Record<DisputeEventType, AuditAction> = {
  [DisputeEventType.CREATED]: AuditAction.DISPUTE_OPENED,
  [DisputeEventType.FUNDS_WITHDRAWN]: AuditAction.DISPUTE_WITHDRAWN,
  [DisputeEventType.FUNDS_REINSTATED]: AuditAction.DISPUTE_REINSTATED,
  [DisputeEventType.CLOSED]: AuditAction.DISPUTE_CLOSED,
};

/**
 * Dispute event processor
 *
 * One dispute row per (provider, providerDisputeId), locked for the whole
 * settlement. Withdrawals and reinstatements post against the dispute id, so
 * each side reaches the ledger at most once however often it is delivered.
 */
export class DisputeEventProcessor {
  private readonly logger = new Logger(DisputeEventProcessor.name);

  constructor(
    private readonly storage: StorageAdapter,
    private readonly ledger: LedgerService,
    private readonly metrics?: PipelineMetrics,
  ) {}

  async process(input: DisputeEvent): Promise<DisputeRecord> {
    const event = validateDisputeEvent(input);

    const dispute = await this.storage.withTransaction(async (tx) => {
      const record = await this.upsertDispute(tx, event);

      await this.post(tx, event, record);

      await tx.createAuditLog({
        tenantId: event.tenantId,
        action: AUDIT_ACTIONS[event.type],
        targetType: AuditTargetType.PAYMENT_DISPUTE,
        targetId: record.id,
        metadata: {
          provider: event.provider,
          provider_event_id: event.providerEventId,
          provider_dispute_id: event.providerDisputeId,
          dispute_id: record.id,
          customer_id: event.customerId,
          amount: event.amount,
          currency: event.currency,
          status: record.status,
          occurred_at: event.occurredAt.toISOString(),
          received_at: record.receivedAt.toISOString(),
          reason: record.reason,
        },
      });

      const processedAt = new Date();
      await tx.markDisputeProcessed(record.id, processedAt);
      record.processedAt = processedAt;
      return record;
    });

    this.metrics?.recordDisputeEvent(event.provider, event.type);
    return dispute;
  }

  private async upsertDispute(
    tx: StorageAdapter,
    event: DisputeEvent,
  ): Promise<DisputeRecord> {
    const desired = statusForEvent(event.type);
    const receivedAt = new Date();

    let existing = await tx.findDisputeForUpdate(event.provider, event.providerDisputeId);
    if (!existing) {
      const inserted = await tx.insertDispute({
        tenantId: event.tenantId,
        provider: event.provider,
        providerDisputeId: event.providerDisputeId,
        providerEventId: event.providerEventId,
        customerId: event.customerId,
        amount: event.amount,
        currency: event.currency,
        reason: event.reason,
        status: desired,
        rawPayload: event.rawPayload,
        receivedAt,
      });
      if (inserted) {
        return inserted;
      }
      // Lost the insert race; continue against the winner's row
      existing = await tx.findDisputeForUpdate(event.provider, event.providerDisputeId);
      if (!existing) {
        throw new InvalidEventError(
          `dispute ${event.provider}/${event.providerDisputeId} could not be stored`,
        );
      }
    }

    if (existing.providerEventId === event.providerEventId && existing.isProcessed()) {
      throw new EventAlreadyProcessedError(event.provider, event.providerEventId);
    }

    const status = nextStatus(existing.status, desired);
    if (status !== desired) {
      this.logger.debug(
        `Dispute ${existing.id} stays ${status}; ${event.type} arrived out of order`,
      );
    }

    return tx.updateDispute(existing.id, {
      providerEventId: event.providerEventId,
      customerId: event.customerId,
      amount: event.amount,
      currency: event.currency,
      reason: event.reason || existing.reason,
      status,
      rawPayload: event.rawPayload,
      receivedAt,
    });
  }

  private async post(
    tx: StorageAdapter,
    event: DisputeEvent,
    dispute: DisputeRecord,
  ): Promise<void> {
    let sourceType: LedgerSourceType;
    let debitCode: LedgerAccountCode;
    let creditCode: LedgerAccountCode;

    switch (event.type) {
      case DisputeEventType.FUNDS_WITHDRAWN:
        sourceType = LedgerSourceType.DISPUTE_HOLD;
        debitCode = LedgerAccountCode.REFUND_LIABILITY;
        creditCode = LedgerAccountCode.CASH;
        break;
      case DisputeEventType.FUNDS_REINSTATED:
        sourceType = LedgerSourceType.DISPUTE_WIN;
        debitCode = LedgerAccountCode.CASH;
        creditCode = LedgerAccountCode.REFUND_LIABILITY;
        break;
      default:
        return;
    }

    const debit = await this.ledger.ensureAccount(
      event.tenantId,
      debitCode,
      LEDGER_ACCOUNT_NAMES[debitCode],
      tx,
    );
    const credit = await this.ledger.ensureAccount(
      event.tenantId,
      creditCode,
      LEDGER_ACCOUNT_NAMES[creditCode],
      tx,
    );

    await this.ledger.createEntry(
      {
        tenantId: event.tenantId,
        sourceType,
        sourceId: dispute.id,
        currency: event.currency,
        occurredAt: event.occurredAt,
        lines: [
          { accountId: debit.id, direction: LedgerDirection.DEBIT, amount: event.amount },
          { accountId: credit.id, direction: LedgerDirection.CREDIT, amount: event.amount },
        ],
      },
      tx,
    );
  }
}

export function validateDisputeEvent(event: DisputeEvent): DisputeEvent {
  if (!event.providerEventId.trim() || !event.type || !event.tenantId.trim()) {
    throw new InvalidEventError('dispute event requires an id, a type and a tenant');
  }
  if (!event.providerDisputeId.trim()) {
    throw new InvalidEventError('dispute event requires a dispute id');
  }
  if (!event.customerId.trim()) {
    throw new InvalidCustomerError();
  }
  const currency = event.currency.trim().toUpperCase();
  if (!currency) {
    throw new InvalidCurrencyError();
  }
  if (Number.isNaN(event.occurredAt.getTime())) {
    throw new InvalidEventError('dispute event has no occurrence time');
  }
  if (!DISPUTE_TYPES.has(event.type)) {
    throw new InvalidEventError(`unknown dispute event type: ${event.type}`);
  }
  if (!Number.isInteger(event.amount) || event.amount <= 0) {
    throw new InvalidAmountError(`invalid dispute amount: ${event.amount}`);
  }

  return { ...event, currency };
}
