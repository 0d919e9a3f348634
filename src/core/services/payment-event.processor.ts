import { Logger } from '@nestjs/common';
import {
  AuditAction,
  AuditTargetType,
  LedgerAccountCode,
  LedgerDirection,
  LedgerSourceType,
  PaymentEventType,
} from '../domain/enums';
import {
  AuditMetadataValue,
  PaymentEvent,
  PaymentEventRecord,
} from '../domain/models';
import {
  EventAlreadyProcessedError,
  InvalidAmountError,
  InvalidCurrencyError,
  InvalidCustomerError,
  InvalidEventError,
} from '../errors';
import { PipelineMetrics, StorageAdapter } from '../interfaces';
import { settleInvoice } from './invoice-settlement';
import { LEDGER_ACCOUNT_NAMES, LedgerService } from './ledger.service';

export interface PaymentProcessResult {
  record: PaymentEventRecord;
  /** Customer receivable after settlement; absent for failed payments */
  balance?: number;
}

const PAYMENT_TYPES: ReadonlySet<string> = new Set(Object.values(PaymentEventType));

/**
 * Payment event processor
 *
 * Persists the event once per (provider, providerEventId), then settles it:
 * ledger posting, invoice update and audit trail commit together. A record
 * that was stored but never stamped processed is resumed on redelivery.
 */
export class PaymentEventProcessor {
  private readonly logger = new Logger(PaymentEventProcessor.name);

  constructor(
    private readonly storage: StorageAdapter,
    private readonly ledger: LedgerService,
    private readonly metrics?: PipelineMetrics,
  ) {}

  async process(input: PaymentEvent): Promise<PaymentProcessResult> {
    const event = validatePaymentEvent(input);
    const receivedAt = new Date();

    const inserted = await this.storage.insertPaymentEvent({
      tenantId: event.tenantId,
      provider: event.provider,
      providerEventId: event.providerEventId,
      eventType: event.type,
      customerId: event.customerId,
      rawPayload: event.rawPayload,
      receivedAt,
    });

    const record =
      inserted ??
      (await this.storage.findPaymentEvent(event.provider, event.providerEventId));
    if (!record) {
      throw new InvalidEventError(
        `payment event ${event.provider}/${event.providerEventId} could not be stored`,
      );
    }
    if (record.isProcessed()) {
      throw new EventAlreadyProcessedError(event.provider, event.providerEventId);
    }
    if (!inserted) {
      this.logger.log(
        `Resuming unprocessed payment event ${event.provider}/${event.providerEventId}`,
      );
    }

    const result = await this.storage.withTransaction(async (tx) => {
      // A concurrent delivery may have settled the event since the read above
      const locked = await tx.findPaymentEventForUpdate(record.id);
      if (!locked) {
        throw new InvalidEventError(
          `payment event ${event.provider}/${event.providerEventId} disappeared`,
        );
      }
      if (locked.isProcessed()) {
        throw new EventAlreadyProcessedError(event.provider, event.providerEventId);
      }

      const balance = await this.settle(tx, event, locked);
      const processedAt = new Date();
      await tx.markPaymentEventProcessed(locked.id, processedAt);
      locked.processedAt = processedAt;
      return { record: locked, balance };
    });

    if (inserted) {
      this.metrics?.recordPaymentEvent(event.provider, event.type);
    }
    return result;
  }

  private async settle(
    tx: StorageAdapter,
    event: PaymentEvent,
    record: PaymentEventRecord,
  ): Promise<number | undefined> {
    const metadata = auditMetadata(event, record);

    if (event.type === PaymentEventType.FAILED) {
      await tx.createAuditLog({
        tenantId: event.tenantId,
        action: AuditAction.PAYMENT_FAILED,
        targetType: AuditTargetType.PAYMENT_EVENT,
        targetId: record.id,
        metadata,
      });
      return undefined;
    }

    const succeeded = event.type === PaymentEventType.SUCCEEDED;
    const [debitCode, creditCode] = succeeded
      ? [LedgerAccountCode.CASH, LedgerAccountCode.ACCOUNTS_RECEIVABLE]
      : [LedgerAccountCode.REFUND_LIABILITY, LedgerAccountCode.CASH];

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
        sourceType: succeeded ? LedgerSourceType.PAYMENT : LedgerSourceType.REFUND,
        sourceId: record.id,
        currency: event.currency,
        occurredAt: event.occurredAt,
        lines: [
          { accountId: debit.id, direction: LedgerDirection.DEBIT, amount: event.amount },
          { accountId: credit.id, direction: LedgerDirection.CREDIT, amount: event.amount },
        ],
      },
      tx,
    );

    if (event.invoiceId) {
      const invoice = await tx.findInvoiceForUpdate(event.tenantId, event.invoiceId);
      if (invoice) {
        const delta = succeeded ? event.amount : -event.amount;
        await tx.updateInvoiceSettlement(
          invoice.id,
          settleInvoice(invoice, delta, event.occurredAt),
        );
      } else {
        this.logger.warn(
          `Invoice ${event.invoiceId} not found for tenant ${event.tenantId}`,
        );
      }
    }

    const balance = await tx.sumCustomerReceivable({
      tenantId: event.tenantId,
      customerId: event.customerId,
      currency: event.currency,
    });

    await tx.createAuditLog({
      tenantId: event.tenantId,
      action: succeeded ? AuditAction.PAYMENT_RECEIVED : AuditAction.PAYMENT_REFUNDED,
      targetType: AuditTargetType.PAYMENT_EVENT,
      targetId: record.id,
      metadata: { ...metadata, balance },
    });
    return balance;
  }
}

/**
 * Check a parsed event and return it with its currency upper-cased
 */
export function validatePaymentEvent(event: PaymentEvent): PaymentEvent {
  if (!event.providerEventId.trim() || !event.type || !event.tenantId.trim()) {
    throw new InvalidEventError('payment event requires an id, a type and a tenant');
  }
  if (!event.customerId.trim()) {
    throw new InvalidCustomerError();
  }
  const currency = event.currency.trim().toUpperCase();
  if (!currency) {
    throw new InvalidCurrencyError();
  }
  if (Number.isNaN(event.occurredAt.getTime())) {
    throw new InvalidEventError('payment event has no occurrence time');
  }
  if (!PAYMENT_TYPES.has(event.type)) {
    throw new InvalidEventError(`unknown payment event type: ${event.type}`);
  }

  const moves = event.type !== PaymentEventType.FAILED;
  if (!Number.isInteger(event.amount) || event.amount < 0 || (moves && event.amount === 0)) {
    throw new InvalidAmountError(`invalid ${event.type} amount: ${event.amount}`);
  }

  return { ...event, currency };
}

function auditMetadata(
  event: PaymentEvent,
  record: PaymentEventRecord,
): Record<string, AuditMetadataValue> {
  return {
    provider: event.provider,
    provider_event_id: event.providerEventId,
    customer_id: event.customerId,
    amount: event.amount,
    currency: event.currency,
    event_type: event.type,
    payment_event_id: record.id,
    occurred_at: event.occurredAt.toISOString(),
    received_at: record.receivedAt.toISOString(),
    invoice_id: event.invoiceId ?? null,
  };
}
