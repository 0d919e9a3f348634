import {
  AuditLog,
  DisputeRecord,
  Invoice,
  LedgerAccount,
  LedgerEntry,
  LedgerEntryLine,
  OutboxEvent,
  PaymentEventRecord,
  ProviderConfigRecord,
} from '../domain/models';
import {
  AuditLogQuery,
  CreateAuditLogDto,
  CreateDisputeRecordDto,
  CreateLedgerAccountDto,
  CreateLedgerEntryDto,
  CreateLedgerEntryLineDto,
  CreateOutboxEventDto,
  CreatePaymentEventRecordDto,
  CustomerBalanceQuery,
  LedgerEntryQuery,
  OutboxQuery,
  UpdateDisputeRecordDto,
  UpdateInvoiceSettlementDto,
  UpsertProviderConfigDto,
} from './common.types';

/**
 * Storage adapter interface - abstracts all database operations.
 *
 * Inserts named `insert*` behave like `INSERT ... ON CONFLICT DO NOTHING`:
 * they resolve to the new row, or to null when the unique key already exists.
 * Methods named `*ForUpdate` take a row lock and only hold it inside
 * `withTransaction`.
 */
export interface StorageAdapter {
  // ==================== Transactions ====================

  /**
   * Run `work` atomically. The callback receives a storage adapter bound to
   * the transaction; every write made through it commits or rolls back together.
   * Nested calls join the outer transaction.
   */
  withTransaction<T>(work: (storage: StorageAdapter) => Promise<T>): Promise<T>;

  // ==================== Provider configuration ====================

  /**
   * Active configurations for a provider, oldest first
   */
  listActiveProviderConfigs(provider: string): Promise<ProviderConfigRecord[]>;

  findProviderConfig(
    tenantId: string,
    provider: string,
  ): Promise<ProviderConfigRecord | null>;

  /**
   * Insert or replace the row for (tenantId, provider)
   */
  upsertProviderConfig(
    dto: UpsertProviderConfigDto,
  ): Promise<ProviderConfigRecord>;

  setProviderConfigActive(
    tenantId: string,
    provider: string,
    isActive: boolean,
  ): Promise<void>;

  // ==================== Payment events ====================

  /**
   * Unique on (provider, providerEventId)
   */
  insertPaymentEvent(
    dto: CreatePaymentEventRecordDto,
  ): Promise<PaymentEventRecord | null>;

  findPaymentEvent(
    provider: string,
    providerEventId: string,
  ): Promise<PaymentEventRecord | null>;

  /**
   * Re-read a stored event under a row lock, inside a transaction
   */
  findPaymentEventForUpdate(id: string): Promise<PaymentEventRecord | null>;

  markPaymentEventProcessed(id: string, processedAt: Date): Promise<void>;

  // ==================== Disputes ====================

  /**
   * Unique on (provider, providerDisputeId)
   */
  insertDispute(dto: CreateDisputeRecordDto): Promise<DisputeRecord | null>;

  findDisputeForUpdate(
    provider: string,
    providerDisputeId: string,
  ): Promise<DisputeRecord | null>;

  updateDispute(id: string, dto: UpdateDisputeRecordDto): Promise<DisputeRecord>;

  markDisputeProcessed(id: string, processedAt: Date): Promise<void>;

  // ==================== Invoices ====================

  findInvoiceForUpdate(
    tenantId: string,
    invoiceId: string,
  ): Promise<Invoice | null>;

  updateInvoiceSettlement(
    id: string,
    dto: UpdateInvoiceSettlementDto,
  ): Promise<void>;

  // ==================== Ledger ====================

  findLedgerAccount(
    tenantId: string,
    code: string,
  ): Promise<LedgerAccount | null>;

  /**
   * Unique on (tenantId, code)
   */
  insertLedgerAccount(dto: CreateLedgerAccountDto): Promise<LedgerAccount | null>;

  /**
   * Unique on (tenantId, sourceType, sourceId)
   */
  insertLedgerEntry(dto: CreateLedgerEntryDto): Promise<LedgerEntry | null>;

  insertLedgerEntryLines(
    lines: CreateLedgerEntryLineDto[],
  ): Promise<LedgerEntryLine[]>;

  findLedgerEntries(query: LedgerEntryQuery): Promise<LedgerEntry[]>;

  getLedgerEntryLines(ledgerEntryId: string): Promise<LedgerEntryLine[]>;

  /**
   * Sum of accounts_receivable postings (debit positive, credit negative)
   * whose entry source resolves to the customer through a payment event or
   * a dispute
   */
  sumCustomerReceivable(query: CustomerBalanceQuery): Promise<number>;

  // ==================== Audit ====================

  createAuditLog(dto: CreateAuditLogDto): Promise<AuditLog>;

  getAuditLogs(query: AuditLogQuery): Promise<AuditLog[]>;

  // ==================== Outbox ====================

  /**
   * Unique on dedupeKey
   */
  insertOutboxEvent(dto: CreateOutboxEventDto): Promise<OutboxEvent | null>;

  getOutboxEvents(query: OutboxQuery): Promise<OutboxEvent[]>;

  markOutboxEventDelivered(id: string): Promise<void>;

  /**
   * Bumps the retry count; moves the event to dead_letter once maxRetries is reached
   */
  markOutboxEventFailed(id: string, error: string): Promise<OutboxEvent>;

  // ==================== Health ====================

  isHealthy(): Promise<boolean>;
}

