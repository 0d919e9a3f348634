import {
  AuditLog,
  AuditLogQuery,
  CreateAuditLogDto,
  CreateDisputeRecordDto,
  CreateLedgerAccountDto,
  CreateLedgerEntryDto,
  CreateLedgerEntryLineDto,
  CreateOutboxEventDto,
  CreatePaymentEventRecordDto,
  CustomerBalanceQuery,
  DisputeRecord,
  Invoice,
  LedgerAccount,
  LedgerAccountCode,
  LedgerDirection,
  LedgerEntry,
  LedgerEntryLine,
  LedgerEntryQuery,
  LedgerSourceType,
  OutboxEvent,
  OutboxQuery,
  OutboxStatus,
  outboxRetryDelayMs,
  PaymentEventRecord,
  ProviderConfigRecord,
  StorageAdapter,
  UpdateDisputeRecordDto,
  UpdateInvoiceSettlementDto,
  UpsertProviderConfigDto,
} from '../../../core';

const PAYMENT_SOURCES: ReadonlySet<string> = new Set([
  LedgerSourceType.PAYMENT,
  LedgerSourceType.PAYMENT_FEE,
  LedgerSourceType.REFUND,
]);

const DISPUTE_SOURCES: ReadonlySet<string> = new Set([
  LedgerSourceType.DISPUTE_HOLD,
  LedgerSourceType.DISPUTE_WIN,
  LedgerSourceType.DISPUTE_LOSS,
]);

/**
 * Everything the mock holds. Stored values are replaced, never mutated, so a
 * shallow copy of each map is a complete snapshot.
 */
interface MockState {
  providerConfigs: Map<string, ProviderConfigRecord>;
  paymentEvents: Map<string, PaymentEventRecord>;
  disputes: Map<string, DisputeRecord>;
  invoices: Map<string, Invoice>;
  ledgerAccounts: Map<string, LedgerAccount>;
  ledgerEntries: Map<string, LedgerEntry>;
  ledgerEntryLines: Map<string, LedgerEntryLine>;
  auditLogs: Map<string, AuditLog>;
  outboxEvents: Map<string, OutboxEvent>;
}

function emptyState(): MockState {
  return {
    providerConfigs: new Map(),
    paymentEvents: new Map(),
    disputes: new Map(),
    invoices: new Map(),
    ledgerAccounts: new Map(),
    ledgerEntries: new Map(),
    ledgerEntryLines: new Map(),
    auditLogs: new Map(),
    outboxEvents: new Map(),
  };
}

function snapshot(state: MockState): MockState {
  return {
    providerConfigs: new Map(state.providerConfigs),
    paymentEvents: new Map(state.paymentEvents),
    disputes: new Map(state.disputes),
    invoices: new Map(state.invoices),
    ledgerAccounts: new Map(state.ledgerAccounts),
    ledgerEntries: new Map(state.ledgerEntries),
    ledgerEntryLines: new Map(state.ledgerEntryLines),
    auditLogs: new Map(state.auditLogs),
    outboxEvents: new Map(state.outboxEvents),
  };
}

/**
 * Mock storage adapter for testing
 * Provides in-memory storage with deterministic behavior.
 *
 * Transactions are serialized and roll back to a snapshot on failure. The
 * adapter handed to a transaction callback joins that transaction when its
 * own withTransaction is called.
 */
export class MockStorageAdapter implements StorageAdapter {
  private readonly state: MockState;
  private readonly shared: { lock: Promise<void>; idCounter: number };
  private readonly joined: boolean;

  constructor(
    private readonly options: MockStorageOptions = {},
    parent?: MockStorageAdapter,
  ) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      throwOnError: false,
      ...options,
    };
    this.state = parent ? parent.state : emptyState();
    this.shared = parent ? parent.shared : { lock: Promise.resolve(), idCounter: 0 };
    this.joined = parent !== undefined;
  }

  /**
   * Generate a unique ID
   */
  private generateId(): string {
    return `mock-${++this.shared.idCounter}-${Date.now()}`;
  }

  /**
   * Simulate network latency if configured
   */
  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.options.latencyMs),
      );
    }
  }

  // ==================== Transactions ====================

  async withTransaction<T>(
    work: (storage: StorageAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.joined) {
      return work(this);
    }

    const previous = this.shared.lock;
    let release: () => void = () => undefined;
    this.shared.lock = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;

    const saved = snapshot(this.state);
    try {
      return await work(new MockStorageAdapter(this.options, this));
    } catch (error) {
      this.restore(saved);
      throw error;
    } finally {
      release();
    }
  }

  private restore(saved: MockState): void {
    // Mutate in place: joined adapters hold the same state object
    Object.assign(this.state, saved);
  }

  // ==================== Provider configuration ====================

  async listActiveProviderConfigs(provider: string): Promise<ProviderConfigRecord[]> {
    await this.simulateLatency();
    return [...this.state.providerConfigs.values()]
      .filter((config) => config.provider === provider && config.isActive)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((config) => ({ ...config }));
  }

  async findProviderConfig(
    tenantId: string,
    provider: string,
  ): Promise<ProviderConfigRecord | null> {
    await this.simulateLatency();
    const config = this.state.providerConfigs.get(`${tenantId}:${provider}`);
    return config ? { ...config } : null;
  }

  async upsertProviderConfig(
    dto: UpsertProviderConfigDto,
  ): Promise<ProviderConfigRecord> {
    await this.simulateLatency();
    const key = `${dto.tenantId}:${dto.provider}`;
    const existing = this.state.providerConfigs.get(key);
    const now = new Date();

    const record: ProviderConfigRecord = {
      id: existing?.id ?? this.generateId(),
      tenantId: dto.tenantId,
      provider: dto.provider,
      encryptedConfig: { ...dto.encryptedConfig },
      isActive: dto.isActive,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    this.state.providerConfigs.set(key, record);
    return { ...record };
  }

  async setProviderConfigActive(
    tenantId: string,
    provider: string,
    isActive: boolean,
  ): Promise<void> {
    await this.simulateLatency();
    const key = `${tenantId}:${provider}`;
    const existing = this.state.providerConfigs.get(key);
    if (existing) {
      this.state.providerConfigs.set(key, { ...existing, isActive, updatedAt: new Date() });
    }
  }

  // ==================== Payment events ====================

  async insertPaymentEvent(
    dto: CreatePaymentEventRecordDto,
  ): Promise<PaymentEventRecord | null> {
    await this.simulateLatency();
    if (this.paymentEventByKey(dto.provider, dto.providerEventId)) {
      return null;
    }

    const record = new PaymentEventRecord(
      this.generateId(),
      dto.tenantId,
      dto.provider,
      dto.providerEventId,
      dto.eventType,
      dto.customerId,
      dto.rawPayload,
      dto.receivedAt,
    );
    this.state.paymentEvents.set(record.id, record);
    return copyPaymentEvent(record);
  }

  async findPaymentEvent(
    provider: string,
    providerEventId: string,
  ): Promise<PaymentEventRecord | null> {
    await this.simulateLatency();
    const record = this.paymentEventByKey(provider, providerEventId);
    return record ? copyPaymentEvent(record) : null;
  }

  async findPaymentEventForUpdate(id: string): Promise<PaymentEventRecord | null> {
    await this.simulateLatency();
    const record = this.state.paymentEvents.get(id);
    return record ? copyPaymentEvent(record) : null;
  }

  async markPaymentEventProcessed(id: string, processedAt: Date): Promise<void> {
    await this.simulateLatency();
    const record = this.state.paymentEvents.get(id);
    if (!record) {
      throw new Error(`Payment event not found: ${id}`);
    }
    const updated = copyPaymentEvent(record);
    updated.processedAt = processedAt;
    this.state.paymentEvents.set(id, updated);
  }

  private paymentEventByKey(
    provider: string,
    providerEventId: string,
  ): PaymentEventRecord | undefined {
    for (const record of this.state.paymentEvents.values()) {
      if (record.provider === provider && record.providerEventId === providerEventId) {
        return record;
      }
    }
    return undefined;
  }

  // ==================== Disputes ====================

  async insertDispute(dto: CreateDisputeRecordDto): Promise<DisputeRecord | null> {
    await this.simulateLatency();
    if (this.disputeByKey(dto.provider, dto.providerDisputeId)) {
      return null;
    }

    const record = new DisputeRecord(
      this.generateId(),
      dto.tenantId,
      dto.provider,
      dto.providerDisputeId,
      dto.providerEventId,
      dto.customerId,
      dto.amount,
      dto.currency,
      dto.reason,
      dto.status,
      dto.rawPayload,
      dto.receivedAt,
    );
    this.state.disputes.set(record.id, record);
    return copyDispute(record);
  }

  async findDisputeForUpdate(
    provider: string,
    providerDisputeId: string,
  ): Promise<DisputeRecord | null> {
    await this.simulateLatency();
    const record = this.disputeByKey(provider, providerDisputeId);
    return record ? copyDispute(record) : null;
  }

  async updateDispute(id: string, dto: UpdateDisputeRecordDto): Promise<DisputeRecord> {
    await this.simulateLatency();
    const existing = this.state.disputes.get(id);
    if (!existing) {
      throw new Error(`Dispute not found: ${id}`);
    }

    const updated = new DisputeRecord(
      existing.id,
      existing.tenantId,
      existing.provider,
      existing.providerDisputeId,
      dto.providerEventId,
      dto.customerId,
      dto.amount,
      dto.currency,
      dto.reason,
      dto.status,
      dto.rawPayload,
      dto.receivedAt,
      null,
    );
    this.state.disputes.set(id, updated);
    return copyDispute(updated);
  }

  async markDisputeProcessed(id: string, processedAt: Date): Promise<void> {
    await this.simulateLatency();
    const record = this.state.disputes.get(id);
    if (!record) {
      throw new Error(`Dispute not found: ${id}`);
    }
    const updated = copyDispute(record);
    updated.processedAt = processedAt;
    this.state.disputes.set(id, updated);
  }

  private disputeByKey(
    provider: string,
    providerDisputeId: string,
  ): DisputeRecord | undefined {
    for (const record of this.state.disputes.values()) {
      if (record.provider === provider && record.providerDisputeId === providerDisputeId) {
        return record;
      }
    }
    return undefined;
  }

  // ==================== Invoices ====================

  async findInvoiceForUpdate(
    tenantId: string,
    invoiceId: string,
  ): Promise<Invoice | null> {
    await this.simulateLatency();
    const invoice = this.state.invoices.get(invoiceId);
    return invoice && invoice.tenantId === tenantId ? { ...invoice } : null;
  }

  async updateInvoiceSettlement(
    id: string,
    dto: UpdateInvoiceSettlementDto,
  ): Promise<void> {
    await this.simulateLatency();
    const invoice = this.state.invoices.get(id);
    if (!invoice) {
      throw new Error(`Invoice not found: ${id}`);
    }
    this.state.invoices.set(id, {
      ...invoice,
      amountPaid: dto.amountPaid,
      paidAt: dto.paidAt,
    });
  }

  // ==================== Ledger ====================

  async findLedgerAccount(
    tenantId: string,
    code: string,
  ): Promise<LedgerAccount | null> {
    await this.simulateLatency();
    const account = this.state.ledgerAccounts.get(`${tenantId}:${code}`);
    return account ? { ...account } : null;
  }

  async insertLedgerAccount(dto: CreateLedgerAccountDto): Promise<LedgerAccount | null> {
    await this.simulateLatency();
    const key = `${dto.tenantId}:${dto.code}`;
    if (this.state.ledgerAccounts.has(key)) {
      return null;
    }

    const account: LedgerAccount = {
      id: this.generateId(),
      tenantId: dto.tenantId,
      code: dto.code,
      name: dto.name,
      createdAt: new Date(),
    };
    this.state.ledgerAccounts.set(key, account);
    return { ...account };
  }

  async insertLedgerEntry(dto: CreateLedgerEntryDto): Promise<LedgerEntry | null> {
    await this.simulateLatency();
    for (const entry of this.state.ledgerEntries.values()) {
      if (
        entry.tenantId === dto.tenantId &&
        entry.sourceType === dto.sourceType &&
        entry.sourceId === dto.sourceId
      ) {
        return null;
      }
    }

    const entry: LedgerEntry = {
      id: this.generateId(),
      tenantId: dto.tenantId,
      sourceType: dto.sourceType,
      sourceId: dto.sourceId,
      currency: dto.currency,
      occurredAt: dto.occurredAt,
      createdAt: new Date(),
    };
    this.state.ledgerEntries.set(entry.id, entry);
    return { ...entry };
  }

  async insertLedgerEntryLines(
    lines: CreateLedgerEntryLineDto[],
  ): Promise<LedgerEntryLine[]> {
    await this.simulateLatency();
    return lines.map((dto) => {
      const line: LedgerEntryLine = { id: this.generateId(), ...dto };
      this.state.ledgerEntryLines.set(line.id, line);
      return { ...line };
    });
  }

  async findLedgerEntries(query: LedgerEntryQuery): Promise<LedgerEntry[]> {
    await this.simulateLatency();
    return [...this.state.ledgerEntries.values()]
      .filter(
        (entry) =>
          (!query.tenantId || entry.tenantId === query.tenantId) &&
          (!query.sourceType || entry.sourceType === query.sourceType) &&
          (!query.sourceId || entry.sourceId === query.sourceId),
      )
      .map((entry) => ({ ...entry }));
  }

  async getLedgerEntryLines(ledgerEntryId: string): Promise<LedgerEntryLine[]> {
    await this.simulateLatency();
    return [...this.state.ledgerEntryLines.values()]
      .filter((line) => line.ledgerEntryId === ledgerEntryId)
      .map((line) => ({ ...line }));
  }

  async sumCustomerReceivable(query: CustomerBalanceQuery): Promise<number> {
    await this.simulateLatency();
    const receivable = this.state.ledgerAccounts.get(
      `${query.tenantId}:${LedgerAccountCode.ACCOUNTS_RECEIVABLE}`,
    );
    if (!receivable) {
      return 0;
    }

    let balance = 0;
    for (const line of this.state.ledgerEntryLines.values()) {
      if (line.accountId !== receivable.id || line.currency !== query.currency) {
        continue;
      }
      const entry = this.state.ledgerEntries.get(line.ledgerEntryId);
      if (!entry || entry.tenantId !== query.tenantId) {
        continue;
      }
      if (this.customerForSource(entry) !== query.customerId) {
        continue;
      }
      balance += line.direction === LedgerDirection.DEBIT ? line.amount : -line.amount;
    }
    return balance;
  }

  private customerForSource(entry: LedgerEntry): string | undefined {
    if (PAYMENT_SOURCES.has(entry.sourceType)) {
      return this.state.paymentEvents.get(entry.sourceId)?.customerId;
    }
    if (DISPUTE_SOURCES.has(entry.sourceType)) {
      return this.state.disputes.get(entry.sourceId)?.customerId;
    }
    return undefined;
  }

  // ==================== Audit ====================

  async createAuditLog(dto: CreateAuditLogDto): Promise<AuditLog> {
    await this.simulateLatency();
    const log = new AuditLog(
      this.generateId(),
      dto.tenantId,
      dto.action,
      dto.targetType,
      dto.targetId,
      { ...dto.metadata },
    );
    this.state.auditLogs.set(log.id, log);
    return log;
  }

  async getAuditLogs(query: AuditLogQuery): Promise<AuditLog[]> {
    await this.simulateLatency();
    return [...this.state.auditLogs.values()].filter(
      (log) =>
        (!query.tenantId || log.tenantId === query.tenantId) &&
        (!query.action || log.action === query.action) &&
        (!query.targetType || log.targetType === query.targetType) &&
        (!query.targetId || log.targetId === query.targetId),
    );
  }

  // ==================== Outbox ====================

  async insertOutboxEvent(dto: CreateOutboxEventDto): Promise<OutboxEvent | null> {
    await this.simulateLatency();
    for (const event of this.state.outboxEvents.values()) {
      if (event.dedupeKey === dto.dedupeKey) {
        return null;
      }
    }

    const event = new OutboxEvent(
      this.generateId(),
      dto.tenantId,
      dto.eventType,
      { ...dto.payload },
      dto.dedupeKey,
      OutboxStatus.PENDING,
      0,
      dto.maxRetries ?? 3,
    );
    this.state.outboxEvents.set(event.id, event);
    return copyOutboxEvent(event);
  }

  async getOutboxEvents(query: OutboxQuery): Promise<OutboxEvent[]> {
    await this.simulateLatency();
    const events = [...this.state.outboxEvents.values()]
      .filter(
        (event) =>
          (!query.status || event.status === query.status) &&
          (!query.scheduledBefore || event.scheduledFor <= query.scheduledBefore),
      )
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(copyOutboxEvent);

    return query.limit ? events.slice(0, query.limit) : events;
  }

  async markOutboxEventDelivered(id: string): Promise<void> {
    await this.simulateLatency();
    const updated = copyOutboxEvent(this.requireOutboxEvent(id));
    updated.status = OutboxStatus.DELIVERED;
    updated.processedAt = new Date();
    updated.error = null;
    this.state.outboxEvents.set(id, updated);
  }

  async markOutboxEventFailed(id: string, error: string): Promise<OutboxEvent> {
    await this.simulateLatency();
    const updated = copyOutboxEvent(this.requireOutboxEvent(id));
    updated.retryCount += 1;
    updated.error = error;
    if (updated.canRetry()) {
      updated.status = OutboxStatus.FAILED;
      updated.scheduledFor = new Date(Date.now() + outboxRetryDelayMs(updated.retryCount));
    } else {
      updated.status = OutboxStatus.DEAD_LETTER;
    }
    this.state.outboxEvents.set(id, updated);
    return copyOutboxEvent(updated);
  }

  private requireOutboxEvent(id: string): OutboxEvent {
    const event = this.state.outboxEvents.get(id);
    if (!event) {
      throw new Error(`Outbox event not found: ${id}`);
    }
    return event;
  }

  // ==================== Health & Monitoring ====================

  async isHealthy(): Promise<boolean> {
    await this.simulateLatency();
    return !this.options.throwOnError;
  }

  // ==================== Testing Utilities ====================

  /**
   * Invoices are issued outside the pipeline; tests place them directly
   */
  seedInvoice(invoice: Invoice): void {
    this.state.invoices.set(invoice.id, { ...invoice });
  }

  /**
   * Clear all data (for testing)
   */
  clear(): void {
    this.restore(emptyState());
    this.shared.idCounter = 0;
  }

  /**
   * Get all data (for testing)
   */
  getAllData(): {
    providerConfigs: ProviderConfigRecord[];
    paymentEvents: PaymentEventRecord[];
    disputes: DisputeRecord[];
    invoices: Invoice[];
    ledgerAccounts: LedgerAccount[];
    ledgerEntries: LedgerEntry[];
    ledgerEntryLines: LedgerEntryLine[];
    auditLogs: AuditLog[];
    outboxEvents: OutboxEvent[];
  } {
    return {
      providerConfigs: [...this.state.providerConfigs.values()],
      paymentEvents: [...this.state.paymentEvents.values()],
      disputes: [...this.state.disputes.values()],
      invoices: [...this.state.invoices.values()],
      ledgerAccounts: [...this.state.ledgerAccounts.values()],
      ledgerEntries: [...this.state.ledgerEntries.values()],
      ledgerEntryLines: [...this.state.ledgerEntryLines.values()],
      auditLogs: [...this.state.auditLogs.values()],
      outboxEvents: [...this.state.outboxEvents.values()],
    };
  }
}

function copyPaymentEvent(record: PaymentEventRecord): PaymentEventRecord {
  return new PaymentEventRecord(
    record.id,
    record.tenantId,
    record.provider,
    record.providerEventId,
    record.eventType,
    record.customerId,
    record.rawPayload,
    record.receivedAt,
    record.processedAt,
  );
}

function copyDispute(record: DisputeRecord): DisputeRecord {
  return new DisputeRecord(
    record.id,
    record.tenantId,
    record.provider,
    record.providerDisputeId,
    record.providerEventId,
    record.customerId,
    record.amount,
    record.currency,
    record.reason,
    record.status,
    record.rawPayload,
    record.receivedAt,
    record.processedAt,
  );
}

function copyOutboxEvent(event: OutboxEvent): OutboxEvent {
  return new OutboxEvent(
    event.id,
    event.tenantId,
    event.eventType,
    event.payload,
    event.dedupeKey,
    event.status,
    event.retryCount,
    event.maxRetries,
    event.scheduledFor,
    event.processedAt,
    event.error,
    event.createdAt,
  );
}

/**
 * Mock storage configuration options
 */
export interface MockStorageOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
  throwOnError?: boolean;
}
