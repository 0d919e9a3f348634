import { DataSource, EntityManager, EntityTarget, ObjectLiteral } from 'typeorm';
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
import {
  AuditLogEntity,
  DisputeEntity,
  InvoiceEntity,
  LedgerAccountEntity,
  LedgerEntryEntity,
  LedgerEntryLineEntity,
  OutboxEventEntity,
  PaymentEventEntity,
  ProviderConfigEntity,
} from './entities';

const CUSTOMER_RECEIVABLE_SQL = `
  SELECT COALESCE(SUM(CASE WHEN l.direction = $4 THEN l.amount ELSE -l.amount END), 0) AS balance
  FROM ledger_entry_lines l
  JOIN ledger_entries e ON e.id = l.ledger_entry_id
  JOIN ledger_accounts a ON a.id = l.account_id
  LEFT JOIN payment_events p
    ON e.source_type::text = ANY($5) AND p.id::text = e.source_id
  LEFT JOIN payment_disputes d
    ON e.source_type::text = ANY($6) AND d.id::text = e.source_id
  WHERE e.tenant_id = $1
    AND a.tenant_id = $1
    AND a.code = $7
    AND l.currency = $2
    AND COALESCE(p.customer_id, d.customer_id) = $3
`;

const PAYMENT_SOURCES = [
  LedgerSourceType.PAYMENT,
  LedgerSourceType.PAYMENT_FEE,
  LedgerSourceType.REFUND,
];

const DISPUTE_SOURCES = [
  LedgerSourceType.DISPUTE_HOLD,
  LedgerSourceType.DISPUTE_WIN,
  LedgerSourceType.DISPUTE_LOSS,
];

/**
 * TypeORM implementation of StorageAdapter for PostgreSQL
 *
 * An instance built with an EntityManager is bound to that manager's
 * transaction; the root instance opens a query runner per withTransaction.
 */
export class TypeORMStorageAdapter implements StorageAdapter {
  constructor(
    private readonly dataSource: DataSource,
    private readonly transactionManager?: EntityManager,
  ) {}

  private get manager(): EntityManager {
    return this.transactionManager ?? this.dataSource.manager;
  }

  /**
   * Transaction Support
   */

  async withTransaction<T>(
    work: (storage: StorageAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.transactionManager) {
      return work(this);
    }

    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const result = await work(
        new TypeORMStorageAdapter(this.dataSource, queryRunner.manager),
      );
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * Provider configuration
   */

  async listActiveProviderConfigs(provider: string): Promise<ProviderConfigRecord[]> {
    const entities = await this.manager.find(ProviderConfigEntity, {
      where: { provider, isActive: true },
      order: { createdAt: 'ASC', id: 'ASC' },
    });
    return entities.map((e) => this.mapProviderConfigEntityToDomain(e));
  }

  async findProviderConfig(
    tenantId: string,
    provider: string,
  ): Promise<ProviderConfigRecord | null> {
    const entity = await this.manager.findOne(ProviderConfigEntity, {
      where: { tenantId, provider },
    });
    return entity ? this.mapProviderConfigEntityToDomain(entity) : null;
  }

  async upsertProviderConfig(
    dto: UpsertProviderConfigDto,
  ): Promise<ProviderConfigRecord> {
    await this.manager
      .createQueryBuilder()
      .insert()
      .into(ProviderConfigEntity)
      .values({
        tenantId: dto.tenantId,
        provider: dto.provider,
        encryptedConfig: dto.encryptedConfig,
        isActive: dto.isActive,
      })
      .orUpdate(
        ['encrypted_config', 'is_active', 'updated_at'],
        ['tenant_id', 'provider'],
      )
      .execute();

    const entity = await this.manager.findOneOrFail(ProviderConfigEntity, {
      where: { tenantId: dto.tenantId, provider: dto.provider },
    });
    return this.mapProviderConfigEntityToDomain(entity);
  }

  async setProviderConfigActive(
    tenantId: string,
    provider: string,
    isActive: boolean,
  ): Promise<void> {
    await this.manager.update(
      ProviderConfigEntity,
      { tenantId, provider },
      { isActive, updatedAt: new Date() },
    );
  }

  /**
   * Payment events
   */

  async insertPaymentEvent(
    dto: CreatePaymentEventRecordDto,
  ): Promise<PaymentEventRecord | null> {
    const id = await this.insertIgnoringConflict(PaymentEventEntity, {
      tenantId: dto.tenantId,
      provider: dto.provider,
      providerEventId: dto.providerEventId,
      eventType: dto.eventType,
      customerId: dto.customerId,
      rawPayload: dto.rawPayload,
      receivedAt: dto.receivedAt,
    });
    if (!id) {
      return null;
    }

    const entity = await this.manager.findOneOrFail(PaymentEventEntity, { where: { id } });
    return this.mapPaymentEventEntityToDomain(entity);
  }

  async findPaymentEvent(
    provider: string,
    providerEventId: string,
  ): Promise<PaymentEventRecord | null> {
    const entity = await this.manager.findOne(PaymentEventEntity, {
      where: { provider, providerEventId },
    });
    return entity ? this.mapPaymentEventEntityToDomain(entity) : null;
  }

  async findPaymentEventForUpdate(id: string): Promise<PaymentEventRecord | null> {
    const entity = await this.manager.findOne(PaymentEventEntity, {
      where: { id },
      lock: { mode: 'pessimistic_write' },
    });
    return entity ? this.mapPaymentEventEntityToDomain(entity) : null;
  }

  async markPaymentEventProcessed(id: string, processedAt: Date): Promise<void> {
    await this.manager.update(PaymentEventEntity, id, { processedAt });
  }

  /**
   * Disputes
   */

  async insertDispute(dto: CreateDisputeRecordDto): Promise<DisputeRecord | null> {
    const id = await this.insertIgnoringConflict(DisputeEntity, {
      tenantId: dto.tenantId,
      provider: dto.provider,
      providerDisputeId: dto.providerDisputeId,
      providerEventId: dto.providerEventId,
      customerId: dto.customerId,
      amount: dto.amount,
      currency: dto.currency,
      reason: dto.reason,
      status: dto.status,
      rawPayload: dto.rawPayload,
      receivedAt: dto.receivedAt,
    });
    if (!id) {
      return null;
    }

    const entity = await this.manager.findOneOrFail(DisputeEntity, { where: { id } });
    return this.mapDisputeEntityToDomain(entity);
  }

  async findDisputeForUpdate(
    provider: string,
    providerDisputeId: string,
  ): Promise<DisputeRecord | null> {
    // Use pessimistic locking to serialize events for the same dispute
    const entity = await this.manager.findOne(DisputeEntity, {
      where: { provider, providerDisputeId },
      lock: { mode: 'pessimistic_write' },
    });
    return entity ? this.mapDisputeEntityToDomain(entity) : null;
  }

  async updateDispute(id: string, dto: UpdateDisputeRecordDto): Promise<DisputeRecord> {
    await this.updateById(DisputeEntity, id, {
      providerEventId: dto.providerEventId,
      customerId: dto.customerId,
      amount: dto.amount,
      currency: dto.currency,
      reason: dto.reason,
      status: dto.status,
      rawPayload: dto.rawPayload,
      receivedAt: dto.receivedAt,
      processedAt: null,
    });

    const entity = await this.manager.findOneOrFail(DisputeEntity, { where: { id } });
    return this.mapDisputeEntityToDomain(entity);
  }

  async markDisputeProcessed(id: string, processedAt: Date): Promise<void> {
    await this.manager.update(DisputeEntity, id, { processedAt });
  }

  /**
   * Invoices
   */

  async findInvoiceForUpdate(
    tenantId: string,
    invoiceId: string,
  ): Promise<Invoice | null> {
    const entity = await this.manager.findOne(InvoiceEntity, {
      where: { id: invoiceId, tenantId },
      lock: { mode: 'pessimistic_write' },
    });
    if (!entity) {
      return null;
    }
    return {
      id: entity.id,
      tenantId: entity.tenantId,
      customerId: entity.customerId,
      currency: entity.currency,
      subtotal: entity.subtotal,
      amountPaid: entity.amountPaid,
      paidAt: entity.paidAt,
    };
  }

  async updateInvoiceSettlement(
    id: string,
    dto: UpdateInvoiceSettlementDto,
  ): Promise<void> {
    await this.manager.update(InvoiceEntity, id, {
      amountPaid: dto.amountPaid,
      paidAt: dto.paidAt,
    });
  }

  /**
   * Ledger
   */

  async findLedgerAccount(
    tenantId: string,
    code: string,
  ): Promise<LedgerAccount | null> {
    const entity = await this.manager.findOne(LedgerAccountEntity, {
      where: { tenantId, code },
    });
    return entity ? { ...entity } : null;
  }

  async insertLedgerAccount(dto: CreateLedgerAccountDto): Promise<LedgerAccount | null> {
    const id = await this.insertIgnoringConflict(LedgerAccountEntity, {
      tenantId: dto.tenantId,
      code: dto.code,
      name: dto.name,
    });
    if (!id) {
      return null;
    }

    const entity = await this.manager.findOneOrFail(LedgerAccountEntity, { where: { id } });
    return { ...entity };
  }

  async insertLedgerEntry(dto: CreateLedgerEntryDto): Promise<LedgerEntry | null> {
    const id = await this.insertIgnoringConflict(LedgerEntryEntity, {
      tenantId: dto.tenantId,
      sourceType: dto.sourceType,
      sourceId: dto.sourceId,
      currency: dto.currency,
      occurredAt: dto.occurredAt,
    });
    if (!id) {
      return null;
    }

    const entity = await this.manager.findOneOrFail(LedgerEntryEntity, { where: { id } });
    return { ...entity };
  }

  async insertLedgerEntryLines(
    lines: CreateLedgerEntryLineDto[],
  ): Promise<LedgerEntryLine[]> {
    const entities = this.manager.create(LedgerEntryLineEntity, lines);
    const saved = await this.manager.save(entities);
    return saved.map((line) => ({ ...line }));
  }

  async findLedgerEntries(query: LedgerEntryQuery): Promise<LedgerEntry[]> {
    const qb = this.manager.createQueryBuilder(LedgerEntryEntity, 'e');

    if (query.tenantId) {
      qb.andWhere('e.tenant_id = :tenantId', { tenantId: query.tenantId });
    }
    if (query.sourceType) {
      qb.andWhere('e.source_type = :sourceType', { sourceType: query.sourceType });
    }
    if (query.sourceId) {
      qb.andWhere('e.source_id = :sourceId', { sourceId: query.sourceId });
    }

    qb.orderBy('e.created_at', 'ASC');

    const entities = await qb.getMany();
    return entities.map((e) => ({ ...e }));
  }

  async getLedgerEntryLines(ledgerEntryId: string): Promise<LedgerEntryLine[]> {
    const entities = await this.manager.find(LedgerEntryLineEntity, {
      where: { ledgerEntryId },
    });
    return entities.map((e) => ({ ...e }));
  }

  async sumCustomerReceivable(query: CustomerBalanceQuery): Promise<number> {
    const rows: unknown = await this.manager.query(CUSTOMER_RECEIVABLE_SQL, [
      query.tenantId,
      query.currency,
      query.customerId,
      LedgerDirection.DEBIT,
      PAYMENT_SOURCES,
      DISPUTE_SOURCES,
      LedgerAccountCode.ACCOUNTS_RECEIVABLE,
    ]);

    if (!Array.isArray(rows) || rows.length === 0) {
      return 0;
    }
    const balance: unknown = Reflect.get(rows[0], 'balance');
    return Number(balance ?? 0);
  }

  /**
   * Audit
   */

  async createAuditLog(dto: CreateAuditLogDto): Promise<AuditLog> {
    const entity = this.manager.create(AuditLogEntity, {
      tenantId: dto.tenantId,
      action: dto.action,
      targetType: dto.targetType,
      targetId: dto.targetId,
      metadata: dto.metadata ?? {},
    });

    const saved = await this.manager.save(entity);
    return this.mapAuditLogEntityToDomain(saved);
  }

  async getAuditLogs(query: AuditLogQuery): Promise<AuditLog[]> {
    const qb = this.manager.createQueryBuilder(AuditLogEntity, 'a');

    if (query.tenantId) {
      qb.andWhere('a.tenant_id = :tenantId', { tenantId: query.tenantId });
    }
    if (query.action) {
      qb.andWhere('a.action = :action', { action: query.action });
    }
    if (query.targetType) {
      qb.andWhere('a.target_type = :targetType', { targetType: query.targetType });
    }
    if (query.targetId) {
      qb.andWhere('a.target_id = :targetId', { targetId: query.targetId });
    }

    qb.orderBy('a.created_at', 'ASC');

    const entities = await qb.getMany();
    return entities.map((e) => this.mapAuditLogEntityToDomain(e));
  }

  /**
   * Outbox
   */

  async insertOutboxEvent(dto: CreateOutboxEventDto): Promise<OutboxEvent | null> {
    const id = await this.insertIgnoringConflict(OutboxEventEntity, {
      tenantId: dto.tenantId,
      eventType: dto.eventType,
      payload: dto.payload,
      dedupeKey: dto.dedupeKey,
      status: OutboxStatus.PENDING,
      maxRetries: dto.maxRetries ?? 3,
    });
    if (!id) {
      return null;
    }

    const entity = await this.manager.findOneOrFail(OutboxEventEntity, { where: { id } });
    return this.mapOutboxEventEntityToDomain(entity);
  }

  async getOutboxEvents(query: OutboxQuery): Promise<OutboxEvent[]> {
    const qb = this.manager.createQueryBuilder(OutboxEventEntity, 'o');

    if (query.status) {
      qb.andWhere('o.status = :status', { status: query.status });
    }
    if (query.scheduledBefore) {
      qb.andWhere('o.scheduled_for <= :before', {
        before: query.scheduledBefore,
      });
    }

    qb.orderBy('o.created_at', 'ASC');
    if (query.limit) {
      qb.limit(query.limit);
    }

    const entities = await qb.getMany();
    return entities.map((e) => this.mapOutboxEventEntityToDomain(e));
  }

  async markOutboxEventDelivered(id: string): Promise<void> {
    await this.manager.update(OutboxEventEntity, id, {
      status: OutboxStatus.DELIVERED,
      processedAt: new Date(),
      error: null,
    });
  }

  async markOutboxEventFailed(
    id: string,
    errorMessage: string,
  ): Promise<OutboxEvent> {
    const entity = await this.manager.findOneOrFail(OutboxEventEntity, { where: { id } });

    const retryCount = entity.retryCount + 1;
    const deadLetter = retryCount >= entity.maxRetries;

    await this.manager.update(OutboxEventEntity, id, {
      status: deadLetter ? OutboxStatus.DEAD_LETTER : OutboxStatus.FAILED,
      retryCount,
      error: errorMessage,
      // Exponential backoff for retry
      ...(deadLetter
        ? {}
        : { scheduledFor: new Date(Date.now() + outboxRetryDelayMs(retryCount)) }),
    });

    const updated = await this.manager.findOneOrFail(OutboxEventEntity, { where: { id } });
    return this.mapOutboxEventEntityToDomain(updated);
  }

  /**
   * Health Check
   */

  async isHealthy(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  /**
   * INSERT ... ON CONFLICT DO NOTHING; resolves to the new id, or null when
   * a unique key already existed
   */
  private async insertIgnoringConflict<E extends ObjectLiteral>(
    target: EntityTarget<E>,
    values: Partial<E>,
  ): Promise<string | null> {
    const result = await this.manager
      .createQueryBuilder()
      .insert()
      .into<ObjectLiteral>(target)
      .values(values)
      .orIgnore()
      .execute();

    const id: unknown = result.identifiers[0]?.id;
    return typeof id === 'string' ? id : null;
  }

  private async updateById<E extends ObjectLiteral>(
    target: EntityTarget<E>,
    id: string,
    values: Partial<E>,
  ): Promise<void> {
    await this.manager
      .createQueryBuilder()
      .update<ObjectLiteral>(target)
      .set(values)
      .where('id = :id', { id })
      .execute();
  }

  /**
   * Private Mapping Methods
   */

  private mapProviderConfigEntityToDomain(
    entity: ProviderConfigEntity,
  ): ProviderConfigRecord {
    return {
      id: entity.id,
      tenantId: entity.tenantId,
      provider: entity.provider,
      encryptedConfig: entity.encryptedConfig,
      isActive: entity.isActive,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }

  private mapPaymentEventEntityToDomain(entity: PaymentEventEntity): PaymentEventRecord {
    return new PaymentEventRecord(
      entity.id,
      entity.tenantId,
      entity.provider,
      entity.providerEventId,
      entity.eventType,
      entity.customerId,
      entity.rawPayload,
      entity.receivedAt,
      entity.processedAt,
    );
  }

  private mapDisputeEntityToDomain(entity: DisputeEntity): DisputeRecord {
    return new DisputeRecord(
      entity.id,
      entity.tenantId,
      entity.provider,
      entity.providerDisputeId,
      entity.providerEventId,
      entity.customerId,
      entity.amount,
      entity.currency,
      entity.reason,
      entity.status,
      entity.rawPayload,
      entity.receivedAt,
      entity.processedAt,
    );
  }

  private mapAuditLogEntityToDomain(entity: AuditLogEntity): AuditLog {
    return new AuditLog(
      entity.id,
      entity.tenantId,
      entity.action,
      entity.targetType,
      entity.targetId,
      entity.metadata,
      entity.createdAt,
    );
  }

  private mapOutboxEventEntityToDomain(entity: OutboxEventEntity): OutboxEvent {
    return new OutboxEvent(
      entity.id,
      entity.tenantId,
      entity.eventType,
      entity.payload,
      entity.dedupeKey,
      entity.status,
      entity.retryCount,
      entity.maxRetries,
      entity.scheduledFor,
      entity.processedAt,
      entity.error,
      entity.createdAt,
    );
  }
}
