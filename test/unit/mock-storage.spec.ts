import {
  AuditAction,
  AuditTargetType,
  LedgerAccountCode,
  LedgerDirection,
  LedgerSourceType,
  MockStorageAdapter,
  OutboxEventType,
  PaymentEventType,
} from '../../src';

describe('MockStorageAdapter', () => {
  let storage: MockStorageAdapter;

  beforeEach(() => {
    storage = new MockStorageAdapter();
  });

  describe('withTransaction', () => {
    it('should commit the work of a successful transaction', async () => {
      await storage.withTransaction(async (tx) => {
        await tx.insertLedgerAccount({ tenantId: 'tenant_a', code: 'cash', name: 'Cash' });
      });

      expect(await storage.findLedgerAccount('tenant_a', 'cash')).not.toBeNull();
    });

    it('should roll back every write when the work throws', async () => {
      await expect(
        storage.withTransaction(async (tx) => {
          await tx.insertLedgerAccount({ tenantId: 'tenant_a', code: 'cash', name: 'Cash' });
          await tx.createAuditLog({
            tenantId: 'tenant_a',
            action: AuditAction.LEDGER_ENTRY_CREATED,
            targetType: AuditTargetType.LEDGER_ENTRY,
            targetId: 'entry_1',
          });
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');

      expect(await storage.findLedgerAccount('tenant_a', 'cash')).toBeNull();
      expect(storage.getAllData().auditLogs).toHaveLength(0);
    });

    it('should let a nested transaction join the outer one', async () => {
      await expect(
        storage.withTransaction(async (tx) => {
          await tx.withTransaction(async (inner) => {
            await inner.insertLedgerAccount({ tenantId: 'tenant_a', code: 'cash', name: 'Cash' });
          });
          expect(await tx.findLedgerAccount('tenant_a', 'cash')).not.toBeNull();
          throw new Error('outer failed');
        }),
      ).rejects.toThrow('outer failed');

      expect(await storage.findLedgerAccount('tenant_a', 'cash')).toBeNull();
    });

    it('should run concurrent transactions one after another', async () => {
      const steps: string[] = [];
      const step = (name: string) => async () => {
        steps.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        steps.push(`${name}:end`);
      };

      await Promise.all([storage.withTransaction(step('a')), storage.withTransaction(step('b'))]);

      expect(steps).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    });
  });

  describe('uniqueness', () => {
    it('should refuse a second ledger entry for the same source', async () => {
      const dto = {
        tenantId: 'tenant_a',
        sourceType: LedgerSourceType.PAYMENT,
        sourceId: 'pe_1',
        currency: 'USD',
        occurredAt: new Date('2024-05-01T10:00:00Z'),
      };

      expect(await storage.insertLedgerEntry(dto)).not.toBeNull();
      expect(await storage.insertLedgerEntry(dto)).toBeNull();
      expect(await storage.insertLedgerEntry({ ...dto, tenantId: 'tenant_b' })).not.toBeNull();
    });

    it('should refuse a duplicate outbox dedupe key', async () => {
      const dto = {
        tenantId: 'tenant_a',
        eventType: OutboxEventType.LEDGER_ENTRY_CREATED,
        payload: { ledger_entry_id: 'entry_1', source_type: 'payment', source_id: 'pe_1' },
        dedupeKey: 'ledger_entry:entry_1',
      };

      expect(await storage.insertOutboxEvent(dto)).not.toBeNull();
      expect(await storage.insertOutboxEvent(dto)).toBeNull();
    });

    it('should refuse a duplicate payment event per provider', async () => {
      const dto = {
        tenantId: 'tenant_a',
        provider: 'stripe',
        providerEventId: 'evt_1',
        eventType: PaymentEventType.SUCCEEDED,
        customerId: 'cus_1',
        rawPayload: { id: 'evt_1' },
        receivedAt: new Date('2024-05-01T10:00:00Z'),
      };

      expect(await storage.insertPaymentEvent(dto)).not.toBeNull();
      expect(await storage.insertPaymentEvent({ ...dto, tenantId: 'tenant_b' })).toBeNull();
    });
  });

  describe('sumCustomerReceivable', () => {
    it('should sum receivable lines of the customer in one currency', async () => {
      const receivable = await storage.insertLedgerAccount({
        tenantId: 'tenant_a',
        code: LedgerAccountCode.ACCOUNTS_RECEIVABLE,
        name: 'Accounts Receivable',
      });
      const paymentFor = async (customerId: string, providerEventId: string) =>
        storage.insertPaymentEvent({
          tenantId: 'tenant_a',
          provider: 'stripe',
          providerEventId,
          eventType: PaymentEventType.SUCCEEDED,
          customerId,
          rawPayload: {},
          receivedAt: new Date('2024-05-01T10:00:00Z'),
        });
      const post = async (sourceId: string, currency: string, amount: number) => {
        const entry = await storage.insertLedgerEntry({
          tenantId: 'tenant_a',
          sourceType: LedgerSourceType.PAYMENT,
          sourceId,
          currency,
          occurredAt: new Date('2024-05-01T10:00:00Z'),
        });
        if (!entry || !receivable) {
          throw new Error('fixture setup failed');
        }
        await storage.insertLedgerEntryLines([
          {
            ledgerEntryId: entry.id,
            accountId: receivable.id,
            direction: LedgerDirection.CREDIT,
            currency,
            amount,
          },
        ]);
      };

      const first = await paymentFor('cus_1', 'evt_1');
      const second = await paymentFor('cus_1', 'evt_2');
      const other = await paymentFor('cus_2', 'evt_3');
      if (!first || !second || !other) {
        throw new Error('fixture setup failed');
      }
      await post(first.id, 'USD', 2000);
      await post(second.id, 'EUR', 700);
      await post(other.id, 'USD', 300);

      expect(
        await storage.sumCustomerReceivable({
          tenantId: 'tenant_a',
          customerId: 'cus_1',
          currency: 'USD',
        }),
      ).toBe(-2000);
    });

    it('should be zero before the receivable account exists', async () => {
      expect(
        await storage.sumCustomerReceivable({
          tenantId: 'tenant_a',
          customerId: 'cus_1',
          currency: 'USD',
        }),
      ).toBe(0);
    });
  });

  it('should report health from its options', async () => {
    expect(await storage.isHealthy()).toBe(true);
    expect(await new MockStorageAdapter({ throwOnError: true }).isHealthy()).toBe(false);
  });
});
