import {
  AuditAction,
  EventAlreadyProcessedError,
  InvalidAmountError,
  InvalidCustomerError,
  LedgerAccountCode,
  LedgerSourceType,
  PaymentEvent,
  PaymentEventType,
} from '../../src';
import { Pipeline, accountBalance, createPipeline } from './pipeline.fixture';

describe('Payment processing', () => {
  let pipeline: Pipeline;
  const occurredAt = new Date('2024-05-01T10:00:00Z');

  function paymentEvent(overrides: Partial<PaymentEvent> = {}): PaymentEvent {
    return {
      provider: 'stripe',
      providerEventId: 'evt_1',
      providerPaymentId: 'pi_1',
      providerPaymentType: 'payment_intent',
      type: PaymentEventType.SUCCEEDED,
      tenantId: 'tenant_a',
      customerId: 'cus_1',
      amount: 2000,
      currency: 'usd',
      occurredAt,
      rawPayload: { id: 'evt_1' },
      invoiceId: 'inv_1',
      ...overrides,
    };
  }

  beforeEach(() => {
    pipeline = createPipeline();
    pipeline.storage.seedInvoice({
      id: 'inv_1',
      tenantId: 'tenant_a',
      customerId: 'cus_1',
      currency: 'USD',
      subtotal: 2000,
      amountPaid: 0,
      paidAt: null,
    });
  });

  afterEach(() => {
    pipeline.storage.clear();
  });

  it('should post a 2000 USD payment and settle the invoice', async () => {
    const result = await pipeline.payments.process(paymentEvent());

    expect(result.balance).toBe(-2000);
    expect(result.record.processedAt).toBeInstanceOf(Date);

    const data = pipeline.storage.getAllData();
    expect(data.ledgerEntries).toHaveLength(1);
    expect(data.ledgerEntries[0]).toMatchObject({
      tenantId: 'tenant_a',
      sourceType: LedgerSourceType.PAYMENT,
      sourceId: result.record.id,
      currency: 'USD',
    });
    expect(data.ledgerEntryLines).toHaveLength(2);
    expect(await accountBalance(pipeline, 'tenant_a', LedgerAccountCode.CASH)).toBe(2000);
    expect(
      await accountBalance(pipeline, 'tenant_a', LedgerAccountCode.ACCOUNTS_RECEIVABLE),
    ).toBe(-2000);

    expect(data.invoices[0]).toMatchObject({ amountPaid: 2000, paidAt: occurredAt });

    const [audit] = await pipeline.storage.getAuditLogs({
      action: AuditAction.PAYMENT_RECEIVED,
    });
    expect(audit.targetId).toBe(result.record.id);
    expect(audit.metadata).toMatchObject({
      provider: 'stripe',
      provider_event_id: 'evt_1',
      customer_id: 'cus_1',
      amount: 2000,
      currency: 'USD',
      event_type: 'succeeded',
      invoice_id: 'inv_1',
      occurred_at: '2024-05-01T10:00:00.000Z',
      balance: -2000,
    });

    expect(pipeline.metrics.getMetrics().paymentEvents).toEqual({ 'stripe.succeeded': 1 });
  });

  it('should reject the same event a second time', async () => {
    await pipeline.payments.process(paymentEvent());

    await expect(pipeline.payments.process(paymentEvent())).rejects.toThrow(
      EventAlreadyProcessedError,
    );
    expect(pipeline.storage.getAllData().ledgerEntries).toHaveLength(1);
    expect(pipeline.storage.getAllData().invoices[0].amountPaid).toBe(2000);
  });

  it('should settle concurrent deliveries of one event only once', async () => {
    pipeline = createPipeline({ simulateLatency: true, latencyMs: 2 });
    pipeline.storage.seedInvoice({
      id: 'inv_1',
      tenantId: 'tenant_a',
      customerId: 'cus_1',
      currency: 'USD',
      subtotal: 2000,
      amountPaid: 0,
      paidAt: null,
    });

    const outcomes = await Promise.allSettled([
      pipeline.payments.process(paymentEvent()),
      pipeline.payments.process(paymentEvent()),
    ]);

    const rejected = outcomes.filter(
      (outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected',
    );
    expect(outcomes.filter((outcome) => outcome.status === 'fulfilled')).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(EventAlreadyProcessedError);

    const data = pipeline.storage.getAllData();
    expect(data.paymentEvents).toHaveLength(1);
    expect(data.ledgerEntries).toHaveLength(1);
    expect(data.invoices[0].amountPaid).toBe(2000);
    expect(
      await pipeline.storage.getAuditLogs({ action: AuditAction.PAYMENT_RECEIVED }),
    ).toHaveLength(1);
    expect(pipeline.metrics.getMetrics().paymentEvents).toEqual({ 'stripe.succeeded': 1 });
  });

  it('should resume an event whose settlement failed earlier', async () => {
    jest
      .spyOn(pipeline.ledger, 'createEntry')
      .mockRejectedValueOnce(new Error('connection reset'));

    await expect(pipeline.payments.process(paymentEvent())).rejects.toThrow('connection reset');
    const [stored] = pipeline.storage.getAllData().paymentEvents;
    expect(stored.processedAt).toBeNull();
    expect(pipeline.storage.getAllData().ledgerEntries).toHaveLength(0);

    const result = await pipeline.payments.process(paymentEvent());

    expect(result.record.id).toBe(stored.id);
    expect(pipeline.storage.getAllData().ledgerEntries).toHaveLength(1);
    expect(pipeline.metrics.getMetrics().paymentEvents).toEqual({});
  });

  it('should reverse a refund against cash and reopen the invoice', async () => {
    await pipeline.payments.process(paymentEvent());

    const refund = await pipeline.payments.process(
      paymentEvent({
        providerEventId: 'evt_2',
        type: PaymentEventType.REFUNDED,
        amount: 500,
      }),
    );

    expect(refund.balance).toBe(-2000);
    const data = pipeline.storage.getAllData();
    expect(data.ledgerEntries.map((entry) => entry.sourceType)).toEqual([
      LedgerSourceType.PAYMENT,
      LedgerSourceType.REFUND,
    ]);
    expect(await accountBalance(pipeline, 'tenant_a', LedgerAccountCode.CASH)).toBe(1500);
    expect(
      await accountBalance(pipeline, 'tenant_a', LedgerAccountCode.REFUND_LIABILITY),
    ).toBe(500);
    expect(data.invoices[0]).toMatchObject({ amountPaid: 1500, paidAt: null });
  });

  it('should record a failed payment without touching the ledger', async () => {
    const result = await pipeline.payments.process(
      paymentEvent({ type: PaymentEventType.FAILED, amount: 0 }),
    );

    expect(result.balance).toBeUndefined();
    expect(pipeline.storage.getAllData().ledgerEntries).toHaveLength(0);
    expect(pipeline.storage.getAllData().invoices[0].amountPaid).toBe(0);
    expect(
      await pipeline.storage.getAuditLogs({ action: AuditAction.PAYMENT_FAILED }),
    ).toHaveLength(1);
  });

  it('should leave the ledger intact when the invoice is unknown', async () => {
    const result = await pipeline.payments.process(paymentEvent({ invoiceId: 'inv_missing' }));

    expect(result.balance).toBe(-2000);
    expect(pipeline.storage.getAllData().invoices[0].amountPaid).toBe(0);
  });

  it('should not settle another tenant\'s invoice', async () => {
    await pipeline.payments.process(paymentEvent({ tenantId: 'tenant_b' }));

    expect(pipeline.storage.getAllData().invoices[0].amountPaid).toBe(0);
  });

  it('should reject a zero amount on a succeeded payment', async () => {
    await expect(pipeline.payments.process(paymentEvent({ amount: 0 }))).rejects.toThrow(
      InvalidAmountError,
    );
    expect(pipeline.storage.getAllData().paymentEvents).toHaveLength(0);
  });

  it('should reject an event without a customer', async () => {
    await expect(pipeline.payments.process(paymentEvent({ customerId: ' ' }))).rejects.toThrow(
      InvalidCustomerError,
    );
  });
});
