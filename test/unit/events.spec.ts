import {
  DispatchedEvent,
  EventDispatcherImpl,
  IngestionMetrics,
  LoggingEventHandler,
  MetricsCollector,
  OutboxEventType,
} from '../../src';

const event: DispatchedEvent = {
  id: 'ob_1',
  tenantId: 'tenant_a',
  eventType: OutboxEventType.LEDGER_ENTRY_CREATED,
  payload: { ledger_entry_id: 'le_1', source_type: 'payment', source_id: 'pe_1' },
  createdAt: new Date('2024-05-01T10:00:00Z'),
};

describe('EventDispatcherImpl', () => {
  let dispatcher: EventDispatcherImpl;

  beforeEach(() => {
    dispatcher = new EventDispatcherImpl();
  });

  it('should call typed and catch-all handlers', async () => {
    const typed = jest.fn();
    const all = jest.fn();
    dispatcher.on('ledger_entry_created', typed);
    dispatcher.onAll(all);

    await dispatcher.dispatch('ledger_entry_created', event);

    expect(typed).toHaveBeenCalledWith('ledger_entry_created', event);
    expect(all).toHaveBeenCalledWith('ledger_entry_created', event);
  });

  it('should not call handlers of other event types', async () => {
    const other = jest.fn();
    dispatcher.on('something_else', other);

    await dispatcher.dispatch('ledger_entry_created', event);

    expect(other).not.toHaveBeenCalled();
  });

  it('should collect handler failures without stopping the others', async () => {
    const healthy = jest.fn();
    dispatcher.on('ledger_entry_created', async () => {
      throw new Error('handler down');
    });
    dispatcher.on('ledger_entry_created', healthy);

    const result = await dispatcher.dispatchAndWait('ledger_entry_created', event);

    expect(result.success).toBe(false);
    expect(result.errors.map((error) => error.message)).toEqual(['handler down']);
    expect(healthy).toHaveBeenCalled();
  });

  it('should not throw from dispatch when a handler fails', async () => {
    dispatcher.onAll(() => {
      throw new Error('boom');
    });

    await expect(dispatcher.dispatch('ledger_entry_created', event)).resolves.toBeUndefined();
  });

  it('should unsubscribe', () => {
    const typed = dispatcher.on('ledger_entry_created', jest.fn());
    const all = dispatcher.onAll(jest.fn());
    expect(dispatcher.getHandlerCount('ledger_entry_created')).toBe(2);

    typed.unsubscribe();
    all.unsubscribe();

    expect(dispatcher.getHandlerCount()).toBe(0);
  });
});

describe('LoggingEventHandler', () => {
  it('should log source details at normal level', async () => {
    const logger = { log: jest.fn() };
    const handler = new LoggingEventHandler(logger).getHandler();

    await handler('ledger_entry_created', event);

    expect(logger.log).toHaveBeenCalledWith(
      'ledger_entry_created ob_1 tenant=tenant_a source=payment/pe_1',
    );
  });

  it('should keep minimal lines short', () => {
    const handler = new LoggingEventHandler({ log: jest.fn() }, 'minimal');

    expect(handler.format('ledger_entry_created', event)).toBe('ledger_entry_created ob_1');
  });

  it('should include the payload at verbose level', () => {
    const handler = new LoggingEventHandler({ log: jest.fn() }, 'verbose');

    expect(handler.format('ledger_entry_created', event)).toBe(
      'ledger_entry_created ob_1 tenant=tenant_a payload={"ledger_entry_id":"le_1","source_type":"payment","source_id":"pe_1"}',
    );
  });
});

describe('IngestionMetrics', () => {
  function collector(): jest.Mocked<MetricsCollector> {
    return { increment: jest.fn(), gauge: jest.fn(), histogram: jest.fn() };
  }

  it('should count events by provider and type', () => {
    const metrics = new IngestionMetrics();

    metrics.recordPaymentEvent('stripe', 'succeeded');
    metrics.recordPaymentEvent('stripe', 'succeeded');
    metrics.recordDisputeEvent('stripe', 'funds_withdrawn');
    metrics.recordLedgerEntry('payment');

    expect(metrics.getMetrics()).toEqual({
      paymentEvents: { 'stripe.succeeded': 2 },
      disputeEvents: { 'stripe.funds_withdrawn': 1 },
      ledgerEntries: { payment: 1 },
      totalEvents: 3,
    });
  });

  it('should mirror counters to the collector', () => {
    const sink = collector();
    const metrics = new IngestionMetrics(sink);

    metrics.recordPaymentEvent('adyen', 'refunded');
    metrics.recordLedgerEntry('refund');
    metrics.recordDeliveryLag(250);

    expect(sink.increment).toHaveBeenCalledWith('kassa.payment_event', {
      provider: 'adyen',
      eventType: 'refunded',
    });
    expect(sink.increment).toHaveBeenCalledWith('kassa.ledger_entry', { sourceType: 'refund' });
    expect(sink.gauge).toHaveBeenCalledWith('kassa.ledger_entries', 1, { sourceType: 'refund' });
    expect(sink.histogram).toHaveBeenCalledWith('kassa.outbox.delivery_lag', 250);
  });

  it('should reset', () => {
    const metrics = new IngestionMetrics();
    metrics.recordPaymentEvent('stripe', 'failed');

    metrics.reset();

    expect(metrics.getMetrics().totalEvents).toBe(0);
  });
});
