import {
  AuditAction,
  DisputeEvent,
  DisputeEventType,
  DisputeStatus,
  EventAlreadyProcessedError,
  InvalidAmountError,
  InvalidEventError,
  LedgerAccountCode,
  LedgerSourceType,
} from '../../src';
import { Pipeline, accountBalance, createPipeline } from './pipeline.fixture';

describe('Dispute processing', () => {
  let pipeline: Pipeline;

  function disputeEvent(
    type: DisputeEventType,
    providerEventId: string,
    overrides: Partial<DisputeEvent> = {},
  ): DisputeEvent {
    return {
      provider: 'stripe',
      providerEventId,
      providerDisputeId: 'dp_1',
      type,
      tenantId: 'tenant_a',
      customerId: 'cus_1',
      amount: 1200,
      currency: 'usd',
      reason: 'fraudulent',
      occurredAt: new Date('2024-05-02T10:00:00Z'),
      rawPayload: { id: providerEventId },
      ...overrides,
    };
  }

  beforeEach(() => {
    pipeline = createPipeline();
  });

  afterEach(() => {
    pipeline.storage.clear();
  });

  it('should open a dispute without posting to the ledger', async () => {
    const dispute = await pipeline.disputes.process(
      disputeEvent(DisputeEventType.CREATED, 'evt_d1'),
    );

    expect(dispute.status).toBe(DisputeStatus.OPEN);
    expect(dispute.currency).toBe('USD');
    expect(dispute.processedAt).toBeInstanceOf(Date);
    expect(pipeline.storage.getAllData().ledgerEntries).toHaveLength(0);
    expect(
      await pipeline.storage.getAuditLogs({ action: AuditAction.DISPUTE_OPENED }),
    ).toHaveLength(1);
  });

  it('should mirror a withdrawal and reinstatement with net zero', async () => {
    const withdrawn = await pipeline.disputes.process(
      disputeEvent(DisputeEventType.FUNDS_WITHDRAWN, 'evt_d2'),
    );
    const reinstated = await pipeline.disputes.process(
      disputeEvent(DisputeEventType.FUNDS_REINSTATED, 'evt_d3'),
    );

    expect(withdrawn.id).toBe(reinstated.id);
    expect(reinstated.status).toBe(DisputeStatus.REINSTATED);

    const entries = pipeline.storage.getAllData().ledgerEntries;
    expect(entries.map((entry) => [entry.sourceType, entry.sourceId])).toEqual([
      [LedgerSourceType.DISPUTE_HOLD, withdrawn.id],
      [LedgerSourceType.DISPUTE_WIN, withdrawn.id],
    ]);

    const hold = await pipeline.storage.getLedgerEntryLines(entries[0].id);
    const win = await pipeline.storage.getLedgerEntryLines(entries[1].id);
    expect(hold.map((line) => [line.direction, line.amount])).toEqual([
      ['debit', 1200],
      ['credit', 1200],
    ]);
    expect(win.map((line) => line.accountId)).toEqual(
      [...hold.map((line) => line.accountId)].reverse(),
    );

    expect(await accountBalance(pipeline, 'tenant_a', LedgerAccountCode.CASH)).toBe(0);
    expect(
      await accountBalance(pipeline, 'tenant_a', LedgerAccountCode.REFUND_LIABILITY),
    ).toBe(0);
  });

  it('should never move the status backwards and end closed', async () => {
    const sequence: Array<[DisputeEventType, string]> = [
      [DisputeEventType.FUNDS_WITHDRAWN, 'evt_1'],
      [DisputeEventType.CREATED, 'evt_2'],
      [DisputeEventType.FUNDS_REINSTATED, 'evt_3'],
      [DisputeEventType.CLOSED, 'evt_4'],
      [DisputeEventType.FUNDS_WITHDRAWN, 'evt_5'],
    ];
    const statuses: DisputeStatus[] = [];

    for (const [type, eventId] of sequence) {
      const dispute = await pipeline.disputes.process(disputeEvent(type, eventId));
      statuses.push(dispute.status);
    }

    expect(statuses).toEqual([
      DisputeStatus.WITHDRAWN,
      DisputeStatus.WITHDRAWN,
      DisputeStatus.REINSTATED,
      DisputeStatus.CLOSED,
      DisputeStatus.CLOSED,
    ]);
    expect(pipeline.storage.getAllData().disputes).toHaveLength(1);
  });

  it('should not post the same hold twice', async () => {
    await pipeline.disputes.process(disputeEvent(DisputeEventType.FUNDS_WITHDRAWN, 'evt_1'));
    await pipeline.disputes.process(disputeEvent(DisputeEventType.FUNDS_WITHDRAWN, 'evt_2'));

    expect(pipeline.storage.getAllData().ledgerEntries).toHaveLength(1);
  });

  it('should reject a redelivered event', async () => {
    await pipeline.disputes.process(disputeEvent(DisputeEventType.CREATED, 'evt_1'));

    await expect(
      pipeline.disputes.process(disputeEvent(DisputeEventType.CREATED, 'evt_1')),
    ).rejects.toThrow(EventAlreadyProcessedError);
    expect(
      await pipeline.storage.getAuditLogs({ action: AuditAction.DISPUTE_OPENED }),
    ).toHaveLength(1);
  });

  it('should keep the earlier reason when a later event has none', async () => {
    await pipeline.disputes.process(disputeEvent(DisputeEventType.CREATED, 'evt_1'));
    const closed = await pipeline.disputes.process(
      disputeEvent(DisputeEventType.CLOSED, 'evt_2', { reason: '' }),
    );

    expect(closed.reason).toBe('fraudulent');
  });

  it('should count every processed dispute event', async () => {
    await pipeline.disputes.process(disputeEvent(DisputeEventType.CREATED, 'evt_1'));
    await pipeline.disputes.process(disputeEvent(DisputeEventType.FUNDS_WITHDRAWN, 'evt_2'));

    expect(pipeline.metrics.getMetrics().disputeEvents).toEqual({
      'stripe.created': 1,
      'stripe.funds_withdrawn': 1,
    });
  });

  it('should require a dispute id and a positive amount', async () => {
    await expect(
      pipeline.disputes.process(
        disputeEvent(DisputeEventType.CREATED, 'evt_1', { providerDisputeId: '' }),
      ),
    ).rejects.toThrow(InvalidEventError);
    await expect(
      pipeline.disputes.process(disputeEvent(DisputeEventType.CREATED, 'evt_1', { amount: 0 })),
    ).rejects.toThrow(InvalidAmountError);
  });
});
