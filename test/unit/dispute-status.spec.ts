import {
  DisputeEventType,
  DisputeStatus,
  nextStatus,
  statusForEvent,
  statusRank,
} from '../../src';

describe('Dispute status lattice', () => {
  it('should order statuses open < withdrawn < reinstated < closed', () => {
    expect(statusRank(DisputeStatus.OPEN)).toBeLessThan(statusRank(DisputeStatus.WITHDRAWN));
    expect(statusRank(DisputeStatus.WITHDRAWN)).toBeLessThan(
      statusRank(DisputeStatus.REINSTATED),
    );
    expect(statusRank(DisputeStatus.REINSTATED)).toBeLessThan(
      statusRank(DisputeStatus.CLOSED),
    );
  });

  it('should map event types to statuses', () => {
    expect(statusForEvent(DisputeEventType.CREATED)).toBe(DisputeStatus.OPEN);
    expect(statusForEvent(DisputeEventType.FUNDS_WITHDRAWN)).toBe(DisputeStatus.WITHDRAWN);
    expect(statusForEvent(DisputeEventType.FUNDS_REINSTATED)).toBe(DisputeStatus.REINSTATED);
    expect(statusForEvent(DisputeEventType.CLOSED)).toBe(DisputeStatus.CLOSED);
  });

  it('should move forward', () => {
    expect(nextStatus(DisputeStatus.OPEN, DisputeStatus.WITHDRAWN)).toBe(
      DisputeStatus.WITHDRAWN,
    );
  });

  it('should not regress on out-of-order delivery', () => {
    expect(nextStatus(DisputeStatus.REINSTATED, DisputeStatus.OPEN)).toBe(
      DisputeStatus.REINSTATED,
    );
    expect(nextStatus(DisputeStatus.WITHDRAWN, DisputeStatus.WITHDRAWN)).toBe(
      DisputeStatus.WITHDRAWN,
    );
  });

  it('should keep closed terminal', () => {
    expect(nextStatus(DisputeStatus.CLOSED, DisputeStatus.REINSTATED)).toBe(
      DisputeStatus.CLOSED,
    );
    expect(nextStatus(DisputeStatus.OPEN, DisputeStatus.CLOSED)).toBe(DisputeStatus.CLOSED);
  });

  it('should end closed for any sequence containing a close', () => {
    const sequence = [
      DisputeStatus.WITHDRAWN,
      DisputeStatus.CLOSED,
      DisputeStatus.OPEN,
      DisputeStatus.REINSTATED,
    ];

    const final = sequence.reduce(nextStatus, DisputeStatus.OPEN);

    expect(final).toBe(DisputeStatus.CLOSED);
  });
});
