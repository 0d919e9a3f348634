import { DisputeEventType, DisputeStatus } from '../domain/enums';

const RANK: Record<DisputeStatus, number> = {
  [DisputeStatus.OPEN]: 1,
  [DisputeStatus.WITHDRAWN]: 2,
  [DisputeStatus.REINSTATED]: 3,
  [DisputeStatus.CLOSED]: 4,
};

const STATUS_FOR_EVENT: Record<DisputeEventType, DisputeStatus> = {
  [DisputeEventType.CREATED]: DisputeStatus.OPEN,
  [DisputeEventType.FUNDS_WITHDRAWN]: DisputeStatus.WITHDRAWN,
  [DisputeEventType.FUNDS_REINSTATED]: DisputeStatus.REINSTATED,
  [DisputeEventType.CLOSED]: DisputeStatus.CLOSED,
};

export function statusRank(status: DisputeStatus): number {
  return RANK[status];
}

export function statusForEvent(type: DisputeEventType): DisputeStatus {
  return STATUS_FOR_EVENT[type];
}

/**
 * Resolve the stored status when an event arrives. Closed is terminal and
 * otherwise the status only moves up the lattice, so out-of-order delivery
 * never regresses a dispute.
 */
export function nextStatus(
  current: DisputeStatus,
  desired: DisputeStatus,
): DisputeStatus {
  if (current === DisputeStatus.CLOSED || desired === DisputeStatus.CLOSED) {
    return DisputeStatus.CLOSED;
  }
  return statusRank(desired) > statusRank(current) ? desired : current;
}
