/**
 * Canonical dispute event types produced by dispute-capable adapters
 */
export enum DisputeEventType {
  CREATED = 'created',
  FUNDS_WITHDRAWN = 'funds_withdrawn',
  FUNDS_REINSTATED = 'funds_reinstated',
  CLOSED = 'closed',
}

/**
 * Persisted dispute status. Ordered: open < withdrawn < reinstated < closed
 */
export enum DisputeStatus {
  OPEN = 'open',
  WITHDRAWN = 'withdrawn',
  REINSTATED = 'reinstated',
  CLOSED = 'closed',
}
