import { DisputeStatus } from '../enums';

/**
 * DisputeRecord - one row per (provider, providerDisputeId).
 * Status only moves forward through the dispute lattice.
 */
export class DisputeRecord {
  constructor(
    public readonly id: string,
    public readonly tenantId: string,
    public readonly provider: string,
    public readonly providerDisputeId: string,
    public providerEventId: string,
    public customerId: string,
    public amount: number,
    public currency: string,
    public reason: string,
    public status: DisputeStatus,
    public rawPayload: Record<string, unknown>,
    public receivedAt: Date,
    public processedAt: Date | null = null,
  ) {}

  isProcessed(): boolean {
    return this.processedAt !== null;
  }

  isClosed(): boolean {
    return this.status === DisputeStatus.CLOSED;
  }
}
