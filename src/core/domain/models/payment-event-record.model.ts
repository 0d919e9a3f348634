import { PaymentEventType } from '../enums';

/**
 * PaymentEventRecord - the deduplicated, durable form of a payment event.
 * Unique on (provider, providerEventId). A null processedAt means settlement
 * has not completed and the record may be resumed.
 */
export class PaymentEventRecord {
  constructor(
    public readonly id: string,
    public readonly tenantId: string,
    public readonly provider: string,
    public readonly providerEventId: string,
    public readonly eventType: PaymentEventType,
    public readonly customerId: string,
    public readonly rawPayload: Record<string, unknown>,
    public readonly receivedAt: Date,
    public processedAt: Date | null = null,
  ) {}

  isProcessed(): boolean {
    return this.processedAt !== null;
  }
}
