import * as crypto from 'crypto';

export interface SignedWebhook {
  body: Buffer;
  headers: Record<string, string>;
  payload: Record<string, unknown>;
}

/**
 * Stripe Webhook Factory
 * Builds Stripe-shaped events and signs them the way Stripe does, for tests
 */
export class StripeWebhookFactory {
  static paymentIntentSucceeded(
    options: {
      eventId?: string;
      paymentIntentId?: string;
      amount?: number;
      amountReceived?: number;
      currency?: string;
      customerId?: string;
      invoiceId?: string;
      created?: number;
    } = {},
  ): Record<string, unknown> {
    const created = options.created ?? Math.floor(Date.now() / 1000);
    const metadata: Record<string, string> = {
      customer_id: options.customerId ?? 'cus_test_001',
    };
    if (options.invoiceId) {
      metadata.invoice_id = options.invoiceId;
    }

    return {
      id: options.eventId ?? `evt_${crypto.randomBytes(8).toString('hex')}`,
      object: 'event',
      type: 'payment_intent.succeeded',
      created,
      data: {
        object: {
          id: options.paymentIntentId ?? 'pi_test_001',
          object: 'payment_intent',
          amount: options.amount ?? 2000,
          amount_received: options.amountReceived ?? options.amount ?? 2000,
          currency: options.currency ?? 'usd',
          created,
          metadata,
        },
      },
    };
  }

  static chargeRefunded(
    options: {
      eventId?: string;
      chargeId?: string;
      amount?: number;
      amountRefunded?: number;
      currency?: string;
      customerId?: string;
      invoiceId?: string;
    } = {},
  ): Record<string, unknown> {
    const created = Math.floor(Date.now() / 1000);
    const metadata: Record<string, string> = {
      customer_id: options.customerId ?? 'cus_test_001',
    };
    if (options.invoiceId) {
      metadata.invoice_id = options.invoiceId;
    }

    return {
      id: options.eventId ?? `evt_${crypto.randomBytes(8).toString('hex')}`,
      object: 'event',
      type: 'charge.refunded',
      created,
      data: {
        object: {
          id: options.chargeId ?? 'ch_test_001',
          object: 'charge',
          amount: options.amount ?? 5000,
          amount_refunded: options.amountRefunded ?? 0,
          currency: options.currency ?? 'usd',
          created,
          metadata,
        },
      },
    };
  }

  static dispute(
    type:
      | 'charge.dispute.created'
      | 'charge.dispute.funds_withdrawn'
      | 'charge.dispute.funds_reinstated'
      | 'charge.dispute.closed',
    options: {
      eventId?: string;
      disputeId?: string;
      amount?: number;
      currency?: string;
      customerId?: string;
      reason?: string;
    } = {},
  ): Record<string, unknown> {
    const created = Math.floor(Date.now() / 1000);

    return {
      id: options.eventId ?? `evt_${crypto.randomBytes(8).toString('hex')}`,
      object: 'event',
      type,
      created,
      data: {
        object: {
          id: options.disputeId ?? 'dp_test_001',
          object: 'dispute',
          amount: options.amount ?? 1200,
          currency: options.currency ?? 'usd',
          reason: options.reason ?? 'fraudulent',
          created,
          metadata: { customer_id: options.customerId ?? 'cus_test_001' },
        },
      },
    };
  }

  /**
   * Serialize and sign a payload. Extra v1 signatures simulate secret rotation.
   */
  static sign(
    payload: Record<string, unknown>,
    secret: string,
    options: { timestamp?: number; extraSecrets?: string[] } = {},
  ): SignedWebhook {
    const body = Buffer.from(JSON.stringify(payload));
    const timestamp = options.timestamp ?? Math.floor(Date.now() / 1000);

    const signatures = [...(options.extraSecrets ?? []), secret].map(
      (key) =>
        `v1=${crypto
          .createHmac('sha256', key)
          .update(`${timestamp}.${body.toString('utf8')}`)
          .digest('hex')}`,
    );

    return {
      body,
      headers: {
        'stripe-signature': [`t=${timestamp}`, ...signatures].join(','),
        'content-type': 'application/json',
      },
      payload,
    };
  }
}
