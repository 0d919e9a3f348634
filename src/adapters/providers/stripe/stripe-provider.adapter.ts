import * as crypto from 'crypto';
import {
  AdapterConfig,
  DisputeCapableAdapter,
  DisputeEvent,
  DisputeEventType,
  EventIgnoredError,
  InvalidCustomerError,
  InvalidPayloadError,
  InvalidSignatureError,
  PaymentEvent,
  PaymentEventType,
  WebhookHeaders,
  getHeader,
} from '../../../core';
import {
  parseJsonObject,
  pickInteger,
  pickRecord,
  pickString,
  requireConfigValue,
  timingSafeEqual,
  unixToDate,
} from '../shared/payload.utils';

export const STRIPE_SIGNATURE_HEADER = 'Stripe-Signature';
export const DEFAULT_STRIPE_TOLERANCE_SECONDS = 300;

export interface StripeAdapterOptions {
  /**
   * Maximum age of the signed timestamp. Zero or less disables the check.
   */
  toleranceSeconds?: number;
  now?: () => Date;
}

interface StripeEnvelope {
  id: string;
  type: string;
  created: number;
  object: Record<string, unknown>;
  raw: Record<string, unknown>;
}

const DISPUTE_TYPES: Record<string, DisputeEventType> = {
  'charge.dispute.created': DisputeEventType.CREATED,
  'charge.dispute.funds_withdrawn': DisputeEventType.FUNDS_WITHDRAWN,
  'charge.dispute.funds_reinstated': DisputeEventType.FUNDS_REINSTATED,
  'charge.dispute.closed': DisputeEventType.CLOSED,
};

/**
 * Stripe Provider Adapter
 *
 * Signature: `Stripe-Signature: t=<unix>,v1=<hex>[,v1=<hex>...]` where each
 * v1 is HMAC-SHA256(webhook_secret, `${t}.${body}`). Several v1 values appear
 * while a secret is being rolled; any match is accepted.
 *
 * @see https://docs.stripe.com/webhooks#verify-manually
 */
export class StripeProviderAdapter implements DisputeCapableAdapter {
  readonly providerName = 'stripe';
  private readonly webhookSecret: string;
  private readonly toleranceSeconds: number;
  private readonly now: () => Date;

  constructor(
    private readonly config: AdapterConfig,
    options: StripeAdapterOptions = {},
  ) {
    this.webhookSecret = requireConfigValue(config, 'webhook_secret');

    const configured = Number(config.values.tolerance_seconds?.trim() || NaN);
    this.toleranceSeconds = Number.isFinite(configured)
      ? configured
      : options.toleranceSeconds ?? DEFAULT_STRIPE_TOLERANCE_SECONDS;
    this.now = options.now ?? (() => new Date());
  }

  async verify(rawBody: Buffer, headers: WebhookHeaders): Promise<void> {
    const header = getHeader(headers, STRIPE_SIGNATURE_HEADER);
    if (!header) {
      throw new InvalidSignatureError('missing Stripe-Signature header');
    }

    const { timestamp, signatures } = this.parseSignatureHeader(header);

    if (this.toleranceSeconds > 0) {
      const age = Math.abs(this.now().getTime() / 1000 - Number(timestamp));
      if (age > this.toleranceSeconds) {
        throw new InvalidSignatureError('signature timestamp outside tolerance');
      }
    }

    const expected = crypto
      .createHmac('sha256', this.webhookSecret)
      .update(`${timestamp}.`)
      .update(rawBody)
      .digest('hex');

    if (!signatures.some((candidate) => timingSafeEqual(candidate, expected))) {
      throw new InvalidSignatureError();
    }
  }

  async parse(rawBody: Buffer): Promise<PaymentEvent> {
    const event = this.readEnvelope(rawBody);

    switch (event.type) {
      case 'payment_intent.succeeded': {
        const received = pickInteger(event.object.amount_received);
        const amount = received > 0 ? received : pickInteger(event.object.amount);
        return this.toPaymentEvent(event, PaymentEventType.SUCCEEDED, 'payment_intent', amount);
      }
      case 'payment_intent.payment_failed':
        return this.toPaymentEvent(
          event,
          PaymentEventType.FAILED,
          'payment_intent',
          pickInteger(event.object.amount),
        );
      case 'charge.succeeded':
        return this.toPaymentEvent(
          event,
          PaymentEventType.SUCCEEDED,
          'charge',
          pickInteger(event.object.amount),
        );
      case 'charge.refunded': {
        const refunded = pickInteger(event.object.amount_refunded);
        const amount = refunded > 0 ? refunded : pickInteger(event.object.amount);
        return this.toPaymentEvent(event, PaymentEventType.REFUNDED, 'charge', amount);
      }
      default:
        throw new EventIgnoredError(event.type);
    }
  }

  async parseDispute(rawBody: Buffer): Promise<DisputeEvent> {
    const event = this.readEnvelope(rawBody);

    const type = DISPUTE_TYPES[event.type];
    if (!type) {
      throw new EventIgnoredError(event.type);
    }

    const disputeId = pickString(event.object.id);
    if (!disputeId) {
      throw new InvalidPayloadError('dispute object has no id');
    }

    return {
      provider: this.providerName,
      providerEventId: event.id,
      providerDisputeId: disputeId,
      type,
      tenantId: this.config.tenantId,
      customerId: this.customerId(event.object),
      amount: pickInteger(event.object.amount),
      currency: pickString(event.object.currency).toUpperCase(),
      reason: pickString(event.object.reason),
      occurredAt: unixToDate(pickInteger(event.object.created), event.created),
      rawPayload: event.raw,
    };
  }

  private parseSignatureHeader(header: string): {
    timestamp: string;
    signatures: string[];
  } {
    let timestamp = '';
    const signatures: string[] = [];

    for (const part of header.split(',')) {
      const separator = part.indexOf('=');
      if (separator <= 0) {
        throw new InvalidSignatureError('malformed Stripe-Signature header');
      }
      const key = part.slice(0, separator).trim();
      const value = part.slice(separator + 1).trim();

      if (key === 't') {
        timestamp = value;
      } else if (key === 'v1' && value) {
        signatures.push(value);
      }
    }

    if (!/^\d+$/.test(timestamp) || signatures.length === 0) {
      throw new InvalidSignatureError('malformed Stripe-Signature header');
    }
    return { timestamp, signatures };
  }

  private readEnvelope(rawBody: Buffer): StripeEnvelope {
    const raw = parseJsonObject(rawBody);
    const id = pickString(raw.id);
    const type = pickString(raw.type);
    const object = pickRecord(pickRecord(raw.data).object);

    if (!id || !type || Object.keys(object).length === 0) {
      throw new InvalidPayloadError('Stripe event is missing id, type or data.object');
    }
    return { id, type, created: pickInteger(raw.created), object, raw };
  }

  private toPaymentEvent(
    event: StripeEnvelope,
    type: PaymentEventType,
    paymentType: string,
    amount: number,
  ): PaymentEvent {
    const metadata = pickRecord(event.object.metadata);
    const invoiceId = pickString(metadata.invoice_id);

    return {
      provider: this.providerName,
      providerEventId: event.id,
      providerPaymentId: pickString(event.object.id),
      providerPaymentType: paymentType,
      type,
      tenantId: this.config.tenantId,
      customerId: this.customerId(event.object),
      amount,
      currency: pickString(event.object.currency).toUpperCase(),
      occurredAt: unixToDate(pickInteger(event.object.created), event.created),
      rawPayload: event.raw,
      ...(invoiceId ? { invoiceId } : {}),
    };
  }

  private customerId(object: Record<string, unknown>): string {
    const customerId = pickString(pickRecord(object.metadata).customer_id);
    if (!customerId) {
      throw new InvalidCustomerError('Stripe object metadata has no customer_id');
    }
    return customerId;
  }
}
