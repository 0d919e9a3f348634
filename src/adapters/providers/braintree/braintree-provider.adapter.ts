import * as crypto from 'crypto';
import { XMLParser } from 'fast-xml-parser';
import {
  AdapterConfig,
  EventIgnoredError,
  InvalidCustomerError,
  InvalidPayloadError,
  InvalidSignatureError,
  PaymentEvent,
  PaymentEventType,
  PaymentProviderAdapter,
} from '../../../core';
import { isRecord, requireConfigValue, timingSafeEqual } from '../shared/payload.utils';

const DEFAULT_CURRENCY = 'USD';
const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

const KIND_TYPES: Record<string, PaymentEventType> = {
  subscription_charged_successfully: PaymentEventType.SUCCEEDED,
  transaction_settled: PaymentEventType.SUCCEEDED,
  subscription_canceled: PaymentEventType.FAILED,
  transaction_settlement_declined: PaymentEventType.FAILED,
  subscription_went_past_due: PaymentEventType.FAILED,
};

/**
 * Braintree Provider Adapter
 *
 * Webhooks arrive form-encoded as `bt_signature` and `bt_payload`. The
 * signature is `publicKey|hash` where hash is the hex HMAC-SHA256 of
 * bt_payload under the private key. The payload is base64-encoded XML.
 */
export class BraintreeProviderAdapter implements PaymentProviderAdapter {
  readonly providerName = 'braintree';
  private readonly privateKey: string;
  private readonly xml = new XMLParser({
    ignoreAttributes: true,
    parseTagValue: false,
    trimValues: true,
  });

  constructor(private readonly config: AdapterConfig) {
    this.privateKey = requireConfigValue(config, 'private_key');
  }

  async verify(rawBody: Buffer): Promise<void> {
    const { signature, payload } = readForm(rawBody);

    const parts = signature.split('|');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new InvalidSignatureError('bt_signature is not publicKey|hash');
    }

    const expected = crypto
      .createHmac('sha256', this.privateKey)
      .update(payload)
      .digest('hex');

    if (!timingSafeEqual(parts[1], expected)) {
      throw new InvalidSignatureError();
    }
  }

  async parse(rawBody: Buffer): Promise<PaymentEvent> {
    const { signature, payload } = readForm(rawBody);
    const notification = this.readNotification(payload);

    const kind = findTag(notification, 'kind');
    if (!kind) {
      throw new InvalidPayloadError('Braintree notification has no kind');
    }
    const type = KIND_TYPES[kind];
    if (!type) {
      throw new EventIgnoredError(kind);
    }

    // The id is half of the idempotency key
    const id = findTag(notification, 'id');
    if (!id) {
      throw new InvalidPayloadError('Braintree notification has no transaction id');
    }

    const customerId = findTag(notification, 'customer-id');
    if (!customerId) {
      throw new InvalidCustomerError('Braintree notification has no customer-id');
    }

    const currency = (findTag(notification, 'currency-iso-code') || DEFAULT_CURRENCY).toUpperCase();
    const majorAmount = Number(findTag(notification, 'amount'));
    // amounts are decimal major units, e.g. "10.00"
    const amount = Number.isFinite(majorAmount) && majorAmount > 0
      ? Math.round(majorAmount * 100)
      : 0;

    return {
      provider: this.providerName,
      providerEventId: `${id}_${kind}`,
      providerPaymentId: id,
      providerPaymentType: 'transaction',
      type,
      tenantId: this.config.tenantId,
      customerId,
      amount,
      currency,
      occurredAt: parseTimestamp(findTag(notification, 'timestamp')),
      rawPayload: { bt_signature: signature, bt_payload: payload, notification },
    };
  }

  private readNotification(payload: string): Record<string, unknown> {
    const compact = payload.replace(/[\r\n]/g, '');
    const xmlText = BASE64.test(compact) && compact.length % 4 === 0
      ? Buffer.from(compact, 'base64').toString('utf8')
      : payload;

    let parsed: unknown;
    try {
      parsed = this.xml.parse(xmlText, true);
    } catch {
      throw new InvalidPayloadError('bt_payload is not valid XML');
    }
    if (!isRecord(parsed)) {
      throw new InvalidPayloadError('bt_payload is not valid XML');
    }
    return parsed;
  }
}

/**
 * Decode the form body; both fields are required
 */
export function readForm(rawBody: Buffer): { signature: string; payload: string } {
  const form = new URLSearchParams(rawBody.toString('utf8'));
  const signature = form.get('bt_signature')?.trim() ?? '';
  const payload = form.get('bt_payload') ?? '';

  if (!signature || !payload.trim()) {
    throw new InvalidPayloadError('bt_signature and bt_payload are required');
  }
  return { signature, payload };
}

/**
 * Depth-first search for the first element with a text value
 */
function findTag(node: unknown, tag: string): string {
  if (Array.isArray(node)) {
    for (const child of node) {
      const found = findTag(child, tag);
      if (found) {
        return found;
      }
    }
    return '';
  }
  if (!isRecord(node)) {
    return '';
  }

  const direct = node[tag];
  if (typeof direct === 'string' && direct) {
    return direct;
  }
  for (const child of Object.values(node)) {
    const found = findTag(child, tag);
    if (found) {
      return found;
    }
  }
  return '';
}

function parseTimestamp(value: string): Date {
  if (!value) {
    return new Date();
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? new Date() : parsed;
}
