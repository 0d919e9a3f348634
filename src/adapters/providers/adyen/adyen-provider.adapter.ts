import * as crypto from 'crypto';
import {
  AdapterConfig,
  EventIgnoredError,
  InvalidConfigError,
  InvalidCustomerError,
  InvalidPayloadError,
  InvalidSignatureError,
  PaymentEvent,
  PaymentEventType,
  PaymentProviderAdapter,
} from '../../../core';
import {
  isRecord,
  parseJsonObject,
  pickInteger,
  pickRecord,
  pickString,
  requireConfigValue,
  timingSafeEqual,
} from '../shared/payload.utils';

/**
 * One NotificationRequestItem, with the fields that take part in signing
 */
export interface AdyenNotificationItem {
  pspReference: string;
  originalReference: string;
  merchantAccountCode: string;
  merchantReference: string;
  value: number;
  currency: string;
  eventCode: string;
  success: string;
  eventDate: string;
  additionalData: Record<string, string>;
}

const HEX_KEY = /^(?:[0-9a-fA-F]{2})+$/;

/**
 * Adyen Provider Adapter
 *
 * Adyen batches notifications; each item is signed on its own with
 * HMAC-SHA256 over eight colon-joined fields, keyed by the hex-decoded HMAC key
 * and base64 encoded into `additionalData.hmacSignature`. Every item in the
 * batch must verify.
 *
 * @see https://docs.adyen.com/development-resources/webhooks/verify-hmac-signatures
 */
export class AdyenProviderAdapter implements PaymentProviderAdapter {
  readonly providerName = 'adyen';
  private readonly hmacKey: Buffer;

  constructor(private readonly config: AdapterConfig) {
    const hexKey = requireConfigValue(config, 'hmac_key');
    if (!HEX_KEY.test(hexKey)) {
      throw new InvalidConfigError('adyen hmac_key is not valid hex');
    }
    this.hmacKey = Buffer.from(hexKey, 'hex');
  }

  async verify(rawBody: Buffer): Promise<void> {
    const items = readNotificationItems(parseJsonObject(rawBody));

    for (const item of items) {
      const signature = item.additionalData.hmacSignature;
      if (!signature) {
        throw new InvalidSignatureError('notification item has no hmacSignature');
      }
      if (!timingSafeEqual(this.sign(item), signature)) {
        throw new InvalidSignatureError();
      }
    }
  }

  async parse(rawBody: Buffer): Promise<PaymentEvent> {
    const raw = parseJsonObject(rawBody);
    const item = readNotificationItems(raw)[0];
    const succeeded = item.success === 'true';

    let type: PaymentEventType;
    switch (item.eventCode) {
      case 'AUTHORISATION':
        type = succeeded ? PaymentEventType.SUCCEEDED : PaymentEventType.FAILED;
        break;
      case 'REFUND':
        if (!succeeded) {
          throw new EventIgnoredError('REFUND (unsuccessful)');
        }
        type = PaymentEventType.REFUNDED;
        break;
      case 'CANCELLATION':
        if (!succeeded) {
          throw new EventIgnoredError('CANCELLATION (unsuccessful)');
        }
        type = PaymentEventType.FAILED;
        break;
      case 'OFFER_CLOSED':
        type = PaymentEventType.FAILED;
        break;
      default:
        throw new EventIgnoredError(item.eventCode);
    }

    const customerId =
      item.additionalData['metadata.customer_id'] || item.merchantReference;
    if (!customerId) {
      throw new InvalidCustomerError('Adyen notification has no customer reference');
    }
    const invoiceId = item.additionalData['metadata.invoice_id'];

    return {
      provider: this.providerName,
      providerEventId: `${item.pspReference}_${item.eventCode}`,
      providerPaymentId: item.pspReference,
      providerPaymentType: 'payment',
      type,
      tenantId: this.config.tenantId,
      customerId,
      amount: item.value,
      currency: item.currency.toUpperCase(),
      occurredAt: parseEventDate(item.eventDate),
      rawPayload: raw,
      ...(invoiceId ? { invoiceId } : {}),
    };
  }

  /**
   * base64(HMAC-SHA256(key, escaped fields joined by ':'))
   */
  sign(item: AdyenNotificationItem): string {
    return crypto
      .createHmac('sha256', this.hmacKey)
      .update(signingString(item))
      .digest('base64');
  }
}

export function signingString(item: AdyenNotificationItem): string {
  return [
    item.pspReference,
    item.originalReference,
    item.merchantAccountCode,
    item.merchantReference,
    String(item.value),
    item.currency,
    item.eventCode,
    item.success,
  ]
    .map((field) => field.replace(/\\/g, '\\\\').replace(/:/g, '\\:'))
    .join(':');
}

function readNotificationItems(
  root: Record<string, unknown>,
): AdyenNotificationItem[] {
  const entries = root.notificationItems;
  if (!Array.isArray(entries) || entries.length === 0) {
    throw new InvalidPayloadError('Adyen notification has no notificationItems');
  }

  return entries.map((entry: unknown) => {
    const request = isRecord(entry) ? entry.NotificationRequestItem : undefined;
    if (!isRecord(request)) {
      throw new InvalidPayloadError('notification item has no NotificationRequestItem');
    }
    return toNotificationItem(request);
  });
}

function toNotificationItem(request: Record<string, unknown>): AdyenNotificationItem {
  const amount = pickRecord(request.amount);
  const additionalData: Record<string, string> = {};
  for (const [key, value] of Object.entries(pickRecord(request.additionalData))) {
    if (typeof value === 'string') {
      additionalData[key] = value;
    }
  }

  return {
    pspReference: stringField(request.pspReference),
    originalReference: stringField(request.originalReference),
    merchantAccountCode: stringField(request.merchantAccountCode),
    merchantReference: stringField(request.merchantReference),
    value: pickInteger(amount.value),
    currency: stringField(amount.currency),
    eventCode: stringField(request.eventCode),
    success: stringField(request.success),
    eventDate: stringField(request.eventDate),
    additionalData,
  };
}

/**
 * Signed fields are taken verbatim, without trimming
 */
function stringField(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function parseEventDate(value: string): Date {
  const trimmed = pickString(value);
  if (!trimmed) {
    return new Date();
  }
  const parsed = new Date(trimmed);
  return Number.isNaN(parsed.getTime()) ? new Date() : parsed;
}
