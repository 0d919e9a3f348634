import * as crypto from 'crypto';
import { SignedWebhook } from '../stripe/stripe-webhook.factory';

/**
 * Braintree Webhook Factory
 * Builds form-encoded, signed Braintree notifications for tests
 */
export class BraintreeWebhookFactory {
  static notificationXml(
    options: {
      kind?: string;
      transactionId?: string;
      customerId?: string;
      amount?: string;
      currency?: string;
      timestamp?: string;
    } = {},
  ): string {
    const currency = options.currency === undefined
      ? '<currency-iso-code>USD</currency-iso-code>'
      : options.currency
        ? `<currency-iso-code>${options.currency}</currency-iso-code>`
        : '';

    return [
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<notification>',
      `<kind>${options.kind ?? 'transaction_settled'}</kind>`,
      `<timestamp type="datetime">${options.timestamp ?? '2024-05-01T10:00:00Z'}</timestamp>`,
      '<subject><transaction>',
      `<id>${options.transactionId ?? 'txn_test_001'}</id>`,
      `<customer-id>${options.customerId ?? 'cus_test_001'}</customer-id>`,
      `<amount>${options.amount ?? '20.00'}</amount>`,
      currency,
      '</transaction></subject>',
      '</notification>',
    ].join('');
  }

  /**
   * Base64-encode the XML, sign it and form-encode both fields
   */
  static sign(
    xml: string,
    privateKey: string,
    options: { publicKey?: string; encode?: boolean } = {},
  ): SignedWebhook {
    const payload = options.encode === false
      ? xml
      : Buffer.from(xml, 'utf8').toString('base64');
    const hash = crypto.createHmac('sha256', privateKey).update(payload).digest('hex');
    const signature = `${options.publicKey ?? 'test-public-key'}|${hash}`;

    const form = new URLSearchParams({ bt_signature: signature, bt_payload: payload });
    return {
      body: Buffer.from(form.toString()),
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      payload: { bt_signature: signature, bt_payload: payload },
    };
  }
}
