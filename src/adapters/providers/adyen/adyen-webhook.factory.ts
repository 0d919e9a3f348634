import { SignedWebhook } from '../stripe/stripe-webhook.factory';
import { AdyenNotificationItem, AdyenProviderAdapter } from './adyen-provider.adapter';

/**
 * Adyen Webhook Factory
 * Builds signed Adyen notification batches for tests
 */
export class AdyenWebhookFactory {
  static item(options: Partial<AdyenNotificationItem> = {}): AdyenNotificationItem {
    return {
      pspReference: '8815000000000001',
      originalReference: '',
      merchantAccountCode: 'TestMerchant',
      merchantReference: 'order-001',
      value: 2000,
      currency: 'EUR',
      eventCode: 'AUTHORISATION',
      success: 'true',
      eventDate: '2024-05-01T10:00:00.000Z',
      ...options,
      additionalData: {
        'metadata.customer_id': 'cus_test_001',
        ...options.additionalData,
      },
    };
  }

  /**
   * Sign each item with the hex key and wrap them into a notification batch
   */
  static sign(items: AdyenNotificationItem[], hexKey: string): SignedWebhook {
    const signer = new AdyenProviderAdapter({
      tenantId: 'factory',
      values: { hmac_key: hexKey },
    });

    const notificationItems = items.map((item) => ({
      NotificationRequestItem: {
        pspReference: item.pspReference,
        originalReference: item.originalReference,
        merchantAccountCode: item.merchantAccountCode,
        merchantReference: item.merchantReference,
        amount: { value: item.value, currency: item.currency },
        eventCode: item.eventCode,
        success: item.success,
        eventDate: item.eventDate,
        additionalData: {
          ...item.additionalData,
          hmacSignature: signer.sign(item),
        },
      },
    }));

    const payload = { live: 'false', notificationItems };
    return {
      body: Buffer.from(JSON.stringify(payload)),
      headers: { 'content-type': 'application/json' },
      payload,
    };
  }
}
