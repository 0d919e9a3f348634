import {
  AdyenWebhookFactory,
  BraintreeWebhookFactory,
  InvalidConfigError,
  InvalidCustomerError,
  InvalidPayloadError,
  InvalidSignatureError,
  ProviderNotFoundError,
  StripeWebhookFactory,
  isStructuredBody,
} from '../../src';
import { Pipeline, STRIPE_NOW, createPipeline } from './pipeline.fixture';

describe('Webhook ingestion', () => {
  const timestamp = Math.floor(STRIPE_NOW.getTime() / 1000);
  let pipeline: Pipeline;

  function signedPayment(secret: string, eventId = 'evt_1') {
    return StripeWebhookFactory.sign(
      StripeWebhookFactory.paymentIntentSucceeded({ eventId, amount: 2000, customerId: 'cus_1' }),
      secret,
      { timestamp },
    );
  }

  beforeEach(async () => {
    pipeline = createPipeline();
    await pipeline.providerConfigs.upsert('tenant_a', 'stripe', { webhook_secret: 'secret-a' });
    await pipeline.providerConfigs.upsert('tenant_b', 'stripe', { webhook_secret: 'secret-b' });
  });

  afterEach(() => {
    pipeline.storage.clear();
  });

  describe('Tenant resolution', () => {
    it('should attribute the event to the tenant whose secret verifies it', async () => {
      const webhook = signedPayment('secret-b');

      const outcome = await pipeline.ingestion.ingestWebhook('stripe', webhook.body, webhook.headers);

      expect(outcome).toEqual({
        outcome: 'processed',
        kind: 'payment',
        tenantId: 'tenant_b',
        provider: 'stripe',
        providerEventId: 'evt_1',
      });
      const [record] = pipeline.storage.getAllData().paymentEvents;
      expect(record.tenantId).toBe('tenant_b');
      expect(record.customerId).toBe('cus_1');
    });

    it('should match the provider name case-insensitively', async () => {
      const webhook = signedPayment('secret-a');

      const outcome = await pipeline.ingestion.ingestWebhook(' Stripe ', webhook.body, webhook.headers);

      expect(outcome.tenantId).toBe('tenant_a');
      expect(outcome.provider).toBe('stripe');
    });

    it('should reject a webhook no tenant can verify', async () => {
      const webhook = signedPayment('unknown-secret');

      await expect(
        pipeline.ingestion.ingestWebhook('stripe', webhook.body, webhook.headers),
      ).rejects.toThrow('no active configuration verified the webhook');
      expect(pipeline.storage.getAllData().paymentEvents).toHaveLength(0);
    });

    it('should reject a body changed after signing', async () => {
      const webhook = signedPayment('secret-a');
      const tampered = Buffer.from(webhook.body.toString('utf8').replace('2000', '2001'));

      await expect(
        pipeline.ingestion.ingestWebhook('stripe', tampered, webhook.headers),
      ).rejects.toThrow(InvalidSignatureError);
    });

    it('should skip deactivated configurations', async () => {
      await pipeline.providerConfigs.deactivate('tenant_a', 'stripe');
      const webhook = signedPayment('secret-a');

      await expect(
        pipeline.ingestion.ingestWebhook('stripe', webhook.body, webhook.headers),
      ).rejects.toThrow(InvalidSignatureError);
    });

    it('should propagate configuration failures instead of trying the next tenant', async () => {
      await pipeline.storage.upsertProviderConfig({
        tenantId: 'tenant_a',
        provider: 'stripe',
        encryptedConfig: { version: 1, nonce: 'AAAAAAAAAAAAAAAA', ciphertext: 'AAAAAAAAAAAAAAAAAAAAAA' },
        isActive: true,
      });
      const webhook = signedPayment('secret-b');

      await expect(
        pipeline.ingestion.ingestWebhook('stripe', webhook.body, webhook.headers),
      ).rejects.toThrow(InvalidConfigError);
    });
  });

  describe('Rejections', () => {
    it('should reject unknown providers', async () => {
      await expect(
        pipeline.ingestion.ingestWebhook('paypal', Buffer.from('{}'), {}),
      ).rejects.toThrow('payment provider not found: paypal');
    });

    it('should reject a provider no tenant has configured', async () => {
      await expect(
        pipeline.ingestion.ingestWebhook('adyen', Buffer.from('{"live":"false"}'), {}),
      ).rejects.toThrow(ProviderNotFoundError);
    });

    it('should reject bodies that are neither JSON objects nor forms', async () => {
      await expect(
        pipeline.ingestion.ingestWebhook('stripe', Buffer.from('[1,2]'), {}),
      ).rejects.toThrow(InvalidPayloadError);
      await expect(
        pipeline.ingestion.ingestWebhook('stripe', Buffer.from(''), {}),
      ).rejects.toThrow(InvalidPayloadError);
    });

    it('should surface validation failures from a verified event', async () => {
      const payload = StripeWebhookFactory.paymentIntentSucceeded({ eventId: 'evt_x' });
      const object = {
        id: 'pi_x',
        amount: 100,
        currency: 'usd',
        metadata: {},
      };
      const webhook = StripeWebhookFactory.sign(
        { ...payload, data: { object } },
        'secret-a',
        { timestamp },
      );

      await expect(
        pipeline.ingestion.ingestWebhook('stripe', webhook.body, webhook.headers),
      ).rejects.toThrow(InvalidCustomerError);
    });
  });

  describe('Outcomes', () => {
    it('should acknowledge a redelivered event as duplicate', async () => {
      const webhook = signedPayment('secret-a');
      await pipeline.ingestion.ingestWebhook('stripe', webhook.body, webhook.headers);

      const outcome = await pipeline.ingestion.ingestWebhook('stripe', webhook.body, webhook.headers);

      expect(outcome).toEqual({
        outcome: 'duplicate',
        kind: 'payment',
        tenantId: 'tenant_a',
        provider: 'stripe',
        providerEventId: 'evt_1',
      });
      expect(pipeline.storage.getAllData().ledgerEntries).toHaveLength(1);
    });

    it('should report one concurrent redelivery as duplicate', async () => {
      pipeline = createPipeline({ simulateLatency: true, latencyMs: 2 });
      await pipeline.providerConfigs.upsert('tenant_a', 'stripe', { webhook_secret: 'secret-a' });
      const webhook = signedPayment('secret-a');

      const outcomes = await Promise.all([
        pipeline.ingestion.ingestWebhook('stripe', webhook.body, webhook.headers),
        pipeline.ingestion.ingestWebhook('stripe', webhook.body, webhook.headers),
      ]);

      expect(outcomes.map((outcome) => outcome.outcome).sort()).toEqual([
        'duplicate',
        'processed',
      ]);
      expect(pipeline.storage.getAllData().ledgerEntries).toHaveLength(1);
    });

    it('should ignore event types the pipeline does not handle', async () => {
      const webhook = StripeWebhookFactory.sign(
        { id: 'evt_c', type: 'customer.created', data: { object: { id: 'cus_1' } } },
        'secret-a',
        { timestamp },
      );

      const outcome = await pipeline.ingestion.ingestWebhook('stripe', webhook.body, webhook.headers);

      expect(outcome).toEqual({ outcome: 'ignored', tenantId: 'tenant_a', provider: 'stripe' });
    });

    it('should route Stripe disputes to the dispute processor', async () => {
      const webhook = StripeWebhookFactory.sign(
        StripeWebhookFactory.dispute('charge.dispute.funds_withdrawn', {
          eventId: 'evt_d1',
          disputeId: 'dp_1',
        }),
        'secret-a',
        { timestamp },
      );

      const outcome = await pipeline.ingestion.ingestWebhook('stripe', webhook.body, webhook.headers);

      expect(outcome).toEqual({
        outcome: 'processed',
        kind: 'dispute',
        tenantId: 'tenant_a',
        provider: 'stripe',
        providerEventId: 'evt_d1',
      });
      const [dispute] = pipeline.storage.getAllData().disputes;
      expect(dispute.providerDisputeId).toBe('dp_1');
      expect(dispute.amount).toBe(1200);
    });

    it('should ingest Adyen notifications', async () => {
      const hexKey = '0123456789abcdef0123456789abcdef';
      await pipeline.providerConfigs.upsert('tenant_a', 'adyen', { hmac_key: hexKey });
      const webhook = AdyenWebhookFactory.sign([AdyenWebhookFactory.item()], hexKey);

      const outcome = await pipeline.ingestion.ingestWebhook('adyen', webhook.body, webhook.headers);

      expect(outcome).toEqual({
        outcome: 'processed',
        kind: 'payment',
        tenantId: 'tenant_a',
        provider: 'adyen',
        providerEventId: '8815000000000001_AUTHORISATION',
      });
    });

    it('should ingest Braintree form notifications', async () => {
      await pipeline.providerConfigs.upsert('tenant_b', 'braintree', {
        private_key: 'test-private-key',
      });
      const webhook = BraintreeWebhookFactory.sign(
        BraintreeWebhookFactory.notificationXml({ transactionId: 'txn_1' }),
        'test-private-key',
      );

      const outcome = await pipeline.ingestion.ingestWebhook(
        'braintree',
        webhook.body,
        webhook.headers,
      );

      expect(outcome).toEqual({
        outcome: 'processed',
        kind: 'payment',
        tenantId: 'tenant_b',
        provider: 'braintree',
        providerEventId: 'txn_1_transaction_settled',
      });
    });
  });
});

describe('isStructuredBody', () => {
  it.each([
    ['{"id":"evt_1"}', true],
    ['  {"a":1}  ', true],
    ['bt_signature=a&bt_payload=b', true],
    ['a=1', true],
    ['[1,2]', false],
    ['"text"', false],
    ['42', false],
    ['=value', false],
    ['hello', false],
    ['', false],
  ])('should classify %j', (body, expected) => {
    expect(isStructuredBody(Buffer.from(body))).toBe(expected);
  });
});
