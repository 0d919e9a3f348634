import {
  AuditAction,
  AuditTargetType,
  InvalidConfigError,
  ProviderNotFoundError,
} from '../../src';
import { Pipeline, createPipeline } from './pipeline.fixture';

describe('Provider configuration', () => {
  let pipeline: Pipeline;

  beforeEach(() => {
    pipeline = createPipeline();
  });

  afterEach(() => {
    pipeline.storage.clear();
  });

  describe('upsert', () => {
    it('should store credentials encrypted and active', async () => {
      const record = await pipeline.providerConfigs.upsert(' tenant_a ', 'Stripe', {
        webhook_secret: 'test-secret',
      });

      expect(record.tenantId).toBe('tenant_a');
      expect(record.provider).toBe('stripe');
      expect(record.isActive).toBe(true);
      expect(JSON.stringify(record.encryptedConfig)).not.toContain('test-secret');
      expect(pipeline.vault.decrypt(record.encryptedConfig)).toEqual({
        webhook_secret: 'test-secret',
      });
    });

    it('should audit the changed keys without their values', async () => {
      const record = await pipeline.providerConfigs.upsert('tenant_a', 'braintree', {
        public_key: 'test-public-key',
        private_key: 'test-private-key',
      });

      const [log] = await pipeline.storage.getAuditLogs({
        action: AuditAction.PROVIDER_CONFIG_UPSERTED,
      });
      expect(log.tenantId).toBe('tenant_a');
      expect(log.targetType).toBe(AuditTargetType.PROVIDER_CONFIG);
      expect(log.targetId).toBe(record.id);
      expect(log.metadata).toEqual({
        provider: 'braintree',
        keys: 'private_key,public_key',
      });
    });

    it('should replace credentials and reactivate the same row', async () => {
      const first = await pipeline.providerConfigs.upsert('tenant_a', 'stripe', {
        webhook_secret: 'old-secret',
      });
      await pipeline.providerConfigs.deactivate('tenant_a', 'stripe');

      const second = await pipeline.providerConfigs.upsert('tenant_a', 'stripe', {
        webhook_secret: 'new-secret',
      });

      expect(second.id).toBe(first.id);
      expect(second.isActive).toBe(true);
      expect(pipeline.storage.getAllData().providerConfigs).toHaveLength(1);
      expect(await pipeline.providerConfigs.getDecrypted('tenant_a', 'stripe')).toEqual({
        tenantId: 'tenant_a',
        values: { webhook_secret: 'new-secret' },
      });
    });

    it('should reject unknown providers', async () => {
      await expect(
        pipeline.providerConfigs.upsert('tenant_a', 'paypal', { key: 'test-secret' }),
      ).rejects.toThrow(ProviderNotFoundError);
    });

    it('should reject a blank tenant', async () => {
      await expect(
        pipeline.providerConfigs.upsert('  ', 'stripe', { webhook_secret: 'test-secret' }),
      ).rejects.toThrow('provider config requires a tenant');
    });

    const incomplete: Array<[string, Record<string, string>, string]> = [
      ['stripe', {}, 'provider config is missing webhook_secret'],
      ['adyen', { hmac_key: 'not-hex' }, 'adyen hmac_key is not valid hex'],
      ['braintree', { private_key: ' ' }, 'provider config is missing private_key'],
    ];

    it.each(incomplete)('should reject incomplete %s credentials', async (provider, values, message) => {
      await expect(
        pipeline.providerConfigs.upsert('tenant_a', provider, values),
      ).rejects.toThrow(new InvalidConfigError(message));
      expect(pipeline.storage.getAllData().providerConfigs).toHaveLength(0);
      expect(pipeline.storage.getAllData().auditLogs).toHaveLength(0);
    });
  });

  describe('deactivate', () => {
    it('should return false when nothing is configured', async () => {
      expect(await pipeline.providerConfigs.deactivate('tenant_a', 'stripe')).toBe(false);
      expect(pipeline.storage.getAllData().auditLogs).toHaveLength(0);
    });

    it('should deactivate and audit an existing row', async () => {
      const record = await pipeline.providerConfigs.upsert('tenant_a', 'stripe', {
        webhook_secret: 'test-secret',
      });

      expect(await pipeline.providerConfigs.deactivate('tenant_a', 'STRIPE')).toBe(true);

      expect(await pipeline.storage.listActiveProviderConfigs('stripe')).toHaveLength(0);
      const [log] = await pipeline.storage.getAuditLogs({
        action: AuditAction.PROVIDER_CONFIG_DEACTIVATED,
      });
      expect(log.targetId).toBe(record.id);
      expect(log.metadata).toEqual({ provider: 'stripe' });
    });
  });

  describe('getDecrypted', () => {
    it('should return null for an unconfigured tenant', async () => {
      expect(await pipeline.providerConfigs.getDecrypted('tenant_x', 'stripe')).toBeNull();
    });

    it('should still read a deactivated row', async () => {
      await pipeline.providerConfigs.upsert('tenant_a', 'adyen', {
        hmac_key: '0123456789abcdef0123456789abcdef',
      });
      await pipeline.providerConfigs.deactivate('tenant_a', 'adyen');

      expect(await pipeline.providerConfigs.getDecrypted('tenant_a', 'adyen')).toEqual({
        tenantId: 'tenant_a',
        values: { hmac_key: '0123456789abcdef0123456789abcdef' },
      });
    });
  });
});
