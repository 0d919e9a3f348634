import { Logger } from '@nestjs/common';
import { AuditAction, AuditTargetType } from '../domain/enums';
import { AdapterConfig, ProviderConfigRecord } from '../domain/models';
import { InvalidConfigError, ProviderNotFoundError } from '../errors';
import { StorageAdapter } from '../interfaces';
import { AdapterRegistry, normalizeProvider } from '../registry';
import { CredentialVault } from '../vault';

/**
 * Manages per-tenant webhook credentials. Values are only ever stored
 * encrypted; the audit trail records which keys changed, never their values.
 */
export class ProviderConfigService {
  private readonly logger = new Logger(ProviderConfigService.name);

  constructor(
    private readonly storage: StorageAdapter,
    private readonly registry: AdapterRegistry,
    private readonly vault: CredentialVault,
  ) {}

  /**
   * Validate, encrypt and store credentials, activating the row
   */
  async upsert(
    tenantId: string,
    provider: string,
    values: Record<string, string>,
  ): Promise<ProviderConfigRecord> {
    const name = normalizeProvider(provider);
    if (!this.registry.providerExists(name)) {
      throw new ProviderNotFoundError(provider);
    }
    const tenant = tenantId.trim();
    if (!tenant) {
      throw new InvalidConfigError('provider config requires a tenant');
    }

    // Constructing the adapter rejects missing or malformed credentials
    this.registry.newAdapter(name, { tenantId: tenant, values });
    const encryptedConfig = this.vault.encrypt(values);

    const record = await this.storage.withTransaction(async (tx) => {
      const saved = await tx.upsertProviderConfig({
        tenantId: tenant,
        provider: name,
        encryptedConfig,
        isActive: true,
      });
      await tx.createAuditLog({
        tenantId: tenant,
        action: AuditAction.PROVIDER_CONFIG_UPSERTED,
        targetType: AuditTargetType.PROVIDER_CONFIG,
        targetId: saved.id,
        metadata: {
          provider: name,
          keys: Object.keys(values).sort().join(','),
        },
      });
      return saved;
    });

    this.logger.log(`Stored ${name} configuration for tenant ${tenant}`);
    return record;
  }

  /**
   * Stop routing webhooks to this tenant. Returns false when no row exists.
   */
  async deactivate(tenantId: string, provider: string): Promise<boolean> {
    const name = normalizeProvider(provider);
    const tenant = tenantId.trim();

    return this.storage.withTransaction(async (tx) => {
      const existing = await tx.findProviderConfig(tenant, name);
      if (!existing) {
        return false;
      }
      await tx.setProviderConfigActive(tenant, name, false);
      await tx.createAuditLog({
        tenantId: tenant,
        action: AuditAction.PROVIDER_CONFIG_DEACTIVATED,
        targetType: AuditTargetType.PROVIDER_CONFIG,
        targetId: existing.id,
        metadata: { provider: name },
      });
      return true;
    });
  }

  async getDecrypted(
    tenantId: string,
    provider: string,
  ): Promise<AdapterConfig | null> {
    const tenant = tenantId.trim();
    const record = await this.storage.findProviderConfig(
      tenant,
      normalizeProvider(provider),
    );
    if (!record) {
      return null;
    }
    return { tenantId: tenant, values: this.vault.decrypt(record.encryptedConfig) };
  }
}
