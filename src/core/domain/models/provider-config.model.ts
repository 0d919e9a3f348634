/**
 * Encrypted-at-rest credential envelope
 */
export interface EncryptedEnvelope {
  version: number;
  nonce: string;
  ciphertext: string;
}

/**
 * Per-tenant, per-provider webhook credentials as stored
 */
export interface ProviderConfigRecord {
  id: string;
  tenantId: string;
  provider: string;
  encryptedConfig: EncryptedEnvelope;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Decrypted credentials, held in memory for a single verification attempt
 */
export interface AdapterConfig {
  tenantId: string;
  values: Record<string, string>;
}
