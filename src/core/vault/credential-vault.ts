import * as crypto from 'crypto';
import { EncryptedEnvelope } from '../domain/models';
import { EncryptionKeyMissingError, InvalidConfigError } from '../errors';

export const ENVELOPE_VERSION = 1;

const ALGORITHM = 'aes-256-gcm';
const NONCE_BYTES = 12;
const TAG_BYTES = 16;
const RAW_BASE64 = /^[A-Za-z0-9+/]*$/;

/**
 * Credential vault
 *
 * Encrypts per-tenant provider credentials with AES-256-GCM. The key is the
 * SHA-256 digest of an operator-supplied secret, derived once at construction.
 * Envelope fields are unpadded standard base64; the ciphertext carries the
 * GCM tag as its last 16 bytes.
 */
export class CredentialVault {
  private readonly key: Buffer | null;

  constructor(secret?: string) {
    const trimmed = secret?.trim();
    this.key = trimmed
      ? crypto.createHash('sha256').update(trimmed).digest()
      : null;
  }

  hasKey(): boolean {
    return this.key !== null;
  }

  encrypt(values: Record<string, string>): EncryptedEnvelope {
    const key = this.requireKey();
    if (Object.keys(values).length === 0) {
      throw new InvalidConfigError('provider config is empty');
    }

    const nonce = crypto.randomBytes(NONCE_BYTES);
    const cipher = crypto.createCipheriv(ALGORITHM, key, nonce);
    const sealed = Buffer.concat([
      cipher.update(JSON.stringify(values), 'utf8'),
      cipher.final(),
      cipher.getAuthTag(),
    ]);

    return {
      version: ENVELOPE_VERSION,
      nonce: toRawBase64(nonce),
      ciphertext: toRawBase64(sealed),
    };
  }

  /**
   * Decrypt a stored envelope into its key/value map
   */
  decrypt(envelope: unknown): Record<string, string> {
    const key = this.requireKey();
    const { nonce, sealed } = this.readEnvelope(envelope);

    let plaintext: string;
    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, key, nonce);
      decipher.setAuthTag(sealed.subarray(sealed.length - TAG_BYTES));
      plaintext = Buffer.concat([
        decipher.update(sealed.subarray(0, sealed.length - TAG_BYTES)),
        decipher.final(),
      ]).toString('utf8');
    } catch {
      throw new InvalidConfigError('provider config could not be decrypted');
    }

    return parseConfigMap(plaintext);
  }

  private requireKey(): Buffer {
    if (!this.key) {
      throw new EncryptionKeyMissingError();
    }
    return this.key;
  }

  private readEnvelope(envelope: unknown): { nonce: Buffer; sealed: Buffer } {
    if (typeof envelope !== 'object' || envelope === null) {
      throw new InvalidConfigError('provider config envelope is malformed');
    }
    const version = Reflect.get(envelope, 'version');
    const nonce = Reflect.get(envelope, 'nonce');
    const ciphertext = Reflect.get(envelope, 'ciphertext');

    if (version !== ENVELOPE_VERSION) {
      throw new InvalidConfigError(
        `unsupported provider config version: ${String(version)}`,
      );
    }
    if (typeof nonce !== 'string' || typeof ciphertext !== 'string') {
      throw new InvalidConfigError('provider config envelope is malformed');
    }

    const nonceBytes = fromRawBase64(nonce);
    const sealed = fromRawBase64(ciphertext);
    if (nonceBytes.length !== NONCE_BYTES || sealed.length < TAG_BYTES) {
      throw new InvalidConfigError('provider config envelope is malformed');
    }
    return { nonce: nonceBytes, sealed };
  }
}

function toRawBase64(data: Buffer): string {
  return data.toString('base64').replace(/=+$/, '');
}

function fromRawBase64(value: string): Buffer {
  if (!RAW_BASE64.test(value) || value.length % 4 === 1) {
    throw new InvalidConfigError('provider config is not valid base64');
  }
  return Buffer.from(value, 'base64');
}

function parseConfigMap(plaintext: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(plaintext);
  } catch {
    throw new InvalidConfigError('provider config is not valid JSON');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new InvalidConfigError('provider config is not an object');
  }

  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') {
      values[key] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      values[key] = String(value);
    } else {
      throw new InvalidConfigError(`provider config value for ${key} is not a scalar`);
    }
  }

  if (Object.keys(values).length === 0) {
    throw new InvalidConfigError('provider config is empty');
  }
  return values;
}
