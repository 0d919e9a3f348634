import {
  CredentialVault,
  ENVELOPE_VERSION,
  EncryptionKeyMissingError,
  InvalidConfigError,
} from '../../src';

describe('CredentialVault', () => {
  const vault = new CredentialVault('test-secret');

  it('should decrypt what it encrypted', () => {
    const values = { webhook_secret: 'test-webhook-secret', tolerance_seconds: '300' };

    const envelope = vault.encrypt(values);

    expect(vault.decrypt(envelope)).toEqual(values);
  });

  it('should write versioned, unpadded base64 envelopes', () => {
    const envelope = vault.encrypt({ hmac_key: '00ff' });

    expect(envelope.version).toBe(ENVELOPE_VERSION);
    expect(envelope.nonce).toMatch(/^[A-Za-z0-9+/]{16}$/);
    expect(envelope.ciphertext).not.toContain('=');
  });

  it('should use a fresh nonce each time', () => {
    const first = vault.encrypt({ a: '1' });
    const second = vault.encrypt({ a: '1' });

    expect(first.nonce).not.toBe(second.nonce);
    expect(first.ciphertext).not.toBe(second.ciphertext);
  });

  it('should ignore surrounding whitespace in the secret', () => {
    const envelope = vault.encrypt({ a: '1' });

    expect(new CredentialVault('  test-secret  ').decrypt(envelope)).toEqual({ a: '1' });
  });

  it('should fail to decrypt with another secret', () => {
    const envelope = vault.encrypt({ a: '1' });

    expect(() => new CredentialVault('other-secret').decrypt(envelope)).toThrow(
      'provider config could not be decrypted',
    );
  });

  it('should detect a tampered ciphertext', () => {
    const envelope = vault.encrypt({ a: '1' });
    const first = envelope.ciphertext[0] === 'A' ? 'B' : 'A';
    const tampered = { ...envelope, ciphertext: first + envelope.ciphertext.slice(1) };

    expect(() => vault.decrypt(tampered)).toThrow(InvalidConfigError);
  });

  it('should reject unknown envelope versions', () => {
    const envelope = vault.encrypt({ a: '1' });

    expect(() => vault.decrypt({ ...envelope, version: 2 })).toThrow(
      'unsupported provider config version: 2',
    );
  });

  it('should reject envelopes that are not objects', () => {
    expect(() => vault.decrypt('nope')).toThrow('provider config envelope is malformed');
  });

  it('should reject an empty config', () => {
    expect(() => vault.encrypt({})).toThrow('provider config is empty');
  });

  it('should require a key', () => {
    const keyless = new CredentialVault('   ');

    expect(keyless.hasKey()).toBe(false);
    expect(() => keyless.encrypt({ a: '1' })).toThrow(EncryptionKeyMissingError);
    expect(() => keyless.decrypt({})).toThrow(EncryptionKeyMissingError);
  });
});
