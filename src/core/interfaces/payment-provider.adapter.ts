import { AdapterConfig, DisputeEvent, PaymentEvent } from '../domain/models';

/**
 * Raw request headers as received by the webhook endpoint
 */
export type WebhookHeaders = Record<string, string | string[] | undefined>;

/**
 * Payment provider adapter - verifies and parses one provider's webhooks.
 * One instance is built per tenant configuration, per verification attempt.
 */
export interface PaymentProviderAdapter {
  /**
   * Provider identifier, lower-case (e.g. 'stripe')
   */
  readonly providerName: string;

  /**
   * Verify the webhook against this tenant's credentials.
   * Throws InvalidSignatureError on mismatch or malformed signature data and
   * InvalidPayloadError when the body cannot be decoded. Resolves otherwise.
   */
  verify(rawBody: Buffer, headers: WebhookHeaders): Promise<void>;

  /**
   * Parse a verified body into a canonical payment event.
   * Throws EventIgnoredError for event types the pipeline does not act on.
   */
  parse(rawBody: Buffer): Promise<PaymentEvent>;
}

/**
 * Optional capability for adapters whose provider also sends dispute events
 */
export interface DisputeCapableAdapter extends PaymentProviderAdapter {
  /**
   * Throws EventIgnoredError when the body is not a dispute event
   */
  parseDispute(rawBody: Buffer): Promise<DisputeEvent>;
}

export function supportsDisputes(
  adapter: PaymentProviderAdapter,
): adapter is DisputeCapableAdapter {
  return (
    'parseDispute' in adapter &&
    typeof adapter.parseDispute === 'function'
  );
}

/**
 * Builds an adapter from decrypted credentials. Throws InvalidConfigError
 * when required credentials are missing or malformed.
 */
export type PaymentProviderFactory = (
  config: AdapterConfig,
) => PaymentProviderAdapter;

/**
 * Case-insensitive header lookup; multi-valued headers yield their first value
 */
export function getHeader(
  headers: WebhookHeaders,
  name: string,
): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) {
      continue;
    }
    return Array.isArray(value) ? value[0] : value;
  }
  return undefined;
}
