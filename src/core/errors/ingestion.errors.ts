/**
 * How the webhook endpoint and callers should treat a failure
 */
export type ErrorCategory =
  | 'signature'
  | 'configuration'
  | 'validation'
  | 'skip'
  | 'duplicate'
  | 'ledger';

/**
 * Base class for every failure the ingestion pipeline raises on purpose
 */
export abstract class IngestionError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Signature / authentication

export class InvalidSignatureError extends IngestionError {
  readonly category = 'signature';

  constructor(message = 'invalid webhook signature') {
    super(message);
  }
}

export class InvalidPayloadError extends IngestionError {
  readonly category = 'signature';

  constructor(message = 'invalid webhook payload') {
    super(message);
  }
}

// Configuration

export class InvalidConfigError extends IngestionError {
  readonly category = 'configuration';

  constructor(message = 'invalid provider configuration') {
    super(message);
  }
}

export class EncryptionKeyMissingError extends IngestionError {
  readonly category = 'configuration';

  constructor(message = 'config encryption key is not configured') {
    super(message);
  }
}

export class ProviderNotFoundError extends IngestionError {
  readonly category = 'configuration';

  constructor(public readonly provider: string) {
    super(`payment provider not found: ${provider}`);
  }
}

// Business validation

export class InvalidCustomerError extends IngestionError {
  readonly category = 'validation';

  constructor(message = 'event has no resolvable customer') {
    super(message);
  }
}

export class InvalidCurrencyError extends IngestionError {
  readonly category = 'validation';

  constructor(message = 'event currency is missing') {
    super(message);
  }
}

export class InvalidAmountError extends IngestionError {
  readonly category = 'validation';

  constructor(message = 'event amount is invalid') {
    super(message);
  }
}

export class InvalidEventError extends IngestionError {
  readonly category = 'validation';

  constructor(message = 'event is invalid') {
    super(message);
  }
}

// Signals

/**
 * The provider sent an event type the pipeline does not act on
 */
export class EventIgnoredError extends IngestionError {
  readonly category = 'skip';

  constructor(public readonly eventType = '') {
    super(eventType ? `event ignored: ${eventType}` : 'event ignored');
  }
}

/**
 * The event was already settled; acknowledge without reprocessing
 */
export class EventAlreadyProcessedError extends IngestionError {
  readonly category = 'duplicate';

  constructor(
    public readonly provider: string,
    public readonly providerEventId: string,
  ) {
    super(`event already processed: ${provider}/${providerEventId}`);
  }
}

// Ledger

/**
 * Unbalanced lines, unknown direction or account, or a malformed header
 */
export class LedgerInvariantError extends IngestionError {
  readonly category = 'ledger';

  constructor(message: string) {
    super(message);
  }
}

export function isIngestionError(error: unknown): error is IngestionError {
  return error instanceof IngestionError;
}
