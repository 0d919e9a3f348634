import { AdapterConfig } from '../domain/models';
import { ProviderNotFoundError } from '../errors';
import {
  PaymentProviderAdapter,
  PaymentProviderFactory,
} from '../interfaces';

/**
 * Adapter registry - name-keyed lookup from provider to adapter factory.
 * The set is fixed when the registry is built; names are matched trimmed and
 * case-insensitively.
 */
export class AdapterRegistry {
  private readonly factories: ReadonlyMap<string, PaymentProviderFactory>;

  constructor(factories: Record<string, PaymentProviderFactory>) {
    this.factories = new Map(
      Object.entries(factories).map(([name, factory]) => [
        normalizeProvider(name),
        factory,
      ]),
    );
  }

  providerExists(name: string): boolean {
    return this.factories.has(normalizeProvider(name));
  }

  /**
   * Build an adapter for one tenant's decrypted credentials
   */
  newAdapter(name: string, config: AdapterConfig): PaymentProviderAdapter {
    const factory = this.factories.get(normalizeProvider(name));
    if (!factory) {
      throw new ProviderNotFoundError(name);
    }
    return factory(config);
  }

  providers(): string[] {
    return [...this.factories.keys()];
  }
}

export function normalizeProvider(name: string): string {
  return name.trim().toLowerCase();
}
