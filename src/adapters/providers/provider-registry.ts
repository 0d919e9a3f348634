import { AdapterRegistry } from '../../core';
import { AdyenProviderAdapter } from './adyen';
import { BraintreeProviderAdapter } from './braintree';
import { StripeAdapterOptions, StripeProviderAdapter } from './stripe';

export interface ProviderRegistryOptions {
  stripe?: StripeAdapterOptions;
}

/**
 * The providers this build supports
 */
export function createProviderRegistry(
  options: ProviderRegistryOptions = {},
): AdapterRegistry {
  return new AdapterRegistry({
    stripe: (config) => new StripeProviderAdapter(config, options.stripe),
    adyen: (config) => new AdyenProviderAdapter(config),
    braintree: (config) => new BraintreeProviderAdapter(config),
  });
}
