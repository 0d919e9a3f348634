export * from './stripe';
export * from './adyen';
export * from './braintree';
export * from './shared/payload.utils';
export * from './provider-registry';
