export * from './braintree-provider.adapter';
export * from './braintree-webhook.factory';
