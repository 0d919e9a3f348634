export * from './adyen-provider.adapter';
export * from './adyen-webhook.factory';
