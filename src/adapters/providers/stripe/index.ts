export * from './stripe-provider.adapter';
export * from './stripe-webhook.factory';
