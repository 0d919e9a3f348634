export { WebhookController, toHttpException, toResponse } from './webhook.controller';
export { HealthController } from './health.controller';
