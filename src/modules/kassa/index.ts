/**
 * Kassa NestJS Module
 */

export { KassaModule } from './kassa.module';

export {
  KassaModuleConfig,
  KassaModuleAsyncConfig,
  defaultKassaConfig,
  resolveKassaConfig,
} from './kassa.config';

export * from './constants';

export { WebhookController, HealthController, toHttpException } from './controllers';

export { ConfigurationService } from './services/configuration.service';
export { OutboxProcessor, OutboxRunResult } from './services/outbox.processor';

export { RawBodyInterceptor, readRawBody } from './interceptors/raw-body.interceptor';
