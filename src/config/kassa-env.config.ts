import { registerAs } from '@nestjs/config';
import type { KassaModuleConfig } from '../modules/kassa/kassa.config';
import { EnvironmentVariables, validateEnv } from './env.validation';

/**
 * Module config built from validated environment variables
 */
export function kassaConfigFromEnv(env: EnvironmentVariables): KassaModuleConfig {
  return {
    storage: {
      type: env.STORAGE_TYPE,
      options: {
        host: env.DB_HOST,
        port: env.DB_PORT,
        username: env.DB_USERNAME,
        password: env.DB_PASSWORD,
        database: env.DB_NAME,
        poolSize: env.DB_POOL_SIZE,
        logging: env.DB_LOGGING,
        synchronize: env.DB_SYNCHRONIZE,
      },
    },
    encryptionSecret: env.KASSA_CONFIG_SECRET,
    providers: {
      stripe: { toleranceSeconds: env.STRIPE_TOLERANCE_SECONDS },
    },
    outbox: {
      enabled: env.OUTBOX_ENABLED,
      pollIntervalMs: env.OUTBOX_POLL_INTERVAL_MS,
    },
  };
}

export const kassaEnvConfig = registerAs('kassa', () =>
  kassaConfigFromEnv(validateEnv(process.env)),
);
