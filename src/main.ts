import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { ConfigurationService } from './modules';

const logger = new Logger('Kassa');

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { rawBody: true });
  app.enableShutdownHooks();

  if (app.get(ConfigurationService).isSwaggerEnabled()) {
    const config = new DocumentBuilder()
      .setTitle('Kassa')
      .setDescription(
        'Verifies payment provider webhooks per tenant and posts them to a double-entry ledger.',
      )
      .setVersion('0.1.0')
      .addTag('Ingest', 'Receive and process provider webhooks')
      .addTag('Health', 'Liveness, readiness and pipeline counters')
      .build();

    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api', app, document);
  }

  const port = process.env.PORT ?? 4010;
  await app.listen(port);
  logger.log(`Kassa is running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  logger.error('Kassa failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
