import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';
import { AppConfigService } from './config/app-config.service.js';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const config = app.get(AppConfigService).get();
  app.useLogger(config.logLevels);
  app.enableShutdownHooks();

  await app.listen(config.port, config.host);
  new Logger('Bootstrap').log(
    `Service request parser v${config.version} listening on ${config.host}:${config.port}`,
  );
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start',
    err instanceof Error ? err.stack : String(err),
  );
  process.exit(1);
});
