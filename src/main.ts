import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';
import { RouterConfigService } from './config/router-config.service.js';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const { port } = app.get(RouterConfigService).get();
  await app.listen(port);
  Logger.log(`Random router listening on :${port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(
    'Failed to start',
    err instanceof Error ? err.stack : String(err),
    'Bootstrap',
  );
  process.exit(1);
});
