import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { ignoredSettings, missingSecrets, type AppConfig } from './config/configuration';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = configureApp(await NestFactory.create(AppModule));
  const config = app.get<ConfigService<AppConfig, true>>(ConfigService);

  // Requests fail with 500 until these are set; say so up front.
  const missing = missingSecrets({
    polygon: config.get('polygon', { infer: true }),
    auth: config.get('auth', { infer: true }),
  });
  for (const name of missing) {
    logger.warn(`${name} is not set; chart requests will fail until it is configured`);
  }

  for (const name of ignoredSettings(process.env)) {
    logger.warn(`${name}=${process.env[name] ?? ''} is not valid; using the default instead`);
  }

  const port = config.get('port', { infer: true });
  await app.listen(port);
  logger.log(
    `Spark chart API listening on http://localhost:${port} (style=${config.get('chart', { infer: true }).style})`,
  );
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error('Failed to start', err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
