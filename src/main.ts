import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { DEFAULT_PORT, readIntConfig, readListConfig } from './common/config/app-config';
import { errorMessage, errorStack } from './common/errors';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['error', 'warn', 'debug', 'log', 'verbose'],
    bufferLogs: true,
  });

  const logger = new Logger('Bootstrap');
  const configService = app.get(ConfigService);

  // Every origin, method and header unless CORS_ORIGINS narrows the origins.
  const corsOrigins = readListConfig(configService, 'CORS_ORIGINS');
  app.enableCors({
    origin: corsOrigins.length > 0 ? corsOrigins : true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    credentials: true,
  });

  app.enableShutdownHooks();

  const port = readIntConfig(configService, 'PORT', DEFAULT_PORT);
  const host = '0.0.0.0';

  await app.listen(port, host);

  logger.log(`Application is listening on: ${await app.getUrl()}`);
  logger.debug('Debug logging is enabled');
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`Failed to start: ${errorMessage(error)}`, errorStack(error));
  process.exit(1);
});
