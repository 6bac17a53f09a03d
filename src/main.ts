import 'reflect-metadata';
import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { json } from 'express';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { requestIdMiddleware } from './common/middleware/request-id.middleware';
import { INVALID_PAYLOAD_MESSAGE } from './common/constants/error-messages.constants';
import { validateEnv } from './common/config/env.validation';
import { createLogger, logger } from './common/utils/logger';

async function bootstrap(): Promise<void> {
  logger.boot();

  const validatedEnv = validateEnv(process.env);
  const nestLogLevel = validatedEnv.LOG_LEVEL === 'info' ? 'log' : validatedEnv.LOG_LEVEL;
  const app = await NestFactory.create(AppModule, {
    logger: [nestLogLevel, 'warn', 'error'],
  });

  app.use(helmet());
  app.use(json({ limit: '100kb' }));
  app.use(requestIdMiddleware);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: () => new BadRequestException(INVALID_PAYLOAD_MESSAGE),
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableShutdownHooks();

  await app.listen(validatedEnv.PORT);

  createLogger('Bootstrap').info(`Catalog cache service listening on port ${validatedEnv.PORT}`);
}

bootstrap().catch((error: unknown) => {
  createLogger('Bootstrap').error(
    'Failed to bootstrap catalog cache service',
    error instanceof Error ? error : undefined,
  );
  process.exit(1);
});
