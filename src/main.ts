import 'reflect-metadata';
import { ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { json } from 'express';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { validateEnv, type AppEnv } from './common/config/env.validation';
import { createLogger, logger } from './common/utils/logger';
import { buildCorsOriginHandler } from './common/http/cors-policy';
import { REQUEST_ID_HEADER, requestIdMiddleware } from './common/middleware/request-id.middleware';

async function bootstrap(): Promise<void> {
  logger.boot();

  const validatedEnv = validateEnv(process.env);
  const nestLogLevel = validatedEnv.LOG_LEVEL === 'info' ? 'log' : validatedEnv.LOG_LEVEL;
  const app = await NestFactory.create(AppModule, {
    logger: [nestLogLevel, 'warn', 'error'],
  });

  app.use(helmet());

  app.use(json({ limit: '2mb' }));

  app.use(requestIdMiddleware);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());

  configureCors(app, validatedEnv);

  await app.listen(validatedEnv.PORT);

  createLogger('Bootstrap').info(`Inventory allocation service listening on port ${validatedEnv.PORT}`);
}

function configureCors(app: Awaited<ReturnType<typeof NestFactory.create>>, env: AppEnv): void {
  createLogger('Bootstrap').info('cors_configuration', {
    event: 'cors_configuration',
    cors_mode: env.NODE_ENV === 'production' ? 'allow_list' : 'permissive',
    allowedOriginsCount: env.ALLOWED_ORIGINS.length,
  });

  app.enableCors({
    origin: buildCorsOriginHandler(env),
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', REQUEST_ID_HEADER],
    exposedHeaders: [REQUEST_ID_HEADER, 'Content-Disposition'],
    credentials: true,
  });
}

bootstrap().catch((error: unknown) => {
  createLogger('Bootstrap').error(
    'Failed to bootstrap inventory allocation service',
    error instanceof Error ? error : undefined,
  );
  process.exit(1);
});
