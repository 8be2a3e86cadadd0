import 'reflect-metadata';
import { LogLevel, Logger, ValidationPipe, VersioningType } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import compression from 'compression';
import helmet from 'helmet';
import { AppModule } from './app.module';
import type { AppConfig, LogLevelName } from './config/configuration';

const LEVELS: readonly LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/** The given level and every more severe one. */
function levelsFrom(threshold: LogLevelName): LogLevel[] {
  return LEVELS.slice(0, LEVELS.indexOf(threshold) + 1);
}

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const config = app.get<ConfigService<AppConfig, true>>(ConfigService);
  app.useLogger(levelsFrom(config.get('logLevel', { infer: true })));

  // Security + performance
  app.use(helmet());
  app.use(compression());

  // Global URL prefix and versioning (e.g., /api/v1/...); /metrics stays at the root
  app.setGlobalPrefix('api', { exclude: ['metrics'] });
  app.enableVersioning({ type: VersioningType.URI, defaultVersion: '1' });

  app.enableCors({
    origin: true,
    credentials: true,
  });

  // Strict request validation everywhere
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // strip unknown props
      forbidNonWhitelisted: true,
      transform: true, // auto-transform DTO primitives
    }),
  );

  // Let in-flight retrains and the SQLite handle close on SIGTERM
  app.enableShutdownHooks();

  const port = config.get('port', { infer: true });
  await app.listen(port);
  new Logger('Bootstrap').log(`API listening on http://localhost:${port}/api/v1`);
}

bootstrap().catch((e: unknown) => {
  new Logger('Bootstrap').error(e instanceof Error ? (e.stack ?? e.message) : String(e));
  process.exit(1);
});
