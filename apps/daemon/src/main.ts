import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import type { NextFunction, Request, Response } from 'express';
import {
  API_DOCS_PATH,
  API_GLOBAL_PREFIX,
  API_PREFIX_PATH,
  APP_NAME,
  APP_VERSION,
  HTTP_SLOW_REQUEST_THRESHOLD_MS,
} from './app.constants';
import { AppModule } from './app.module';
import { ensureBootstrapDirs } from './bootstrap-env';
import { errorCode } from './lib/fs';
import { DaemonLogger } from './logs/daemon-logger';
import { loadDaemonSettings } from './settings/settings.service';

async function bootstrap() {
  const settings = loadDaemonSettings(process.env);
  await ensureBootstrapDirs(settings.paths);
  const bootstrapLogger = new Logger('Bootstrap');

  process.on('unhandledRejection', (reason) => {
    bootstrapLogger.error(`Unhandled rejection: ${String(reason)}`);
  });
  process.on('uncaughtException', (err) => {
    bootstrapLogger.error(`Uncaught exception: ${err.stack ?? String(err)}`);
    process.exit(1);
  });

  const app = await NestFactory.create(AppModule, {
    logger: new DaemonLogger(settings.logLevel),
  });
  // SIGTERM/SIGINT run beforeApplicationShutdown, which stops the supervisor and drains workers.
  app.enableShutdownHooks();
  app.setGlobalPrefix(API_GLOBAL_PREFIX);

  if (process.env.HTTP_LOGGING === 'true') {
    const httpLogger = new Logger('HTTP');
    app.use((req: Request, res: Response, next: NextFunction) => {
      const start = process.hrtime.bigint();
      res.on('finish', () => {
        const ms = Number(process.hrtime.bigint() - start) / 1e6;
        const status = res.statusCode;
        const msg = `${req.method} ${req.originalUrl || req.url} -> ${status} ${ms.toFixed(0)}ms`;

        if (status >= 500) httpLogger.error(msg);
        else if (status >= 400) httpLogger.warn(msg);
        else if (ms >= HTTP_SLOW_REQUEST_THRESHOLD_MS) httpLogger.warn(`SLOW ${msg}`);
      });
      next();
    });
  }

  if (process.env.SWAGGER_ENABLED === 'true') {
    const config = new DocumentBuilder()
      .setTitle(APP_NAME)
      .setDescription('Status and logs of the aria2 post-processing daemon.')
      .setVersion(APP_VERSION)
      .build();
    const document = SwaggerModule.createDocument(app, config);
    // Swagger routes ignore the global prefix; it is part of API_DOCS_PATH.
    SwaggerModule.setup(API_DOCS_PATH, app, document);
  }

  const { host, port } = settings.http;
  try {
    await app.listen(port, host);
  } catch (err) {
    if (errorCode(err) === 'EADDRINUSE') {
      bootstrapLogger.error(
        `Port ${port} is already in use. Stop the other process or set PORT to a free port.`,
      );
      process.exit(1);
    }
    throw err;
  }

  const url = await app.getUrl().catch(() => `http://${host}:${port}`);
  bootstrapLogger.log(
    `Listening: ${url}${API_PREFIX_PATH} (downloads=${settings.paths.downloadDir}, ended=${settings.paths.endedDir})`,
  );
}

bootstrap().catch((err: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exit(1);
});
