#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { describeListenTarget, listenOn, resolveListenTarget } from './adapters';
import { AppModule } from './app.module';
import { toError } from './core';
import { ConfigurationService, resolveLogLevels } from './modules';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    bodyParser: false,
    abortOnError: false,
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  app.enableShutdownHooks();

  const config = app.get(ConfigurationService);
  const target = resolveListenTarget(config.getListenConfig());

  if (config.isDocsEnabled()) {
    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('hookrelay')
        .setDescription('Runs a configured program for each webhook request')
        .setVersion('0.1.0')
        .addTag('Dispatch', 'Hook endpoints')
        .build(),
    );
    SwaggerModule.setup(config.getDocsPath(), app, document);
  }

  await app.init();
  await listenOn(app.getHttpServer(), target);
  logger.log(`Starting the server on ${describeListenTarget(target)}`);
}

bootstrap().catch((error: unknown) => {
  const failure = toError(error);
  new Logger('Bootstrap').error(`Failed to start the server: ${failure.message}`, failure.stack);
  process.exit(1);
});
