import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter } from '@nestjs/platform-fastify';
import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger, ValidationPipe } from '@nestjs/common';
import { AppModule } from './app.module.js';
import { APP_CONFIG } from './config/app.config.js';
import type { AppConfig } from './config/app.config.js';

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), {
    logger: ['error', 'warn', 'log', 'debug', 'verbose'],
  });
  const config = app.get<AppConfig>(APP_CONFIG);

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  const docConfig = new DocumentBuilder()
    .setTitle('Repo Pulse API')
    .setDescription('Monitor GitHub accounts and ingest repository commit history')
    .setVersion('1.0.0')
    .addApiKey({ type: 'apiKey', name: 'X-API-Key', in: 'header' }, 'X-API-Key')
    .build();

  const doc = SwaggerModule.createDocument(app, docConfig);
  SwaggerModule.setup('docs', app, doc);

  await app.listen(config.port, '0.0.0.0');

  const logger = new Logger('Bootstrap');
  logger.log(`Swagger documentation: http://localhost:${config.port}/docs`);
  logger.log(`Environment: ${config.isProduction ? 'production' : 'development'}`);
  logger.log(`Authentication: ${config.isProduction ? 'API key required' : 'X-User-Id header trusted'}`);
}
bootstrap().catch((err: unknown) => {
  console.error('Application failed to start:', err);
  process.exit(1);
});
