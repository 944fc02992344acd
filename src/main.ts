import 'reflect-metadata';
import 'dotenv/config';
import { Logger, type LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module.js';
import { loadConfig, REQUIRED_ENV_VARS } from './config/app-config.service.js';

const PRODUCTION_LOG_LEVELS: LogLevel[] = ['log', 'warn', 'error', 'fatal'];
const DEFAULT_LOG_LEVELS: LogLevel[] = [...PRODUCTION_LOG_LEVELS, 'debug', 'verbose'];

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const missing = REQUIRED_ENV_VARS.filter((name) => !process.env[name]);
  if (missing.length > 0) {
    logger.error(`Missing required environment variables: ${missing.join(', ')}`);
    process.exit(1);
  }

  const config = loadConfig();
  const app = await NestFactory.create(AppModule, {
    logger:
      config.environment === 'production' ? PRODUCTION_LOG_LEVELS : DEFAULT_LOG_LEVELS,
  });
  app.enableCors();
  app.enableShutdownHooks();

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Datagotchi API')
      .setDescription('Digital pets fed with data: pets, storage, search, games')
      .setVersion('0.1.0')
      .addBearerAuth()
      .build(),
  );
  SwaggerModule.setup('docs', app, document, { jsonDocumentUrl: 'openapi.json' });

  await app.listen(config.port, '0.0.0.0');
  logger.log(`Listening on :${config.port} (${config.environment})`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(`Startup failed: ${String(err)}`);
  process.exit(1);
});
