import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, LogLevel, ValidationPipe } from '@nestjs/common';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  // Configure logging level
  const logLevel = process.env.LOG_LEVEL || 'log';
  const logLevels: LogLevel[] =
    logLevel === 'debug'
      ? ['log', 'error', 'warn', 'debug', 'verbose']
      : ['log', 'error', 'warn'];

  const app = await NestFactory.create(AppModule, {
    logger: logLevels,
  });
  const port = process.env.PORT || 3000;

  // Enable global validation pipe with transformation
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
      whitelist: true,
      forbidNonWhitelisted: false,
    }),
  );

  app.enableShutdownHooks();

  const logger = new Logger('Bootstrap');
  if (!process.env.SUNSETHUE_API_KEY) {
    logger.warn(
      'SUNSETHUE_API_KEY is not set; forecast lookups will fail until it is configured',
    );
  }

  await app.listen(port);
  logger.log(`Listening on port ${port}`);
}

void bootstrap();
