import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { logLevelsUpTo, parseEnv } from './config/env.validation';

async function bootstrap() {
  const env = parseEnv(process.env);
  const app = await NestFactory.create(AppModule, { logger: logLevelsUpTo(env.LOG_LEVEL) });

  app.enableCors();
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  await app.listen(env.PORT);
  Logger.log(`Listening on port ${env.PORT} (vector index: ${env.VECTOR_INDEX})`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.stack ?? error.message : String(error), 'Bootstrap');
  process.exit(1);
});
