import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import chalk from 'chalk';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { APP_DEFAULTS } from './config/app.config';
import { resolveLogLevels } from './logger/log-levels';

const PORT = Number(process.env.PORT) || APP_DEFAULTS.port;

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  configureApp(app);
  app.enableShutdownHooks();
  await app.listen(PORT);
  console.log(
    chalk.green(`EduSense API is running on :${PORT} / ${new Date().toISOString()}`),
  );
}

bootstrap().catch((e: unknown) => {
  new Logger('Bootstrap').error(
    'EduSense API failed to start',
    e instanceof Error ? e.stack : String(e),
  );
  process.exit(1);
});
