import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

async function bootstrap() {
  // No HTTP server: the bot talks to Telegram by long polling
  const app = await NestFactory.createApplicationContext(AppModule);
  app.enableShutdownHooks();
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('❌ Failed to start:', error);
  process.exit(1);
});
