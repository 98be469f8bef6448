import { Module } from '@nestjs/common';
import { SettingsModule } from './config/settings.module';
import { BotModule } from './bot/bot.module';

@Module({
  imports: [SettingsModule, BotModule],
})
export class AppModule {}
