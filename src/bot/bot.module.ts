import { Module } from '@nestjs/common';
import { BotService } from './bot.service';
import { BuildModule } from '../build/build.module';

@Module({
  providers: [BotService],
  imports: [BuildModule],
})
export class BotModule {}
