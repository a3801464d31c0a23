import { Module } from '@nestjs/common';
import { SharedModule } from '@app/shared';
import { SlackHandlersModule } from './slack/handlers/handlers.module';
import { SlashCommandModule } from './http/slash-command.module';

@Module({
  imports: [SharedModule, SlackHandlersModule, SlashCommandModule],
})
export class AppModule {}
