import { Module } from '@nestjs/common';
import { DispatcherModule } from '../dispatcher/dispatcher.module';
import { SlashCommandServer } from './slash-command.server';

@Module({
  imports: [DispatcherModule],
  providers: [SlashCommandServer],
  exports: [SlashCommandServer],
})
export class SlashCommandModule {}
