import { Module } from '@nestjs/common';
import { SlackModule } from '../slack.module';
import { DispatcherModule } from '../../dispatcher/dispatcher.module';
import { MentionHandler } from './mention.handler';
import { CommandHandler } from './command.handler';

@Module({
  imports: [SlackModule, DispatcherModule],
  providers: [MentionHandler, CommandHandler],
})
export class SlackHandlersModule {}
