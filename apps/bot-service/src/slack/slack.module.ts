import { Module } from '@nestjs/common';
import { DispatcherModule } from '../dispatcher/dispatcher.module';
import { SlackService } from './slack.service';

@Module({
  imports: [DispatcherModule],
  providers: [SlackService],
  exports: [SlackService],
})
export class SlackModule {}
