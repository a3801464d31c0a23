import { Injectable, Logger } from '@nestjs/common';
import {
  DispatchResult,
  InboundEvent,
} from '@app/shared/types/slack.types';
import { EightBallService } from '../eightball/eightball.service';

/**
 * Single entry point shared by the Socket Mode and HTTP adapters.
 * Delivery of the reply stays with the adapter that received the event.
 */
@Injectable()
export class DispatcherService {
  private readonly logger = new Logger(DispatcherService.name);

  constructor(private readonly eightBallService: EightBallService) {}

  dispatch(event: InboundEvent): DispatchResult {
    switch (event.kind) {
      case 'connecting':
        this.logger.log('Connecting to Slack with Socket Mode...');
        return { handled: false };
      case 'connected':
        this.logger.log('Connected to Slack with Socket Mode');
        return { handled: false };
      case 'app_mention':
      case 'slash_command': {
        const { reply } = this.eightBallService.answer(event.query.text);
        this.logger.log(
          `${event.kind} from user=${event.query.userId} channel=${event.query.channelId}: ${reply}`,
        );
        return { handled: true, reply };
      }
      default: {
        const unknown: never = event;
        this.logger.debug(`Ignoring event: ${JSON.stringify(unknown)}`);
        return { handled: false };
      }
    }
  }
}
