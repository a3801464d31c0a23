import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { MentionEvent } from '@app/shared/types/slack.types';
import { SlackService } from '../slack.service';
import { DispatcherService } from '../../dispatcher/dispatcher.service';

@Injectable()
export class MentionHandler implements OnModuleInit {
  private readonly logger = new Logger(MentionHandler.name);

  constructor(
    private readonly slackService: SlackService,
    private readonly dispatcher: DispatcherService,
  ) {}

  onModuleInit(): void {
    const app = this.slackService.getApp();
    if (!app) return;

    // Bolt acks every Events API envelope before listeners run.
    app.event('app_mention', async ({ event }) => {
      await this.handleMention(event);
    });

    this.logger.log('app_mention event listener registered');
  }

  async handleMention(event: MentionEvent): Promise<void> {
    const channel = event.channel;
    const result = this.dispatcher.dispatch({
      kind: 'app_mention',
      query: {
        text: event.text || '',
        userId: event.user || '',
        channelId: channel,
      },
    });
    if (!result.handled) return;

    try {
      await this.slackService.postMessage({ channel, text: result.reply });
    } catch (err) {
      this.logger.error(
        `Failed to post reply to channel=${channel}: ${(err as Error).message}`,
      );
    }
  }
}
