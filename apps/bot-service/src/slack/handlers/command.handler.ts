import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import {
  SlashCommandPayload,
  SlashCommandResponse,
} from '@app/shared/types/slack.types';
import { SlackService } from '../slack.service';
import { DispatcherService } from '../../dispatcher/dispatcher.service';

export const ASK_COMMAND = '/ask8ball';

/**
 * `/ask8ball` delivered over Socket Mode. The reply travels back in the ack.
 */
@Injectable()
export class CommandHandler implements OnModuleInit {
  private readonly logger = new Logger(CommandHandler.name);

  constructor(
    private readonly slackService: SlackService,
    private readonly dispatcher: DispatcherService,
  ) {}

  onModuleInit(): void {
    const app = this.slackService.getApp();
    if (!app) return;

    app.command(ASK_COMMAND, async ({ command, ack }) => {
      const response = this.handleAsk(command);
      await ack(response ?? undefined);
    });

    this.logger.log(`Slash command registered: ${ASK_COMMAND}`);
  }

  handleAsk(command: SlashCommandPayload): SlashCommandResponse | null {
    const result = this.dispatcher.dispatch({
      kind: 'slash_command',
      query: {
        text: command.text || '',
        userId: command.user_id || '',
        channelId: command.channel_id || '',
      },
    });
    if (!result.handled) return null;

    this.logger.log(`Slash command replying with: ${result.reply}`);
    return { text: result.reply };
  }
}
