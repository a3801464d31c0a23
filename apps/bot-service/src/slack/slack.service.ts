import {
  Injectable,
  Inject,
  OnModuleInit,
  OnApplicationBootstrap,
  OnModuleDestroy,
  Logger,
} from '@nestjs/common';
import { App, SocketModeReceiver } from '@slack/bolt';
import {
  slackConfig,
  transportConfig,
} from '@app/shared/config/configuration';
import { ConfigType } from '@nestjs/config';
import { DispatcherService } from '../dispatcher/dispatcher.service';

@Injectable()
export class SlackService
  implements OnModuleInit, OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(SlackService.name);
  private app: App | null = null;

  constructor(
    @Inject(slackConfig.KEY)
    private readonly slackCfg: ConfigType<typeof slackConfig>,
    @Inject(transportConfig.KEY)
    private readonly transportCfg: ConfigType<typeof transportConfig>,
    private readonly dispatcher: DispatcherService,
  ) {}

  onModuleInit(): void {
    if (!this.transportCfg.socketEnabled) {
      this.logger.log(
        `Socket Mode disabled (TRANSPORT_MODE=${this.transportCfg.mode})`,
      );
      return;
    }

    const receiver = new SocketModeReceiver({
      appToken: this.slackCfg.appToken,
    });
    receiver.client.on('connecting', () => {
      this.dispatcher.dispatch({ kind: 'connecting' });
    });
    receiver.client.on('connected', () => {
      this.dispatcher.dispatch({ kind: 'connected' });
    });

    this.app = new App({
      token: this.slackCfg.botToken,
      receiver,
    });
  }

  // Listeners are registered during onModuleInit; start once all are in place.
  async onApplicationBootstrap(): Promise<void> {
    if (!this.app) return;
    await this.app.start();
    this.logger.log('Slack Bot started (Socket Mode)');
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.app) return;
    await this.app.stop();
    this.logger.log('Slack Bot stopped');
  }

  getApp(): App | null {
    return this.app;
  }

  async postMessage(params: {
    channel: string;
    text: string;
  }): Promise<{ ts?: string }> {
    if (!this.app) {
      throw new Error('Slack app is not running (Socket Mode disabled)');
    }
    const result = await this.app.client.chat.postMessage({
      channel: params.channel,
      text: params.text,
    });
    return { ts: result.ts };
  }
}
