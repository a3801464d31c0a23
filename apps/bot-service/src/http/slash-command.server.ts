import {
  Injectable,
  Inject,
  OnApplicationBootstrap,
  OnModuleDestroy,
  Logger,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import express, { Express, Request, Response, NextFunction } from 'express';
import { Server } from 'http';
import { Socket } from 'net';
import {
  slackConfig,
  transportConfig,
} from '@app/shared/config/configuration';
import { DispatcherService } from '../dispatcher/dispatcher.service';
import { createSlashCommandRouter } from './slash-command.routes';

@Injectable()
export class SlashCommandServer
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(SlashCommandServer.name);
  private server: Server | null = null;
  private readonly openSockets = new Set<Socket>();

  constructor(
    @Inject(slackConfig.KEY)
    private readonly slackCfg: ConfigType<typeof slackConfig>,
    @Inject(transportConfig.KEY)
    private readonly transportCfg: ConfigType<typeof transportConfig>,
    private readonly dispatcher: DispatcherService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (!this.transportCfg.httpEnabled) {
      this.logger.log(
        `HTTP slash commands disabled (TRANSPORT_MODE=${this.transportCfg.mode})`,
      );
      return;
    }
    await this.listen(this.transportCfg.httpPort);
  }

  async onModuleDestroy(): Promise<void> {
    await this.close();
  }

  createApp(): Express {
    const app = express();
    app.disable('x-powered-by');

    app.use(
      createSlashCommandRouter({
        path: this.transportCfg.slashCommandPath,
        signingSecret: this.slackCfg.signingSecret,
        maxAgeSeconds: this.transportCfg.signatureMaxAgeSeconds,
        dispatch: (event) => this.dispatcher.dispatch(event),
      }),
    );

    app.use((_req: Request, res: Response) => {
      res.status(404).type('text/plain').send('Not found');
    });

    // Body parser failures (oversized or undecodable payloads)
    app.use(
      (err: Error, req: Request, res: Response, _next: NextFunction) => {
        this.logger.warn(
          `Error reading request body on ${req.path}: ${err.message}`,
        );
        res.status(400).type('text/plain').send('Bad request');
      },
    );

    return app;
  }

  /**
   * Starts listening and resolves with the bound port (useful with port 0).
   */
  listen(port: number, host = '0.0.0.0'): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      const server = this.createApp().listen(port, host);

      server.on('connection', (socket: Socket) => {
        this.openSockets.add(socket);
        socket.on('close', () => this.openSockets.delete(socket));
      });

      server.once('listening', () => {
        this.server = server;
        const address = server.address();
        const bound =
          typeof address === 'object' && address !== null ? address.port : port;
        this.logger.log(
          `Starting HTTP server on :${bound} (${this.transportCfg.slashCommandPath})`,
        );
        resolve(bound);
      });

      server.once('error', (err: NodeJS.ErrnoException) => {
        if (err.code === 'EADDRINUSE') {
          reject(
            new Error(
              `Port ${port} is already in use. Set HTTP_PORT to a free port.`,
            ),
          );
        } else {
          reject(err);
        }
      });
    });
  }

  close(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;

    for (const socket of this.openSockets) {
      socket.destroy();
    }
    this.openSockets.clear();

    return new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        this.logger.log('HTTP server stopped');
        resolve();
      });
    });
  }
}
