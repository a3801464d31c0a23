import { Router, Request, Response, NextFunction, raw } from 'express';
import { Logger } from '@nestjs/common';
import { DispatchResult, InboundEvent } from '@app/shared/types/slack.types';
import { verifySlackSignature } from './signature.verifier';

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

export interface SlashCommandRouterOptions {
  path: string;
  signingSecret: string;
  maxAgeSeconds: number;
  dispatch: (event: InboundEvent) => DispatchResult;
  now?: () => number;
}

function reject(res: Response, status: number, message: string): void {
  res.status(status).type('text/plain').send(message);
}

/**
 * Router for the slash command webhook. Stages run in order and each
 * failure is logged with the stage name: method, body, signature, payload,
 * serialization.
 */
export function createSlashCommandRouter(
  options: SlashCommandRouterOptions,
): Router {
  const logger = new Logger('SlashCommandRouter');
  const now = options.now ?? Date.now;
  const router = Router();

  const requirePost = (req: Request, res: Response, next: NextFunction) => {
    if (req.method !== 'POST') {
      logger.warn(`Rejected ${req.method} ${req.path}: method not allowed`);
      res.setHeader('Allow', 'POST');
      reject(res, 405, 'Method not allowed');
      return;
    }
    next();
  };

  router.all(
    options.path,
    requirePost,
    // Raw bytes, so the signed payload does not depend on the declared charset.
    raw({ type: FORM_CONTENT_TYPE }),
    (req: Request, res: Response) => {
      const rawBody: unknown = req.body;
      if (!Buffer.isBuffer(rawBody)) {
        logger.warn(
          `Error reading request body: expected ${FORM_CONTENT_TYPE}, got ${req.get('Content-Type') ?? 'none'}`,
        );
        reject(res, 400, 'Bad request');
        return;
      }
      const body = rawBody.toString('utf8');

      const verification = verifySlackSignature(
        {
          signature: req.get('X-Slack-Signature'),
          timestamp: req.get('X-Slack-Request-Timestamp'),
          body,
        },
        options.signingSecret,
        options.maxAgeSeconds,
        now(),
      );
      if (!verification.valid) {
        logger.warn(`Error verifying signature: ${verification.error}`);
        if (verification.reason === 'mismatch') {
          reject(res, 403, 'Forbidden');
        } else {
          reject(res, 400, 'Bad request');
        }
        return;
      }

      const params = new URLSearchParams(body);
      const question = params.get('text');
      if (question === null) {
        logger.warn('Error parsing slash command: missing "text" field');
        reject(res, 400, 'Bad request');
        return;
      }

      const result = options.dispatch({
        kind: 'slash_command',
        query: {
          text: question,
          userId: params.get('user_id') ?? '',
          channelId: params.get('channel_id') ?? '',
        },
      });
      if (!result.handled) {
        logger.error('Slash command was not handled by the dispatcher');
        reject(res, 500, 'Internal server error');
        return;
      }

      logger.log(`Slash command replying with: ${result.reply}`);

      let payload: string;
      try {
        payload = JSON.stringify({ text: result.reply });
      } catch (err) {
        logger.error(`Error marshaling response: ${(err as Error).message}`);
        reject(res, 500, 'Internal server error');
        return;
      }

      res.status(200).type('application/json').send(payload);
    },
  );

  return router;
}
