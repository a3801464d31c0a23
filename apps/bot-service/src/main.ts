import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, LogLevel } from '@nestjs/common';
import { existsSync } from 'fs';
import { join } from 'path';

const SHUTDOWN_TIMEOUT_MS = 10000;

const LOG_LEVELS: Record<string, LogLevel[]> = {
  debug: ['error', 'warn', 'log', 'debug'],
  info: ['error', 'warn', 'log'],
  warn: ['error', 'warn'],
  error: ['error'],
};

export function resolveLogLevels(level: string | undefined): LogLevel[] {
  return LOG_LEVELS[level ?? 'info'] ?? LOG_LEVELS.info;
}

type ExitFn = (code: number) => void;

const exitProcess: ExitFn = (code) => process.exit(code);

export async function bootstrap(exit: ExitFn = exitProcess): Promise<void> {
  const logger = new Logger('BotService');

  if (!existsSync(join(process.cwd(), '.env'))) {
    logger.log('No .env file found. Using environment variables.');
  }

  // Loaded lazily so a ConfigModule validation error rejects this promise
  // instead of throwing while main.ts itself is being loaded.
  const { AppModule } = await import('./app.module');

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
    abortOnError: false,
  });

  logger.log('Bot service started');

  const shutdown = async () => {
    logger.log('Shutting down...');
    const closePromise = app.close();
    const timeoutPromise = new Promise<never>((_, reject) =>
      setTimeout(
        () => reject(new Error('Shutdown timeout')),
        SHUTDOWN_TIMEOUT_MS,
      ),
    );
    try {
      await Promise.race([closePromise, timeoutPromise]);
      exit(0);
    } catch (err) {
      logger.error(`Shutdown error: ${(err as Error).message}`);
      exit(1);
    }
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

/**
 * Runs the bot; any startup failure (including invalid configuration) is
 * logged and ends the process with status 1.
 */
export async function main(exit: ExitFn = exitProcess): Promise<void> {
  try {
    await bootstrap(exit);
  } catch (err) {
    new Logger('BotService').error(
      `Fatal startup error: ${(err as Error).message}`,
    );
    exit(1);
  }
}

if (require.main === module) {
  void main();
}
