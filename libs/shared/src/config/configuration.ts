import { registerAs } from '@nestjs/config';

export type TransportMode = 'socket' | 'http' | 'hybrid';

function envMode(val: string | undefined): TransportMode {
  if (val === 'socket' || val === 'http') return val;
  return 'hybrid';
}

export const slackConfig = registerAs('slack', () => ({
  botToken: process.env.SLACK_BOT_TOKEN || '',
  appToken: process.env.SLACK_APP_TOKEN || '',
  signingSecret: process.env.SLACK_SIGNING_SECRET || '',
}));

export const transportConfig = registerAs('transport', () => {
  const mode = envMode(process.env.TRANSPORT_MODE);
  return {
    mode,
    socketEnabled: mode === 'socket' || mode === 'hybrid',
    httpEnabled: mode === 'http' || mode === 'hybrid',
    httpPort: parseInt(process.env.HTTP_PORT || '8080', 10),
    slashCommandPath: process.env.SLASH_COMMAND_PATH || '/ask8ball',
    signatureMaxAgeSeconds: parseInt(
      process.env.SIGNATURE_MAX_AGE_SECONDS || '300',
      10,
    ),
  };
});
