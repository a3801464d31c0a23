import * as Joi from 'joi';

const SOCKET_MODES = ['socket', 'hybrid'];
const HTTP_MODES = ['http', 'hybrid'];

export const validationSchema = Joi.object({
  TRANSPORT_MODE: Joi.string()
    .valid('socket', 'http', 'hybrid')
    .default('hybrid'),

  // Required - Slack
  SLACK_BOT_TOKEN: Joi.string().pattern(/^xoxb-/).required().messages({
    'any.required':
      'SLACK_BOT_TOKEN is required. Get it from https://api.slack.com/apps',
    'string.pattern.base': 'SLACK_BOT_TOKEN must start with "xoxb-"',
  }),
  SLACK_APP_TOKEN: Joi.string().when('TRANSPORT_MODE', {
    is: Joi.string().valid(...SOCKET_MODES),
    then: Joi.string().pattern(/^xapp-/).required().messages({
      'any.required':
        'SLACK_APP_TOKEN is required for socket and hybrid transport modes.',
      'string.pattern.base': 'SLACK_APP_TOKEN must start with "xapp-"',
    }),
    otherwise: Joi.string().optional().allow(''),
  }),
  SLACK_SIGNING_SECRET: Joi.string().when('TRANSPORT_MODE', {
    is: Joi.string().valid(...HTTP_MODES),
    then: Joi.string().required().messages({
      'any.required':
        'SLACK_SIGNING_SECRET is required for http and hybrid transport modes.',
    }),
    otherwise: Joi.string().optional().allow(''),
  }),

  // Optional - HTTP
  HTTP_PORT: Joi.number().integer().min(1).max(65535).default(8080),
  SLASH_COMMAND_PATH: Joi.string().pattern(/^\//).default('/ask8ball'),
  SIGNATURE_MAX_AGE_SECONDS: Joi.number().integer().min(1).default(300),

  // Optional - Logging
  LOG_LEVEL: Joi.string()
    .valid('debug', 'info', 'warn', 'error')
    .default('info'),
}).options({ allowUnknown: true });
