// Module
export * from './shared.module';

// Types
export * from './types/eightball.types';
export * from './types/slack.types';

// Config
export * from './config/configuration';
export * from './config/validation.schema';
