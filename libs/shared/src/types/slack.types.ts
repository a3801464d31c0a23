import { InboundQuery } from './eightball.types';

export type InboundEvent =
  | { kind: 'connecting' }
  | { kind: 'connected' }
  | { kind: 'app_mention'; query: InboundQuery }
  | { kind: 'slash_command'; query: InboundQuery };

export type DispatchResult =
  | { handled: false }
  | { handled: true; reply: string };

export interface SlashCommandResponse {
  text: string;
}

/**
 * Fields of an `app_mention` event the bot reads. Bolt's `AppMentionEvent`
 * is assignable to it.
 */
export interface MentionEvent {
  text?: string;
  user?: string;
  channel: string;
}

/**
 * Fields of a slash command payload the bot reads, whether it arrives over
 * Socket Mode or as a form-encoded POST.
 */
export interface SlashCommandPayload {
  command?: string;
  text: string;
  user_id?: string;
  channel_id?: string;
}
