export type Classification =
  | 'not_a_question'
  | 'open_ended_question'
  | 'yes_no_question';

export interface InboundQuery {
  text: string;
  userId: string;
  channelId: string;
}

export interface Answer {
  question: string;
  classification: Classification;
  reply: string;
}

/**
 * Uniform integer source shared by every request in the process.
 */
export interface RandomSource {
  /** Returns an integer in `[0, bound)`. */
  nextInt(bound: number): number;
}
