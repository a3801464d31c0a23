import {
  Classification,
  RandomSource,
} from '@app/shared/types/eightball.types';
import { ResponsePool } from './response-pool';

export const NOT_A_QUESTION_REPLY = "Where's the question?";
export const OPEN_ENDED_REPLY =
  "I'm not a tarot deck. Yes or no questions please.";

export function selectReply(
  classification: Classification,
  pool: ResponsePool,
  rng: RandomSource,
): string {
  switch (classification) {
    case 'not_a_question':
      return NOT_A_QUESTION_REPLY;
    case 'open_ended_question':
      return OPEN_ENDED_REPLY;
    case 'yes_no_question':
      return pool[rng.nextInt(pool.length)];
  }
}
