import { Classification } from '@app/shared/types/eightball.types';

// Unanchored on the right: "however?" counts as "how".
const OPEN_ENDED_PATTERN = /^(who|what|when|where|why|how|if)/;

export function classifyQuestion(normalizedText: string): Classification {
  if (!normalizedText.endsWith('?')) {
    return 'not_a_question';
  }
  if (OPEN_ENDED_PATTERN.test(normalizedText.toLowerCase())) {
    return 'open_ended_question';
  }
  return 'yes_no_question';
}
