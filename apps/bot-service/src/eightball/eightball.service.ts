import { Injectable, Inject, Logger } from '@nestjs/common';
import { Answer, RandomSource } from '@app/shared/types/eightball.types';
import { RESPONSE_POOL, ResponsePool } from './response-pool';
import { RANDOM_SOURCE } from './random-source';
import { normalizeQuery } from './query-normalizer';
import { classifyQuestion } from './question-classifier';
import { selectReply } from './reply-selector';

@Injectable()
export class EightBallService {
  private readonly logger = new Logger(EightBallService.name);

  constructor(
    @Inject(RESPONSE_POOL)
    private readonly pool: ResponsePool,
    @Inject(RANDOM_SOURCE)
    private readonly rng: RandomSource,
  ) {}

  answer(rawText: string): Answer {
    const question = normalizeQuery(rawText);
    const classification = classifyQuestion(question);
    const reply = selectReply(classification, this.pool, this.rng);
    this.logger.debug(`Classified "${question}" as ${classification}`);
    return { question, classification, reply };
  }
}
