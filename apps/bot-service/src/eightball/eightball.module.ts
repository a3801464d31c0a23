import { Module } from '@nestjs/common';
import { EightBallService } from './eightball.service';
import { MAGIC_RESPONSES, RESPONSE_POOL } from './response-pool';
import { MathRandomSource, RANDOM_SOURCE } from './random-source';

@Module({
  providers: [
    { provide: RESPONSE_POOL, useValue: MAGIC_RESPONSES },
    { provide: RANDOM_SOURCE, useValue: new MathRandomSource() },
    EightBallService,
  ],
  exports: [EightBallService],
})
export class EightBallModule {}
