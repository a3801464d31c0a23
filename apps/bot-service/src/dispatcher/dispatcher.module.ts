import { Module } from '@nestjs/common';
import { EightBallModule } from '../eightball/eightball.module';
import { DispatcherService } from './dispatcher.service';

@Module({
  imports: [EightBallModule],
  providers: [DispatcherService],
  exports: [DispatcherService],
})
export class DispatcherModule {}
