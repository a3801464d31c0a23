import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { slackConfig, transportConfig } from './config/configuration';
import { validationSchema } from './config/validation.schema';

@Global()
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [slackConfig, transportConfig],
      validationSchema,
      validationOptions: {
        abortEarly: false,
      },
    }),
  ],
  exports: [ConfigModule],
})
export class SharedModule {}
