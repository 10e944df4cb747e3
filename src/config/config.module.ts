import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GRADING_SETTINGS, loadGradingSettings } from './grading.settings';

@Global()
@Module({
  providers: [
    {
      provide: GRADING_SETTINGS,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => loadGradingSettings(config),
    },
  ],
  exports: [GRADING_SETTINGS],
})
export class GradingConfigModule {}
