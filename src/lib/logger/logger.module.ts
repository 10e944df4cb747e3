import { Global, Module } from '@nestjs/common';

import { GradewiseLogger } from './logger';

@Global()
@Module({ providers: [GradewiseLogger], exports: [GradewiseLogger] })
export class LoggerModule {}
