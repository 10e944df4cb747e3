import { Module } from '@nestjs/common';
import { EvaluationClient } from './evaluation-client.service';
import { EvaluationModel } from './evaluation-model';
import { GeminiEvaluationModel } from './gemini-evaluation.model';

@Module({
  providers: [
    EvaluationClient,
    { provide: EvaluationModel, useClass: GeminiEvaluationModel },
  ],
  exports: [EvaluationClient],
})
export class EvaluationModule {}
