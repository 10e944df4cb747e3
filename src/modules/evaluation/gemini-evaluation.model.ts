import { Inject, Injectable } from '@nestjs/common';
import { GenerativeModel, GoogleGenerativeAI } from '@google/generative-ai';
import {
  RejectedOutput,
  TransientFailure,
  errorMessage,
} from '../../common/errors';
import { GRADING_SETTINGS, GradingSettings } from '../../config';
import { classifyGeminiError } from '../../lib/gemini';
import { GradewiseLogger } from '../../lib/logger';
import { EvaluationModel } from './evaluation-model';

@Injectable()
export class GeminiEvaluationModel extends EvaluationModel {
  readonly modelId: string;
  private readonly model: GenerativeModel;

  constructor(
    @Inject(GRADING_SETTINGS) settings: GradingSettings,
    private readonly logger: GradewiseLogger,
  ) {
    super();
    this.logger.setContext(GeminiEvaluationModel.name);
    this.modelId = settings.gemini.model;
    const ai = new GoogleGenerativeAI(settings.gemini.apiKey);
    this.model = ai.getGenerativeModel(
      {
        model: settings.gemini.model,
        generationConfig: {
          responseMimeType: 'application/json',
          temperature: 0.2,
        },
      },
      { timeout: settings.gemini.timeoutMs },
    );
  }

  async generate(prompt: string): Promise<string> {
    try {
      const res = await this.model.generateContent(prompt);
      return res.response.text();
    } catch (err) {
      const message = errorMessage(err);
      this.logger.warn(`AI evaluation call failed: ${message}`);
      if (classifyGeminiError(err) === 'transient') {
        throw new TransientFailure(message, { cause: err });
      }
      throw new RejectedOutput(message, { cause: err });
    }
  }
}
