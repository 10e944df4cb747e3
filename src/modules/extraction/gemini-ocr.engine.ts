import { Inject, Injectable } from '@nestjs/common';
import {
  GenerativeModel,
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
} from '@google/generative-ai';
import {
  PermanentInputFailure,
  RejectedOutput,
  TransientFailure,
  errorMessage,
} from '../../common/errors';
import { GRADING_SETTINGS, GradingSettings } from '../../config';
import { classifyGeminiError } from '../../lib/gemini';
import { GradewiseLogger } from '../../lib/logger';
import { OcrEngine } from './ocr-engine';

const TRANSCRIBE_PROMPT = `You are transcribing a student's written assignment.
Return ONLY the text exactly as written, preserving paragraphs and line breaks.
Do not correct spelling or grammar, do not summarise and do not add commentary.
If the page contains no readable writing, return an empty response.`.trim();

/** OCR through Gemini's multimodal input (images and scanned PDFs). */
@Injectable()
export class GeminiOcrEngine extends OcrEngine {
  private readonly model: GenerativeModel;

  constructor(
    @Inject(GRADING_SETTINGS) settings: GradingSettings,
    private readonly logger: GradewiseLogger,
  ) {
    super();
    this.logger.setContext(GeminiOcrEngine.name);
    const ai = new GoogleGenerativeAI(settings.gemini.apiKey);
    this.model = ai.getGenerativeModel(
      { model: settings.gemini.model, generationConfig: { temperature: 0 } },
      { timeout: settings.ocr.timeoutMs },
    );
  }

  async recognize(bytes: Buffer, mimeType: string): Promise<string> {
    if (!bytes.length) {
      throw new PermanentInputFailure('Cannot transcribe an empty file');
    }
    try {
      const res = await this.model.generateContent([
        TRANSCRIBE_PROMPT,
        { inlineData: { data: bytes.toString('base64'), mimeType } },
      ]);
      return res.response.text();
    } catch (err) {
      const message = errorMessage(err);
      if (classifyGeminiError(err) === 'transient') {
        this.logger.warn(`OCR engine unavailable: ${message}`);
        throw new TransientFailure(message, { cause: err });
      }
      this.logger.warn(`OCR request refused: ${message}`);
      // a 4xx here means the file itself was not accepted
      if (err instanceof GoogleGenerativeAIFetchError) {
        throw new PermanentInputFailure(message, { cause: err });
      }
      throw new RejectedOutput(message, { cause: err });
    }
  }
}
