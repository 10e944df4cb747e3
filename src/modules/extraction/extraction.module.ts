import { Module } from '@nestjs/common';
import { ContentExtractor } from './content-extractor.service';
import { GeminiOcrEngine } from './gemini-ocr.engine';
import { OcrEngine } from './ocr-engine';

@Module({
  providers: [
    ContentExtractor,
    { provide: OcrEngine, useClass: GeminiOcrEngine },
  ],
  exports: [ContentExtractor],
})
export class ExtractionModule {}
