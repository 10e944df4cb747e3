import { Inject, Injectable } from '@nestjs/common';
import {
  PermanentInputFailure,
  RejectedOutput,
  errorMessage,
} from '../../common/errors';
import { GRADING_SETTINGS, GradingSettings } from '../../config';
import { FileStore, StoredFileNotFound } from '../../lib/aws';
import { GradewiseLogger } from '../../lib/logger';
import {
  FileInput,
  SubmissionInput,
} from '../submissions/interfaces/submission.interface';
import { sniffMimeType } from './file-signature';
import {
  ExtractionOutcome,
  extractionFailure,
} from './interfaces/extraction.interface';
import { OcrEngine } from './ocr-engine';
import { readPdfText } from './pdf-text';
import { meaningfulLength, normalizeText } from './text-normalizer';

/**
 * Turns a submission's input into plain text. Never throws for stage
 * failures: every problem comes back as a classified outcome so the caller
 * can decide between retrying and giving up.
 */
@Injectable()
export class ContentExtractor {
  constructor(
    private readonly files: FileStore,
    private readonly ocr: OcrEngine,
    @Inject(GRADING_SETTINGS) private readonly settings: GradingSettings,
    private readonly logger: GradewiseLogger,
  ) {
    this.logger.setContext(ContentExtractor.name);
  }

  async extract(input: SubmissionInput): Promise<ExtractionOutcome> {
    if (input.kind === 'text') {
      const text = normalizeText(input.text);
      if (!text) return extractionFailure('bad_input', 'Submission text is empty');
      return { ok: true, text };
    }
    return this.extractFile(input);
  }

  private async extractFile(input: FileInput): Promise<ExtractionOutcome> {
    let bytes: Buffer;
    try {
      bytes = await this.files.download(input.fileKey);
    } catch (err) {
      if (err instanceof StoredFileNotFound) {
        return extractionFailure('bad_input', err.message);
      }
      this.logger.warn(`File store unavailable for ${input.fileKey}: ${errorMessage(err)}`);
      return extractionFailure(
        'engine_unavailable',
        `Could not load ${input.filename}: ${errorMessage(err)}`,
      );
    }

    const detected = sniffMimeType(bytes);
    if (!detected) {
      return extractionFailure(
        'bad_input',
        `${input.filename} is not a supported image or PDF`,
      );
    }
    const declaredPdf = input.mimeType === 'application/pdf';
    if (declaredPdf !== (detected === 'application/pdf')) {
      return extractionFailure(
        'bad_input',
        `${input.filename} was uploaded as ${input.mimeType} but contains ${detected}`,
      );
    }
    if (detected !== input.mimeType) {
      // image subtypes are often mislabelled by browsers; trust the bytes
      this.logger.debug(
        `${input.filename} declared ${input.mimeType} but contains ${detected}`,
      );
    }

    try {
      const raw =
        detected === 'application/pdf'
          ? await this.pdfText(bytes)
          : await this.ocr.recognize(bytes, detected);
      return this.accept(normalizeText(raw), input.filename);
    } catch (err) {
      if (err instanceof PermanentInputFailure) {
        return extractionFailure('bad_input', err.message);
      }
      if (err instanceof RejectedOutput) {
        return extractionFailure('illegible', err.message);
      }
      this.logger.warn(`Extraction of ${input.filename} failed: ${errorMessage(err)}`);
      return extractionFailure('engine_unavailable', errorMessage(err));
    }
  }

  /** Text layer first; scans without one go through OCR. */
  private async pdfText(bytes: Buffer): Promise<string> {
    let layer: string;
    try {
      layer = await readPdfText(bytes);
    } catch (err) {
      throw new PermanentInputFailure(`Unreadable PDF: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (meaningfulLength(normalizeText(layer)) >= this.settings.ocr.minChars) {
      return layer;
    }
    this.logger.debug('PDF has no usable text layer, falling back to OCR');
    return this.ocr.recognize(bytes, 'application/pdf');
  }

  private accept(text: string, filename: string): ExtractionOutcome {
    if (meaningfulLength(text) < this.settings.ocr.minChars) {
      return extractionFailure(
        'illegible',
        `Too little readable text in ${filename}`,
      );
    }
    return { ok: true, text };
  }
}
