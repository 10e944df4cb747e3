import {
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError,
} from '@google/generative-ai';
import {
  PermanentInputFailure,
  RejectedOutput,
  TransientFailure,
} from '../../common/errors';
import { mockLogger, testSettings } from '../../testing';
import { GeminiOcrEngine } from './gemini-ocr.engine';

const mockGenerateContent = jest.fn();
const mockGetGenerativeModel = jest.fn();

jest.mock('@google/generative-ai', () => ({
  ...jest.requireActual('@google/generative-ai'),
  GoogleGenerativeAI: jest.fn().mockImplementation(() => ({
    getGenerativeModel: (...args: unknown[]) => mockGetGenerativeModel(...args),
  })),
}));

describe('GeminiOcrEngine', () => {
  let engine: GeminiOcrEngine;

  beforeEach(() => {
    mockGenerateContent.mockReset();
    mockGetGenerativeModel.mockReset();
    mockGetGenerativeModel.mockReturnValue({
      generateContent: mockGenerateContent,
    });
    engine = new GeminiOcrEngine(
      testSettings({ ocr: { timeoutMs: 2500, minChars: 10 } }),
      mockLogger(),
    );
  });

  it('uses a deterministic model with the OCR timeout', () => {
    expect(mockGetGenerativeModel).toHaveBeenCalledWith(
      { model: 'test-model', generationConfig: { temperature: 0 } },
      { timeout: 2500 },
    );
  });

  it('sends the file inline and returns the transcription', async () => {
    mockGenerateContent.mockResolvedValue({
      response: { text: () => 'Dear diary' },
    });

    await expect(engine.recognize(Buffer.from('abc'), 'image/png')).resolves.toBe(
      'Dear diary',
    );

    const [parts] = mockGenerateContent.mock.calls[0];
    expect(parts[1]).toEqual({
      inlineData: { data: 'YWJj', mimeType: 'image/png' },
    });
  });

  it('refuses an empty file without calling the model', async () => {
    await expect(engine.recognize(Buffer.alloc(0), 'image/png')).rejects.toBeInstanceOf(
      PermanentInputFailure,
    );
    expect(mockGenerateContent).not.toHaveBeenCalled();
  });

  it('reports server errors as transient', async () => {
    mockGenerateContent.mockRejectedValue(
      new GoogleGenerativeAIFetchError('Service Unavailable', 503),
    );
    await expect(engine.recognize(Buffer.from('abc'), 'image/png')).rejects.toBeInstanceOf(
      TransientFailure,
    );
  });

  it('reports a refused upload as bad input', async () => {
    mockGenerateContent.mockRejectedValue(
      new GoogleGenerativeAIFetchError('Unsupported MIME type', 400),
    );
    await expect(engine.recognize(Buffer.from('abc'), 'image/png')).rejects.toBeInstanceOf(
      PermanentInputFailure,
    );
  });

  it('reports a blocked transcription as rejected output', async () => {
    mockGenerateContent.mockRejectedValue(
      new GoogleGenerativeAIResponseError('Candidate was blocked due to RECITATION'),
    );
    await expect(engine.recognize(Buffer.from('abc'), 'image/png')).rejects.toBeInstanceOf(
      RejectedOutput,
    );
  });
});
