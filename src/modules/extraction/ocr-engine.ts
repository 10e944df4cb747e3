/**
 * Black-box handwriting and print recognition.
 *
 * Implementations throw `TransientFailure` when the engine cannot be reached,
 * `PermanentInputFailure` when it cannot read the bytes at all and
 * `RejectedOutput` when it answers without usable text.
 */
export abstract class OcrEngine {
  abstract recognize(bytes: Buffer, mimeType: string): Promise<string>;
}
