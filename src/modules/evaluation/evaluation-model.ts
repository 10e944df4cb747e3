/**
 * External AI model port. Implementations throw `TransientFailure` for
 * timeouts, network errors and rate limits and `RejectedOutput` when the
 * model refuses the request.
 */
export abstract class EvaluationModel {
  abstract readonly modelId: string;
  abstract generate(prompt: string): Promise<string>;
}
