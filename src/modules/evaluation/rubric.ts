import { MAX_SCORE, MIN_SCORE } from './evaluation-parser';
import { Rubric } from './interfaces/evaluation.interface';

export const DEFAULT_RUBRIC: Rubric = {
  name: 'Written assignment',
  criteria: [
    {
      category: 'grammar',
      description: 'Sentence construction, agreement, tense and punctuation.',
    },
    {
      category: 'vocabulary',
      description: 'Range and precision of word choice for the level.',
    },
    {
      category: 'structure',
      description: 'Organisation of ideas, paragraphing and coherence.',
    },
    {
      category: 'overall',
      description: 'How well the piece communicates its purpose.',
    },
  ],
};

const OUTPUT_CONTRACT = `Respond with a single JSON object and nothing else:
{
  "score": <number between ${MIN_SCORE} and ${MAX_SCORE}>,
  "feedback": [
    { "category": "<one of the rubric categories>", "comment": "<short, specific comment>" }
  ]
}`;

const STRICT_RULES = `Your previous answer could not be used. Follow these rules exactly:
- Output raw JSON only: no markdown fences, no prose before or after.
- "score" MUST be a plain number, not a string, a range or a fraction.
- "feedback" MUST be an array; every item MUST have string "category" and "comment".`;

export function buildEvaluationPrompt(
  text: string,
  rubric: Rubric,
  strict = false,
): string {
  const criteria = rubric.criteria
    .map((c) => `- ${c.category}: ${c.description}`)
    .join('\n');

  return [
    `You are an experienced teacher marking a student's written work against the "${rubric.name}" rubric.`,
    `Score the work from ${MIN_SCORE} to ${MAX_SCORE} and give one or more feedback items per category.`,
    `Rubric:\n${criteria}`,
    OUTPUT_CONTRACT,
    ...(strict ? [STRICT_RULES] : []),
    `Student submission:\n"""\n${text}\n"""`,
  ].join('\n\n');
}
