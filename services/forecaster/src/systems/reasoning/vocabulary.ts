/**
 * Answer Vocabularies
 * Likelihood phrases a forecaster may answer with, and the probability each
 * stands for when scoring
 */

export const VOCABULARY_IDS = ["ten-options", "six-options"] as const;
export type VocabularyId = (typeof VOCABULARY_IDS)[number];

export interface AnswerVocabulary {
  readonly id: VocabularyId;

  /** Phrase → probability, least to most likely */
  readonly probabilities: Readonly<Record<string, number>>;

  /** Used when no phrase can be found */
  readonly fallback: string;
}

export const TEN_OPTIONS: AnswerVocabulary = Object.freeze({
  id: "ten-options",
  probabilities: Object.freeze({
    No: 0.05,
    "Extremely Unlikely": 0.15,
    "Very Unlikely": 0.25,
    Unlikely: 0.35,
    "Slightly Unlikely": 0.45,
    "Slightly Likely": 0.55,
    Likely: 0.65,
    "Very Likely": 0.75,
    "Extremely Likely": 0.85,
    Yes: 0.95,
  }),
  fallback: "Slightly Unlikely",
});

export const SIX_OPTIONS: AnswerVocabulary = Object.freeze({
  id: "six-options",
  probabilities: Object.freeze({
    No: 0.05,
    "Very Unlikely": 0.15,
    Unlikely: 0.35,
    Likely: 0.55,
    "Very Likely": 0.75,
    Yes: 0.95,
  }),
  fallback: "Unlikely",
});

const VOCABULARIES: Record<VocabularyId, AnswerVocabulary> = {
  "ten-options": TEN_OPTIONS,
  "six-options": SIX_OPTIONS,
};

export function getVocabulary(id: VocabularyId): AnswerVocabulary {
  return VOCABULARIES[id];
}

export function vocabularyTokens(vocabulary: AnswerVocabulary): string[] {
  return Object.keys(vocabulary.probabilities);
}

export function isVocabularyToken(vocabulary: AnswerVocabulary, token: string): boolean {
  return Object.hasOwn(vocabulary.probabilities, token);
}

/**
 * Probability a phrase stands for; unknown phrases map to the fallback's
 */
export function tokenProbability(vocabulary: AnswerVocabulary, token: string): number {
  const key = isVocabularyToken(vocabulary, token) ? token : vocabulary.fallback;
  return vocabulary.probabilities[key];
}
