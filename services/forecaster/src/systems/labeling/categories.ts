export const QUESTION_CATEGORIES = [
  "Science & Tech",
  "Healthcare & Biology",
  "Economics & Business",
  "Environment & Energy",
  "Politics & Governance",
  "Education & Research",
  "Arts & Recreation",
  "Security & Defense",
  "Social Sciences",
  "Sports",
  "Other",
] as const;

export type QuestionCategory = (typeof QUESTION_CATEGORIES)[number];

export function isQuestionCategory(value: string): value is QuestionCategory {
  return QUESTION_CATEGORIES.some((category) => category === value);
}
