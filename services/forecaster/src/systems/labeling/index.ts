/**
 * Labeling System
 */

export * from "./categories.js";
export {
  assignCategory,
  isIllDefined,
  labelQuestions,
  type LabelerOptions,
  type LabelableQuestion,
  type QuestionLabels,
  type LabelingResult,
} from "./labeler.js";
