export { IntentClassifier } from "./classifier";
export { IntentModel, softmax } from "./model";
export { trainIntentModel, type TrainingOptions } from "./trainer";
export {
  FileModelSource,
  DatasetModelSource,
  loadStopWords,
  parseModelArtifact,
  type ModelSource,
} from "./model-source";
export { tokenize, removeStopWords, ngrams, analyze, TfidfVectorizer } from "./features";
export {
  INTENT_LABELS,
  LABEL_SET_VERSION,
  DEFAULT_LABEL,
  isIntentLabel,
  type IntentLabel,
} from "./labels";
export {
  FAILED_CLASSIFICATION,
  IntentDatasetSchema,
  ModelArtifactSchema,
  type ClassificationResult,
  type LabelledExample,
  type IntentDataset,
  type ModelArtifact,
} from "./types";
