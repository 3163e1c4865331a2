export * from "./types";
export * from "./errors";
export { Summarizer, summarizeQuery } from "./pipeline";
export type { CreateSummarizerOptions, SummarizeOptions, SummarizerDependencies } from "./pipeline";
export { summarizeBatch } from "./batch-runner";
export type { BatchConfig, BatchOutcome, QuerySummarizer } from "./batch-runner";
export { PerspectiveSynthesizer, normalizeGeneratedSentence } from "./perspective-synthesizer";
export { GroundingValidator } from "./grounding-validator";
export type { ClaimValidationOutcome, GroundingPools, ValidationOutcome } from "./grounding-validator";
export { assembleResult, toOutputRecord } from "./result-assembler";
export {
  LabeledStancePartitioner,
  LlmStancePartitioner,
  assertStancePools,
  buildStancePools,
} from "./stance-partition";
export type { StanceLabels, StancePartitioner } from "./stance-partition";
export {
  LexicalSimilarityScorer,
  LlmSimilarityScorer,
  createSimilarityScorer,
  findNearDuplicatePairs,
  jaccardSimilarity,
} from "./text-similarity";
export type { SimilarityPair, SimilarityScorer } from "./text-similarity";
export {
  AiSdkTextGenerator,
  GenerationTimeoutError,
  ProviderUnavailableError,
  ResilientTextGenerator,
} from "./generation";
export type { GenerateOptions, TextGenerator } from "./generation";
export { SchemaComplianceError } from "./schema-retry";
export { DocumentStore } from "../document-store";
export type { DocumentInput } from "../document-store";
export { TfidfRetriever } from "../retrieval";
export type { Retriever, RetrievalOptions, ScoredDocument } from "../retrieval";
export { buildDocumentStore, collectStanceLabels, parseInputRecord, parseInputRecords } from "../input-record";
export type { ParsedInput } from "../input-record";
export { loadSummarizerConfig } from "../config-loader";
export { DEFAULT_SUMMARIZER_CONFIG, SummarizerConfigSchema } from "../config-schemas";
export type { SummarizerConfig } from "../config-schemas";
export { CachedTextGenerator, GenerationCache } from "../generation-cache";
export { classifyError } from "../error-classification";
