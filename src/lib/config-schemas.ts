/**
 * Configuration Schemas
 *
 * Zod schema, defaults and version for the summarizer configuration.
 *
 * @module config-schemas
 * @version 1.0.0
 */

import { z } from "zod";

export const SUMMARIZER_SCHEMA_VERSION = "1.0.0";

export const LLM_PROVIDERS = ["anthropic", "openai", "google", "mistral"] as const;
export type LlmProvider = (typeof LLM_PROVIDERS)[number];

// ============================================================================
// SUMMARIZER CONFIG SCHEMA (1.0.0)
// ============================================================================

export const SummarizerConfigSchema = z.object({
  // === Model Selection ===
  llmProvider: z.enum(LLM_PROVIDERS).describe("LLM provider for all generation tasks"),
  llmTiering: z.boolean().describe("Use per-task models instead of one model for everything"),
  modelPartition: z.string().min(1).describe("Model for stance partitioning"),
  modelSynthesis: z.string().min(1).describe("Model for perspective and claim generation"),
  modelSimilarity: z.string().min(1).describe("Model for LLM similarity scoring"),

  retrieval: z.object({
    topK: z.number().int().min(1).max(100).describe("Per-query document budget"),
  }),

  partition: z.object({
    maxDocChars: z.number().int().min(100).max(20000).describe("Document excerpt length in the stance prompt"),
  }),

  synthesis: z.object({
    clusterCount: z.union([z.literal("auto"), z.number().int().min(1).max(20)])
      .describe("Perspectives per claim: fixed k, or auto from pool size"),
    docsPerPerspective: z.number().min(0.5).max(20).describe("Target pool documents per perspective when clusterCount is auto"),
    maxPerspectivesPerClaim: z.number().int().min(1).max(20),
    maxAttempts: z.number().int().min(1).max(10).describe("Regeneration budget per polarity branch"),
    maxDocChars: z.number().int().min(100).max(20000),
    temperature: z.number().min(0).max(2),
  }),

  similarity: z.object({
    mode: z.enum(["lexical", "llm"]).describe("How perspective overlap is scored"),
    nearDuplicateThreshold: z.number().min(0).max(1).describe("Pairs scoring at or above this are near-duplicates"),
  }),

  grounding: z.object({
    maxPerspectiveWords: z.number().int().min(1).max(200).describe("Soft bound, logged only"),
    maxClaimWords: z.number().int().min(1).max(100).describe("Soft bound, logged only"),
    enforcePoolSeparation: z.boolean().describe("Reject perspectives citing the opposing pool"),
  }),

  generation: z.object({
    timeoutMs: z.number().int().min(100).max(600000),
    maxRetries: z.number().int().min(0).max(10).describe("Retries for timeouts and rate limits"),
    backoffMs: z.number().int().min(0).max(60000),
    backoffStrategy: z.enum(["none", "fixed", "exponential"]),
    maxSchemaRetries: z.number().int().min(0).max(5).describe("Repair prompts for malformed structured output"),
  }),

  batch: z.object({
    maxConcurrency: z.number().int().min(1).max(64),
  }),

  cache: z.object({
    enabled: z.boolean(),
    dbPath: z.string().min(1),
    ttlDays: z.number().int().min(1).max(365),
  }),

  circuitBreaker: z.object({
    enabled: z.boolean(),
    failureThreshold: z.number().int().min(1).max(100),
    resetTimeoutSec: z.number().int().min(1).max(3600),
  }),
});

export type SummarizerConfig = z.infer<typeof SummarizerConfigSchema>;

export const DEFAULT_SUMMARIZER_CONFIG: SummarizerConfig = {
  llmProvider: "openai",
  llmTiering: false,
  modelPartition: "gpt-4o-mini",
  modelSynthesis: "gpt-4o",
  modelSimilarity: "gpt-4o-mini",
  retrieval: {
    topK: 6,
  },
  partition: {
    maxDocChars: 1500,
  },
  synthesis: {
    clusterCount: "auto",
    docsPerPerspective: 1,
    maxPerspectivesPerClaim: 5,
    maxAttempts: 3,
    maxDocChars: 1500,
    temperature: 0.1,
  },
  similarity: {
    mode: "lexical",
    nearDuplicateThreshold: 0.6,
  },
  grounding: {
    maxPerspectiveWords: 30,
    maxClaimWords: 12,
    enforcePoolSeparation: true,
  },
  generation: {
    timeoutMs: 30000,
    maxRetries: 2,
    backoffMs: 500,
    backoffStrategy: "exponential",
    maxSchemaRetries: 2,
  },
  batch: {
    maxConcurrency: 4,
  },
  cache: {
    enabled: false,
    dbPath: "./generation-cache.db",
    ttlDays: 7,
  },
  circuitBreaker: {
    enabled: true,
    failureThreshold: 3,
    resetTimeoutSec: 60,
  },
};

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export function validateSummarizerConfig(content: unknown): ValidationResult {
  const parsed = SummarizerConfigSchema.safeParse(content);
  if (parsed.success) return { valid: true, errors: [] };
  return {
    valid: false,
    errors: parsed.error.issues.map((i) => `${i.path.join(".") || "root"}: ${i.message}`),
  };
}
