/**
 * Summarizer - LLM Provider Selection
 *
 * Handles provider normalisation and per-task model selection.
 *
 * @module summarizer/llm
 */

import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { mistral } from "@ai-sdk/mistral";
import type { LanguageModel } from "ai";
import { DEFAULT_SUMMARIZER_CONFIG, type LlmProvider, type SummarizerConfig } from "../config-schemas";

// ============================================================================
// MODEL SELECTION
// ============================================================================

export type GenerationTask = "partition" | "perspective" | "claim" | "similarity";

export interface ModelInfo {
  provider: LlmProvider;
  modelName: string;
  model: LanguageModel;
}

export function normalizeProvider(raw: string): LlmProvider {
  const p = (raw || "").toLowerCase().trim();
  if (p === "anthropic" || p === "claude") return "anthropic";
  if (p === "google" || p === "gemini") return "google";
  if (p === "mistral") return "mistral";
  return "openai";
}

export function detectProviderFromModelName(modelName: string): LlmProvider | null {
  const name = (modelName || "").toLowerCase();
  if (name.includes("claude")) return "anthropic";
  if (name.includes("gemini")) return "google";
  if (name.includes("mistral")) return "mistral";
  if (name.includes("gpt")) return "openai";
  return null;
}

function modelOverrideForTask(task: GenerationTask, config: SummarizerConfig): string {
  switch (task) {
    case "partition":
      return config.modelPartition;
    case "similarity":
      return config.modelSimilarity;
    case "perspective":
    case "claim":
      return config.modelSynthesis;
  }
}

/**
 * Default model per provider. Partition and similarity are cheap
 * classification tasks; synthesis gets the stronger model.
 */
export function defaultModelNameForTask(provider: LlmProvider, task: GenerationTask): string {
  const synthesis = task === "perspective" || task === "claim";
  switch (provider) {
    case "anthropic":
      return synthesis ? "claude-sonnet-4-20250514" : "claude-3-5-haiku-20241022";
    case "google":
      return synthesis ? "gemini-1.5-pro" : "gemini-1.5-flash";
    case "mistral":
      return synthesis ? "mistral-large-latest" : "mistral-small-latest";
    case "openai":
      return synthesis ? "gpt-4o" : "gpt-4o-mini";
  }
}

function buildModel(provider: LlmProvider, modelName: string): LanguageModel {
  switch (provider) {
    case "anthropic":
      return anthropic(modelName);
    case "google":
      return google(modelName);
    case "mistral":
      return mistral(modelName);
    case "openai":
      return openai(modelName);
  }
}

/**
 * Resolve the model name for a task without instantiating a provider client.
 *
 * Tiering off: every task uses the synthesis model. Tiering on: the
 * per-task model from config, unless it belongs to another provider, in
 * which case the provider's default for the task is used.
 */
export function resolveModelName(task: GenerationTask, config: SummarizerConfig = DEFAULT_SUMMARIZER_CONFIG): string {
  const provider = normalizeProvider(config.llmProvider);
  const configured = config.llmTiering ? modelOverrideForTask(task, config) : config.modelSynthesis;

  const inferredProvider = detectProviderFromModelName(configured);
  if (inferredProvider && inferredProvider !== provider) {
    console.warn(
      `[LLM] Ignoring model "${configured}" for task "${task}" because provider is "${provider}"`,
    );
    return defaultModelNameForTask(provider, config.llmTiering ? task : "perspective");
  }
  return configured;
}

/**
 * Get an LLM model for a specific generation task.
 */
export function getModelForTask(task: GenerationTask, config: SummarizerConfig = DEFAULT_SUMMARIZER_CONFIG): ModelInfo {
  const provider = normalizeProvider(config.llmProvider);
  const modelName = resolveModelName(task, config);
  return { provider, modelName, model: buildModel(provider, modelName) };
}
