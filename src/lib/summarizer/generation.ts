/**
 * Text generation boundary.
 *
 * The summarizer treats generation as a black box: `generate(prompt) -> text`.
 * `AiSdkTextGenerator` implements it on the AI SDK; `ResilientTextGenerator`
 * adds the deadline, retry/backoff and circuit-breaker policy around any
 * generator.
 *
 * @module summarizer/generation
 */

import { generateText } from "ai";
import { DEFAULT_SUMMARIZER_CONFIG, type SummarizerConfig } from "../config-schemas";
import { classifyError } from "../error-classification";
import {
  isProviderAvailable,
  recordFailure,
  recordSuccess,
  releaseProbe,
  type CircuitBreakerConfig,
} from "../provider-circuit-breaker";
import { getModelForTask, resolveModelName, type GenerationTask } from "./llm";

// ============================================================================
// TYPES
// ============================================================================

export interface GenerateOptions {
  task: GenerationTask;
  signal?: AbortSignal;
  temperature?: number;
}

export interface TextGenerator {
  /** Stable label of the backing provider/model, used for caching and health tracking */
  readonly name: string;
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

export class GenerationTimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "GenerationTimeoutError";
  }
}

export class ProviderUnavailableError extends Error {
  constructor(public readonly provider: string) {
    super(`Generation provider ${provider} is unavailable (circuit open)`);
    this.name = "ProviderUnavailableError";
  }
}

// ============================================================================
// AI SDK GENERATOR
// ============================================================================

export class AiSdkTextGenerator implements TextGenerator {
  readonly name: string;

  constructor(private readonly config: SummarizerConfig = DEFAULT_SUMMARIZER_CONFIG) {
    const tasks: GenerationTask[] = ["partition", "perspective", "similarity"];
    const models = Array.from(new Set(tasks.map((t) => resolveModelName(t, config))));
    this.name = `${config.llmProvider}:${models.join("/")}`;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const modelInfo = getModelForTask(options.task, this.config);
    const result = await generateText({
      model: modelInfo.model,
      prompt,
      temperature: options.temperature ?? this.config.synthesis.temperature,
      abortSignal: options.signal,
      // Retries are owned by ResilientTextGenerator
      maxRetries: 0,
    });
    return result.text;
  }
}

// ============================================================================
// DEADLINES AND RETRIES
// ============================================================================

/**
 * Run `fn` with an abort signal that fires after `timeoutMs`. Rejects with
 * GenerationTimeoutError when the deadline passes first.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parentSignal?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parentSignal?.reason);
  parentSignal?.addEventListener("abort", onParentAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new GenerationTimeoutError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener("abort", onParentAbort);
  }
}

export type BackoffStrategy = "none" | "fixed" | "exponential";

export function backoffDelay(attempt: number, baseMs: number, strategy: BackoffStrategy): number {
  switch (strategy) {
    case "none":
      return 0;
    case "fixed":
      return baseMs;
    case "exponential":
      return baseMs * 2 ** attempt;
  }
}

export interface ResilienceOptions {
  timeoutMs: number;
  maxRetries: number;
  backoffMs: number;
  backoffStrategy: BackoffStrategy;
  circuitBreaker?: CircuitBreakerConfig;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class ResilientTextGenerator implements TextGenerator {
  readonly name: string;

  constructor(
    private readonly inner: TextGenerator,
    private readonly options: ResilienceOptions,
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep,
  ) {
    this.name = inner.name;
  }

  static fromConfig(inner: TextGenerator, config: SummarizerConfig): ResilientTextGenerator {
    return new ResilientTextGenerator(inner, {
      timeoutMs: config.generation.timeoutMs,
      maxRetries: config.generation.maxRetries,
      backoffMs: config.generation.backoffMs,
      backoffStrategy: config.generation.backoffStrategy,
      circuitBreaker: config.circuitBreaker,
    });
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const { timeoutMs, maxRetries, backoffMs, backoffStrategy, circuitBreaker } = this.options;
    let lastError: unknown = new Error(`${options.task} generation was not attempted`);

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (options.signal?.aborted) {
        throw options.signal.reason instanceof Error ? options.signal.reason : new Error("Generation aborted");
      }
      if (circuitBreaker && !isProviderAvailable(this.name, circuitBreaker)) {
        throw new ProviderUnavailableError(this.name);
      }

      try {
        const text = await withTimeout(
          (signal) => this.inner.generate(prompt, { ...options, signal }),
          timeoutMs,
          `${options.task} generation`,
          options.signal,
        );
        if (circuitBreaker) recordSuccess(this.name, circuitBreaker);
        return text;
      } catch (err) {
        lastError = err;
        const classified = classifyError(err);

        if (circuitBreaker) {
          if (classified.shouldCountAsProviderFailure) {
            recordFailure(this.name, classified.message, circuitBreaker);
          } else {
            releaseProbe(this.name);
          }
        }

        if (!classified.retriable || attempt === maxRetries) throw err;

        const delay = backoffDelay(attempt, backoffMs, backoffStrategy);
        console.warn(
          `[Generation] ${options.task} attempt ${attempt + 1}/${maxRetries + 1} failed (${classified.category}); retrying in ${delay}ms`,
        );
        if (delay > 0) await this.sleep(delay);
      }
    }

    throw lastError;
  }
}
