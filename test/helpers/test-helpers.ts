/**
 * Shared Test Helpers
 *
 * In-process stand-ins for the generation boundary. Prompts carry a
 * `TASK: <SECTION>` marker on their first line, so a fake can route on it.
 *
 * @module test-helpers
 */

import type { GenerateOptions, TextGenerator } from "@/lib/summarizer/generation";
import { DEFAULT_SUMMARIZER_CONFIG, type SummarizerConfig } from "@/lib/config-schemas";

export type FakeHandler = (prompt: string, options: GenerateOptions) => string | Promise<string>;

export interface RecordedCall {
  prompt: string;
  task: GenerateOptions["task"];
}

export class FakeTextGenerator implements TextGenerator {
  readonly calls: RecordedCall[] = [];

  constructor(
    private readonly handler: FakeHandler,
    readonly name: string = "fake:test-model",
  ) {}

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    this.calls.push({ prompt, task: options.task });
    return this.handler(prompt, options);
  }

  callsFor(task: GenerateOptions["task"]): RecordedCall[] {
    return this.calls.filter((c) => c.task === task);
  }
}

/** The prompt section a rendered prompt came from, e.g. "PERSPECTIVE". */
export function sectionOf(prompt: string): string | null {
  const match = prompt.match(/^TASK: ([A-Z_]+)/m);
  return match ? match[1] : null;
}

/** Document ids listed in a rendered prompt, in order. */
export function docIdsInPrompt(prompt: string): string[] {
  return Array.from(prompt.matchAll(/\[docId: ([^\]]+)\]/g), (m) => m[1]);
}

/** Polarity named in a PERSPECTIVE or CLAIM prompt. */
export function polarityInPrompt(prompt: string): "pro" | "con" | null {
  const match = prompt.match(/the (pro|con) side/);
  return match ? (match[1] === "pro" ? "pro" : "con") : null;
}

export interface ScriptedResponses {
  /** Stance per document id for STANCE_PARTITION prompts; unlisted ids are omitted */
  stances?: Record<string, "pro" | "con" | "neutral">;
  /** Perspective sentence for a cluster, keyed by its ids joined with "+" */
  perspectives?: Record<string, string>;
  /** Claim text per polarity */
  claims?: Partial<Record<"pro" | "con", string>>;
}

/**
 * Generator answering each prompt section from fixed tables. Unknown
 * clusters get "Perspective drawn from <ids>." so tests can still trace them.
 */
export function scriptedGenerator(responses: ScriptedResponses): FakeTextGenerator {
  return new FakeTextGenerator((prompt) => {
    const ids = docIdsInPrompt(prompt);
    switch (sectionOf(prompt)) {
      case "STANCE_PARTITION": {
        const assignments = ids.flatMap((docId) => {
          const stance = responses.stances?.[docId];
          return stance ? [{ docId, stance }] : [];
        });
        return JSON.stringify({ assignments });
      }
      case "PERSPECTIVE": {
        const key = ids.join("+");
        return responses.perspectives?.[key] ?? `Perspective drawn from ${key}.`;
      }
      case "CLAIM": {
        const polarity = polarityInPrompt(prompt);
        return (polarity && responses.claims?.[polarity]) || `The ${polarity ?? "unknown"} side holds.`;
      }
      default:
        throw new Error(`Unexpected prompt: ${prompt.slice(0, 80)}`);
    }
  });
}

/** Default config with nested overrides. */
export function testConfig(overrides: {
  [K in keyof SummarizerConfig]?: SummarizerConfig[K] extends object ? Partial<SummarizerConfig[K]> : SummarizerConfig[K];
} = {}): SummarizerConfig {
  const base = DEFAULT_SUMMARIZER_CONFIG;
  return {
    ...base,
    ...pickScalars(overrides),
    retrieval: { ...base.retrieval, ...overrides.retrieval },
    partition: { ...base.partition, ...overrides.partition },
    synthesis: { ...base.synthesis, ...overrides.synthesis },
    similarity: { ...base.similarity, ...overrides.similarity },
    grounding: { ...base.grounding, ...overrides.grounding },
    generation: { ...base.generation, ...overrides.generation },
    batch: { ...base.batch, ...overrides.batch },
    cache: { ...base.cache, ...overrides.cache },
    circuitBreaker: { ...base.circuitBreaker, ...overrides.circuitBreaker },
  };
}

function pickScalars(overrides: Partial<Record<keyof SummarizerConfig, unknown>>): Partial<SummarizerConfig> {
  const out: Partial<SummarizerConfig> = {};
  if (typeof overrides.llmProvider === "string") {
    const p = overrides.llmProvider;
    if (p === "openai" || p === "anthropic" || p === "google" || p === "mistral") out.llmProvider = p;
  }
  if (typeof overrides.llmTiering === "boolean") out.llmTiering = overrides.llmTiering;
  if (typeof overrides.modelPartition === "string") out.modelPartition = overrides.modelPartition;
  if (typeof overrides.modelSynthesis === "string") out.modelSynthesis = overrides.modelSynthesis;
  if (typeof overrides.modelSimilarity === "string") out.modelSimilarity = overrides.modelSimilarity;
  return out;
}
