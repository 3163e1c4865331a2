/**
 * Schema Retry Logic with Error Recovery
 *
 * Re-prompts the model with a repair prompt when its output fails zod
 * validation, up to `maxRetries` extra attempts.
 *
 * @module summarizer/schema-retry
 */

import { z } from "zod";
import { parseModelJson } from "./json";

// ============================================================================
// TYPES
// ============================================================================

export interface SchemaRetryConfig {
  maxRetries: number;
  onRetry?: (attempt: number, error: string) => void;
}

export class SchemaComplianceError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: z.ZodError | Error,
  ) {
    super(message);
    this.name = "SchemaComplianceError";
  }
}

// ============================================================================
// RETRY LOGIC
// ============================================================================

/**
 * Generate with automatic schema retry.
 *
 * `generateFn` receives the repair prompt on every attempt after the first.
 * Only validation failures are retried here; errors thrown by `generateFn`
 * (timeouts, provider failures) propagate untouched, since the generation
 * layer owns their retry policy.
 */
export async function generateWithSchemaRetry<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  generateFn: (retryPrompt?: string) => Promise<unknown>,
  config: SchemaRetryConfig,
): Promise<T> {
  const { maxRetries, onRetry } = config;

  let lastError: z.ZodError | Error = new Error("No output generated");
  let lastOutput: unknown = undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const retryPrompt = attempt > 0 ? buildSchemaRetryPrompt(lastError, lastOutput) : undefined;
    const output = await generateFn(retryPrompt);
    lastOutput = output;

    const parsed = schema.safeParse(output);
    if (parsed.success) return parsed.data;

    lastError = parsed.error;
    const errorSummary = summarizeSchemaErrors(parsed.error);
    onRetry?.(attempt + 1, errorSummary);
    console.warn(`[Schema-Retry] Validation failed (attempt ${attempt + 1}/${maxRetries + 1}):\n${errorSummary}`);
  }

  throw new SchemaComplianceError(
    `Failed to generate valid output after ${maxRetries + 1} attempts`,
    maxRetries + 1,
    lastError,
  );
}

/**
 * Text-in variant: the model's raw text is parsed with `parseModelJson`
 * before validation, and the repair prompt is appended to the base prompt.
 */
export async function generateJsonWithSchemaRetry<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  basePrompt: string,
  generate: (prompt: string) => Promise<string>,
  config: SchemaRetryConfig,
): Promise<T> {
  return generateWithSchemaRetry(
    schema,
    async (retryPrompt) => {
      const prompt = retryPrompt ? `${basePrompt}\n\n${retryPrompt}` : basePrompt;
      return parseModelJson(await generate(prompt));
    },
    config,
  );
}

// ============================================================================
// RETRY PROMPT GENERATION
// ============================================================================

export function buildSchemaRetryPrompt(error: z.ZodError | Error, lastOutput: unknown): string {
  if (!(error instanceof z.ZodError)) {
    return `Your previous generation failed with error: ${error.message}

Please regenerate the output following the format requirements exactly.`;
  }

  const fixes = getCommonFixes(error);
  const excerpt = lastOutput === null || lastOutput === undefined
    ? "(no parseable JSON found)"
    : JSON.stringify(lastOutput, null, 2).slice(0, 500);

  return `Your previous output did not match the required format. Please fix the following errors:

${summarizeSchemaErrors(error)}

Common fixes needed:
${fixes.map((fix, i) => `${i + 1}. ${fix}`).join("\n")}

Your previous output (excerpt):
\`\`\`json
${excerpt}
\`\`\`

Return ONLY the corrected JSON. No explanations. No markdown.`;
}

// ============================================================================
// ERROR ANALYSIS
// ============================================================================

export function summarizeSchemaErrors(error: z.ZodError): string {
  return error.issues
    .slice(0, 10)
    .map((issue) => `- ${issue.path.join(".") || "root"}: ${issue.message} (code: ${issue.code})`)
    .join("\n");
}

function getCommonFixes(error: z.ZodError): string[] {
  const fixes = new Set<string>();

  for (const issue of error.issues) {
    switch (issue.code) {
      case "invalid_type":
        if (issue.received === "null") {
          fixes.add("Replace null values with appropriate defaults (empty string, empty array)");
        } else if (issue.received === "undefined") {
          fixes.add("Add missing required fields");
        } else {
          fixes.add(`Convert ${issue.received} to ${issue.expected} type`);
        }
        break;
      case "invalid_enum_value":
        fixes.add("Use exact enum values (check spelling and case sensitivity)");
        break;
      case "too_small":
        if (issue.type === "array") fixes.add(`Array must have at least ${issue.minimum} items`);
        else if (issue.type === "string") fixes.add("Strings must not be empty");
        break;
      default:
        fixes.add(`Fix ${issue.code} error at ${issue.path.join(".") || "root"}`);
    }
  }

  return Array.from(fixes);
}
