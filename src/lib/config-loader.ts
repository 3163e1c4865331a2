/**
 * Configuration Loader
 *
 * Loads the file-backed summarizer defaults and resolves environment
 * variable overrides on top of them. A broken file never stops the
 * pipeline: it is reported and the code defaults are used instead.
 *
 * @module config-loader
 * @version 1.0.0
 */

import fs from "node:fs";
import path from "node:path";
import {
  DEFAULT_SUMMARIZER_CONFIG,
  SUMMARIZER_SCHEMA_VERSION,
  SummarizerConfigSchema,
  type SummarizerConfig,
} from "./config-schemas";

export type { SummarizerConfig } from "./config-schemas";
export { DEFAULT_SUMMARIZER_CONFIG } from "./config-schemas";

// ============================================================================
// TYPES
// ============================================================================

export interface OverrideRecord {
  envVar: string;
  fieldPath: string;
  appliedValue: string | number | boolean | undefined;
}

export interface LoadedConfig {
  config: SummarizerConfig;
  source: "file" | "default";
  filePath: string;
  warnings: string[];
  overrides: OverrideRecord[];
  skippedOverrides: string[];
}

export interface LoadConfigOptions {
  /** Defaults to $SUMMARIZER_CONFIG_PATH or ./configs/summarizer.default.json */
  filePath?: string;
  env?: NodeJS.ProcessEnv;
}

// ============================================================================
// ENV OVERRIDES
// ============================================================================

type EnvMapping = { fieldPath: string; parser: (v: string) => unknown };

const parseIntValue = (v: string) => parseInt(v, 10);
const parseBool = (v: string) => v === "true";

const SUMMARIZER_ENV_MAP: Record<string, EnvMapping> = {
  SUMMARIZER_LLM_PROVIDER: { fieldPath: "llmProvider", parser: (v) => v },
  SUMMARIZER_LLM_TIERING: { fieldPath: "llmTiering", parser: parseBool },
  SUMMARIZER_MODEL_PARTITION: { fieldPath: "modelPartition", parser: (v) => v },
  SUMMARIZER_MODEL_SYNTHESIS: { fieldPath: "modelSynthesis", parser: (v) => v },
  SUMMARIZER_MODEL_SIMILARITY: { fieldPath: "modelSimilarity", parser: (v) => v },
  SUMMARIZER_TOP_K: { fieldPath: "retrieval.topK", parser: parseIntValue },
  SUMMARIZER_CLUSTER_COUNT: {
    fieldPath: "synthesis.clusterCount",
    parser: (v) => (v === "auto" ? "auto" : parseInt(v, 10)),
  },
  SUMMARIZER_MAX_ATTEMPTS: { fieldPath: "synthesis.maxAttempts", parser: parseIntValue },
  SUMMARIZER_SIMILARITY_MODE: { fieldPath: "similarity.mode", parser: (v) => v },
  SUMMARIZER_DUPLICATE_THRESHOLD: { fieldPath: "similarity.nearDuplicateThreshold", parser: (v) => parseFloat(v) },
  SUMMARIZER_TIMEOUT_MS: { fieldPath: "generation.timeoutMs", parser: parseIntValue },
  SUMMARIZER_MAX_RETRIES: { fieldPath: "generation.maxRetries", parser: parseIntValue },
  SUMMARIZER_MAX_CONCURRENCY: { fieldPath: "batch.maxConcurrency", parser: parseIntValue },
  SUMMARIZER_CACHE_ENABLED: { fieldPath: "cache.enabled", parser: parseBool },
  SUMMARIZER_CACHE_PATH: { fieldPath: "cache.dbPath", parser: (v) => v },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: Record<string, unknown>, fieldPath: string, value: unknown): void {
  const parts = fieldPath.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

function cloneConfig(config: SummarizerConfig): Record<string, unknown> {
  return structuredClone({ ...config });
}

export function applyEnvOverrides(
  base: SummarizerConfig,
  env: NodeJS.ProcessEnv = process.env,
): { result: SummarizerConfig; overrides: OverrideRecord[]; skippedOverrides: string[] } {
  const overrides: OverrideRecord[] = [];
  const skippedOverrides: string[] = [];

  if ((env.SUMMARIZER_CONFIG_ENV_OVERRIDES ?? "on") === "off") {
    return { result: base, overrides, skippedOverrides };
  }

  let result = base;

  for (const [envVar, mapping] of Object.entries(SUMMARIZER_ENV_MAP)) {
    const envValue = env[envVar];
    if (envValue === undefined || envValue === "") continue;

    const parsedValue = mapping.parser(envValue);
    const tentative = cloneConfig(result);
    setNestedValue(tentative, mapping.fieldPath, parsedValue);

    // Only keep an override that leaves the config valid
    const validation = SummarizerConfigSchema.safeParse(tentative);
    if (!validation.success) {
      console.warn(
        `[Config-Loader] Skipping invalid override ${envVar}=${envValue}: ` +
          validation.error.issues.map((i) => i.message).join(", "),
      );
      skippedOverrides.push(`${envVar} (invalid: ${validation.error.issues[0]?.message})`);
      continue;
    }

    result = validation.data;
    overrides.push({
      envVar,
      fieldPath: mapping.fieldPath,
      appliedValue:
        typeof parsedValue === "string" || typeof parsedValue === "number" || typeof parsedValue === "boolean"
          ? parsedValue
          : undefined,
    });
  }

  return { result, overrides, skippedOverrides };
}

// ============================================================================
// FILE LOADING
// ============================================================================

export function getDefaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.SUMMARIZER_CONFIG_PATH || path.resolve(process.cwd(), "configs", "summarizer.default.json");
}

/**
 * Read the file-backed defaults. Missing file, invalid JSON, a schema
 * version mismatch or schema errors all fall back to the code defaults
 * with a warning.
 */
export function loadDefaultConfigFromFile(filePath: string): {
  config: SummarizerConfig;
  source: "file" | "default";
  warnings: string[];
} {
  const warnings: string[] = [];
  const fallback = (warning: string) => {
    console.warn(`[Config-Loader] ${warning}; using built-in defaults`);
    warnings.push(warning);
    return { config: DEFAULT_SUMMARIZER_CONFIG, source: "default" as const, warnings };
  };

  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? String(err.code) : "";
    return fallback(code === "ENOENT" ? `Config file not found: ${filePath}` : `Cannot read ${filePath}: ${String(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return fallback(`Invalid JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!isRecord(parsed)) {
    return fallback(`Config in ${filePath} is not an object`);
  }

  const { schemaVersion, ...content } = parsed;
  if (schemaVersion !== SUMMARIZER_SCHEMA_VERSION) {
    return fallback(
      `Schema version mismatch in ${filePath}: expected ${SUMMARIZER_SCHEMA_VERSION}, got ${String(schemaVersion)}`,
    );
  }

  const validation = SummarizerConfigSchema.safeParse(content);
  if (!validation.success) {
    const issues = validation.error.issues
      .slice(0, 5)
      .map((i) => `${i.path.join(".") || "root"}: ${i.message}`)
      .join("; ");
    return fallback(`Invalid config in ${filePath}: ${issues}`);
  }

  return { config: validation.data, source: "file", warnings };
}

/**
 * Effective configuration: file defaults (or code defaults) plus env overrides.
 */
export function loadSummarizerConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const filePath = options.filePath ?? getDefaultConfigPath(env);
  const fromFile = loadDefaultConfigFromFile(filePath);
  const { result, overrides, skippedOverrides } = applyEnvOverrides(fromFile.config, env);

  if (overrides.length > 0) {
    console.log(`[Config-Loader] Applied ${overrides.length} env overrides: ${overrides.map((o) => o.envVar).join(", ")}`);
  }

  return {
    config: result,
    source: fromFile.source,
    filePath,
    warnings: fromFile.warnings,
    overrides,
    skippedOverrides,
  };
}
