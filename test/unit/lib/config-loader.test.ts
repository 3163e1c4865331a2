/**
 * Tests for file-backed config loading and env overrides.
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  applyEnvOverrides,
  getDefaultConfigPath,
  loadDefaultConfigFromFile,
  loadSummarizerConfig,
} from "@/lib/config-loader";
import { DEFAULT_SUMMARIZER_CONFIG, validateSummarizerConfig } from "@/lib/config-schemas";

describe("config-loader", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "summarizer-config-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const writeConfig = (content: unknown): string => {
    const filePath = path.join(tempDir, "summarizer.json");
    fs.writeFileSync(filePath, typeof content === "string" ? content : JSON.stringify(content));
    return filePath;
  };

  describe("loadDefaultConfigFromFile", () => {
    it("loads a valid file", () => {
      const filePath = writeConfig({
        schemaVersion: "1.0.0",
        ...DEFAULT_SUMMARIZER_CONFIG,
        retrieval: { topK: 4 },
      });
      const loaded = loadDefaultConfigFromFile(filePath);
      expect(loaded.source).toBe("file");
      expect(loaded.config.retrieval.topK).toBe(4);
      expect(loaded.warnings).toEqual([]);
    });

    it("falls back to code defaults when the file is missing", () => {
      const filePath = path.join(tempDir, "missing.json");
      const loaded = loadDefaultConfigFromFile(filePath);
      expect(loaded.source).toBe("default");
      expect(loaded.config).toBe(DEFAULT_SUMMARIZER_CONFIG);
      expect(loaded.warnings).toEqual([`Config file not found: ${filePath}`]);
    });

    it("falls back on invalid JSON", () => {
      const loaded = loadDefaultConfigFromFile(writeConfig("{ not json"));
      expect(loaded.source).toBe("default");
      expect(loaded.warnings[0]).toMatch(/^Invalid JSON in /);
    });

    it("falls back on a schema version mismatch", () => {
      const filePath = writeConfig({ schemaVersion: "0.9.0", ...DEFAULT_SUMMARIZER_CONFIG });
      const loaded = loadDefaultConfigFromFile(filePath);
      expect(loaded.source).toBe("default");
      expect(loaded.warnings).toEqual([
        `Schema version mismatch in ${filePath}: expected 1.0.0, got 0.9.0`,
      ]);
    });

    it("falls back on schema errors", () => {
      const filePath = writeConfig({
        schemaVersion: "1.0.0",
        ...DEFAULT_SUMMARIZER_CONFIG,
        synthesis: { ...DEFAULT_SUMMARIZER_CONFIG.synthesis, maxAttempts: 0 },
      });
      const loaded = loadDefaultConfigFromFile(filePath);
      expect(loaded.source).toBe("default");
      expect(loaded.warnings[0]).toContain("synthesis.maxAttempts");
    });

    it("ships a repository default file equal to the code defaults", () => {
      const loaded = loadDefaultConfigFromFile(path.resolve(process.cwd(), "configs", "summarizer.default.json"));
      expect(loaded.source).toBe("file");
      expect(loaded.config).toEqual(DEFAULT_SUMMARIZER_CONFIG);
    });
  });

  describe("applyEnvOverrides", () => {
    it("applies valid overrides with type conversion", () => {
      const { result, overrides, skippedOverrides } = applyEnvOverrides(DEFAULT_SUMMARIZER_CONFIG, {
        SUMMARIZER_TOP_K: "8",
        SUMMARIZER_CLUSTER_COUNT: "2",
        SUMMARIZER_CACHE_ENABLED: "true",
        SUMMARIZER_SIMILARITY_MODE: "llm",
      });
      expect(result.retrieval.topK).toBe(8);
      expect(result.synthesis.clusterCount).toBe(2);
      expect(result.cache.enabled).toBe(true);
      expect(result.similarity.mode).toBe("llm");
      expect(overrides.map((o) => o.envVar)).toEqual([
        "SUMMARIZER_TOP_K",
        "SUMMARIZER_CLUSTER_COUNT",
        "SUMMARIZER_SIMILARITY_MODE",
        "SUMMARIZER_CACHE_ENABLED",
      ]);
      expect(skippedOverrides).toEqual([]);
    });

    it("skips an override that would make the config invalid and keeps the rest", () => {
      const { result, skippedOverrides } = applyEnvOverrides(DEFAULT_SUMMARIZER_CONFIG, {
        SUMMARIZER_TOP_K: "0",
        SUMMARIZER_MAX_ATTEMPTS: "5",
      });
      expect(result.retrieval.topK).toBe(6);
      expect(result.synthesis.maxAttempts).toBe(5);
      expect(skippedOverrides).toHaveLength(1);
      expect(skippedOverrides[0]).toMatch(/^SUMMARIZER_TOP_K \(invalid: /);
    });

    it("ignores every override when disabled", () => {
      const { result, overrides } = applyEnvOverrides(DEFAULT_SUMMARIZER_CONFIG, {
        SUMMARIZER_CONFIG_ENV_OVERRIDES: "off",
        SUMMARIZER_TOP_K: "8",
      });
      expect(result).toBe(DEFAULT_SUMMARIZER_CONFIG);
      expect(overrides).toEqual([]);
    });

    it("does not mutate the base config", () => {
      applyEnvOverrides(DEFAULT_SUMMARIZER_CONFIG, { SUMMARIZER_TOP_K: "9" });
      expect(DEFAULT_SUMMARIZER_CONFIG.retrieval.topK).toBe(6);
    });
  });

  describe("loadSummarizerConfig", () => {
    it("combines the file with env overrides", () => {
      const filePath = writeConfig({ schemaVersion: "1.0.0", ...DEFAULT_SUMMARIZER_CONFIG });
      const loaded = loadSummarizerConfig({ filePath, env: { SUMMARIZER_MAX_CONCURRENCY: "2" } });
      expect(loaded.source).toBe("file");
      expect(loaded.filePath).toBe(filePath);
      expect(loaded.config.batch.maxConcurrency).toBe(2);
    });

    it("resolves the file path from SUMMARIZER_CONFIG_PATH", () => {
      expect(getDefaultConfigPath({ SUMMARIZER_CONFIG_PATH: "/etc/summarizer.json" })).toBe("/etc/summarizer.json");
    });
  });

  describe("validateSummarizerConfig", () => {
    it("accepts the defaults and reports field paths for errors", () => {
      expect(validateSummarizerConfig(DEFAULT_SUMMARIZER_CONFIG)).toEqual({ valid: true, errors: [] });
      const bad = validateSummarizerConfig({ ...DEFAULT_SUMMARIZER_CONFIG, llmProvider: "other" });
      expect(bad.valid).toBe(false);
      expect(bad.errors[0]).toMatch(/^llmProvider: /);
    });
  });
});
