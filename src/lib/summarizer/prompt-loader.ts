/**
 * External Prompt File Loader
 *
 * Loads prompt templates from `.prompt.md` files:
 * - YAML-like frontmatter (version, description, variables, requiredSections)
 * - Section extraction (## SECTION_NAME)
 * - Variable substitution (${variableName})
 * - mtime-based cache, so edits are picked up without a restart
 *
 * @module summarizer/prompt-loader
 */

import { readFile, stat } from "fs/promises";
import { createHash } from "crypto";
import path from "path";

// ============================================================================
// TYPES
// ============================================================================

export interface PromptFrontmatter {
  version: string;
  description: string;
  variables: string[];
  requiredSections: string[];
}

export interface PromptSection {
  name: string;
  content: string;
}

export interface PromptFile {
  frontmatter: PromptFrontmatter;
  sections: PromptSection[];
  contentHash: string;
  filePath: string;
}

export interface LoadResult {
  success: boolean;
  prompt?: PromptFile;
  warnings: string[];
  errors: string[];
}

export interface RenderedSection {
  content: string;
  contentHash: string;
  warnings: string[];
}

// ============================================================================
// CACHE
// ============================================================================

interface CachedPrompt {
  prompt: PromptFile;
  mtimeMs: number;
}

const promptCache = new Map<string, CachedPrompt>();

export function clearPromptCache(): void {
  promptCache.clear();
}

// ============================================================================
// FILE PATHS
// ============================================================================

export const SUMMARIZER_PROMPT_FILE = "summarizer.prompt.md";

export function getPromptDir(): string {
  return process.env.SUMMARIZER_PROMPT_DIR || path.resolve(process.cwd(), "prompts");
}

export function getPromptFilePath(fileName: string = SUMMARIZER_PROMPT_FILE): string {
  return path.join(getPromptDir(), fileName);
}

export function hashContent(content: string): string {
  return createHash("sha256").update(content, "utf-8").digest("hex");
}

// ============================================================================
// PARSERS
// ============================================================================

/**
 * Parse the frontmatter block. Supports the flat `key: value` and
 * `key:` + `- item` list subset used by prompt files.
 */
export function parseFrontmatter(content: string): {
  frontmatter: PromptFrontmatter | null;
  body: string;
  error?: string;
} {
  const fmMatch = content.match(/^---\n([\s\S]*?)\n---\n([\s\S]*)$/);
  if (!fmMatch) {
    return { frontmatter: null, body: content, error: "No frontmatter block found" };
  }

  const [, fmText, body] = fmMatch;
  const scalars = new Map<string, string>();
  const lists = new Map<string, string[]>();
  let currentList: string[] | null = null;

  for (const line of fmText.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    if (trimmed.startsWith("- ") && currentList !== null) {
      currentList.push(trimmed.slice(2).replace(/^["']|["']$/g, ""));
      continue;
    }

    const kvMatch = trimmed.match(/^(\w+):\s*(.*)$/);
    if (!kvMatch) continue;
    const [, key, value] = kvMatch;
    if (value === "") {
      currentList = [];
      lists.set(key, currentList);
    } else {
      currentList = null;
      scalars.set(key, value.replace(/^["']|["']$/g, ""));
    }
  }

  return {
    frontmatter: {
      version: scalars.get("version") ?? "unknown",
      description: scalars.get("description") ?? "",
      variables: lists.get("variables") ?? [],
      requiredSections: lists.get("requiredSections") ?? [],
    },
    body,
  };
}

/**
 * Extract sections delimited by `## SECTION_NAME` headers.
 */
export function extractSections(body: string): PromptSection[] {
  const sections: PromptSection[] = [];
  let current: { name: string; lines: string[] } | null = null;

  const flush = () => {
    if (current) sections.push({ name: current.name, content: current.lines.join("\n").trim() });
  };

  for (const line of body.split("\n")) {
    const headerMatch = line.match(/^## ([A-Z][A-Z0-9_]+)\s*$/);
    if (headerMatch) {
      flush();
      current = { name: headerMatch[1], lines: [] };
    } else if (current) {
      // Horizontal rules separate sections visually only
      if (line.trim() === "---") continue;
      current.lines.push(line);
    }
  }
  flush();

  return sections;
}

// ============================================================================
// LOADER
// ============================================================================

export async function loadPromptFile(fileName: string = SUMMARIZER_PROMPT_FILE): Promise<LoadResult> {
  const filePath = getPromptFilePath(fileName);
  const warnings: string[] = [];
  const errors: string[] = [];

  try {
    const fileStats = await stat(filePath);
    const cached = promptCache.get(filePath);
    if (cached && cached.mtimeMs === fileStats.mtimeMs) {
      return { success: true, prompt: cached.prompt, warnings, errors };
    }

    const rawContent = (await readFile(filePath, "utf-8")).replace(/\r\n/g, "\n");
    const { frontmatter, body, error } = parseFrontmatter(rawContent);
    if (!frontmatter || error) {
      errors.push(error ?? "Could not parse frontmatter");
      return { success: false, warnings, errors };
    }

    const sections = extractSections(body);
    if (sections.length === 0) {
      errors.push("No sections found in prompt file (expected ## SECTION_NAME headers)");
      return { success: false, warnings, errors };
    }

    const names = new Set(sections.map((s) => s.name));
    for (const required of frontmatter.requiredSections) {
      if (!names.has(required)) warnings.push(`Required section "${required}" not found in prompt file`);
    }

    const prompt: PromptFile = {
      frontmatter,
      sections,
      contentHash: hashContent(rawContent),
      filePath,
    };
    promptCache.set(filePath, { prompt, mtimeMs: fileStats.mtimeMs });
    return { success: true, prompt, warnings, errors };
  } catch (err) {
    const code = err instanceof Error && "code" in err ? String(err.code) : "";
    errors.push(
      code === "ENOENT"
        ? `Prompt file not found: ${filePath}`
        : `Failed to load prompt file: ${err instanceof Error ? err.message : String(err)}`,
    );
    return { success: false, warnings, errors };
  }
}

/**
 * Replace ${variable} placeholders. Unknown variables stay in place and are
 * reported.
 */
export function renderSection(
  prompt: PromptFile,
  sectionName: string,
  variables: Record<string, string>,
): { content: string; warnings: string[] } | null {
  const section = prompt.sections.find((s) => s.name === sectionName);
  if (!section) return null;

  const warnings: string[] = [];
  const content = section.content.replace(/\$\{(\w+)\}/g, (match, varName: string) => {
    if (Object.prototype.hasOwnProperty.call(variables, varName)) return variables[varName];
    warnings.push(`Variable "${varName}" referenced in section "${sectionName}" but not provided`);
    return match;
  });

  return { content, warnings };
}

/**
 * Load the prompt file and render one section. Throws when the file or the
 * section is missing, since no generation step can run without its prompt.
 */
export async function loadAndRenderSection(
  sectionName: string,
  variables: Record<string, string>,
  fileName: string = SUMMARIZER_PROMPT_FILE,
): Promise<RenderedSection> {
  const result = await loadPromptFile(fileName);
  if (!result.success || !result.prompt) {
    throw new Error(`Cannot load prompt file ${fileName}: ${result.errors.join("; ")}`);
  }

  const rendered = renderSection(result.prompt, sectionName, variables);
  if (!rendered || !rendered.content.trim()) {
    throw new Error(`Missing or empty prompt section: ${sectionName}`);
  }

  const warnings = [...result.warnings, ...rendered.warnings];
  for (const w of warnings) console.warn(`[Prompt-Loader] ${w}`);

  return { content: rendered.content, contentHash: result.prompt.contentHash, warnings };
}
