/**
 * Batch Summarization
 *
 * Runs many queries against one shared, read-only document store with a
 * concurrency limit. Each query ends in its own outcome; a failure never
 * aborts its siblings and never yields a partial result.
 *
 * @module summarizer/batch-runner
 */

import pLimit from "p-limit";
import { classifyError, type ErrorCategory } from "../error-classification";
import type { ParsedInput } from "../input-record";
import type { SummarizeOptions } from "./pipeline";
import type { Query, SummaryResult } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export type BatchOutcome =
  | { queryId: string; status: "ok"; result: SummaryResult }
  | { queryId: string; status: "failed"; error: Error; category: ErrorCategory };

export interface BatchConfig {
  maxConcurrency: number;
  onProgress?: (completed: number, total: number) => void;
}

export interface QuerySummarizer {
  summarizeQuery(query: Query, options?: SummarizeOptions): Promise<SummaryResult>;
}

// ============================================================================
// BATCH EXECUTION
// ============================================================================

/**
 * Summarize every input, each restricted to its own supplied documents.
 * Outcomes come back in input order.
 */
export async function summarizeBatch(
  inputs: readonly ParsedInput[],
  summarizer: QuerySummarizer,
  config: BatchConfig,
): Promise<BatchOutcome[]> {
  const { maxConcurrency, onProgress } = config;
  const limit = pLimit(maxConcurrency);
  let completed = 0;

  const tasks = inputs.map((input) =>
    limit(async (): Promise<BatchOutcome> => {
      const queryId = input.query.id;
      let outcome: BatchOutcome;
      try {
        const result = await summarizer.summarizeQuery(input.query, { candidateIds: input.docIds });
        outcome = { queryId, status: "ok", result };
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        const { category } = classifyError(error);
        console.error(`[Batch] Query ${queryId} failed (${error.name}): ${error.message}`);
        outcome = { queryId, status: "failed", error, category };
      }
      completed++;
      onProgress?.(completed, inputs.length);
      return outcome;
    }),
  );

  const outcomes = await Promise.all(tasks);
  const failed = outcomes.filter((o) => o.status === "failed").length;
  console.log(`[Batch] Completed ${outcomes.length} queries (${outcomes.length - failed} ok, ${failed} failed)`);
  return outcomes;
}
