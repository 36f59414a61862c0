/**
 * Shared type definitions for the evaluator and report layers.
 */

/**
 * The specification of an evaluator (serializable format).
 * `arguments` is null (no arguments), a single positional argument, or
 * keyword arguments.
 */
export interface EvaluatorSpec {
  name: string;
  arguments: null | [unknown] | Record<string, unknown>;
}

/**
 * Recorded when a report evaluator throws while a dataset is evaluated.
 */
export interface EvaluatorFailure {
  name: string;
  errorMessage: string;
  errorStacktrace: string;
  source: EvaluatorSpec;
}

/** A single scored observation: the model's score and its ground-truth label. */
export interface ScoredCase {
  name?: string;
  score: number;
  label: number;
}
