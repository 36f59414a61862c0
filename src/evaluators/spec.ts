/**
 * Short forms for evaluator specs in YAML/JSON dataset files:
 * - `'MyEvaluator'`: no arguments
 * - `{ MyEvaluator: value }`: a single positional argument
 * - `{ MyEvaluator: { k1: v1, k2: v2 } }`: keyword arguments
 */

import type { EvaluatorSpec } from '../types.js';

export function deserializeEvaluatorSpec(value: unknown): EvaluatorSpec {
  if (typeof value === 'string') {
    return { name: value, arguments: null };
  }

  if (isPlainObject(value)) {
    const entries = Object.entries(value);
    if (entries.length !== 1) {
      throw new Error(
        `Expected a single key containing the evaluator name, found keys ${JSON.stringify(Object.keys(value))}`,
      );
    }
    const [name, raw] = entries[0];
    if (raw === undefined || raw === null) {
      return { name, arguments: null };
    }
    return { name, arguments: isPlainObject(raw) ? raw : [raw] };
  }

  throw new Error(`Invalid evaluator spec: ${JSON.stringify(value)}`);
}

export function serializeEvaluatorSpec(spec: EvaluatorSpec): unknown {
  if (spec.arguments === null) {
    return spec.name;
  }
  if (Array.isArray(spec.arguments)) {
    return { [spec.name]: spec.arguments[0] };
  }
  return { [spec.name]: spec.arguments };
}

/**
 * Keyword arguments for a spec. A positional argument is assigned to
 * `positionalField`.
 */
export function specOptions(spec: EvaluatorSpec, positionalField: string): Record<string, unknown> {
  if (spec.arguments === null) {
    return {};
  }
  if (Array.isArray(spec.arguments)) {
    return { [positionalField]: spec.arguments[0] };
  }
  return spec.arguments;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
