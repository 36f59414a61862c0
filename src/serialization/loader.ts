/**
 * YAML/JSON loading and saving for scored datasets.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import YAML from 'yaml';
import { ScoredDataset } from '../dataset.js';
import { DEFAULT_REPORT_EVALUATORS, type EvaluatorRegistryEntry } from '../evaluators/report-common.js';
import type { ReportEvaluator } from '../evaluators/report-evaluator.js';
import { deserializeEvaluatorSpec, serializeEvaluatorSpec } from '../evaluators/spec.js';
import type { EvaluatorSpec, ScoredCase } from '../types.js';
import { datasetSchema } from './schema.js';

export type DatasetFormat = 'yaml' | 'json';

export interface LoadOptions {
  /** Registry entries for custom report evaluators. */
  customReportEvaluators?: EvaluatorRegistryEntry[];
  /** File format. If not specified, inferred from file extension. */
  fmt?: DatasetFormat;
}

/**
 * Load a ScoredDataset from a file. The file name (without extension) is the
 * default dataset name.
 */
export function loadDatasetFromFile(path: string, opts?: LoadOptions): ScoredDataset {
  const fmt = opts?.fmt ?? inferFormat(path);
  const content = readFileSync(path, 'utf-8');
  return loadDatasetFromText(content, { ...opts, fmt, defaultName: stemOf(path) });
}

/**
 * Load a ScoredDataset from a YAML (default) or JSON string.
 */
export function loadDatasetFromText(
  content: string,
  opts?: LoadOptions & { defaultName?: string },
): ScoredDataset {
  const fmt = opts?.fmt ?? 'yaml';
  const raw: unknown = fmt === 'yaml' ? YAML.parse(content) : JSON.parse(content);
  return loadDatasetFromObject(raw, opts);
}

/**
 * Load a ScoredDataset from a plain object (after parsing YAML/JSON).
 */
export function loadDatasetFromObject(
  data: unknown,
  opts?: LoadOptions & { defaultName?: string },
): ScoredDataset {
  const parsed = datasetSchema.parse(data);
  const registry = buildRegistry(opts?.customReportEvaluators ?? [], DEFAULT_REPORT_EVALUATORS);

  const reportEvaluators = parsed.report_evaluators.map((rawSpec) =>
    loadEvaluatorFromRegistry(registry, deserializeEvaluatorSpec(rawSpec)),
  );

  const cases: ScoredCase[] = parsed.cases.map((row) => ({
    ...(row.name != null ? { name: row.name } : {}),
    score: row.score,
    label: row.label,
  }));

  return new ScoredDataset({
    name: parsed.name ?? opts?.defaultName ?? null,
    cases,
    reportEvaluators,
  });
}

/**
 * Save a ScoredDataset to a file.
 */
export function saveDatasetToFile(
  dataset: ScoredDataset,
  path: string,
  opts?: { fmt?: DatasetFormat },
): void {
  const fmt = opts?.fmt ?? inferFormat(path);
  const data = serializeDataset(dataset);
  const content =
    fmt === 'yaml' ? YAML.stringify(data, { sortMapEntries: false }) : `${JSON.stringify(data, null, 2)}\n`;
  writeFileSync(path, content, 'utf-8');
}

function serializeDataset(dataset: ScoredDataset): Record<string, unknown> {
  const data: Record<string, unknown> = {};

  if (dataset.name) data.name = dataset.name;

  data.cases = dataset.cases.map((c) => ({
    ...(c.name ? { name: c.name } : {}),
    score: c.score,
    label: c.label,
  }));

  if (dataset.reportEvaluators.length > 0) {
    data.report_evaluators = dataset.reportEvaluators.map((ev) =>
      serializeEvaluatorSpec(ev.asSpec()),
    );
  }

  return data;
}

// -- Registry helpers --

function buildRegistry(
  customEntries: EvaluatorRegistryEntry[],
  defaults: EvaluatorRegistryEntry[],
): Map<string, EvaluatorRegistryEntry> {
  const registry = new Map<string, EvaluatorRegistryEntry>();

  for (const entry of customEntries) {
    if (registry.has(entry.name)) {
      throw new Error(`Duplicate evaluator class name: '${entry.name}'`);
    }
    registry.set(entry.name, entry);
  }
  for (const entry of defaults) {
    if (!registry.has(entry.name)) {
      registry.set(entry.name, entry);
    }
  }

  return registry;
}

function loadEvaluatorFromRegistry(
  registry: Map<string, EvaluatorRegistryEntry>,
  spec: EvaluatorSpec,
): ReportEvaluator {
  const entry = registry.get(spec.name);
  if (!entry) {
    throw new Error(
      `Evaluator '${spec.name}' is not in the registry. ` +
        `Valid choices: ${[...registry.keys()].join(', ')}. ` +
        `If using a custom evaluator, pass its entry in customReportEvaluators.`,
    );
  }

  try {
    return entry.create(spec);
  } catch (e) {
    const error = e instanceof Error ? e : new Error(String(e));
    throw new Error(`Failed to instantiate evaluator '${spec.name}': ${error.message}`, {
      cause: error,
    });
  }
}

// -- Utilities --

function inferFormat(path: string): DatasetFormat {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  throw new Error(
    `Could not infer format for filename '${basename(path)}'. Use the fmt option to specify the format.`,
  );
}

function stemOf(path: string): string {
  const base = basename(path);
  return base.slice(0, base.length - extname(base).length);
}
