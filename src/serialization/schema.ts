/**
 * Zod schemas for the scored dataset file format.
 */

import { z } from 'zod';

/**
 * An evaluator spec in serialized form:
 * - string: evaluator name with no args
 * - { name: value }: single positional arg
 * - { name: { k1: v1, k2: v2 } }: keyword args
 */
export const evaluatorSpecSchema = z.union([
  z.string(),
  z.record(z.string(), z.unknown()).refine((obj) => Object.keys(obj).length === 1, {
    message: 'Evaluator spec object must have exactly one key (the evaluator name)',
  }),
]);

export type EvaluatorSpecRaw = z.infer<typeof evaluatorSpecSchema>;

export const scoredCaseSchema = z
  .object({
    name: z.string().optional().nullable(),
    score: z.number().finite(),
    label: z.number().finite(),
  })
  .strict();

export const datasetSchema = z
  .object({
    $schema: z.string().optional(),
    name: z.string().optional().nullable(),
    cases: z.array(scoredCaseSchema),
    report_evaluators: z.array(evaluatorSpecSchema).optional().default([]),
  })
  .strict();

export type DatasetFile = z.infer<typeof datasetSchema>;
