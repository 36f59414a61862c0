export type { DatasetFormat, LoadOptions } from './loader.js';
export {
  loadDatasetFromFile,
  loadDatasetFromObject,
  loadDatasetFromText,
  saveDatasetToFile,
} from './loader.js';
export type { DatasetFile, EvaluatorSpecRaw } from './schema.js';
export { datasetSchema, evaluatorSpecSchema, scoredCaseSchema } from './schema.js';
