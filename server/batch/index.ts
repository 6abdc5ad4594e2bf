export {
  BatchOrchestrator,
  BatchOptionsError,
  selectWindow,
  DEFAULT_SAMPLE_COUNT,
  GENERATION_REPORT_FILE,
} from './orchestrator.js';
export type {
  BatchDependencies,
  BatchOptions,
  BatchResult,
  Converter,
  LetterRenderer,
} from './orchestrator.js';
export { documentBaseName, documentFileName, slugify } from './naming.js';
export type { DocumentNaming } from './naming.js';
export { buildArchive, writeArchive } from './archive.js';
