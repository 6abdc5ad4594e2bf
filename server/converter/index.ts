export { DocumentConverter } from './document-converter.js';
export type { DocumentConverterOptions } from './document-converter.js';
export { spawnProcess } from './process-runner.js';
export type { ProcessResult, ProcessRunner, RunOptions } from './process-runner.js';
