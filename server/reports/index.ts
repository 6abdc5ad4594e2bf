export { toCsv, writeCsv, parseCsv } from './csv.js';
export {
  GENERATION_REPORT_HEADER,
  formatGenerationReport,
  writeGenerationReport,
  readGenerationReport,
} from './generation-report.js';
export {
  DISPATCH_REPORT_HEADER,
  formatDispatchReport,
  writeDispatchReport,
  readSentIds,
} from './dispatch-report.js';
