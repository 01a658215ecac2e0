export {
  sanitizeFilename,
  fileExtension,
  suffixedPath,
  makeUniquePath,
  createUniqueFile,
  type UniqueFile,
} from './filename.js';
export { formatBytes, formatDuration, renderProgressBar } from './format.js';
export {
  ProgressReporter,
  formatProgress,
  type ByteSink,
  type ProgressReporterOptions,
  type ProgressSnapshot,
  type TransferSummary,
} from './progress-reporter.js';
