export {
  DownloadOrchestrator,
  createOrchestrator,
  declaredFileName,
  type AcceptedDocument,
  type DownloadOutcome,
  type DownloadResult,
  type OrchestratorOptions,
} from './orchestrator.js';
export { StatusTarget } from './status-target.js';
