export { logger } from "./logger";
export { onShutdown } from "./runtime";
export {
  BACKEND_KINDS,
  JOB_STATUSES,
  TERMINAL_STATUSES,
  FAILURE_TYPES,
  isTerminalStatus,
  emptyStatusCounts,
} from "./jobs";
export type { BackendKind, JobStatus, FailureType } from "./jobs";
