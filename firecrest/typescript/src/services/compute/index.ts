export { ComputeServiceImpl, type ComputeService } from './service.js';
export type {
  JobScript,
  SubmitOptions,
  SubmitAndWaitOptions,
  AccountingOptions,
  JobSubmission,
  JobQueueEntry,
  JobAcctEntry,
} from './types.js';
