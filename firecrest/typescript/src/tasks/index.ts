export {
  type TaskCategory,
  type StatusClass,
  type TaskSnapshot,
  type TaskPredicate,
  toTaskSnapshot,
} from './types.js';
export {
  TaskStatus,
  classifyStatus,
  isTerminal,
  isSuccess,
  isFailure,
  successCode,
  failureCode,
  dataReadyCode,
  terminalPredicate,
  milestonePredicate,
  checkTransition,
  describeStatus,
} from './state-machine.js';
export { TasksService, type TaskSource } from './tasks-service.js';
export { TaskPoller, type PollOptions } from './task-poller.js';
