export { FirecrestError } from './error.js';
export {
  ConfigurationError,
  RequestFailureError,
  NetworkError,
  UnauthorizedError,
  NotFoundError,
  RateLimitError,
  TimeoutError,
  TransferFailureError,
  LocalIoError,
  InvalidStateError,
  UnknownStatusError,
  type UnknownStatusReason,
} from './categories.js';
