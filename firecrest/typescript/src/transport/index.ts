export {
  FetchHttpTransport,
  ERROR_HEADERS,
  DEFAULT_RATE_LIMIT_RESET_SECONDS,
  categoryForPath,
  parseRetryAfter,
  type HttpTransport,
  type HttpMethod,
  type RequestBody,
  type TransportRequest,
  type TransportResponse,
  type FetchHttpTransportOptions,
} from './http-transport.js';
export {
  FetchObjectStorageTransfer,
  type ObjectStorageTransfer,
  type StagingForm,
} from './object-storage.js';
