export {
  type TransferState,
  type TransferDirection,
  type TransferContext,
  type TransferWaitOptions,
} from './types.js';
export { ExternalTransfer } from './external-transfer.js';
export { ExternalUpload } from './external-upload.js';
export { ExternalDownload } from './external-download.js';
