export {
  TransferManager,
  planChunks,
  type TransferOptions,
  type TransferSink,
  type TransferEvent,
  type CompletedTransfer,
} from './manager.js';

export { sniffMime, isImageMime, DEFAULT_MIME } from './mime.js';
