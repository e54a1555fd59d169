export { FileTransfer, initFileTransfer } from "./file-transfer/file-transfer.js";
export {
  ChannelsFileTransfer,
  initChannelsFileTransfer,
} from "./file-transfer/channels-file-transfer.js";
export { FilePartTracker } from "./file-transfer/part-tracker.js";
export { PartStatus } from "./file-transfer/types.js";
export type { ProgressCallback, ReceiveFileCallback } from "./file-transfer/types.js";
