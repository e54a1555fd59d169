import type { Capability } from "../callbacks.js";
import type { NativeError } from "../errors.js";
import type { FilePartTracker } from "./part-tracker.js";

// --- Native side ---

export interface NativeFilePartTracker {
  getPartStatus(partNum: number): number;
  getNumParts(): number;
}

export interface NativeReceiveFileCallback {
  callback(payload: Uint8Array, err: unknown): void;
}

/** Sent and received progress share one shape. */
export interface NativeProgressCallback {
  callback(payload: Uint8Array, tracker: NativeFilePartTracker | null, err: unknown): void;
}

export interface NativeFileTransfer {
  send(
    fileSend: Uint8Array,
    recipientId: Uint8Array,
    retry: number,
    progressCb: NativeProgressCallback,
    periodMs: number,
  ): Promise<Uint8Array>;
  receive(transferId: Uint8Array): Uint8Array;
  closeSend(transferId: Uint8Array): void;
  registerSentProgressCallback(
    transferId: Uint8Array,
    progressCb: NativeProgressCallback,
    periodMs: number,
  ): void;
  registerReceivedProgressCallback(
    transferId: Uint8Array,
    progressCb: NativeProgressCallback,
    periodMs: number,
  ): void;
  maxFileNameLen(): number;
  maxFileTypeLen(): number;
  maxFileSize(): number;
  maxPreviewSize(): number;
}

export interface NativeChannelsFileTransfer {
  getExtensionBuilderID(): number;
  maxFileNameLen(): number;
  maxFileTypeLen(): number;
  maxFileSize(): number;
  maxPreviewSize(): number;
  upload(
    fileData: Uint8Array,
    retry: number,
    progressCb: NativeProgressCallback,
    periodMs: number,
  ): Promise<Uint8Array>;
  send(
    channelId: Uint8Array,
    fileLinkJson: Uint8Array,
    fileName: string,
    fileType: string,
    preview: Uint8Array,
    validUntilMs: number,
    cmixParams: Uint8Array,
    pingsJson: Uint8Array,
  ): Promise<Uint8Array>;
  registerSentProgressCallback(
    fileId: Uint8Array,
    progressCb: NativeProgressCallback,
    periodMs: number,
  ): Promise<void>;
  retryUpload(
    fileId: Uint8Array,
    progressCb: NativeProgressCallback,
    periodMs: number,
  ): Promise<void>;
  closeSend(fileId: Uint8Array): Promise<void>;
  download(
    fileInfoJson: Uint8Array,
    progressCb: NativeProgressCallback,
    periodMs: number,
  ): Promise<Uint8Array>;
  registerReceivedProgressCallback(
    fileId: Uint8Array,
    progressCb: NativeProgressCallback,
    periodMs: number,
  ): Promise<void>;
}

export interface NativeFileTransferBindings {
  initFileTransfer(
    e2eId: number,
    receiveCb: NativeReceiveFileCallback,
    e2eFileTransferParams: Uint8Array,
    fileTransferParams: Uint8Array,
  ): NativeFileTransfer;
  initChannelsFileTransfer(
    e2eId: number,
    paramsJson: Uint8Array,
  ): Promise<NativeChannelsFileTransfer>;
}

// --- Host side ---

export type ReceiveFileCallback = Capability<
  "callback",
  [payload: Uint8Array, err: NativeError | null]
>;

/**
 * Called once on initialization, on progress updates (at most once per
 * period), and on fatal error. The tracker may be null once completed.
 */
export type ProgressCallback = Capability<
  "callback",
  [progress: Uint8Array, tracker: FilePartTracker | null, err: NativeError | null]
>;

/** Part states reported by `FilePartTracker.getPartStatus`. */
export const PartStatus = {
  Unsent: 0,
  Sent: 1,
  Arrived: 2,
  Received: 3,
} as const;
