/**
 * FileTransfer — direct file transfer to an E2E partner.
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { bytesArg, intArg, numberArg, uintArg } from "../marshal.js";
import { adaptProgressCallback, adaptReceiveFileCallback } from "./part-tracker.js";
import type {
  NativeFileTransfer,
  ProgressCallback,
  ReceiveFileCallback,
} from "./types.js";

export class FileTransfer implements EntryPoints<NativeFileTransfer> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeFileTransfer,
  ) {
    Object.freeze(this);
  }

  /**
   * Start sending the file described by `fileSend` (JSON). Resolves to the
   * transfer ID once the transfer is queued; progress arrives on `progressCb`.
   *
   * @param retry - Resends allowed per part, as a fraction of the part count.
   */
  async send(
    fileSend: Uint8Array,
    recipientId: Uint8Array,
    retry: number,
    progressCb: ProgressCallback,
    periodMs: number,
  ): Promise<Uint8Array> {
    const file = bytesArg("fileSend", fileSend);
    const recipient = bytesArg("recipientId", recipientId);
    const r = numberArg("retry", retry);
    const cb = adaptProgressCallback(this._ctx, "progressCb", progressCb);
    const period = uintArg("periodMs", periodMs);
    return this._ctx.boundary.settleBytes("FileTransfer.send", () =>
      this._native.send(file, recipient, r, cb, period),
    );
  }

  /** Contents of a completed incoming transfer. */
  receive(transferId: Uint8Array): Uint8Array {
    const tid = bytesArg("transferId", transferId);
    return this._ctx.boundary.callBytes("FileTransfer.receive", () =>
      this._native.receive(tid),
    );
  }

  closeSend(transferId: Uint8Array): void {
    const tid = bytesArg("transferId", transferId);
    this._ctx.boundary.call("FileTransfer.closeSend", () => this._native.closeSend(tid));
  }

  registerSentProgressCallback(
    transferId: Uint8Array,
    progressCb: ProgressCallback,
    periodMs: number,
  ): void {
    const tid = bytesArg("transferId", transferId);
    const cb = adaptProgressCallback(this._ctx, "progressCb", progressCb);
    const period = uintArg("periodMs", periodMs);
    this._ctx.boundary.call("FileTransfer.registerSentProgressCallback", () =>
      this._native.registerSentProgressCallback(tid, cb, period),
    );
  }

  registerReceivedProgressCallback(
    transferId: Uint8Array,
    progressCb: ProgressCallback,
    periodMs: number,
  ): void {
    const tid = bytesArg("transferId", transferId);
    const cb = adaptProgressCallback(this._ctx, "progressCb", progressCb);
    const period = uintArg("periodMs", periodMs);
    this._ctx.boundary.call("FileTransfer.registerReceivedProgressCallback", () =>
      this._native.registerReceivedProgressCallback(tid, cb, period),
    );
  }

  // --- Limits ---

  maxFileNameLen(): number {
    return this._ctx.boundary.call("FileTransfer.maxFileNameLen", () =>
      this._native.maxFileNameLen(),
    );
  }

  maxFileTypeLen(): number {
    return this._ctx.boundary.call("FileTransfer.maxFileTypeLen", () =>
      this._native.maxFileTypeLen(),
    );
  }

  maxFileSize(): number {
    return this._ctx.boundary.call("FileTransfer.maxFileSize", () =>
      this._native.maxFileSize(),
    );
  }

  maxPreviewSize(): number {
    return this._ctx.boundary.call("FileTransfer.maxPreviewSize", () =>
      this._native.maxPreviewSize(),
    );
  }
}

export function initFileTransfer(
  e2eId: number,
  receiveCb: ReceiveFileCallback,
  e2eFileTransferParams: Uint8Array,
  fileTransferParams: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): FileTransfer {
  const id = intArg("e2eId", e2eId);
  const cb = adaptReceiveFileCallback(ctx, "receiveCb", receiveCb);
  const e2eParams = bytesArg("e2eFileTransferParams", e2eFileTransferParams);
  const ftParams = bytesArg("fileTransferParams", fileTransferParams);
  const native = ctx.boundary.call("initFileTransfer", () =>
    ctx.native.initFileTransfer(id, cb, e2eParams, ftParams),
  );
  return new FileTransfer(ctx, native);
}
