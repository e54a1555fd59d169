/**
 * ChannelsFileTransfer — uploads files for sharing in channels, and
 * downloads files shared there.
 *
 * Fatal errors arrive on the progress callback; recover with `retryUpload`
 * or give up with `closeSend`.
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import {
  bytesArg,
  intArg,
  numberArg,
  optionalBytesArg,
  stringArg,
  uintArg,
} from "../marshal.js";
import { adaptProgressCallback } from "./part-tracker.js";
import type { NativeChannelsFileTransfer, ProgressCallback } from "./types.js";

export class ChannelsFileTransfer implements EntryPoints<NativeChannelsFileTransfer> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeChannelsFileTransfer,
  ) {
    Object.freeze(this);
  }

  /** Pass to the channels manager so it can handle file messages. */
  getExtensionBuilderID(): number {
    return this._ctx.boundary.call("ChannelsFileTransfer.getExtensionBuilderID", () =>
      this._native.getExtensionBuilderID(),
    );
  }

  maxFileNameLen(): number {
    return this._ctx.boundary.call("ChannelsFileTransfer.maxFileNameLen", () =>
      this._native.maxFileNameLen(),
    );
  }

  maxFileTypeLen(): number {
    return this._ctx.boundary.call("ChannelsFileTransfer.maxFileTypeLen", () =>
      this._native.maxFileTypeLen(),
    );
  }

  maxFileSize(): number {
    return this._ctx.boundary.call("ChannelsFileTransfer.maxFileSize", () =>
      this._native.maxFileSize(),
    );
  }

  maxPreviewSize(): number {
    return this._ctx.boundary.call("ChannelsFileTransfer.maxPreviewSize", () =>
      this._native.maxPreviewSize(),
    );
  }

  // ==========================================================================
  // Sending
  // ==========================================================================

  /**
   * Upload `fileData`. Resolves to the file ID. `progressCb` fires once on
   * initialization, then at most once per `periodMs`, and on fatal error.
   */
  async upload(
    fileData: Uint8Array,
    retry: number,
    progressCb: ProgressCallback,
    periodMs: number,
  ): Promise<Uint8Array> {
    const data = bytesArg("fileData", fileData);
    const r = numberArg("retry", retry);
    const cb = adaptProgressCallback(this._ctx, "progressCb", progressCb);
    const period = uintArg("periodMs", periodMs);
    return this._ctx.boundary.settleBytes("ChannelsFileTransfer.upload", () =>
      this._native.upload(data, r, cb, period),
    );
  }

  /**
   * Share an uploaded file in a channel. Resolves to JSON of the channel
   * send report.
   *
   * @param fileLinkJson - The file link the event model stored on upload.
   * @param validUntilMs - How long the message is valid; 0 uses the default.
   * @param pingsJson - JSON list of public keys to ping; omit for none.
   */
  async send(
    channelId: Uint8Array,
    fileLinkJson: Uint8Array,
    fileName: string,
    fileType: string,
    preview: Uint8Array,
    validUntilMs: number,
    cmixParams: Uint8Array,
    pingsJson?: Uint8Array,
  ): Promise<Uint8Array> {
    const channel = bytesArg("channelId", channelId);
    const link = bytesArg("fileLinkJson", fileLinkJson);
    const name = stringArg("fileName", fileName);
    const type = stringArg("fileType", fileType);
    const prev = bytesArg("preview", preview);
    const validUntil = uintArg("validUntilMs", validUntilMs);
    const params = bytesArg("cmixParams", cmixParams);
    const pings = optionalBytesArg("pingsJson", pingsJson);
    return this._ctx.boundary.settleBytes("ChannelsFileTransfer.send", () =>
      this._native.send(channel, link, name, type, prev, validUntil, params, pings),
    );
  }

  async registerSentProgressCallback(
    fileId: Uint8Array,
    progressCb: ProgressCallback,
    periodMs: number,
  ): Promise<void> {
    const id = bytesArg("fileId", fileId);
    const cb = adaptProgressCallback(this._ctx, "progressCb", progressCb);
    const period = uintArg("periodMs", periodMs);
    await this._ctx.boundary.settle("ChannelsFileTransfer.registerSentProgressCallback", () =>
      this._native.registerSentProgressCallback(id, cb, period),
    );
  }

  /** Retry a failed upload. Callbacks registered before the failure are dropped. */
  async retryUpload(
    fileId: Uint8Array,
    progressCb: ProgressCallback,
    periodMs: number,
  ): Promise<void> {
    const id = bytesArg("fileId", fileId);
    const cb = adaptProgressCallback(this._ctx, "progressCb", progressCb);
    const period = uintArg("periodMs", periodMs);
    await this._ctx.boundary.settle("ChannelsFileTransfer.retryUpload", () =>
      this._native.retryUpload(id, cb, period),
    );
  }

  async closeSend(fileId: Uint8Array): Promise<void> {
    const id = bytesArg("fileId", fileId);
    await this._ctx.boundary.settle("ChannelsFileTransfer.closeSend", () =>
      this._native.closeSend(id),
    );
  }

  // ==========================================================================
  // Receiving
  // ==========================================================================

  /** Start downloading the file described by `fileInfoJson`. Resolves to the file ID. */
  async download(
    fileInfoJson: Uint8Array,
    progressCb: ProgressCallback,
    periodMs: number,
  ): Promise<Uint8Array> {
    const info = bytesArg("fileInfoJson", fileInfoJson);
    const cb = adaptProgressCallback(this._ctx, "progressCb", progressCb);
    const period = uintArg("periodMs", periodMs);
    return this._ctx.boundary.settleBytes("ChannelsFileTransfer.download", () =>
      this._native.download(info, cb, period),
    );
  }

  async registerReceivedProgressCallback(
    fileId: Uint8Array,
    progressCb: ProgressCallback,
    periodMs: number,
  ): Promise<void> {
    const id = bytesArg("fileId", fileId);
    const cb = adaptProgressCallback(this._ctx, "progressCb", progressCb);
    const period = uintArg("periodMs", periodMs);
    await this._ctx.boundary.settle(
      "ChannelsFileTransfer.registerReceivedProgressCallback",
      () => this._native.registerReceivedProgressCallback(id, cb, period),
    );
  }
}

export async function initChannelsFileTransfer(
  e2eId: number,
  paramsJson: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): Promise<ChannelsFileTransfer> {
  const id = intArg("e2eId", e2eId);
  const params = bytesArg("paramsJson", paramsJson);
  const native = await ctx.boundary.settle("initChannelsFileTransfer", () =>
    ctx.native.initChannelsFileTransfer(id, params),
  );
  return new ChannelsFileTransfer(ctx, native);
}
