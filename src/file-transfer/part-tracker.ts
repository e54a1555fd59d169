import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { bindCapability } from "../callbacks.js";
import { copyBytes, uintArg } from "../marshal.js";
import type {
  NativeFilePartTracker,
  NativeProgressCallback,
  NativeReceiveFileCallback,
  ProgressCallback,
  ReceiveFileCallback,
} from "./types.js";

/** Per-part status lookup, handed to progress callbacks of both transfer managers. */
export class FilePartTracker implements EntryPoints<NativeFilePartTracker> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeFilePartTracker,
  ) {
    Object.freeze(this);
  }

  /** One of {@link PartStatus}. */
  getPartStatus(partNum: number): number {
    const n = uintArg("partNum", partNum);
    return this._ctx.boundary.call("FilePartTracker.getPartStatus", () =>
      this._native.getPartStatus(n),
    );
  }

  getNumParts(): number {
    return this._ctx.boundary.call("FilePartTracker.getNumParts", () =>
      this._native.getNumParts(),
    );
  }
}

export function adaptProgressCallback(
  ctx: BindingsContext,
  label: string,
  cb: ProgressCallback,
): NativeProgressCallback {
  const fn = bindCapability(label, cb, "callback");
  return {
    callback(payload, tracker, err) {
      fn(
        copyBytes(payload),
        tracker ? new FilePartTracker(ctx, tracker) : null,
        ctx.boundary.error(err),
      );
    },
  };
}

export function adaptReceiveFileCallback(
  ctx: BindingsContext,
  label: string,
  cb: ReceiveFileCallback,
): NativeReceiveFileCallback {
  const fn = bindCapability(label, cb, "callback");
  return {
    callback(payload, err) {
      fn(copyBytes(payload), ctx.boundary.error(err));
    },
  };
}
