/**
 * Single-use messages: one request, at most one response, no session.
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { bindCapability } from "../callbacks.js";
import { bytesArg, copyBytes, intArg, stringArg } from "../marshal.js";
import type { NativeReportCallback, NativeStopper, ReportCallback } from "./types.js";

export function adaptReportCallback(
  ctx: BindingsContext,
  label: string,
  cb: ReportCallback,
): NativeReportCallback {
  const fn = bindCapability(label, cb, "callback");
  return {
    callback(report, err) {
      fn(copyBytes(report), ctx.boundary.error(err));
    },
  };
}

export class Stopper implements EntryPoints<NativeStopper> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeStopper,
  ) {
    Object.freeze(this);
  }

  stop(): void {
    this._ctx.boundary.call("Stopper.stop", () => this._native.stop());
  }
}

/**
 * Send `payload` to `recipientContact` under `tag`. Resolves to JSON of the
 * send report; the response, if any, arrives on `responseCb`.
 */
export async function transmitSingleUse(
  e2eId: number,
  recipientContact: Uint8Array,
  tag: string,
  payload: Uint8Array,
  singleParams: Uint8Array,
  responseCb: ReportCallback,
  ctx: BindingsContext = ensureBindings(),
): Promise<Uint8Array> {
  const id = intArg("e2eId", e2eId);
  const contact = bytesArg("recipientContact", recipientContact);
  const t = stringArg("tag", tag);
  const data = bytesArg("payload", payload);
  const params = bytesArg("singleParams", singleParams);
  const cb = adaptReportCallback(ctx, "responseCb", responseCb);
  return ctx.boundary.settleBytes("transmitSingleUse", () =>
    ctx.native.transmitSingleUse(id, contact, t, data, params, cb),
  );
}

/** Listen for single-use requests on `tag` until the returned stopper is stopped. */
export function listen(
  e2eId: number,
  tag: string,
  cb: ReportCallback,
  ctx: BindingsContext = ensureBindings(),
): Stopper {
  const id = intArg("e2eId", e2eId);
  const t = stringArg("tag", tag);
  const adapted = adaptReportCallback(ctx, "cb", cb);
  const native = ctx.boundary.call("listen", () => ctx.native.listen(id, t, adapted));
  return new Stopper(ctx, native);
}
