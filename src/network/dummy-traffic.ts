import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { boolArg, intArg, uintArg } from "../marshal.js";
import type { NativeDummyTraffic } from "./types.js";

/** Sends cover traffic at random intervals. Starts paused. */
export class DummyTraffic implements EntryPoints<NativeDummyTraffic> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeDummyTraffic,
  ) {
    Object.freeze(this);
  }

  setStatus(status: boolean): void {
    const s = boolArg("status", status);
    this._ctx.boundary.call("DummyTraffic.setStatus", () => this._native.setStatus(s));
  }

  getStatus(): boolean {
    return this._ctx.boundary.call("DummyTraffic.getStatus", () =>
      this._native.getStatus(),
    );
  }
}

export function newDummyTrafficManager(
  cmixId: number,
  maxNumMessages: number,
  avgSendDeltaMs: number,
  randomRangeMs: number,
  ctx: BindingsContext = ensureBindings(),
): DummyTraffic {
  const id = intArg("cmixId", cmixId);
  const max = uintArg("maxNumMessages", maxNumMessages);
  const avg = uintArg("avgSendDeltaMs", avgSendDeltaMs);
  const range = uintArg("randomRangeMs", randomRangeMs);
  const native = ctx.boundary.call("newDummyTrafficManager", () =>
    ctx.native.newDummyTrafficManager(id, max, avg, range),
  );
  return new DummyTraffic(ctx, native);
}
