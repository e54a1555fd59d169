import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import { bindCapability } from "../callbacks.js";
import { intArg } from "../marshal.js";
import type { TimeSource } from "./types.js";

/** Replace the native clock with `source` (milliseconds since the epoch). */
export function setTimeSource(
  source: TimeSource,
  ctx: BindingsContext = ensureBindings(),
): void {
  const now = bindCapability("source", source, "nowMs");
  ctx.boundary.call("setTimeSource", () => ctx.native.setTimeSource({ nowMs: () => now() }));
}

/** Shift the native clock by `offsetMs`. */
export function setOffset(offsetMs: number, ctx: BindingsContext = ensureBindings()): void {
  const offset = intArg("offsetMs", offsetMs);
  ctx.boundary.call("setOffset", () => ctx.native.setOffset(offset));
}
