import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import { uintArg } from "../marshal.js";

/** Random secret of `numBytes` bytes (32 if 0), suitable as a storage password. */
export function generateSecret(
  numBytes: number,
  ctx: BindingsContext = ensureBindings(),
): Uint8Array {
  const n = uintArg("numBytes", numBytes);
  return ctx.boundary.callBytes("generateSecret", () => ctx.native.generateSecret(n));
}
