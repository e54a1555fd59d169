import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { NativeError } from "../errors.js";
import { stringArg } from "../marshal.js";

/** JSON list of the emojis reactions may use. */
export function supportedEmojis(ctx: BindingsContext = ensureBindings()): Uint8Array {
  return ctx.boundary.callBytes("supportedEmojis", () => ctx.native.supportedEmojis());
}

/** JSON map of supported emoji by character. */
export function supportedEmojisMap(ctx: BindingsContext = ensureBindings()): Uint8Array {
  return ctx.boundary.callBytes("supportedEmojisMap", () =>
    ctx.native.supportedEmojisMap(),
  );
}

/** The reason `reaction` is not a valid reaction, or null if it is one. */
export function validateReaction(
  reaction: string,
  ctx: BindingsContext = ensureBindings(),
): NativeError | null {
  const r = stringArg("reaction", reaction);
  return ctx.boundary.check("validateReaction", () => ctx.native.validateReaction(r));
}
