/**
 * Default parameter sets, as JSON. Edit and pass them back to the entry
 * points that take params.
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";

export function getDefaultCMixParams(ctx: BindingsContext = ensureBindings()): Uint8Array {
  return ctx.boundary.callBytes("getDefaultCMixParams", () =>
    ctx.native.getDefaultCMixParams(),
  );
}

export function getDefaultE2EParams(ctx: BindingsContext = ensureBindings()): Uint8Array {
  return ctx.boundary.callBytes("getDefaultE2EParams", () =>
    ctx.native.getDefaultE2EParams(),
  );
}

export function getDefaultFileTransferParams(
  ctx: BindingsContext = ensureBindings(),
): Uint8Array {
  return ctx.boundary.callBytes("getDefaultFileTransferParams", () =>
    ctx.native.getDefaultFileTransferParams(),
  );
}

export function getDefaultSingleUseParams(
  ctx: BindingsContext = ensureBindings(),
): Uint8Array {
  return ctx.boundary.callBytes("getDefaultSingleUseParams", () =>
    ctx.native.getDefaultSingleUseParams(),
  );
}

export function getDefaultE2eFileTransferParams(
  ctx: BindingsContext = ensureBindings(),
): Uint8Array {
  return ctx.boundary.callBytes("getDefaultE2eFileTransferParams", () =>
    ctx.native.getDefaultE2eFileTransferParams(),
  );
}
