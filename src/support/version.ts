import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";

/** Version of the bindings module. */
export function getVersion(ctx: BindingsContext = ensureBindings()): string {
  return ctx.boundary.call("getVersion", () => ctx.native.getVersion());
}

/** Version of the messaging client library. */
export function getClientVersion(ctx: BindingsContext = ensureBindings()): string {
  return ctx.boundary.call("getClientVersion", () => ctx.native.getClientVersion());
}

export function getClientGitVersion(ctx: BindingsContext = ensureBindings()): string {
  return ctx.boundary.call("getClientGitVersion", () => ctx.native.getClientGitVersion());
}

/** The client's module dependency list. */
export function getClientDependencies(ctx: BindingsContext = ensureBindings()): string {
  return ctx.boundary.call("getClientDependencies", () =>
    ctx.native.getClientDependencies(),
  );
}

/**
 * JSON `{"current", "updated", "old"}` for the bindings build: its version,
 * the version found in storage before this start, and whether they differ.
 */
export function getWasmSemanticVersion(ctx: BindingsContext = ensureBindings()): Uint8Array {
  return ctx.boundary.callBytes("getWasmSemanticVersion", () =>
    ctx.native.getWasmSemanticVersion(),
  );
}

/** Same report as {@link getWasmSemanticVersion}, for the client library. */
export function getXXDKSemanticVersion(ctx: BindingsContext = ensureBindings()): Uint8Array {
  return ctx.boundary.callBytes("getXXDKSemanticVersion", () =>
    ctx.native.getXXDKSemanticVersion(),
  );
}
