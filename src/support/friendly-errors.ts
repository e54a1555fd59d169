import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import { stringArg } from "../marshal.js";

/**
 * Map a native error message to one fit to show users. Known errors come
 * from the common-errors table; others have backend jargon stripped.
 */
export function createUserFriendlyErrorMessage(
  errStr: string,
  ctx: BindingsContext = ensureBindings(),
): string {
  const msg = stringArg("errStr", errStr);
  return ctx.boundary.call("createUserFriendlyErrorMessage", () =>
    ctx.native.createUserFriendlyErrorMessage(msg),
  );
}

/**
 * Replace the common-errors table. `jsonFile` maps error substrings to
 * user-facing messages:
 *
 *   {"Failed to Unmarshal Conversation": "Could not retrieve conversation"}
 */
export function updateCommonErrors(
  jsonFile: string,
  ctx: BindingsContext = ensureBindings(),
): void {
  const json = stringArg("jsonFile", jsonFile);
  ctx.boundary.call("updateCommonErrors", () => ctx.native.updateCommonErrors(json));
}
