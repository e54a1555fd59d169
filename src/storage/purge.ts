import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import { stringArg } from "../marshal.js";

/**
 * Delete every database and stored value the client keeps under
 * `storageDirectory`. Stop all network followers first. Throws a
 * `NativeError` ("invalid password") on a wrong password.
 */
export function purge(
  storageDirectory: string,
  password: string,
  ctx: BindingsContext = ensureBindings(),
): void {
  const dir = stringArg("storageDirectory", storageDirectory);
  const pw = stringArg("password", password);
  ctx.boundary.call("purge", () => ctx.native.purge(dir, pw));
}
