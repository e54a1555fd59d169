import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import { stringArg } from "../marshal.js";

/**
 * Download the signed network definition from `url` and verify it against
 * `cert`. Resolves to the NDF JSON to pass to `newCmix`.
 */
export async function downloadAndVerifySignedNdfWithUrl(
  url: string,
  cert: string,
  ctx: BindingsContext = ensureBindings(),
): Promise<Uint8Array> {
  const u = stringArg("url", url);
  const c = stringArg("cert", cert);
  return ctx.boundary.settleBytes("downloadAndVerifySignedNdfWithUrl", () =>
    ctx.native.downloadAndVerifySignedNdfWithUrl(u, c),
  );
}
