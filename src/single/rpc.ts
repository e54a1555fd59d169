import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import { bindCapability } from "../callbacks.js";
import { bytesArg, copyBytes, decodeText, intArg } from "../marshal.js";
import type { RpcResponseCallback } from "./types.js";

/**
 * Send an RPC request to the server at `recipient` (its reception ID) and
 * resolve to the final response. Intermediate responses go to `onResponse`,
 * or to the info log when it is omitted.
 */
export async function rpcSend(
  cmixId: number,
  recipient: Uint8Array,
  pubKey: Uint8Array,
  request: Uint8Array,
  onResponse?: RpcResponseCallback,
  ctx: BindingsContext = ensureBindings(),
): Promise<Uint8Array> {
  const id = intArg("cmixId", cmixId);
  const to = bytesArg("recipient", recipient);
  const key = bytesArg("pubKey", pubKey);
  const req = bytesArg("request", request);
  const respond =
    onResponse === undefined
      ? (response: Uint8Array) => ctx.logger.info(`rpcSend response: ${decodeText(response)}`)
      : bindCapability("onResponse", onResponse, "callback");
  return ctx.boundary.settleBytes("rpcSend", async () => {
    try {
      return await ctx.native.rpcSend(id, to, key, req, {
        callback: (response) => respond(copyBytes(response)),
      });
    } catch (err) {
      // The error text arrives as bytes.
      throw err instanceof Uint8Array ? decodeText(err) : err;
    }
  });
}
