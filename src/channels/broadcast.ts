/**
 * Broadcast channels: raw symmetric or asymmetric broadcast over a channel
 * definition, without the channels manager's message types.
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { bindCapability } from "../callbacks.js";
import { bytesArg, copyBytes, intArg } from "../marshal.js";
import type { BroadcastListener, NativeBroadcastChannel } from "./types.js";

export class BroadcastChannel implements EntryPoints<NativeBroadcastChannel> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeBroadcastChannel,
  ) {
    Object.freeze(this);
  }

  /** @param method - One of {@link BroadcastMethod}. */
  listen(cb: BroadcastListener, method: number): void {
    const fn = bindCapability("cb", cb, "callback");
    const m = intArg("method", method);
    const ctx = this._ctx;
    this._ctx.boundary.call("BroadcastChannel.listen", () =>
      this._native.listen(
        { callback: (payload, err) => fn(copyBytes(payload), ctx.boundary.error(err)) },
        m,
      ),
    );
  }

  /**
   * Broadcast `payload` (at most `maxPayloadSize()` bytes). Resolves to JSON
   * of the broadcast report.
   */
  async broadcast(payload: Uint8Array): Promise<Uint8Array> {
    const data = bytesArg("payload", payload);
    return this._ctx.boundary.settleBytes("BroadcastChannel.broadcast", () =>
      this._native.broadcast(data),
    );
  }

  async broadcastAsymmetric(payload: Uint8Array, privateKey: Uint8Array): Promise<Uint8Array> {
    const data = bytesArg("payload", payload);
    const key = bytesArg("privateKey", privateKey);
    return this._ctx.boundary.settleBytes("BroadcastChannel.broadcastAsymmetric", () =>
      this._native.broadcastAsymmetric(data, key),
    );
  }

  maxPayloadSize(): number {
    return this._ctx.boundary.call("BroadcastChannel.maxPayloadSize", () =>
      this._native.maxPayloadSize(),
    );
  }

  maxAsymmetricPayloadSize(): number {
    return this._ctx.boundary.call("BroadcastChannel.maxAsymmetricPayloadSize", () =>
      this._native.maxAsymmetricPayloadSize(),
    );
  }

  /** JSON of the channel definition. */
  get(): Uint8Array {
    return this._ctx.boundary.callBytes("BroadcastChannel.get", () => this._native.get());
  }

  stop(): void {
    this._ctx.boundary.call("BroadcastChannel.stop", () => this._native.stop());
  }
}

export function newBroadcastChannel(
  cmixId: number,
  channelDefJson: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): BroadcastChannel {
  const id = intArg("cmixId", cmixId);
  const def = bytesArg("channelDefJson", channelDefJson);
  const native = ctx.boundary.call("newBroadcastChannel", () =>
    ctx.native.newBroadcastChannel(id, def),
  );
  return new BroadcastChannel(ctx, native);
}
