import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { bytesArg, copyBytes, intArg } from "../marshal.js";
import { adaptListener } from "./listeners.js";
import type {
  Listener,
  NativeAuthenticatedConnection,
  NativeConnection,
} from "./types.js";

/** A partner connection created by `Cmix.connect`. */
export class Connection<N extends NativeConnection = NativeConnection>
  implements EntryPoints<NativeConnection>
{
  constructor(
    protected readonly _ctx: BindingsContext,
    protected readonly _native: N,
  ) {
    Object.freeze(this);
  }

  getID(): number {
    return this._ctx.boundary.call("Connection.getID", () => this._native.getID());
  }

  /** Resolves to JSON of the send report. */
  async sendE2E(messageType: number, payload: Uint8Array): Promise<Uint8Array> {
    const type = intArg("messageType", messageType);
    const data = bytesArg("payload", payload);
    const report = await this._ctx.boundary.settle("Connection.sendE2E", () =>
      this._native.sendE2E(type, data),
    );
    return copyBytes(report);
  }

  close(): void {
    this._ctx.boundary.call("Connection.close", () => this._native.close());
  }

  /** Marshalled partner ID. */
  getPartner(): Uint8Array {
    return this._ctx.boundary.callBytes("Connection.getPartner", () => this._native.getPartner());
  }

  registerListener(messageType: number, listener: Listener): void {
    const type = intArg("messageType", messageType);
    const adapted = adaptListener("listener", listener);
    this._ctx.boundary.call("Connection.registerListener", () =>
      this._native.registerListener(type, adapted),
    );
  }
}

/** A connection whose partner identity has been verified. */
export class AuthenticatedConnection
  extends Connection<NativeAuthenticatedConnection>
  implements EntryPoints<NativeAuthenticatedConnection>
{
  isAuthenticated(): boolean {
    return this._ctx.boundary.call("AuthenticatedConnection.isAuthenticated", () =>
      this._native.isAuthenticated(),
    );
  }
}
