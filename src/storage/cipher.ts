/**
 * Database ciphers. Each cipher is registered in the context's registry so
 * storage-backed factories can refer to it by id.
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { bytesArg, intArg, stringArg, uintArg } from "../marshal.js";
import type { NativeDbCipher } from "./types.js";

export class DbCipher implements EntryPoints<NativeDbCipher> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeDbCipher,
    /** Registry handle; pass it to the `...WithIndexedDb` factories. */
    readonly id: number,
  ) {
    Object.freeze(this);
  }

  /** Encrypt `plaintext` (at most the configured block size). Returns base64 ciphertext. */
  encrypt(plaintext: Uint8Array): string {
    const data = bytesArg("plaintext", plaintext);
    return this._ctx.boundary.call("DbCipher.encrypt", () =>
      this._native.encrypt(data),
    );
  }

  decrypt(ciphertext: string): Uint8Array {
    const data = stringArg("ciphertext", ciphertext);
    return this._ctx.boundary.callBytes("DbCipher.decrypt", () => this._native.decrypt(data));
  }

  marshalJSON(): Uint8Array {
    return this._ctx.boundary.callBytes("DbCipher.marshalJSON", () => this._native.marshalJSON());
  }

  unmarshalJSON(json: Uint8Array): void {
    const data = bytesArg("json", json);
    this._ctx.boundary.call("DbCipher.unmarshalJSON", () =>
      this._native.unmarshalJSON(data),
    );
  }
}

/**
 * Create a cipher for storage encryption and register it.
 *
 * @param password - Must match the password used for the cmix storage.
 * @param plaintextBlockSize - Largest payload `encrypt` accepts.
 */
export function newDatabaseCipher(
  cmixId: number,
  password: Uint8Array,
  plaintextBlockSize: number,
  ctx: BindingsContext = ensureBindings(),
): DbCipher {
  const id = intArg("cmixId", cmixId);
  const pw = bytesArg("password", password);
  const blockSize = uintArg("plaintextBlockSize", plaintextBlockSize);
  const native = ctx.boundary.call("newDatabaseCipher", () =>
    ctx.native.newDatabaseCipher(id, pw, blockSize),
  );
  return new DbCipher(ctx, native, ctx.registry.ciphers.add(native));
}

/** Look up a registered cipher's native handle. */
export function getDatabaseCipher(
  cipherId: number,
  ctx: BindingsContext,
): NativeDbCipher {
  return ctx.registry.ciphers.get(intArg("cipherId", cipherId));
}
