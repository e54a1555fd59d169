/**
 * Stores the sync layer reads and writes through: an encrypted local KV and
 * a plain file-system remote store.
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { bytesArg, stringArg } from "../marshal.js";
import type { NativeEkvLocalStore, NativeFileSystemRemoteStore } from "./types.js";

export class EkvLocalStore implements EntryPoints<NativeEkvLocalStore> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeEkvLocalStore,
  ) {
    Object.freeze(this);
  }

  async read(path: string): Promise<Uint8Array> {
    const p = stringArg("path", path);
    return this._ctx.boundary.settleBytes("EkvLocalStore.read", () => this._native.read(p));
  }

  async write(path: string, data: Uint8Array): Promise<void> {
    const p = stringArg("path", path);
    const bytes = bytesArg("data", data);
    await this._ctx.boundary.settle("EkvLocalStore.write", () =>
      this._native.write(p, bytes),
    );
  }
}

export class FileSystemRemoteStore implements EntryPoints<NativeFileSystemRemoteStore> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeFileSystemRemoteStore,
  ) {
    Object.freeze(this);
  }

  async read(path: string): Promise<Uint8Array> {
    const p = stringArg("path", path);
    return this._ctx.boundary.settleBytes("FileSystemRemoteStore.read", () =>
      this._native.read(p),
    );
  }

  async write(path: string, data: Uint8Array): Promise<void> {
    const p = stringArg("path", path);
    const bytes = bytesArg("data", data);
    await this._ctx.boundary.settle("FileSystemRemoteStore.write", () =>
      this._native.write(p, bytes),
    );
  }

  /** Resolves to JSON of the last-modified report for `path`. */
  async getLastModified(path: string): Promise<Uint8Array> {
    const p = stringArg("path", path);
    return this._ctx.boundary.settleBytes("FileSystemRemoteStore.getLastModified", () =>
      this._native.getLastModified(p),
    );
  }

  async getLastWrite(): Promise<Uint8Array> {
    return this._ctx.boundary.settleBytes("FileSystemRemoteStore.getLastWrite", () =>
      this._native.getLastWrite(),
    );
  }
}

/** Local KV under `baseDir`, encrypted with `password`. */
export async function newEkvLocalStore(
  baseDir: string,
  password: string,
  ctx: BindingsContext = ensureBindings(),
): Promise<EkvLocalStore> {
  const dir = stringArg("baseDir", baseDir);
  const pw = stringArg("password", password);
  const native = await ctx.boundary.settle("newEkvLocalStore", () =>
    ctx.native.newEkvLocalStore(dir, pw),
  );
  return new EkvLocalStore(ctx, native);
}

export function newFileSystemRemoteStorage(
  baseDir: string,
  ctx: BindingsContext = ensureBindings(),
): FileSystemRemoteStore {
  const dir = stringArg("baseDir", baseDir);
  const native = ctx.boundary.call("newFileSystemRemoteStorage", () =>
    ctx.native.newFileSystemRemoteStorage(dir),
  );
  return new FileSystemRemoteStore(ctx, native);
}
