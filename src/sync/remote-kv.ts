/**
 * RemoteKV — a prefixed key-value view over the synchronised collective
 * store. Keys and maps carry versioned-object JSON; listeners report
 * changes made by other devices (and, when asked, local ones).
 *
 * Usage:
 *   const kv = await newOrLoadSyncRemoteKV(e2e.getID(), "/sync/txlog", onKey, store);
 *   const settings = await kv.prefix("settings");
 *   await settings.set("theme", objectJson);
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { bindCapability, requireMethods } from "../callbacks.js";
import { boolArg, bytesArg, copyBytes, intArg, stringArg } from "../marshal.js";
import type {
  KeyChangedCallback,
  KeyUpdateCallback,
  MapChangedCallback,
  NativeRemoteKV,
  NativeRemoteStore,
  RemoteStore,
} from "./types.js";

export class RemoteKV implements EntryPoints<NativeRemoteKV> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeRemoteKV,
  ) {
    Object.freeze(this);
  }

  // ==========================================================================
  // Keys
  // ==========================================================================

  /** Resolves to the versioned-object JSON stored under `key`. */
  async get(key: string, version: number): Promise<Uint8Array> {
    const k = stringArg("key", key);
    const v = intArg("version", version);
    return this._ctx.boundary.settleBytes("RemoteKV.get", () => this._native.get(k, v));
  }

  async delete(key: string, version: number): Promise<void> {
    const k = stringArg("key", key);
    const v = intArg("version", version);
    await this._ctx.boundary.settle("RemoteKV.delete", () => this._native.delete(k, v));
  }

  /** `key` must already be the full key; see {@link RemoteKV.getFullKey}. */
  async set(key: string, objectJson: Uint8Array): Promise<void> {
    const k = stringArg("key", key);
    const value = bytesArg("objectJson", objectJson);
    await this._ctx.boundary.settle("RemoteKV.set", () => this._native.set(k, value));
  }

  async getFullKey(key: string, version: number): Promise<string> {
    const k = stringArg("key", key);
    const v = intArg("version", version);
    return this._ctx.boundary.settle("RemoteKV.getFullKey", () =>
      this._native.getFullKey(k, v),
    );
  }

  // ==========================================================================
  // Prefixes
  // ==========================================================================

  async getPrefix(): Promise<string> {
    return this._ctx.boundary.settle("RemoteKV.getPrefix", () => this._native.getPrefix());
  }

  async hasPrefix(prefix: string): Promise<boolean> {
    const p = stringArg("prefix", prefix);
    return this._ctx.boundary.settle("RemoteKV.hasPrefix", () => this._native.hasPrefix(p));
  }

  /** A new view with `prefix` appended to this one's. */
  async prefix(prefix: string): Promise<RemoteKV> {
    const p = stringArg("prefix", prefix);
    const native = await this._ctx.boundary.settle("RemoteKV.prefix", () =>
      this._native.prefix(p),
    );
    return new RemoteKV(this._ctx, native);
  }

  /** A view with no prefixes. */
  async root(): Promise<RemoteKV> {
    const native = await this._ctx.boundary.settle("RemoteKV.root", () => this._native.root());
    return new RemoteKV(this._ctx, native);
  }

  async isMemStore(): Promise<boolean> {
    return this._ctx.boundary.settle("RemoteKV.isMemStore", () => this._native.isMemStore());
  }

  // ==========================================================================
  // Maps
  // ==========================================================================

  async storeMapElement(
    mapName: string,
    elementKey: string,
    objectJson: Uint8Array,
    version: number,
  ): Promise<void> {
    const name = stringArg("mapName", mapName);
    const element = stringArg("elementKey", elementKey);
    const value = bytesArg("objectJson", objectJson);
    const v = intArg("version", version);
    await this._ctx.boundary.settle("RemoteKV.storeMapElement", () =>
      this._native.storeMapElement(name, element, value, v),
    );
  }

  /** `mapJson` maps element keys to versioned-object JSON. */
  async storeMap(mapName: string, mapJson: Uint8Array, version: number): Promise<void> {
    const name = stringArg("mapName", mapName);
    const value = bytesArg("mapJson", mapJson);
    const v = intArg("version", version);
    await this._ctx.boundary.settle("RemoteKV.storeMap", () =>
      this._native.storeMap(name, value, v),
    );
  }

  /** Resolves to the deleted element's versioned-object JSON. */
  async deleteMapElement(
    mapName: string,
    elementKey: string,
    version: number,
  ): Promise<Uint8Array> {
    const name = stringArg("mapName", mapName);
    const element = stringArg("elementKey", elementKey);
    const v = intArg("version", version);
    return this._ctx.boundary.settleBytes("RemoteKV.deleteMapElement", () =>
      this._native.deleteMapElement(name, element, v),
    );
  }

  async getMap(mapName: string, version: number): Promise<Uint8Array> {
    const name = stringArg("mapName", mapName);
    const v = intArg("version", version);
    return this._ctx.boundary.settleBytes("RemoteKV.getMap", () =>
      this._native.getMap(name, v),
    );
  }

  async getMapElement(
    mapName: string,
    elementKey: string,
    version: number,
  ): Promise<Uint8Array> {
    const name = stringArg("mapName", mapName);
    const element = stringArg("elementKey", elementKey);
    const v = intArg("version", version);
    return this._ctx.boundary.settleBytes("RemoteKV.getMapElement", () =>
      this._native.getMapElement(name, element, v),
    );
  }

  // ==========================================================================
  // Listeners
  // ==========================================================================

  /**
   * Resolves to the listener id. `version` and `localEvents` only take
   * effect on the first listener for `key`.
   */
  async listenOnRemoteKey(
    key: string,
    version: number,
    cb: KeyChangedCallback,
    localEvents = true,
  ): Promise<number> {
    const k = stringArg("key", key);
    const v = intArg("version", version);
    const fn = bindCapability("cb", cb, "callback");
    const local = boolArg("localEvents", localEvents);
    return this._ctx.boundary.settle("RemoteKV.listenOnRemoteKey", () =>
      this._native.listenOnRemoteKey(
        k,
        v,
        {
          callback: (changedKey, oldValue, newValue, operation) =>
            fn(changedKey, copyBytes(oldValue), copyBytes(newValue), operation),
        },
        local,
      ),
    );
  }

  async listenOnRemoteMap(
    mapName: string,
    version: number,
    cb: MapChangedCallback,
    localEvents = true,
  ): Promise<number> {
    const name = stringArg("mapName", mapName);
    const v = intArg("version", version);
    const fn = bindCapability("cb", cb, "callback");
    const local = boolArg("localEvents", localEvents);
    return this._ctx.boundary.settle("RemoteKV.listenOnRemoteMap", () =>
      this._native.listenOnRemoteMap(
        name,
        v,
        { callback: (changedMap, editsJson) => fn(changedMap, copyBytes(editsJson)) },
        local,
      ),
    );
  }

  /** JSON object of key → listener ids. */
  getAllRemoteKeyListeners(): Uint8Array {
    return this._ctx.boundary.callBytes("RemoteKV.getAllRemoteKeyListeners", () =>
      this._native.getAllRemoteKeyListeners(),
    );
  }

  /** JSON list of the listener ids on `key`. */
  getRemoteKeyListeners(key: string): Uint8Array {
    const k = stringArg("key", key);
    return this._ctx.boundary.callBytes("RemoteKV.getRemoteKeyListeners", () =>
      this._native.getRemoteKeyListeners(k),
    );
  }

  async deleteRemoteKeyListener(key: string, id: number): Promise<void> {
    const k = stringArg("key", key);
    const listenerId = intArg("id", id);
    await this._ctx.boundary.settle("RemoteKV.deleteRemoteKeyListener", () =>
      this._native.deleteRemoteKeyListener(k, listenerId),
    );
  }

  getAllRemoteMapListeners(): Uint8Array {
    return this._ctx.boundary.callBytes("RemoteKV.getAllRemoteMapListeners", () =>
      this._native.getAllRemoteMapListeners(),
    );
  }

  getRemoteMapListeners(mapName: string): Uint8Array {
    const name = stringArg("mapName", mapName);
    return this._ctx.boundary.callBytes("RemoteKV.getRemoteMapListeners", () =>
      this._native.getRemoteMapListeners(name),
    );
  }

  async deleteRemoteMapListener(mapName: string, id: number): Promise<void> {
    const name = stringArg("mapName", mapName);
    const listenerId = intArg("id", id);
    await this._ctx.boundary.settle("RemoteKV.deleteRemoteMapListener", () =>
      this._native.deleteRemoteMapListener(name, listenerId),
    );
  }
}

// --- Remote store capability ---

const REMOTE_STORE_METHODS = [
  "read",
  "write",
  "getLastModified",
  "getLastWrite",
  "readDir",
] as const;

export function adaptRemoteStore(label: string, host: RemoteStore): NativeRemoteStore {
  const store = requireMethods(label, host, REMOTE_STORE_METHODS);
  return {
    async read(path) {
      return copyBytes(await store.read(path));
    },
    write(path, data) {
      return store.write(path, copyBytes(data));
    },
    getLastModified(path) {
      return store.getLastModified(path);
    },
    getLastWrite() {
      return store.getLastWrite();
    },
    async readDir(path) {
      return copyBytes(await store.readDir(path));
    },
  };
}

/**
 * Open (or create) the synchronised KV for an E2e client. `keyUpdate` hears
 * every key the sync applies; `remoteStore` holds the transaction log.
 */
export async function newOrLoadSyncRemoteKV(
  e2eId: number,
  txLogPath: string,
  keyUpdate: KeyUpdateCallback,
  remoteStore: RemoteStore,
  ctx: BindingsContext = ensureBindings(),
): Promise<RemoteKV> {
  const id = intArg("e2eId", e2eId);
  const path = stringArg("txLogPath", txLogPath);
  const onKey = bindCapability("keyUpdate", keyUpdate, "callback");
  const store = adaptRemoteStore("remoteStore", remoteStore);
  const native = await ctx.boundary.settle("newOrLoadSyncRemoteKV", () =>
    ctx.native.newOrLoadSyncRemoteKV(
      id,
      path,
      { callback: (key, value) => onKey(key, value) },
      store,
    ),
  );
  return new RemoteKV(ctx, native);
}
