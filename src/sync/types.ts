import type { Capability } from "../callbacks.js";

// --- Native side ---

export interface NativeKeyChangedCallback {
  callback(key: string, oldValue: Uint8Array, newValue: Uint8Array, operation: number): void;
}

export interface NativeMapChangedCallback {
  callback(mapName: string, editsJson: Uint8Array): void;
}

export interface NativeKeyUpdateCallback {
  callback(key: string, value: string): void;
}

/** Storage the remote KV synchronises its transaction log to. */
export interface NativeRemoteStore {
  read(path: string): Promise<Uint8Array>;
  write(path: string, data: Uint8Array): Promise<void>;
  getLastModified(path: string): Promise<string>;
  getLastWrite(): Promise<string>;
  readDir(path: string): Promise<Uint8Array>;
}

/**
 * Values are JSON of a versioned object, e.g.
 * `{"Version":1,"Timestamp":"2023-05-13T00:50:03Z","Data":"bm90IHVwZ3JhZGVk"}`.
 */
export interface NativeRemoteKV {
  get(key: string, version: number): Promise<Uint8Array>;
  delete(key: string, version: number): Promise<void>;
  set(key: string, objectJson: Uint8Array): Promise<void>;
  getPrefix(): Promise<string>;
  hasPrefix(prefix: string): Promise<boolean>;
  prefix(prefix: string): Promise<NativeRemoteKV>;
  root(): Promise<NativeRemoteKV>;
  isMemStore(): Promise<boolean>;
  getFullKey(key: string, version: number): Promise<string>;
  storeMapElement(
    mapName: string,
    elementKey: string,
    objectJson: Uint8Array,
    version: number,
  ): Promise<void>;
  storeMap(mapName: string, mapJson: Uint8Array, version: number): Promise<void>;
  deleteMapElement(mapName: string, elementKey: string, version: number): Promise<Uint8Array>;
  getMap(mapName: string, version: number): Promise<Uint8Array>;
  getMapElement(mapName: string, elementKey: string, version: number): Promise<Uint8Array>;
  listenOnRemoteKey(
    key: string,
    version: number,
    cb: NativeKeyChangedCallback,
    localEvents: boolean,
  ): Promise<number>;
  listenOnRemoteMap(
    mapName: string,
    version: number,
    cb: NativeMapChangedCallback,
    localEvents: boolean,
  ): Promise<number>;
  getAllRemoteKeyListeners(): Uint8Array;
  getRemoteKeyListeners(key: string): Uint8Array;
  deleteRemoteKeyListener(key: string, id: number): Promise<void>;
  getAllRemoteMapListeners(): Uint8Array;
  getRemoteMapListeners(mapName: string): Uint8Array;
  deleteRemoteMapListener(mapName: string, id: number): Promise<void>;
}

export interface NativeEkvLocalStore {
  read(path: string): Promise<Uint8Array>;
  write(path: string, data: Uint8Array): Promise<void>;
}

export interface NativeFileSystemRemoteStore {
  read(path: string): Promise<Uint8Array>;
  write(path: string, data: Uint8Array): Promise<void>;
  /** JSON of the modification report. */
  getLastModified(path: string): Promise<Uint8Array>;
  getLastWrite(): Promise<Uint8Array>;
}

export interface NativeSyncBindings {
  newOrLoadSyncRemoteKV(
    e2eId: number,
    txLogPath: string,
    keyUpdate: NativeKeyUpdateCallback,
    remoteStore: NativeRemoteStore,
  ): Promise<NativeRemoteKV>;
  newEkvLocalStore(baseDir: string, password: string): Promise<NativeEkvLocalStore>;
  newFileSystemRemoteStorage(baseDir: string): NativeFileSystemRemoteStore;
}

// --- Host side ---

/** `operation` is the native key-operation code (created, updated, deleted...). */
export type KeyChangedCallback = Capability<
  "callback",
  [key: string, oldValue: Uint8Array, newValue: Uint8Array, operation: number]
>;

export type MapChangedCallback = Capability<
  "callback",
  [mapName: string, editsJson: Uint8Array]
>;

export type KeyUpdateCallback = Capability<"callback", [key: string, value: string]>;

/**
 * Host storage backing the remote KV. Rejections are reported to the native
 * side as failed reads and writes.
 */
export interface RemoteStore {
  read(path: string): Promise<Uint8Array>;
  write(path: string, data: Uint8Array): Promise<void>;
  getLastModified(path: string): Promise<string>;
  getLastWrite(): Promise<string>;
  /** JSON list of entry names. */
  readDir(path: string): Promise<Uint8Array>;
}
