/**
 * Synchronised key-value storage shared between a user's devices, and the
 * local and remote stores it runs over.
 */

export { RemoteKV, newOrLoadSyncRemoteKV } from "./sync/remote-kv.js";
export {
  EkvLocalStore,
  FileSystemRemoteStore,
  newEkvLocalStore,
  newFileSystemRemoteStorage,
} from "./sync/stores.js";
export type {
  KeyChangedCallback,
  KeyUpdateCallback,
  MapChangedCallback,
  RemoteStore,
} from "./sync/types.js";
