/**
 * Every adapter exposes exactly the methods of the native object it wraps,
 * and the package entry points together export every native function.
 */

import { describe, it, expect } from "vitest";
import { NATIVE_EXPORT_NAMES } from "./bindings-init.js";
import { Backup } from "./backup/backup.js";
import { BroadcastChannel } from "./channels/broadcast.js";
import { ChannelsManager } from "./channels/channels-manager.js";
import { DMClient } from "./dm/dm-client.js";
import { AuthenticatedConnection, Connection } from "./e2e/connection.js";
import { E2e } from "./e2e/e2e.js";
import { ChannelsFileTransfer } from "./file-transfer/channels-file-transfer.js";
import { FileTransfer } from "./file-transfer/file-transfer.js";
import { FilePartTracker } from "./file-transfer/part-tracker.js";
import { Group, GroupChat } from "./group/group-chat.js";
import { Cmix } from "./network/cmix.js";
import { DummyTraffic } from "./network/dummy-traffic.js";
import { Notifications } from "./network/notifications.js";
import { Stopper } from "./single/single-use.js";
import { DbCipher } from "./storage/cipher.js";
import { RemoteKV } from "./sync/remote-kv.js";
import { EkvLocalStore, FileSystemRemoteStore } from "./sync/stores.js";
import { UserDiscovery } from "./ud/user-discovery.js";
import * as channelsEntry from "./channels.js";
import * as dmEntry from "./dm.js";
import * as e2eEntry from "./e2e.js";
import * as fileTransferEntry from "./file-transfer.js";
import * as networkEntry from "./network.js";
import * as supportEntry from "./support.js";
import * as syncEntry from "./sync.js";
import {
  createTestContext,
  listEntryPoints,
  mockNative,
  sortedKeys,
} from "./testing/mock-bindings.js";
import type { Mocked } from "./testing/mock-bindings.js";
import * as methods from "./testing/native-methods.js";
import type { NativeBackup } from "./backup/types.js";
import type { NativeBroadcastChannel, NativeChannelsManager } from "./channels/types.js";
import type { NativeDMClient } from "./dm/types.js";
import type {
  NativeAuthenticatedConnection,
  NativeConnection,
  NativeE2e,
} from "./e2e/types.js";
import type {
  NativeChannelsFileTransfer,
  NativeFilePartTracker,
  NativeFileTransfer,
} from "./file-transfer/types.js";
import type { NativeGroup, NativeGroupChat } from "./group/types.js";
import type { NativeCmix, NativeDummyTraffic, NativeNotifications } from "./network/types.js";
import type { NativeStopper } from "./single/types.js";
import type { NativeDbCipher } from "./storage/types.js";
import type {
  NativeEkvLocalStore,
  NativeFileSystemRemoteStore,
  NativeRemoteKV,
} from "./sync/types.js";
import type { NativeUserDiscovery } from "./ud/types.js";

const { ctx } = createTestContext();

type AdapterCase = [name: string, adapter: object, methods: object];

function adapterCase<N>(
  name: string,
  methodMap: Record<keyof N, true>,
  make: (native: Mocked<N>) => object,
): AdapterCase {
  return [name, make(mockNative<N>(methodMap)), methodMap];
}

const adapters: AdapterCase[] = [
  adapterCase<NativeCmix>("Cmix", methods.CMIX_METHODS, (n) => new Cmix(ctx, n)),
  adapterCase<NativeDummyTraffic>(
    "DummyTraffic",
    methods.DUMMY_TRAFFIC_METHODS,
    (n) => new DummyTraffic(ctx, n),
  ),
  adapterCase<NativeNotifications>(
    "Notifications",
    methods.NOTIFICATIONS_METHODS,
    (n) => new Notifications(ctx, n),
  ),
  adapterCase<NativeE2e>("E2e", methods.E2E_METHODS, (n) => new E2e(ctx, n)),
  adapterCase<NativeConnection>(
    "Connection",
    methods.CONNECTION_METHODS,
    (n) => new Connection(ctx, n),
  ),
  adapterCase<NativeAuthenticatedConnection>(
    "AuthenticatedConnection",
    methods.AUTHENTICATED_CONNECTION_METHODS,
    (n) => new AuthenticatedConnection(ctx, n),
  ),
  adapterCase<NativeFilePartTracker>(
    "FilePartTracker",
    methods.FILE_PART_TRACKER_METHODS,
    (n) => new FilePartTracker(ctx, n),
  ),
  adapterCase<NativeFileTransfer>(
    "FileTransfer",
    methods.FILE_TRANSFER_METHODS,
    (n) => new FileTransfer(ctx, n),
  ),
  adapterCase<NativeChannelsFileTransfer>(
    "ChannelsFileTransfer",
    methods.CHANNELS_FILE_TRANSFER_METHODS,
    (n) => new ChannelsFileTransfer(ctx, n),
  ),
  adapterCase<NativeChannelsManager>(
    "ChannelsManager",
    methods.CHANNELS_MANAGER_METHODS,
    (n) => new ChannelsManager(ctx, n),
  ),
  adapterCase<NativeBroadcastChannel>(
    "BroadcastChannel",
    methods.BROADCAST_CHANNEL_METHODS,
    (n) => new BroadcastChannel(ctx, n),
  ),
  adapterCase<NativeDMClient>(
    "DMClient",
    methods.DM_CLIENT_METHODS,
    (n) => new DMClient(ctx, n),
  ),
  adapterCase<NativeStopper>(
    "Stopper",
    methods.STOPPER_METHODS,
    (n) => new Stopper(ctx, n),
  ),
  adapterCase<NativeGroupChat>(
    "GroupChat",
    methods.GROUP_CHAT_METHODS,
    (n) => new GroupChat(ctx, n),
  ),
  adapterCase<NativeGroup>("Group", methods.GROUP_METHODS, (n) => new Group(ctx, n)),
  adapterCase<NativeUserDiscovery>(
    "UserDiscovery",
    methods.USER_DISCOVERY_METHODS,
    (n) => new UserDiscovery(ctx, n),
  ),
  adapterCase<NativeBackup>("Backup", methods.BACKUP_METHODS, (n) => new Backup(ctx, n)),
  adapterCase<NativeDbCipher>(
    "DbCipher",
    methods.DB_CIPHER_METHODS,
    (n) => new DbCipher(ctx, n, 0),
  ),
  adapterCase<NativeRemoteKV>(
    "RemoteKV",
    methods.REMOTE_KV_METHODS,
    (n) => new RemoteKV(ctx, n),
  ),
  adapterCase<NativeEkvLocalStore>(
    "EkvLocalStore",
    methods.EKV_LOCAL_STORE_METHODS,
    (n) => new EkvLocalStore(ctx, n),
  ),
  adapterCase<NativeFileSystemRemoteStore>(
    "FileSystemRemoteStore",
    methods.FILE_SYSTEM_REMOTE_STORE_METHODS,
    (n) => new FileSystemRemoteStore(ctx, n),
  ),
];

describe("adapter entry points", () => {
  it.each(adapters)("%s mirrors its native object", (_name, adapter, native) => {
    expect(listEntryPoints(adapter)).toEqual(sortedKeys(native));
  });

  it.each(adapters)("%s is frozen", (_name, adapter) => {
    expect(Object.isFrozen(adapter)).toBe(true);
  });
});

describe("package entry points", () => {
  it("export a wrapper for every native function", () => {
    const exported = new Set([
      ...Object.keys(networkEntry),
      ...Object.keys(e2eEntry),
      ...Object.keys(channelsEntry),
      ...Object.keys(dmEntry),
      ...Object.keys(fileTransferEntry),
      ...Object.keys(supportEntry),
      ...Object.keys(syncEntry),
    ]);
    const missing = NATIVE_EXPORT_NAMES.filter((name) => !exported.has(name));
    expect(missing).toEqual([]);
  });
});
