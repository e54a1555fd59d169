/**
 * Method maps of every native object. Keyed by the native interface, so the
 * compiler rejects a map that omits or invents a method.
 */

import type { NativeBackup } from "../backup/types.js";
import type {
  NativeBroadcastChannel,
  NativeChannelsManager,
} from "../channels/types.js";
import type { NativeDMClient } from "../dm/types.js";
import type {
  NativeAuthenticatedConnection,
  NativeConnection,
  NativeE2e,
} from "../e2e/types.js";
import type {
  NativeChannelsFileTransfer,
  NativeFilePartTracker,
  NativeFileTransfer,
} from "../file-transfer/types.js";
import type { NativeGroup, NativeGroupChat } from "../group/types.js";
import type {
  NativeCmix,
  NativeDummyTraffic,
  NativeNotifications,
} from "../network/types.js";
import type { NativeStopper } from "../single/types.js";
import type { NativeDbCipher } from "../storage/types.js";
import type {
  NativeEkvLocalStore,
  NativeFileSystemRemoteStore,
  NativeRemoteKV,
} from "../sync/types.js";
import type { NativeUserDiscovery } from "../ud/types.js";

export const CMIX_METHODS: Record<keyof NativeCmix, true> = {
  getID: true,
  readyToSend: true,
  startNetworkFollower: true,
  stopNetworkFollower: true,
  waitForNetwork: true,
  networkFollowerStatus: true,
  getNodeRegistrationStatus: true,
  hasRunningProcessies: true,
  isHealthy: true,
  getRunningProcesses: true,
  addHealthCallback: true,
  removeHealthCallback: true,
  registerClientErrorCallback: true,
  trackServices: true,
  trackServicesWithIdentity: true,
  makeReceptionIdentity: true,
  makeLegacyReceptionIdentity: true,
  getReceptionRegistrationValidationSignature: true,
  connect: true,
  connectWithAuthentication: true,
  waitForRoundResult: true,
};

export const DUMMY_TRAFFIC_METHODS: Record<keyof NativeDummyTraffic, true> = {
  setStatus: true,
  getStatus: true,
};

export const NOTIFICATIONS_METHODS: Record<keyof NativeNotifications, true> = {
  getID: true,
  addToken: true,
  removeToken: true,
  setMaxState: true,
  getMaxState: true,
};

export const E2E_METHODS: Record<keyof NativeE2e, true> = {
  getID: true,
  getContact: true,
  getUdAddressFromNdf: true,
  getUdCertFromNdf: true,
  getUdContactFromNdf: true,
  getReceptionID: true,
  getAllPartnerIDs: true,
  payloadSize: true,
  secondPartitionSize: true,
  partitionSize: true,
  firstPartitionSize: true,
  getHistoricalDHPrivkey: true,
  getHistoricalDHPubkey: true,
  hasAuthenticatedChannel: true,
  removeService: true,
  sendE2E: true,
  addService: true,
  registerListener: true,
  request: true,
  confirm: true,
  reset: true,
  replayConfirm: true,
  callAllReceivedRequests: true,
  deleteRequest: true,
  deleteAllRequests: true,
  deleteSentRequests: true,
  deleteReceiveRequests: true,
  getReceivedRequest: true,
  verifyOwnership: true,
  addPartnerCallback: true,
  deletePartnerCallback: true,
};

export const CONNECTION_METHODS: Record<keyof NativeConnection, true> = {
  getID: true,
  sendE2E: true,
  close: true,
  getPartner: true,
  registerListener: true,
};

export const AUTHENTICATED_CONNECTION_METHODS: Record<
  keyof NativeAuthenticatedConnection,
  true
> = {
  ...CONNECTION_METHODS,
  isAuthenticated: true,
};

export const FILE_PART_TRACKER_METHODS: Record<keyof NativeFilePartTracker, true> = {
  getPartStatus: true,
  getNumParts: true,
};

export const FILE_TRANSFER_METHODS: Record<keyof NativeFileTransfer, true> = {
  send: true,
  receive: true,
  closeSend: true,
  registerSentProgressCallback: true,
  registerReceivedProgressCallback: true,
  maxFileNameLen: true,
  maxFileTypeLen: true,
  maxFileSize: true,
  maxPreviewSize: true,
};

export const CHANNELS_FILE_TRANSFER_METHODS: Record<
  keyof NativeChannelsFileTransfer,
  true
> = {
  getExtensionBuilderID: true,
  maxFileNameLen: true,
  maxFileTypeLen: true,
  maxFileSize: true,
  maxPreviewSize: true,
  upload: true,
  send: true,
  registerSentProgressCallback: true,
  retryUpload: true,
  closeSend: true,
  download: true,
  registerReceivedProgressCallback: true,
};

export const CHANNELS_MANAGER_METHODS: Record<keyof NativeChannelsManager, true> = {
  getID: true,
  joinChannel: true,
  getChannels: true,
  leaveChannel: true,
  replayChannel: true,
  sendGeneric: true,
  sendAdminGeneric: true,
  sendMessage: true,
  sendReply: true,
  sendReaction: true,
  registerReceiveHandler: true,
};

export const BROADCAST_CHANNEL_METHODS: Record<keyof NativeBroadcastChannel, true> = {
  listen: true,
  broadcast: true,
  broadcastAsymmetric: true,
  maxPayloadSize: true,
  maxAsymmetricPayloadSize: true,
  get: true,
  stop: true,
};

export const DM_CLIENT_METHODS: Record<keyof NativeDMClient, true> = {
  getID: true,
  getPublicKey: true,
  getToken: true,
  getIdentity: true,
  exportPrivateIdentity: true,
  getNickname: true,
  setNickname: true,
  blockPartner: true,
  unblockPartner: true,
  isBlocked: true,
  getBlockedPartners: true,
  getDatabaseName: true,
  getShareURL: true,
  sendText: true,
  sendReply: true,
  sendReaction: true,
  sendInvite: true,
  sendSilent: true,
  send: true,
  getNotificationLevel: true,
  setMobileNotificationsLevel: true,
};

export const STOPPER_METHODS: Record<keyof NativeStopper, true> = {
  stop: true,
};

export const GROUP_CHAT_METHODS: Record<keyof NativeGroupChat, true> = {
  makeGroup: true,
  resendRequest: true,
  joinGroup: true,
  leaveGroup: true,
  send: true,
  getGroups: true,
  getGroup: true,
  numGroups: true,
};

export const GROUP_METHODS: Record<keyof NativeGroup, true> = {
  getName: true,
  getID: true,
  getTrackedID: true,
  getInitMessage: true,
  getCreatedNano: true,
  getCreatedMS: true,
  getMembership: true,
  serialize: true,
};

export const USER_DISCOVERY_METHODS: Record<keyof NativeUserDiscovery, true> = {
  getID: true,
  getFacts: true,
  getContact: true,
  confirmFact: true,
  sendRegisterFact: true,
  permanentDeleteAccount: true,
  removeFact: true,
};

export const BACKUP_METHODS: Record<keyof NativeBackup, true> = {
  stopBackup: true,
  isBackupRunning: true,
  addJson: true,
};

export const DB_CIPHER_METHODS: Record<keyof NativeDbCipher, true> = {
  encrypt: true,
  decrypt: true,
  marshalJSON: true,
  unmarshalJSON: true,
};

export const REMOTE_KV_METHODS: Record<keyof NativeRemoteKV, true> = {
  get: true,
  delete: true,
  set: true,
  getPrefix: true,
  hasPrefix: true,
  prefix: true,
  root: true,
  isMemStore: true,
  getFullKey: true,
  storeMapElement: true,
  storeMap: true,
  deleteMapElement: true,
  getMap: true,
  getMapElement: true,
  listenOnRemoteKey: true,
  listenOnRemoteMap: true,
  getAllRemoteKeyListeners: true,
  getRemoteKeyListeners: true,
  deleteRemoteKeyListener: true,
  getAllRemoteMapListeners: true,
  getRemoteMapListeners: true,
  deleteRemoteMapListener: true,
};

export const EKV_LOCAL_STORE_METHODS: Record<keyof NativeEkvLocalStore, true> = {
  read: true,
  write: true,
};

export const FILE_SYSTEM_REMOTE_STORE_METHODS: Record<
  keyof NativeFileSystemRemoteStore,
  true
> = {
  read: true,
  write: true,
  getLastModified: true,
  getLastWrite: true,
};
