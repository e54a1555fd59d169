/**
 * Channels, broadcast channels, and the storage their event models use:
 * ciphers, and purging it all.
 */

export {
  ChannelsManager,
  newChannelsManager,
  loadChannelsManager,
  newChannelsManagerWithIndexedDb,
  newChannelsManagerDummyNameService,
  newChannelsManagerWithIndexedDbDummyNameService,
  generateChannel,
  getChannelInfo,
  generateChannelIdentity,
  getPublicChannelIdentityFromPrivate,
  isNicknameValid,
} from "./channels/channels-manager.js";
export { BroadcastChannel, newBroadcastChannel } from "./channels/broadcast.js";
export { BroadcastMethod, PrivacyLevel } from "./channels/types.js";
export type {
  BroadcastListener,
  ChannelMessageCallback,
  EventModel,
  EventModelBuilder,
} from "./channels/types.js";

export { DbCipher, newDatabaseCipher } from "./storage/cipher.js";
export { purge } from "./storage/purge.js";
