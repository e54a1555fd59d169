import type { Capability } from "../callbacks.js";
import type { NativeDbCipher } from "../storage/types.js";

// --- Native side ---

export interface NativeDMReceiver {
  receive(
    messageId: Uint8Array,
    nickname: string,
    text: Uint8Array,
    partnerKey: Uint8Array,
    senderKey: Uint8Array,
    dmToken: number,
    codeset: number,
    timestamp: number,
    roundId: number,
    messageType: number,
    status: number,
  ): number;
  receiveText(
    messageId: Uint8Array,
    nickname: string,
    text: string,
    partnerKey: Uint8Array,
    senderKey: Uint8Array,
    dmToken: number,
    codeset: number,
    timestamp: number,
    roundId: number,
    status: number,
  ): number;
  receiveReply(
    messageId: Uint8Array,
    reactionTo: Uint8Array,
    nickname: string,
    text: string,
    partnerKey: Uint8Array,
    senderKey: Uint8Array,
    dmToken: number,
    codeset: number,
    timestamp: number,
    roundId: number,
    status: number,
  ): number;
  receiveReaction(
    messageId: Uint8Array,
    reactionTo: Uint8Array,
    nickname: string,
    reaction: string,
    partnerKey: Uint8Array,
    senderKey: Uint8Array,
    dmToken: number,
    codeset: number,
    timestamp: number,
    roundId: number,
    status: number,
  ): number;
  updateSentStatus(
    uuid: number,
    messageId: Uint8Array,
    timestamp: number,
    roundId: number,
    status: number,
  ): void;
  deleteMessage(messageId: Uint8Array, senderPubKey: Uint8Array): boolean;
  getConversation(senderPubKey: Uint8Array): Uint8Array;
  getConversations(): Uint8Array;
}

export interface NativeDMReceiverBuilder {
  build(path: string): NativeDMReceiver;
}

export interface NativeDmNotificationUpdate {
  callback(
    notificationFilterJson: Uint8Array,
    changedStateListJson: Uint8Array,
    deletedListJson: Uint8Array,
  ): void;
}

export interface NativeDMClient {
  getID(): number;
  getPublicKey(): Uint8Array;
  getToken(): number;
  getIdentity(): Uint8Array;
  exportPrivateIdentity(password: string): Uint8Array;
  getNickname(): string;
  setNickname(nickname: string): void;
  blockPartner(partnerPubKey: Uint8Array): Promise<void>;
  unblockPartner(partnerPubKey: Uint8Array): Promise<void>;
  isBlocked(partnerPubKey: Uint8Array): Promise<boolean>;
  getBlockedPartners(): Promise<Uint8Array>;
  getDatabaseName(): string;
  getShareURL(host: string): Uint8Array;
  sendText(
    partnerPubKey: Uint8Array,
    partnerToken: number,
    message: string,
    leaseMs: number,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array>;
  sendReply(
    partnerPubKey: Uint8Array,
    partnerToken: number,
    message: string,
    replyToId: Uint8Array,
    leaseMs: number,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array>;
  sendReaction(
    partnerPubKey: Uint8Array,
    partnerToken: number,
    reaction: string,
    reactToId: Uint8Array,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array>;
  sendInvite(
    partnerPubKey: Uint8Array,
    partnerToken: number,
    inviteToChannelJson: Uint8Array,
    message: string,
    host: string,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array>;
  sendSilent(
    partnerPubKey: Uint8Array,
    partnerToken: number,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array>;
  send(
    partnerPubKey: Uint8Array,
    partnerToken: number,
    messageType: number,
    plaintext: Uint8Array,
    leaseMs: number,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array>;
  getNotificationLevel(partnerPubKey: Uint8Array): Promise<number>;
  setMobileNotificationsLevel(partnerPubKey: Uint8Array, level: number): Promise<void>;
}

export interface NativeDMBindings {
  newDMClient(
    cmixId: number,
    notificationsId: number,
    privateIdentity: Uint8Array,
    receiverBuilder: NativeDMReceiverBuilder,
    notificationUpdate: NativeDmNotificationUpdate,
  ): NativeDMClient;
  newDMClientWithIndexedDb(
    cmixId: number,
    notificationsId: number,
    cipher: NativeDbCipher,
    privateIdentity: Uint8Array,
    notificationUpdate: NativeDmNotificationUpdate,
  ): Promise<NativeDMClient>;
  newDMClientWithIndexedDbUnsafe(
    cmixId: number,
    notificationsId: number,
    privateIdentity: Uint8Array,
    notificationUpdate: NativeDmNotificationUpdate,
  ): Promise<NativeDMClient>;
  decodeDMShareURL(url: string): Uint8Array;
  getDmNotificationReportsForMe(
    notificationFilterJson: Uint8Array,
    notificationDataCsv: string,
  ): Promise<Uint8Array>;
}

// --- Host side ---

/** Direct-message storage. Receive methods return the stored message's uuid. */
export interface DMReceiver {
  receive(
    messageId: Uint8Array,
    nickname: string,
    text: Uint8Array,
    partnerKey: Uint8Array,
    senderKey: Uint8Array,
    dmToken: number,
    codeset: number,
    timestamp: number,
    roundId: number,
    messageType: number,
    status: number,
  ): number;
  receiveText(
    messageId: Uint8Array,
    nickname: string,
    text: string,
    partnerKey: Uint8Array,
    senderKey: Uint8Array,
    dmToken: number,
    codeset: number,
    timestamp: number,
    roundId: number,
    status: number,
  ): number;
  receiveReply(
    messageId: Uint8Array,
    reactionTo: Uint8Array,
    nickname: string,
    text: string,
    partnerKey: Uint8Array,
    senderKey: Uint8Array,
    dmToken: number,
    codeset: number,
    timestamp: number,
    roundId: number,
    status: number,
  ): number;
  receiveReaction(
    messageId: Uint8Array,
    reactionTo: Uint8Array,
    nickname: string,
    reaction: string,
    partnerKey: Uint8Array,
    senderKey: Uint8Array,
    dmToken: number,
    codeset: number,
    timestamp: number,
    roundId: number,
    status: number,
  ): number;
  updateSentStatus(
    uuid: number,
    messageId: Uint8Array,
    timestamp: number,
    roundId: number,
    status: number,
  ): void;
  deleteMessage(messageId: Uint8Array, senderPubKey: Uint8Array): boolean;
  /** JSON of the conversation with `senderPubKey`. */
  getConversation(senderPubKey: Uint8Array): Uint8Array;
  /** JSON list of every conversation. */
  getConversations(): Uint8Array;
}

export type DMReceiverBuilder = Capability<"build", [path: string], DMReceiver>;

export type DmNotificationUpdate = Capability<
  "callback",
  [
    notificationFilterJson: Uint8Array,
    changedStateListJson: Uint8Array,
    deletedListJson: Uint8Array,
  ]
>;

export const NotificationLevel = {
  Mute: 10,
  WhenOpen: 20,
  All: 40,
} as const;
