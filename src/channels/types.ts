import type { Capability } from "../callbacks.js";
import type { NativeError } from "../errors.js";
import type { NativeDbCipher } from "../storage/types.js";

// --- Native side ---

export interface NativeEventModel {
  /** `channel` is the pretty-print form of the joined channel. */
  joinChannel(channel: string): void;
  leaveChannel(channelId: Uint8Array): void;
  receiveMessage(
    channelId: Uint8Array,
    messageId: Uint8Array,
    nickname: string,
    text: string,
    pubKey: Uint8Array,
    dmToken: number,
    codeset: number,
    timestamp: number,
    lease: number,
    roundId: number,
    messageType: number,
    status: number,
    hidden: boolean,
  ): number;
  receiveReply(
    channelId: Uint8Array,
    messageId: Uint8Array,
    reactionTo: Uint8Array,
    nickname: string,
    text: string,
    pubKey: Uint8Array,
    dmToken: number,
    codeset: number,
    timestamp: number,
    lease: number,
    roundId: number,
    messageType: number,
    status: number,
    hidden: boolean,
  ): number;
  receiveReaction(
    channelId: Uint8Array,
    messageId: Uint8Array,
    reactionTo: Uint8Array,
    nickname: string,
    reaction: string,
    pubKey: Uint8Array,
    dmToken: number,
    codeset: number,
    timestamp: number,
    lease: number,
    roundId: number,
    messageType: number,
    status: number,
    hidden: boolean,
  ): number;
  updateSentStatus(
    uuid: number,
    messageId: Uint8Array,
    timestamp: number,
    roundId: number,
    status: number,
  ): void;
}

export interface NativeEventModelBuilder {
  build(path: string): NativeEventModel;
}

export interface NativeChannelMessageCallback {
  callback(receivedChannelMessageReport: Uint8Array, err: unknown): void;
}

export interface NativeChannelsManager {
  getID(): number;
  joinChannel(channelPretty: string): Uint8Array;
  getChannels(): Uint8Array;
  leaveChannel(channelId: Uint8Array): void;
  replayChannel(channelId: Uint8Array): void;
  sendGeneric(
    channelId: Uint8Array,
    messageType: number,
    message: Uint8Array,
    leaseMs: number,
    tracked: boolean,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array>;
  sendAdminGeneric(
    adminPrivateKey: Uint8Array,
    channelId: Uint8Array,
    messageType: number,
    message: Uint8Array,
    leaseMs: number,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array>;
  sendMessage(
    channelId: Uint8Array,
    message: string,
    leaseMs: number,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array>;
  sendReply(
    channelId: Uint8Array,
    message: string,
    messageToReplyTo: Uint8Array,
    leaseMs: number,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array>;
  sendReaction(
    channelId: Uint8Array,
    reaction: string,
    messageToReactTo: Uint8Array,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array>;
  registerReceiveHandler(messageType: number, cb: NativeChannelMessageCallback): void;
}

export interface NativeBroadcastListener {
  callback(payload: Uint8Array, err: unknown): void;
}

export interface NativeBroadcastChannel {
  listen(cb: NativeBroadcastListener, method: number): void;
  broadcast(payload: Uint8Array): Promise<Uint8Array>;
  broadcastAsymmetric(payload: Uint8Array, privateKey: Uint8Array): Promise<Uint8Array>;
  maxPayloadSize(): number;
  maxAsymmetricPayloadSize(): number;
  get(): Uint8Array;
  stop(): void;
}

export interface NativeChannelsBindings {
  newChannelsManager(
    cmixId: number,
    privateIdentity: Uint8Array,
    eventBuilder: NativeEventModelBuilder,
  ): NativeChannelsManager;
  loadChannelsManager(
    cmixId: number,
    storageTag: string,
    eventBuilder: NativeEventModelBuilder,
  ): NativeChannelsManager;
  newChannelsManagerWithIndexedDb(
    cmixId: number,
    privateIdentity: Uint8Array,
    cipher: NativeDbCipher,
  ): Promise<NativeChannelsManager>;
  newChannelsManagerDummyNameService(
    cmixId: number,
    username: string,
    eventBuilder: NativeEventModelBuilder,
  ): NativeChannelsManager;
  newChannelsManagerWithIndexedDbDummyNameService(
    cmixId: number,
    username: string,
    cipher: NativeDbCipher,
  ): Promise<NativeChannelsManager>;
  generateChannel(
    cmixId: number,
    name: string,
    description: string,
    privacyLevel: number,
  ): Uint8Array;
  getChannelInfo(prettyPrint: string): Uint8Array;
  generateChannelIdentity(cmixId: number): Uint8Array;
  getPublicChannelIdentityFromPrivate(privateIdentity: Uint8Array): Uint8Array;
  isNicknameValid(nickname: string): void;
  newBroadcastChannel(cmixId: number, channelDefJson: Uint8Array): NativeBroadcastChannel;
}

// --- Host side ---

/**
 * Storage for channel events. Each receive method returns the uuid the
 * message was stored under.
 */
export interface EventModel {
  joinChannel(channel: string): void;
  leaveChannel(channelId: Uint8Array): void;
  receiveMessage(
    channelId: Uint8Array,
    messageId: Uint8Array,
    nickname: string,
    text: string,
    pubKey: Uint8Array,
    dmToken: number,
    codeset: number,
    timestamp: number,
    lease: number,
    roundId: number,
    messageType: number,
    status: number,
    hidden: boolean,
  ): number;
  receiveReply(
    channelId: Uint8Array,
    messageId: Uint8Array,
    reactionTo: Uint8Array,
    nickname: string,
    text: string,
    pubKey: Uint8Array,
    dmToken: number,
    codeset: number,
    timestamp: number,
    lease: number,
    roundId: number,
    messageType: number,
    status: number,
    hidden: boolean,
  ): number;
  receiveReaction(
    channelId: Uint8Array,
    messageId: Uint8Array,
    reactionTo: Uint8Array,
    nickname: string,
    reaction: string,
    pubKey: Uint8Array,
    dmToken: number,
    codeset: number,
    timestamp: number,
    lease: number,
    roundId: number,
    messageType: number,
    status: number,
    hidden: boolean,
  ): number;
  updateSentStatus(
    uuid: number,
    messageId: Uint8Array,
    timestamp: number,
    roundId: number,
    status: number,
  ): void;
}

/** Builds the event model for the storage path the native side picks. */
export type EventModelBuilder = Capability<"build", [path: string], EventModel>;

export type ChannelMessageCallback = Capability<
  "callback",
  [receivedChannelMessageReport: Uint8Array, err: NativeError | null]
>;

export type BroadcastListener = Capability<
  "callback",
  [payload: Uint8Array, err: NativeError | null]
>;

export const BroadcastMethod = {
  Symmetric: 0,
  RSAToPublic: 1,
} as const;

export const PrivacyLevel = {
  Public: 0,
  Private: 1,
  Secret: 2,
} as const;
