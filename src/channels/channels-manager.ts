/**
 * ChannelsManager — joins channels and sends and receives channel messages.
 * Received events are written to the host's {@link EventModel}.
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { bindCapability } from "../callbacks.js";
import type { NativeError } from "../errors.js";
import { getDatabaseCipher } from "../storage/cipher.js";
import {
  boolArg,
  bytesArg,
  copyBytes,
  intArg,
  stringArg,
  uintArg,
} from "../marshal.js";
import { adaptEventModelBuilder } from "./event-model.js";
import type {
  ChannelMessageCallback,
  EventModelBuilder,
  NativeChannelsManager,
} from "./types.js";

export class ChannelsManager implements EntryPoints<NativeChannelsManager> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeChannelsManager,
  ) {
    Object.freeze(this);
  }

  getID(): number {
    return this._ctx.boundary.call("ChannelsManager.getID", () => this._native.getID());
  }

  // ==========================================================================
  // Membership
  // ==========================================================================

  /** Join the channel in `channelPretty`. Returns JSON of its channel info. */
  joinChannel(channelPretty: string): Uint8Array {
    const pretty = stringArg("channelPretty", channelPretty);
    return this._ctx.boundary.callBytes("ChannelsManager.joinChannel", () =>
      this._native.joinChannel(pretty),
    );
  }

  /** JSON list of joined channel IDs. */
  getChannels(): Uint8Array {
    return this._ctx.boundary.callBytes("ChannelsManager.getChannels", () =>
      this._native.getChannels(),
    );
  }

  leaveChannel(channelId: Uint8Array): void {
    const id = bytesArg("channelId", channelId);
    this._ctx.boundary.call("ChannelsManager.leaveChannel", () =>
      this._native.leaveChannel(id),
    );
  }

  /** Replay every message in the channel's history through the event model. */
  replayChannel(channelId: Uint8Array): void {
    const id = bytesArg("channelId", channelId);
    this._ctx.boundary.call("ChannelsManager.replayChannel", () =>
      this._native.replayChannel(id),
    );
  }

  // ==========================================================================
  // Sending
  //
  // Each send resolves to JSON of the channel send report.
  // ==========================================================================

  async sendGeneric(
    channelId: Uint8Array,
    messageType: number,
    message: Uint8Array,
    leaseMs: number,
    tracked: boolean,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array> {
    const id = bytesArg("channelId", channelId);
    const type = intArg("messageType", messageType);
    const msg = bytesArg("message", message);
    const lease = uintArg("leaseMs", leaseMs);
    const track = boolArg("tracked", tracked);
    const params = bytesArg("cmixParams", cmixParams);
    return this._ctx.boundary.settleBytes("ChannelsManager.sendGeneric", () =>
      this._native.sendGeneric(id, type, msg, lease, track, params),
    );
  }

  /** Send as the channel admin. Requires the channel's private key. */
  async sendAdminGeneric(
    adminPrivateKey: Uint8Array,
    channelId: Uint8Array,
    messageType: number,
    message: Uint8Array,
    leaseMs: number,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array> {
    const key = bytesArg("adminPrivateKey", adminPrivateKey);
    const id = bytesArg("channelId", channelId);
    const type = intArg("messageType", messageType);
    const msg = bytesArg("message", message);
    const lease = uintArg("leaseMs", leaseMs);
    const params = bytesArg("cmixParams", cmixParams);
    return this._ctx.boundary.settleBytes("ChannelsManager.sendAdminGeneric", () =>
      this._native.sendAdminGeneric(key, id, type, msg, lease, params),
    );
  }

  async sendMessage(
    channelId: Uint8Array,
    message: string,
    leaseMs: number,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array> {
    const id = bytesArg("channelId", channelId);
    const msg = stringArg("message", message);
    const lease = uintArg("leaseMs", leaseMs);
    const params = bytesArg("cmixParams", cmixParams);
    return this._ctx.boundary.settleBytes("ChannelsManager.sendMessage", () =>
      this._native.sendMessage(id, msg, lease, params),
    );
  }

  async sendReply(
    channelId: Uint8Array,
    message: string,
    messageToReplyTo: Uint8Array,
    leaseMs: number,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array> {
    const id = bytesArg("channelId", channelId);
    const msg = stringArg("message", message);
    const replyTo = bytesArg("messageToReplyTo", messageToReplyTo);
    const lease = uintArg("leaseMs", leaseMs);
    const params = bytesArg("cmixParams", cmixParams);
    return this._ctx.boundary.settleBytes("ChannelsManager.sendReply", () =>
      this._native.sendReply(id, msg, replyTo, lease, params),
    );
  }

  /** `reaction` must be a single supported emoji. */
  async sendReaction(
    channelId: Uint8Array,
    reaction: string,
    messageToReactTo: Uint8Array,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array> {
    const id = bytesArg("channelId", channelId);
    const r = stringArg("reaction", reaction);
    const reactTo = bytesArg("messageToReactTo", messageToReactTo);
    const params = bytesArg("cmixParams", cmixParams);
    return this._ctx.boundary.settleBytes("ChannelsManager.sendReaction", () =>
      this._native.sendReaction(id, r, reactTo, params),
    );
  }

  /** Deliver messages of `messageType` to `cb` instead of the event model. */
  registerReceiveHandler(messageType: number, cb: ChannelMessageCallback): void {
    const type = intArg("messageType", messageType);
    const fn = bindCapability("cb", cb, "callback");
    const ctx = this._ctx;
    this._ctx.boundary.call("ChannelsManager.registerReceiveHandler", () =>
      this._native.registerReceiveHandler(type, {
        callback: (report, err) => fn(copyBytes(report), ctx.boundary.error(err)),
      }),
    );
  }
}

// --- Factories ---

export function newChannelsManager(
  cmixId: number,
  privateIdentity: Uint8Array,
  eventBuilder: EventModelBuilder,
  ctx: BindingsContext = ensureBindings(),
): ChannelsManager {
  const id = intArg("cmixId", cmixId);
  const identity = bytesArg("privateIdentity", privateIdentity);
  const builder = adaptEventModelBuilder("eventBuilder", eventBuilder);
  const native = ctx.boundary.call("newChannelsManager", () =>
    ctx.native.newChannelsManager(id, identity, builder),
  );
  return new ChannelsManager(ctx, native);
}

/** Load a manager previously stored under `storageTag`. */
export function loadChannelsManager(
  cmixId: number,
  storageTag: string,
  eventBuilder: EventModelBuilder,
  ctx: BindingsContext = ensureBindings(),
): ChannelsManager {
  const id = intArg("cmixId", cmixId);
  const tag = stringArg("storageTag", storageTag);
  const builder = adaptEventModelBuilder("eventBuilder", eventBuilder);
  const native = ctx.boundary.call("loadChannelsManager", () =>
    ctx.native.loadChannelsManager(id, tag, builder),
  );
  return new ChannelsManager(ctx, native);
}

/**
 * Create a manager whose events are stored in the native IndexedDb event
 * model, encrypted with the registered cipher `cipherId`.
 */
export async function newChannelsManagerWithIndexedDb(
  cmixId: number,
  privateIdentity: Uint8Array,
  cipherId: number,
  ctx: BindingsContext = ensureBindings(),
): Promise<ChannelsManager> {
  const id = intArg("cmixId", cmixId);
  const identity = bytesArg("privateIdentity", privateIdentity);
  const cipher = getDatabaseCipher(cipherId, ctx);
  const native = await ctx.boundary.settle("newChannelsManagerWithIndexedDb", () =>
    ctx.native.newChannelsManagerWithIndexedDb(id, identity, cipher),
  );
  return new ChannelsManager(ctx, native);
}

/**
 * Like {@link newChannelsManager}, but identified by `username` through a
 * dummy name service instead of user discovery. For testing and demos.
 */
export function newChannelsManagerDummyNameService(
  cmixId: number,
  username: string,
  eventBuilder: EventModelBuilder,
  ctx: BindingsContext = ensureBindings(),
): ChannelsManager {
  const id = intArg("cmixId", cmixId);
  const name = stringArg("username", username);
  const builder = adaptEventModelBuilder("eventBuilder", eventBuilder);
  const native = ctx.boundary.call("newChannelsManagerDummyNameService", () =>
    ctx.native.newChannelsManagerDummyNameService(id, name, builder),
  );
  return new ChannelsManager(ctx, native);
}

export async function newChannelsManagerWithIndexedDbDummyNameService(
  cmixId: number,
  username: string,
  cipherId: number,
  ctx: BindingsContext = ensureBindings(),
): Promise<ChannelsManager> {
  const id = intArg("cmixId", cmixId);
  const name = stringArg("username", username);
  const cipher = getDatabaseCipher(cipherId, ctx);
  const native = await ctx.boundary.settle(
    "newChannelsManagerWithIndexedDbDummyNameService",
    () => ctx.native.newChannelsManagerWithIndexedDbDummyNameService(id, name, cipher),
  );
  return new ChannelsManager(ctx, native);
}

// --- Channel utilities ---

/**
 * Create a new channel. Returns JSON of the channel generation, including
 * the admin private key. The caller must keep that key safe.
 *
 * @param privacyLevel - One of {@link PrivacyLevel}.
 */
export function generateChannel(
  cmixId: number,
  name: string,
  description: string,
  privacyLevel: number,
  ctx: BindingsContext = ensureBindings(),
): Uint8Array {
  const id = intArg("cmixId", cmixId);
  const n = stringArg("name", name);
  const desc = stringArg("description", description);
  const level = intArg("privacyLevel", privacyLevel);
  return ctx.boundary.callBytes("generateChannel", () =>
    ctx.native.generateChannel(id, n, desc, level),
  );
}

/** JSON of the channel info encoded in a pretty print. */
export function getChannelInfo(
  prettyPrint: string,
  ctx: BindingsContext = ensureBindings(),
): Uint8Array {
  const pretty = stringArg("prettyPrint", prettyPrint);
  return ctx.boundary.callBytes("getChannelInfo", () => ctx.native.getChannelInfo(pretty));
}

/** Marshalled private channel identity. */
export function generateChannelIdentity(
  cmixId: number,
  ctx: BindingsContext = ensureBindings(),
): Uint8Array {
  const id = intArg("cmixId", cmixId);
  return ctx.boundary.callBytes("generateChannelIdentity", () =>
    ctx.native.generateChannelIdentity(id),
  );
}

export function getPublicChannelIdentityFromPrivate(
  privateIdentity: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): Uint8Array {
  const identity = bytesArg("privateIdentity", privateIdentity);
  return ctx.boundary.callBytes("getPublicChannelIdentityFromPrivate", () =>
    ctx.native.getPublicChannelIdentityFromPrivate(identity),
  );
}

/**
 * Check a nickname against the channel rules. Returns the reason it is
 * invalid, or null when it is valid.
 */
export function isNicknameValid(
  nickname: string,
  ctx: BindingsContext = ensureBindings(),
): NativeError | null {
  const nick = stringArg("nickname", nickname);
  return ctx.boundary.check("isNicknameValid", () => ctx.native.isNicknameValid(nick));
}
