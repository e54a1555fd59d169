/**
 * DMClient — direct messages between channel identities.
 *
 * Partners are addressed by public key and DM token, both found on any
 * channel message they sent.
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { getDatabaseCipher } from "../storage/cipher.js";
import { bytesArg, intArg, stringArg, uintArg } from "../marshal.js";
import { adaptDMReceiverBuilder, adaptNotificationUpdate } from "./receiver.js";
import type {
  DMReceiverBuilder,
  DmNotificationUpdate,
  NativeDMClient,
} from "./types.js";

export class DMClient implements EntryPoints<NativeDMClient> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeDMClient,
  ) {
    Object.freeze(this);
  }

  // ==========================================================================
  // Identity
  // ==========================================================================

  getID(): number {
    return this._ctx.boundary.call("DMClient.getID", () => this._native.getID());
  }

  getPublicKey(): Uint8Array {
    return this._ctx.boundary.callBytes("DMClient.getPublicKey", () =>
      this._native.getPublicKey(),
    );
  }

  getToken(): number {
    return this._ctx.boundary.call("DMClient.getToken", () => this._native.getToken());
  }

  /** JSON of the public identity. */
  getIdentity(): Uint8Array {
    return this._ctx.boundary.callBytes("DMClient.getIdentity", () =>
      this._native.getIdentity(),
    );
  }

  /** The private identity, encrypted with `password`. */
  exportPrivateIdentity(password: string): Uint8Array {
    const pw = stringArg("password", password);
    return this._ctx.boundary.callBytes("DMClient.exportPrivateIdentity", () =>
      this._native.exportPrivateIdentity(pw),
    );
  }

  getNickname(): string {
    return this._ctx.boundary.call("DMClient.getNickname", () =>
      this._native.getNickname(),
    );
  }

  setNickname(nickname: string): void {
    const nick = stringArg("nickname", nickname);
    this._ctx.boundary.call("DMClient.setNickname", () => this._native.setNickname(nick));
  }

  getDatabaseName(): string {
    return this._ctx.boundary.call("DMClient.getDatabaseName", () =>
      this._native.getDatabaseName(),
    );
  }

  /** JSON of a share URL on `host` that others can use to DM this identity. */
  getShareURL(host: string): Uint8Array {
    const h = stringArg("host", host);
    return this._ctx.boundary.callBytes("DMClient.getShareURL", () =>
      this._native.getShareURL(h),
    );
  }

  // ==========================================================================
  // Blocking
  // ==========================================================================

  async blockPartner(partnerPubKey: Uint8Array): Promise<void> {
    const key = bytesArg("partnerPubKey", partnerPubKey);
    await this._ctx.boundary.settle("DMClient.blockPartner", () =>
      this._native.blockPartner(key),
    );
  }

  async unblockPartner(partnerPubKey: Uint8Array): Promise<void> {
    const key = bytesArg("partnerPubKey", partnerPubKey);
    await this._ctx.boundary.settle("DMClient.unblockPartner", () =>
      this._native.unblockPartner(key),
    );
  }

  async isBlocked(partnerPubKey: Uint8Array): Promise<boolean> {
    const key = bytesArg("partnerPubKey", partnerPubKey);
    return this._ctx.boundary.settle("DMClient.isBlocked", () =>
      this._native.isBlocked(key),
    );
  }

  /** Resolves to a JSON list of blocked public keys. */
  async getBlockedPartners(): Promise<Uint8Array> {
    return this._ctx.boundary.settleBytes("DMClient.getBlockedPartners", () =>
      this._native.getBlockedPartners(),
    );
  }

  // ==========================================================================
  // Sending
  //
  // Each send resolves to JSON of the send report.
  // ==========================================================================

  async sendText(
    partnerPubKey: Uint8Array,
    partnerToken: number,
    message: string,
    leaseMs: number,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array> {
    const key = bytesArg("partnerPubKey", partnerPubKey);
    const token = intArg("partnerToken", partnerToken);
    const msg = stringArg("message", message);
    const lease = uintArg("leaseMs", leaseMs);
    const params = bytesArg("cmixParams", cmixParams);
    return this._ctx.boundary.settleBytes("DMClient.sendText", () =>
      this._native.sendText(key, token, msg, lease, params),
    );
  }

  async sendReply(
    partnerPubKey: Uint8Array,
    partnerToken: number,
    message: string,
    replyToId: Uint8Array,
    leaseMs: number,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array> {
    const key = bytesArg("partnerPubKey", partnerPubKey);
    const token = intArg("partnerToken", partnerToken);
    const msg = stringArg("message", message);
    const replyTo = bytesArg("replyToId", replyToId);
    const lease = uintArg("leaseMs", leaseMs);
    const params = bytesArg("cmixParams", cmixParams);
    return this._ctx.boundary.settleBytes("DMClient.sendReply", () =>
      this._native.sendReply(key, token, msg, replyTo, lease, params),
    );
  }

  async sendReaction(
    partnerPubKey: Uint8Array,
    partnerToken: number,
    reaction: string,
    reactToId: Uint8Array,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array> {
    const key = bytesArg("partnerPubKey", partnerPubKey);
    const token = intArg("partnerToken", partnerToken);
    const r = stringArg("reaction", reaction);
    const reactTo = bytesArg("reactToId", reactToId);
    const params = bytesArg("cmixParams", cmixParams);
    return this._ctx.boundary.settleBytes("DMClient.sendReaction", () =>
      this._native.sendReaction(key, token, r, reactTo, params),
    );
  }

  /** Invite the partner to the channel in `inviteToChannelJson`. */
  async sendInvite(
    partnerPubKey: Uint8Array,
    partnerToken: number,
    inviteToChannelJson: Uint8Array,
    message: string,
    host: string,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array> {
    const key = bytesArg("partnerPubKey", partnerPubKey);
    const token = intArg("partnerToken", partnerToken);
    const channel = bytesArg("inviteToChannelJson", inviteToChannelJson);
    const msg = stringArg("message", message);
    const h = stringArg("host", host);
    const params = bytesArg("cmixParams", cmixParams);
    return this._ctx.boundary.settleBytes("DMClient.sendInvite", () =>
      this._native.sendInvite(key, token, channel, msg, h, params),
    );
  }

  /** A message the partner stores but never shows; used to start a conversation. */
  async sendSilent(
    partnerPubKey: Uint8Array,
    partnerToken: number,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array> {
    const key = bytesArg("partnerPubKey", partnerPubKey);
    const token = intArg("partnerToken", partnerToken);
    const params = bytesArg("cmixParams", cmixParams);
    return this._ctx.boundary.settleBytes("DMClient.sendSilent", () =>
      this._native.sendSilent(key, token, params),
    );
  }

  async send(
    partnerPubKey: Uint8Array,
    partnerToken: number,
    messageType: number,
    plaintext: Uint8Array,
    leaseMs: number,
    cmixParams: Uint8Array,
  ): Promise<Uint8Array> {
    const key = bytesArg("partnerPubKey", partnerPubKey);
    const token = intArg("partnerToken", partnerToken);
    const type = intArg("messageType", messageType);
    const text = bytesArg("plaintext", plaintext);
    const lease = uintArg("leaseMs", leaseMs);
    const params = bytesArg("cmixParams", cmixParams);
    return this._ctx.boundary.settleBytes("DMClient.send", () =>
      this._native.send(key, token, type, text, lease, params),
    );
  }

  // ==========================================================================
  // Notifications
  // ==========================================================================

  /** Resolves to one of {@link NotificationLevel}. */
  async getNotificationLevel(partnerPubKey: Uint8Array): Promise<number> {
    const key = bytesArg("partnerPubKey", partnerPubKey);
    return this._ctx.boundary.settle("DMClient.getNotificationLevel", () =>
      this._native.getNotificationLevel(key),
    );
  }

  async setMobileNotificationsLevel(partnerPubKey: Uint8Array, level: number): Promise<void> {
    const key = bytesArg("partnerPubKey", partnerPubKey);
    const l = intArg("level", level);
    await this._ctx.boundary.settle("DMClient.setMobileNotificationsLevel", () =>
      this._native.setMobileNotificationsLevel(key, l),
    );
  }
}

// --- Factories ---

/**
 * Create a DM client whose messages are stored by the receiver
 * `receiverBuilder` builds.
 */
export function newDMClient(
  cmixId: number,
  notificationsId: number,
  privateIdentity: Uint8Array,
  receiverBuilder: DMReceiverBuilder,
  notificationUpdate: DmNotificationUpdate,
  ctx: BindingsContext = ensureBindings(),
): DMClient {
  const id = intArg("cmixId", cmixId);
  const notifId = intArg("notificationsId", notificationsId);
  const identity = bytesArg("privateIdentity", privateIdentity);
  const builder = adaptDMReceiverBuilder("receiverBuilder", receiverBuilder);
  const update = adaptNotificationUpdate("notificationUpdate", notificationUpdate);
  const native = ctx.boundary.call("newDMClient", () =>
    ctx.native.newDMClient(id, notifId, identity, builder, update),
  );
  return new DMClient(ctx, native);
}

/**
 * Create a DM client backed by the native IndexedDb store, encrypted with
 * the registered cipher `cipherId`.
 */
export async function newDMClientWithIndexedDb(
  cmixId: number,
  notificationsId: number,
  cipherId: number,
  privateIdentity: Uint8Array,
  notificationUpdate: DmNotificationUpdate,
  ctx: BindingsContext = ensureBindings(),
): Promise<DMClient> {
  const id = intArg("cmixId", cmixId);
  const notifId = intArg("notificationsId", notificationsId);
  const cipher = getDatabaseCipher(cipherId, ctx);
  const identity = bytesArg("privateIdentity", privateIdentity);
  const update = adaptNotificationUpdate("notificationUpdate", notificationUpdate);
  const native = await ctx.boundary.settle("newDMClientWithIndexedDb", () =>
    ctx.native.newDMClientWithIndexedDb(id, notifId, cipher, identity, update),
  );
  return new DMClient(ctx, native);
}

// --- Utilities ---

/**
 * Like {@link newDMClientWithIndexedDb}, but the database is stored
 * unencrypted. Not for production use.
 */
export async function newDMClientWithIndexedDbUnsafe(
  cmixId: number,
  notificationsId: number,
  privateIdentity: Uint8Array,
  notificationUpdate: DmNotificationUpdate,
  ctx: BindingsContext = ensureBindings(),
): Promise<DMClient> {
  const id = intArg("cmixId", cmixId);
  const notifId = intArg("notificationsId", notificationsId);
  const identity = bytesArg("privateIdentity", privateIdentity);
  const update = adaptNotificationUpdate("notificationUpdate", notificationUpdate);
  const native = await ctx.boundary.settle("newDMClientWithIndexedDbUnsafe", () =>
    ctx.native.newDMClientWithIndexedDbUnsafe(id, notifId, identity, update),
  );
  return new DMClient(ctx, native);
}

/** JSON of the partner key, token and nickname encoded in a share URL. */
export function decodeDMShareURL(
  url: string,
  ctx: BindingsContext = ensureBindings(),
): Uint8Array {
  const u = stringArg("url", url);
  return ctx.boundary.callBytes("decodeDMShareURL", () => ctx.native.decodeDMShareURL(u));
}

/** Resolves to JSON of the notification reports addressed to this client. */
export async function getDmNotificationReportsForMe(
  notificationFilterJson: Uint8Array,
  notificationDataCsv: string,
  ctx: BindingsContext = ensureBindings(),
): Promise<Uint8Array> {
  const filter = bytesArg("notificationFilterJson", notificationFilterJson);
  const data = stringArg("notificationDataCsv", notificationDataCsv);
  return ctx.boundary.settleBytes("getDmNotificationReportsForMe", () =>
    ctx.native.getDmNotificationReportsForMe(filter, data),
  );
}
