/**
 * E2e — end-to-end messaging and the auth (partner request) flow for one
 * reception identity.
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { bytesArg, intArg, stringArg, uintArg } from "../marshal.js";
import { adaptAuthCallbacks, adaptListener, adaptProcessor } from "./listeners.js";
import type {
  AuthCallbacks,
  Listener,
  NativeE2e,
  Processor,
} from "./types.js";

export class E2e implements EntryPoints<NativeE2e> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeE2e,
  ) {
    Object.freeze(this);
  }

  // ==========================================================================
  // Identity and sizes
  // ==========================================================================

  getID(): number {
    return this._ctx.boundary.call("E2e.getID", () => this._native.getID());
  }

  /** Marshalled contact of this identity. */
  getContact(): Uint8Array {
    return this._ctx.boundary.callBytes("E2e.getContact", () =>
      this._native.getContact(),
    );
  }

  getUdAddressFromNdf(): string {
    return this._ctx.boundary.call("E2e.getUdAddressFromNdf", () =>
      this._native.getUdAddressFromNdf(),
    );
  }

  getUdCertFromNdf(): Uint8Array {
    return this._ctx.boundary.callBytes("E2e.getUdCertFromNdf", () =>
      this._native.getUdCertFromNdf(),
    );
  }

  getUdContactFromNdf(): Uint8Array {
    return this._ctx.boundary.callBytes("E2e.getUdContactFromNdf", () =>
      this._native.getUdContactFromNdf(),
    );
  }

  getReceptionID(): Uint8Array {
    return this._ctx.boundary.callBytes("E2e.getReceptionID", () =>
      this._native.getReceptionID(),
    );
  }

  /** JSON list of partner IDs. */
  getAllPartnerIDs(): Uint8Array {
    return this._ctx.boundary.callBytes("E2e.getAllPartnerIDs", () =>
      this._native.getAllPartnerIDs(),
    );
  }

  payloadSize(): number {
    return this._ctx.boundary.call("E2e.payloadSize", () => this._native.payloadSize());
  }

  secondPartitionSize(): number {
    return this._ctx.boundary.call("E2e.secondPartitionSize", () =>
      this._native.secondPartitionSize(),
    );
  }

  partitionSize(index: number): number {
    const i = uintArg("index", index);
    return this._ctx.boundary.call("E2e.partitionSize", () =>
      this._native.partitionSize(i),
    );
  }

  firstPartitionSize(): number {
    return this._ctx.boundary.call("E2e.firstPartitionSize", () =>
      this._native.firstPartitionSize(),
    );
  }

  getHistoricalDHPrivkey(): Uint8Array {
    return this._ctx.boundary.callBytes("E2e.getHistoricalDHPrivkey", () =>
      this._native.getHistoricalDHPrivkey(),
    );
  }

  getHistoricalDHPubkey(): Uint8Array {
    return this._ctx.boundary.callBytes("E2e.getHistoricalDHPubkey", () =>
      this._native.getHistoricalDHPubkey(),
    );
  }

  hasAuthenticatedChannel(partnerId: Uint8Array): boolean {
    const id = bytesArg("partnerId", partnerId);
    return this._ctx.boundary.call("E2e.hasAuthenticatedChannel", () =>
      this._native.hasAuthenticatedChannel(id),
    );
  }

  // ==========================================================================
  // Messaging
  // ==========================================================================

  removeService(tag: string): void {
    const t = stringArg("tag", tag);
    this._ctx.boundary.call("E2e.removeService", () => this._native.removeService(t));
  }

  /** Resolves to JSON of the send report. */
  async sendE2E(
    messageType: number,
    recipientId: Uint8Array,
    payload: Uint8Array,
    e2eParams: Uint8Array,
  ): Promise<Uint8Array> {
    const type = intArg("messageType", messageType);
    const recipient = bytesArg("recipientId", recipientId);
    const data = bytesArg("payload", payload);
    const params = bytesArg("e2eParams", e2eParams);
    return this._ctx.boundary.settleBytes("E2e.sendE2E", () =>
      this._native.sendE2E(type, recipient, data, params),
    );
  }

  addService(tag: string, processor: Processor): void {
    const t = stringArg("tag", tag);
    const adapted = adaptProcessor("processor", processor);
    this._ctx.boundary.call("E2e.addService", () => this._native.addService(t, adapted));
  }

  registerListener(senderId: Uint8Array, messageType: number, listener: Listener): void {
    const sender = bytesArg("senderId", senderId);
    const type = intArg("messageType", messageType);
    const adapted = adaptListener("listener", listener);
    this._ctx.boundary.call("E2e.registerListener", () =>
      this._native.registerListener(sender, type, adapted),
    );
  }

  // ==========================================================================
  // Auth
  // ==========================================================================

  /** Resolves to the id of the round the request was sent on. */
  async request(partnerContact: Uint8Array, factsListJson: Uint8Array): Promise<number> {
    const contact = bytesArg("partnerContact", partnerContact);
    const facts = bytesArg("factsListJson", factsListJson);
    return this._ctx.boundary.settle("E2e.request", () =>
      this._native.request(contact, facts),
    );
  }

  async confirm(partnerContact: Uint8Array): Promise<number> {
    const contact = bytesArg("partnerContact", partnerContact);
    return this._ctx.boundary.settle("E2e.confirm", () => this._native.confirm(contact));
  }

  async reset(partnerContact: Uint8Array): Promise<number> {
    const contact = bytesArg("partnerContact", partnerContact);
    return this._ctx.boundary.settle("E2e.reset", () => this._native.reset(contact));
  }

  async replayConfirm(partnerId: Uint8Array): Promise<number> {
    const id = bytesArg("partnerId", partnerId);
    return this._ctx.boundary.settle("E2e.replayConfirm", () =>
      this._native.replayConfirm(id),
    );
  }

  /** Re-deliver every pending received request to the auth callbacks. */
  callAllReceivedRequests(): void {
    this._ctx.boundary.call("E2e.callAllReceivedRequests", () =>
      this._native.callAllReceivedRequests(),
    );
  }

  deleteRequest(partnerId: Uint8Array): void {
    const id = bytesArg("partnerId", partnerId);
    this._ctx.boundary.call("E2e.deleteRequest", () => this._native.deleteRequest(id));
  }

  deleteAllRequests(): void {
    this._ctx.boundary.call("E2e.deleteAllRequests", () =>
      this._native.deleteAllRequests(),
    );
  }

  deleteSentRequests(): void {
    this._ctx.boundary.call("E2e.deleteSentRequests", () =>
      this._native.deleteSentRequests(),
    );
  }

  deleteReceiveRequests(): void {
    this._ctx.boundary.call("E2e.deleteReceiveRequests", () =>
      this._native.deleteReceiveRequests(),
    );
  }

  /** Marshalled contact of the partner's pending request. */
  getReceivedRequest(partnerId: Uint8Array): Uint8Array {
    const id = bytesArg("partnerId", partnerId);
    return this._ctx.boundary.callBytes("E2e.getReceivedRequest", () =>
      this._native.getReceivedRequest(id),
    );
  }

  verifyOwnership(
    receivedContact: Uint8Array,
    verifiedContact: Uint8Array,
    e2eId: number,
  ): boolean {
    const received = bytesArg("receivedContact", receivedContact);
    const verified = bytesArg("verifiedContact", verifiedContact);
    const id = intArg("e2eId", e2eId);
    return this._ctx.boundary.call("E2e.verifyOwnership", () =>
      this._native.verifyOwnership(received, verified, id),
    );
  }

  /** Route auth events for one partner to `callbacks` instead of the login ones. */
  addPartnerCallback(partnerId: Uint8Array, callbacks: AuthCallbacks): void {
    const id = bytesArg("partnerId", partnerId);
    const adapted = adaptAuthCallbacks("callbacks", callbacks);
    this._ctx.boundary.call("E2e.addPartnerCallback", () =>
      this._native.addPartnerCallback(id, adapted),
    );
  }

  deletePartnerCallback(partnerId: Uint8Array): void {
    const id = bytesArg("partnerId", partnerId);
    this._ctx.boundary.call("E2e.deletePartnerCallback", () =>
      this._native.deletePartnerCallback(id),
    );
  }
}

// --- Factories ---

/**
 * Log in with a stored reception identity. `callbacks` receive auth events
 * for every partner without a partner callback of its own.
 */
export function login(
  cmixId: number,
  callbacks: AuthCallbacks,
  identity: Uint8Array,
  e2eParams: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): E2e {
  const id = intArg("cmixId", cmixId);
  const adapted = adaptAuthCallbacks("callbacks", callbacks);
  const ident = bytesArg("identity", identity);
  const params = bytesArg("e2eParams", e2eParams);
  const native = ctx.boundary.call("login", () =>
    ctx.native.login(id, adapted, ident, params),
  );
  return new E2e(ctx, native);
}

/** Like {@link login}, but nothing is persisted. */
export function loginEphemeral(
  cmixId: number,
  callbacks: AuthCallbacks,
  identity: Uint8Array,
  e2eParams: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): E2e {
  const id = intArg("cmixId", cmixId);
  const adapted = adaptAuthCallbacks("callbacks", callbacks);
  const ident = bytesArg("identity", identity);
  const params = bytesArg("e2eParams", e2eParams);
  const native = ctx.boundary.call("loginEphemeral", () =>
    ctx.native.loginEphemeral(id, adapted, ident, params),
  );
  return new E2e(ctx, native);
}
