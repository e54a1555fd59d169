/**
 * UserDiscovery — registers facts (username, email, phone) with the user
 * discovery service and looks other users up by them.
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { bindCapability } from "../callbacks.js";
import { bytesArg, copyBytes, intArg, stringArg } from "../marshal.js";
import type {
  NativeUdNetworkStatus,
  NativeUserDiscovery,
  UdLookupCallback,
  UdNetworkStatus,
  UdSearchCallback,
} from "./types.js";

function adaptNetworkStatus(label: string, host: UdNetworkStatus): NativeUdNetworkStatus {
  const fn = bindCapability(label, host, "udNetworkStatus");
  return { udNetworkStatus: () => fn() };
}

export class UserDiscovery implements EntryPoints<NativeUserDiscovery> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeUserDiscovery,
  ) {
    Object.freeze(this);
  }

  getID(): number {
    return this._ctx.boundary.call("UserDiscovery.getID", () => this._native.getID());
  }

  /** JSON list of registered facts. */
  getFacts(): Uint8Array {
    return this._ctx.boundary.callBytes("UserDiscovery.getFacts", () =>
      this._native.getFacts(),
    );
  }

  getContact(): Uint8Array {
    return this._ctx.boundary.callBytes("UserDiscovery.getContact", () =>
      this._native.getContact(),
    );
  }

  /** Confirm a fact registration with the code sent to the user. */
  confirmFact(confirmationId: string, code: string): void {
    const id = stringArg("confirmationId", confirmationId);
    const c = stringArg("code", code);
    this._ctx.boundary.call("UserDiscovery.confirmFact", () =>
      this._native.confirmFact(id, c),
    );
  }

  /** Start registering a fact. Returns the confirmation id for `confirmFact`. */
  sendRegisterFact(factJson: Uint8Array): string {
    const fact = bytesArg("factJson", factJson);
    return this._ctx.boundary.call("UserDiscovery.sendRegisterFact", () =>
      this._native.sendRegisterFact(fact),
    );
  }

  /** Delete the account by its username fact. Cannot be undone. */
  permanentDeleteAccount(factJson: Uint8Array): void {
    const fact = bytesArg("factJson", factJson);
    this._ctx.boundary.call("UserDiscovery.permanentDeleteAccount", () =>
      this._native.permanentDeleteAccount(fact),
    );
  }

  removeFact(factJson: Uint8Array): void {
    const fact = bytesArg("factJson", factJson);
    this._ctx.boundary.call("UserDiscovery.removeFact", () =>
      this._native.removeFact(fact),
    );
  }
}

// --- Factories ---

export interface UdServer {
  /** Server certificate. */
  cert: Uint8Array;
  /** Marshalled contact of the server. */
  contactFile: Uint8Array;
  address: string;
}

/**
 * Load the user discovery manager from storage, registering `username` with
 * the server the first time.
 */
export function newOrLoadUd(
  e2eId: number,
  follower: UdNetworkStatus,
  username: string,
  registrationValidationSignature: Uint8Array,
  server: UdServer,
  ctx: BindingsContext = ensureBindings(),
): UserDiscovery {
  const id = intArg("e2eId", e2eId);
  const status = adaptNetworkStatus("follower", follower);
  const user = stringArg("username", username);
  const sig = bytesArg("registrationValidationSignature", registrationValidationSignature);
  const cert = bytesArg("server.cert", server.cert);
  const contact = bytesArg("server.contactFile", server.contactFile);
  const address = stringArg("server.address", server.address);
  const native = ctx.boundary.call("newOrLoadUd", () =>
    ctx.native.newOrLoadUd(id, status, user, sig, cert, contact, address),
  );
  return new UserDiscovery(ctx, native);
}

/** Build the manager for a client restored from backup; nothing is registered. */
export function newUdManagerFromBackup(
  e2eId: number,
  follower: UdNetworkStatus,
  server: UdServer,
  ctx: BindingsContext = ensureBindings(),
): UserDiscovery {
  const id = intArg("e2eId", e2eId);
  const status = adaptNetworkStatus("follower", follower);
  const cert = bytesArg("server.cert", server.cert);
  const contact = bytesArg("server.contactFile", server.contactFile);
  const address = stringArg("server.address", server.address);
  const native = ctx.boundary.call("newUdManagerFromBackup", () =>
    ctx.native.newUdManagerFromBackup(id, status, cert, contact, address),
  );
  return new UserDiscovery(ctx, native);
}

// --- Lookups ---

/**
 * Look up the contact for `lookupId`. Resolves to JSON of the single-use
 * send report; the contact arrives on `cb`.
 */
export async function lookupUD(
  e2eId: number,
  udContact: Uint8Array,
  cb: UdLookupCallback,
  lookupId: Uint8Array,
  singleParams: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): Promise<Uint8Array> {
  const id = intArg("e2eId", e2eId);
  const contact = bytesArg("udContact", udContact);
  const fn = bindCapability("cb", cb, "callback");
  const target = bytesArg("lookupId", lookupId);
  const params = bytesArg("singleParams", singleParams);
  return ctx.boundary.settleBytes("lookupUD", () =>
    ctx.native.lookupUD(
      id,
      contact,
      { callback: (found, err) => fn(copyBytes(found), ctx.boundary.error(err)) },
      target,
      params,
    ),
  );
}

/** Search by the facts in `factListJson`; matching contacts arrive on `cb`. */
export async function searchUD(
  e2eId: number,
  udContact: Uint8Array,
  cb: UdSearchCallback,
  factListJson: Uint8Array,
  singleParams: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): Promise<Uint8Array> {
  const id = intArg("e2eId", e2eId);
  const contact = bytesArg("udContact", udContact);
  const fn = bindCapability("cb", cb, "callback");
  const facts = bytesArg("factListJson", factListJson);
  const params = bytesArg("singleParams", singleParams);
  return ctx.boundary.settleBytes("searchUD", () =>
    ctx.native.searchUD(
      id,
      contact,
      { callback: (list, err) => fn(copyBytes(list), ctx.boundary.error(err)) },
      facts,
      params,
    ),
  );
}
