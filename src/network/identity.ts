/**
 * Reception identities and contact files.
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import { bytesArg, intArg, stringArg } from "../marshal.js";

// --- Reception identity storage ---

export function storeReceptionIdentity(
  key: string,
  identity: Uint8Array,
  cmixId: number,
  ctx: BindingsContext = ensureBindings(),
): void {
  const k = stringArg("key", key);
  const data = bytesArg("identity", identity);
  const id = intArg("cmixId", cmixId);
  ctx.boundary.call("storeReceptionIdentity", () =>
    ctx.native.storeReceptionIdentity(k, data, id),
  );
}

/** JSON of the reception identity stored under `key`. */
export function loadReceptionIdentity(
  key: string,
  cmixId: number,
  ctx: BindingsContext = ensureBindings(),
): Uint8Array {
  const k = stringArg("key", key);
  const id = intArg("cmixId", cmixId);
  return ctx.boundary.callBytes("loadReceptionIdentity", () =>
    ctx.native.loadReceptionIdentity(k, id),
  );
}

// --- Contacts ---

export function getIDFromContact(
  contact: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): Uint8Array {
  const data = bytesArg("contact", contact);
  return ctx.boundary.callBytes("getIDFromContact", () => ctx.native.getIDFromContact(data));
}

export function getPubkeyFromContact(
  contact: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): Uint8Array {
  const data = bytesArg("contact", contact);
  return ctx.boundary.callBytes("getPubkeyFromContact", () =>
    ctx.native.getPubkeyFromContact(data),
  );
}

/** Returns a copy of `contact` carrying the facts in `factListJson`. */
export function setFactsOnContact(
  contact: Uint8Array,
  factListJson: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): Uint8Array {
  const data = bytesArg("contact", contact);
  const facts = bytesArg("factListJson", factListJson);
  return ctx.boundary.callBytes("setFactsOnContact", () =>
    ctx.native.setFactsOnContact(data, facts),
  );
}

export function getFactsFromContact(
  contact: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): Uint8Array {
  const data = bytesArg("contact", contact);
  return ctx.boundary.callBytes("getFactsFromContact", () =>
    ctx.native.getFactsFromContact(data),
  );
}
