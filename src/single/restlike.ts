/**
 * RestLike requests: REST-style request/response carried over a connection
 * or a single-use exchange. Requests and responses are JSON.
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import { bytesArg, intArg } from "../marshal.js";
import { adaptReportCallback } from "./single-use.js";
import type { ReportCallback } from "./types.js";

/** Over an open {@link Connection}. Resolves to JSON of the response. */
export async function restlikeRequest(
  cmixId: number,
  connectionId: number,
  request: Uint8Array,
  e2eParams: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): Promise<Uint8Array> {
  const id = intArg("cmixId", cmixId);
  const conn = intArg("connectionId", connectionId);
  const req = bytesArg("request", request);
  const params = bytesArg("e2eParams", e2eParams);
  return ctx.boundary.settleBytes("restlikeRequest", () =>
    ctx.native.restlikeRequest(id, conn, req, params),
  );
}

/** Over an {@link AuthenticatedConnection}. */
export async function restlikeRequestAuth(
  cmixId: number,
  authConnectionId: number,
  request: Uint8Array,
  e2eParams: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): Promise<Uint8Array> {
  const id = intArg("cmixId", cmixId);
  const conn = intArg("authConnectionId", authConnectionId);
  const req = bytesArg("request", request);
  const params = bytesArg("e2eParams", e2eParams);
  return ctx.boundary.settleBytes("restlikeRequestAuth", () =>
    ctx.native.restlikeRequestAuth(id, conn, req, params),
  );
}

/** Over single use. Resolves to JSON of the response. */
export async function requestRestLike(
  e2eId: number,
  recipientContact: Uint8Array,
  request: Uint8Array,
  singleParams: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): Promise<Uint8Array> {
  const id = intArg("e2eId", e2eId);
  const contact = bytesArg("recipientContact", recipientContact);
  const req = bytesArg("request", request);
  const params = bytesArg("singleParams", singleParams);
  return ctx.boundary.settleBytes("requestRestLike", () =>
    ctx.native.requestRestLike(id, contact, req, params),
  );
}

/** Over single use, delivering the response to `cb` instead of returning it. */
export function asyncRequestRestLike(
  e2eId: number,
  recipientContact: Uint8Array,
  request: Uint8Array,
  singleParams: Uint8Array,
  cb: ReportCallback,
  ctx: BindingsContext = ensureBindings(),
): void {
  const id = intArg("e2eId", e2eId);
  const contact = bytesArg("recipientContact", recipientContact);
  const req = bytesArg("request", request);
  const params = bytesArg("singleParams", singleParams);
  const adapted = adaptReportCallback(ctx, "cb", cb);
  ctx.boundary.call("asyncRequestRestLike", () =>
    ctx.native.asyncRequestRestLike(id, contact, req, params, adapted),
  );
}
