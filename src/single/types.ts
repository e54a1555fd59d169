import type { Capability } from "../callbacks.js";
import type { NativeError } from "../errors.js";

// --- Native side ---

/** Shared by single-use responses, single-use listeners, and RestLike replies. */
export interface NativeReportCallback {
  callback(report: Uint8Array, err: unknown): void;
}

export interface NativeRpcResponseCallback {
  callback(response: Uint8Array): void;
}

export interface NativeStopper {
  stop(): void;
}

export interface NativeSingleBindings {
  transmitSingleUse(
    e2eId: number,
    recipientContact: Uint8Array,
    tag: string,
    payload: Uint8Array,
    singleParams: Uint8Array,
    responseCb: NativeReportCallback,
  ): Promise<Uint8Array>;
  listen(e2eId: number, tag: string, cb: NativeReportCallback): NativeStopper;
  restlikeRequest(
    cmixId: number,
    connectionId: number,
    request: Uint8Array,
    e2eParams: Uint8Array,
  ): Promise<Uint8Array>;
  restlikeRequestAuth(
    cmixId: number,
    authConnectionId: number,
    request: Uint8Array,
    e2eParams: Uint8Array,
  ): Promise<Uint8Array>;
  requestRestLike(
    e2eId: number,
    recipientContact: Uint8Array,
    request: Uint8Array,
    singleParams: Uint8Array,
  ): Promise<Uint8Array>;
  asyncRequestRestLike(
    e2eId: number,
    recipientContact: Uint8Array,
    request: Uint8Array,
    singleParams: Uint8Array,
    cb: NativeReportCallback,
  ): void;
  /**
   * Resolves to the final response. Rejects with the error text as bytes
   * when the server or the network fails the request.
   */
  rpcSend(
    cmixId: number,
    recipient: Uint8Array,
    pubKey: Uint8Array,
    request: Uint8Array,
    cb: NativeRpcResponseCallback,
  ): Promise<Uint8Array>;
}

// --- Host side ---

export type ReportCallback = Capability<
  "callback",
  [report: Uint8Array, err: NativeError | null]
>;

/** Hears each intermediate response (sent, processed, final). */
export type RpcResponseCallback = Capability<"callback", [response: Uint8Array]>;
