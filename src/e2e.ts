/**
 * End-to-end messaging, partner connections, single use, RestLike, RPC, and
 * group chat.
 */

export { E2e, login, loginEphemeral } from "./e2e/e2e.js";
export { Connection, AuthenticatedConnection } from "./e2e/connection.js";
export type {
  AuthCallbacks,
  AuthEventHandler,
  Listener,
  Processor,
} from "./e2e/types.js";

export { Stopper, transmitSingleUse, listen } from "./single/single-use.js";
export {
  restlikeRequest,
  restlikeRequestAuth,
  requestRestLike,
  asyncRequestRestLike,
} from "./single/restlike.js";
export { rpcSend } from "./single/rpc.js";
export type { ReportCallback, RpcResponseCallback } from "./single/types.js";

export { Group, GroupChat, newGroupChat } from "./group/group-chat.js";
export type { GroupChatProcessor, GroupRequest } from "./group/types.js";
