/**
 * Direct messages between channel identities.
 */

export {
  DMClient,
  newDMClient,
  newDMClientWithIndexedDb,
  newDMClientWithIndexedDbUnsafe,
  decodeDMShareURL,
  getDmNotificationReportsForMe,
} from "./dm/dm-client.js";
export { NotificationLevel } from "./dm/types.js";
export type {
  DMReceiver,
  DMReceiverBuilder,
  DmNotificationUpdate,
} from "./dm/types.js";
