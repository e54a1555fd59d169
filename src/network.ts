/**
 * Network client, cover traffic, push notifications, and reception identities.
 */

export { Cmix, newCmix, loadCmix } from "./network/cmix.js";
export { DummyTraffic, newDummyTrafficManager } from "./network/dummy-traffic.js";
export {
  Notifications,
  loadNotifications,
  loadNotificationsDummy,
} from "./network/notifications.js";
export {
  storeReceptionIdentity,
  loadReceptionIdentity,
  getIDFromContact,
  getPubkeyFromContact,
  setFactsOnContact,
  getFactsFromContact,
} from "./network/identity.js";
export { FollowerStatus } from "./network/types.js";
export type {
  ClientErrorReporter,
  HealthCallback,
  RoundEventCallback,
  TrackServicesCallback,
} from "./network/types.js";
