/**
 * Account-level services and standalone utilities: user discovery, backup,
 * default params, emoji, versions, native logging, and the clock.
 */

export {
  UserDiscovery,
  newOrLoadUd,
  newUdManagerFromBackup,
  lookupUD,
  searchUD,
} from "./ud/user-discovery.js";
export type { UdServer } from "./ud/user-discovery.js";
export { FactType } from "./ud/types.js";
export type {
  UdLookupCallback,
  UdNetworkStatus,
  UdSearchCallback,
} from "./ud/types.js";

export {
  Backup,
  initializeBackup,
  resumeBackup,
  newCmixFromBackup,
} from "./backup/backup.js";
export type { UpdateBackup } from "./backup/types.js";

export {
  createUserFriendlyErrorMessage,
  updateCommonErrors,
} from "./support/friendly-errors.js";
export { supportedEmojis, supportedEmojisMap, validateReaction } from "./support/emoji.js";
export {
  getVersion,
  getClientVersion,
  getClientGitVersion,
  getClientDependencies,
  getWasmSemanticVersion,
  getXXDKSemanticVersion,
} from "./support/version.js";
export {
  getDefaultCMixParams,
  getDefaultE2EParams,
  getDefaultFileTransferParams,
  getDefaultSingleUseParams,
  getDefaultE2eFileTransferParams,
} from "./support/params.js";
export { generateSecret } from "./support/secrets.js";
export { downloadAndVerifySignedNdfWithUrl } from "./support/ndf.js";
export {
  logLevel,
  registerLogWriter,
  enableGrpcLogs,
  forwardNativeLogs,
} from "./support/native-logging.js";
export { setTimeSource, setOffset } from "./support/clock.js";
export { NativeLogLevel } from "./support/types.js";
export type { LogWriter, TimeSource } from "./support/types.js";
