/**
 * Native bindings singleton: lazy-loaded, idempotent initialization.
 *
 * Application code calls `initBindings()` once at startup.
 * Factories call `ensureBindings()` to get the context synchronously.
 * Tests call `setBindingsForTesting()` to inject mocks.
 */

import { Boundary } from "./boundary.js";
import { resolveConfig } from "./config.js";
import type { BindingsConfig, ConfigOptions } from "./config.js";
import { BindingsLoadError, BindingsNotInitializedError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { Registry } from "./registry.js";
import type { NativeBackupBindings } from "./backup/types.js";
import type { NativeChannelsBindings } from "./channels/types.js";
import type { NativeDMBindings } from "./dm/types.js";
import type { NativeE2eBindings } from "./e2e/types.js";
import type { NativeFileTransferBindings } from "./file-transfer/types.js";
import type { NativeGroupBindings } from "./group/types.js";
import type { NativeNetworkBindings } from "./network/types.js";
import type { NativeSingleBindings } from "./single/types.js";
import type { NativeStorageBindings } from "./storage/types.js";
import type { NativeSupportBindings } from "./support/types.js";
import type { NativeSyncBindings } from "./sync/types.js";
import type { NativeUdBindings } from "./ud/types.js";

/** Every top-level function the native bindings module exports. */
export interface NativeBindings
  extends NativeNetworkBindings,
    NativeE2eBindings,
    NativeFileTransferBindings,
    NativeChannelsBindings,
    NativeDMBindings,
    NativeSingleBindings,
    NativeGroupBindings,
    NativeUdBindings,
    NativeBackupBindings,
    NativeStorageBindings,
    NativeSyncBindings,
    NativeSupportBindings {}

export const NATIVE_EXPORTS: Record<keyof NativeBindings, true> = {
  // --- network ---
  newCmix: true,
  loadCmix: true,
  newDummyTrafficManager: true,
  loadNotifications: true,
  loadNotificationsDummy: true,
  storeReceptionIdentity: true,
  loadReceptionIdentity: true,
  getIDFromContact: true,
  getPubkeyFromContact: true,
  setFactsOnContact: true,
  getFactsFromContact: true,
  // --- e2e ---
  login: true,
  loginEphemeral: true,
  // --- file transfer ---
  initFileTransfer: true,
  initChannelsFileTransfer: true,
  // --- channels ---
  newChannelsManager: true,
  loadChannelsManager: true,
  newChannelsManagerWithIndexedDb: true,
  newChannelsManagerDummyNameService: true,
  newChannelsManagerWithIndexedDbDummyNameService: true,
  generateChannel: true,
  getChannelInfo: true,
  generateChannelIdentity: true,
  getPublicChannelIdentityFromPrivate: true,
  isNicknameValid: true,
  newBroadcastChannel: true,
  // --- dm ---
  newDMClient: true,
  newDMClientWithIndexedDb: true,
  newDMClientWithIndexedDbUnsafe: true,
  decodeDMShareURL: true,
  getDmNotificationReportsForMe: true,
  // --- single use / restlike / rpc ---
  transmitSingleUse: true,
  listen: true,
  restlikeRequest: true,
  restlikeRequestAuth: true,
  requestRestLike: true,
  asyncRequestRestLike: true,
  rpcSend: true,
  // --- group ---
  newGroupChat: true,
  // --- user discovery ---
  newOrLoadUd: true,
  newUdManagerFromBackup: true,
  lookupUD: true,
  searchUD: true,
  // --- backup ---
  newCmixFromBackup: true,
  initializeBackup: true,
  resumeBackup: true,
  // --- storage ---
  newDatabaseCipher: true,
  purge: true,
  // --- sync ---
  newOrLoadSyncRemoteKV: true,
  newEkvLocalStore: true,
  newFileSystemRemoteStorage: true,
  // --- support ---
  createUserFriendlyErrorMessage: true,
  updateCommonErrors: true,
  supportedEmojis: true,
  supportedEmojisMap: true,
  validateReaction: true,
  getVersion: true,
  getClientVersion: true,
  getClientGitVersion: true,
  getClientDependencies: true,
  getWasmSemanticVersion: true,
  getXXDKSemanticVersion: true,
  getDefaultCMixParams: true,
  getDefaultE2EParams: true,
  getDefaultFileTransferParams: true,
  getDefaultSingleUseParams: true,
  getDefaultE2eFileTransferParams: true,
  generateSecret: true,
  downloadAndVerifySignedNdfWithUrl: true,
  logLevel: true,
  registerLogWriter: true,
  enableGrpcLogs: true,
  setTimeSource: true,
  setOffset: true,
};

export const NATIVE_EXPORT_NAMES: readonly string[] = Object.keys(NATIVE_EXPORTS);

/** Names of native exports `value` lacks (or has as non-functions). */
export function missingExports(value: unknown): string[] {
  if (
    (typeof value !== "object" && typeof value !== "function") ||
    value === null
  ) {
    return [...NATIVE_EXPORT_NAMES];
  }
  return NATIVE_EXPORT_NAMES.filter(
    (name) => typeof Reflect.get(value, name) !== "function",
  );
}

export function isNativeBindings(value: unknown): value is NativeBindings {
  return missingExports(value).length === 0;
}

/** Accept either the module namespace itself or its default export. */
export function resolveNativeBindings(loaded: unknown): NativeBindings {
  if (isNativeBindings(loaded)) return loaded;
  if (typeof loaded === "object" && loaded !== null) {
    const fallback: unknown = Reflect.get(loaded, "default");
    if (isNativeBindings(fallback)) return fallback;
  }
  const missing = missingExports(loaded);
  throw new BindingsLoadError(
    `Native bindings module is missing exports: ${missing.join(", ")}`,
    missing,
  );
}

// --- Context ---

/** Everything an adapter needs, passed by reference to every factory. */
export interface BindingsContext {
  readonly native: NativeBindings;
  readonly registry: Registry;
  readonly boundary: Boundary;
  readonly config: BindingsConfig;
  readonly logger: Logger;
}

export function createBindingsContext(
  native: NativeBindings,
  options: ConfigOptions = {},
): BindingsContext {
  const config = resolveConfig(options);
  const logger = createLogger(config.logLevel, config.logPrefix);
  return Object.freeze({
    native,
    registry: new Registry(),
    boundary: new Boundary(config, logger),
    config,
    logger,
  });
}

export interface BindingsOptions extends ConfigOptions {
  /** Module specifier to import. Defaults to `CMIX_BINDINGS_MODULE`. */
  module?: string;
  /** Custom loader; takes precedence over `module`. */
  load?: () => Promise<unknown>;
}

async function loadModule(options: BindingsOptions): Promise<unknown> {
  if (options.load) return options.load();
  const specifier = options.module ?? process.env.CMIX_BINDINGS_MODULE;
  if (!specifier) {
    throw new BindingsLoadError(
      "No native bindings module configured. Pass `module` or set CMIX_BINDINGS_MODULE.",
    );
  }
  try {
    const mod: unknown = await import(specifier);
    return mod;
  } catch (err) {
    throw new BindingsLoadError(
      `Failed to load native bindings from "${specifier}"`,
      [],
      { cause: err },
    );
  }
}

// --- Singleton ---

let bindingsContext: BindingsContext | null = null;
let initPromise: Promise<BindingsContext> | null = null;

/**
 * Load the native bindings. Idempotent: concurrent callers share one load,
 * and a failed load can be retried.
 */
export async function initBindings(
  options: BindingsOptions = {},
): Promise<BindingsContext> {
  if (bindingsContext) return bindingsContext;
  if (initPromise) return initPromise;

  initPromise = (async () => {
    try {
      const native = resolveNativeBindings(await loadModule(options));
      bindingsContext = createBindingsContext(native, options);
      bindingsContext.logger.info("native bindings loaded");
      return bindingsContext;
    } catch (e) {
      initPromise = null;
      throw e;
    }
  })();

  return initPromise;
}

/** Get the context synchronously. Throws if `initBindings()` hasn't completed. */
export function ensureBindings(): BindingsContext {
  if (!bindingsContext) throw new BindingsNotInitializedError();
  return bindingsContext;
}

/**
 * Inject mock bindings for testing. Pass `null` to reset.
 * Returns the context built around the mock.
 */
export function setBindingsForTesting(
  mock: NativeBindings | null,
  options: ConfigOptions = {},
): BindingsContext | null {
  bindingsContext = mock ? createBindingsContext(mock, options) : null;
  initPromise = null;
  return bindingsContext;
}
