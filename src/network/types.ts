import type { Capability } from "../callbacks.js";
import type { NativeError } from "../errors.js";
import type {
  NativeAuthenticatedConnection,
  NativeConnection,
} from "../e2e/types.js";

// --- Native side ---

export interface NativeHealthCallback {
  callback(healthy: boolean): void;
}

export interface NativeClientErrorReporter {
  report(source: string, message: string, trace: string): void;
}

export interface NativeTrackServicesCallback {
  callback(marshalData: Uint8Array, err: unknown): void;
}

export interface NativeRoundEventCallback {
  eventCallback(delivered: boolean, timedOut: boolean, roundResults: Uint8Array): void;
}

export interface NativeCmix {
  getID(): number;
  readyToSend(): boolean;
  startNetworkFollower(timeoutMs: number): void;
  stopNetworkFollower(): void;
  /** Resolves `false` or rejects with no reason while unhealthy. */
  waitForNetwork(timeoutMs: number): Promise<boolean | undefined>;
  networkFollowerStatus(): number;
  getNodeRegistrationStatus(): Uint8Array;
  hasRunningProcessies(): boolean;
  isHealthy(): boolean;
  getRunningProcesses(): Uint8Array;
  addHealthCallback(cb: NativeHealthCallback): number;
  removeHealthCallback(funcId: number): void;
  registerClientErrorCallback(reporter: NativeClientErrorReporter): void;
  trackServices(cb: NativeTrackServicesCallback): void;
  trackServicesWithIdentity(e2eId: number, cb: NativeTrackServicesCallback): void;
  makeReceptionIdentity(): Promise<Uint8Array>;
  makeLegacyReceptionIdentity(): Promise<Uint8Array>;
  getReceptionRegistrationValidationSignature(): Uint8Array;
  connect(
    e2eId: number,
    recipientContact: Uint8Array,
    e2eParams: Uint8Array,
  ): Promise<NativeConnection>;
  connectWithAuthentication(
    e2eId: number,
    recipientContact: Uint8Array,
    e2eParams: Uint8Array,
  ): Promise<NativeAuthenticatedConnection>;
  waitForRoundResult(
    roundList: Uint8Array,
    cb: NativeRoundEventCallback,
    timeoutMs: number,
  ): void;
}

export interface NativeDummyTraffic {
  setStatus(status: boolean): void;
  getStatus(): boolean;
}

export interface NativeNotifications {
  getID(): number;
  addToken(newToken: string, app: string): void;
  removeToken(): void;
  setMaxState(maxState: number): void;
  getMaxState(): number;
}

export interface NativeNetworkBindings {
  newCmix(
    ndfJson: string,
    storageDir: string,
    password: Uint8Array,
    registrationCode: string,
  ): Promise<void>;
  loadCmix(
    storageDir: string,
    password: Uint8Array,
    cmixParams: Uint8Array,
  ): Promise<NativeCmix>;
  newDummyTrafficManager(
    cmixId: number,
    maxNumMessages: number,
    avgSendDeltaMs: number,
    randomRangeMs: number,
  ): NativeDummyTraffic;
  loadNotifications(cmixId: number): NativeNotifications;
  loadNotificationsDummy(cmixId: number): NativeNotifications;
  storeReceptionIdentity(key: string, identity: Uint8Array, cmixId: number): void;
  loadReceptionIdentity(key: string, cmixId: number): Uint8Array;
  getIDFromContact(contact: Uint8Array): Uint8Array;
  getPubkeyFromContact(contact: Uint8Array): Uint8Array;
  setFactsOnContact(contact: Uint8Array, factListJson: Uint8Array): Uint8Array;
  getFactsFromContact(contact: Uint8Array): Uint8Array;
}

// --- Host side ---

export type HealthCallback = Capability<"callback", [healthy: boolean]>;

export type ClientErrorReporter = Capability<
  "report",
  [source: string, message: string, trace: string]
>;

/** Receives JSON of the tracked message services, or the tracking error. */
export type TrackServicesCallback = Capability<
  "callback",
  [marshalData: Uint8Array, err: NativeError | null]
>;

export type RoundEventCallback = Capability<
  "eventCallback",
  [delivered: boolean, timedOut: boolean, roundResults: Uint8Array]
>;

/** Network follower states as reported by `networkFollowerStatus()`. */
export const FollowerStatus = {
  Stopped: 0,
  Running: 2000,
  Stopping: 3000,
} as const;
