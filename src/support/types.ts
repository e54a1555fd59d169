import type { Capability } from "../callbacks.js";

// --- Native side ---

export interface NativeLogWriter {
  log(message: string): void;
}

export interface NativeTimeSource {
  nowMs(): number;
}

export interface NativeSupportBindings {
  createUserFriendlyErrorMessage(errStr: string): string;
  updateCommonErrors(jsonFile: string): void;
  supportedEmojis(): Uint8Array;
  supportedEmojisMap(): Uint8Array;
  validateReaction(reaction: string): void;
  getVersion(): string;
  getClientVersion(): string;
  getClientGitVersion(): string;
  getClientDependencies(): string;
  getWasmSemanticVersion(): Uint8Array;
  getXXDKSemanticVersion(): Uint8Array;
  getDefaultCMixParams(): Uint8Array;
  getDefaultE2EParams(): Uint8Array;
  getDefaultFileTransferParams(): Uint8Array;
  getDefaultSingleUseParams(): Uint8Array;
  getDefaultE2eFileTransferParams(): Uint8Array;
  generateSecret(numBytes: number): Uint8Array;
  downloadAndVerifySignedNdfWithUrl(url: string, cert: string): Promise<Uint8Array>;
  logLevel(level: number): void;
  registerLogWriter(writer: NativeLogWriter): void;
  enableGrpcLogs(writer: NativeLogWriter): void;
  setTimeSource(source: NativeTimeSource): void;
  setOffset(offsetMs: number): void;
}

// --- Host side ---

export type LogWriter = Capability<"log", [message: string]>;

export type TimeSource = Capability<"nowMs", [], number>;

/** Native log thresholds accepted by `logLevel`. */
export const NativeLogLevel = {
  Trace: -1,
  Debug: 0,
  Info: 1,
  Warn: 2,
  Error: 3,
  Critical: 4,
  Fatal: 5,
} as const;
