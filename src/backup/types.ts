import type { Capability } from "../callbacks.js";

export interface NativeUpdateBackup {
  updateBackup(encryptedBackup: Uint8Array): void;
}

export interface NativeBackup {
  stopBackup(): void;
  isBackupRunning(): boolean;
  addJson(json: string): void;
}

export interface NativeBackupBindings {
  newCmixFromBackup(
    ndfJson: string,
    storageDir: string,
    backupPassphrase: string,
    sessionPassword: Uint8Array,
    backupFileContents: Uint8Array,
  ): Promise<Uint8Array>;
  initializeBackup(
    e2eId: number,
    udId: number,
    backupPassphrase: string,
    cb: NativeUpdateBackup,
  ): NativeBackup;
  resumeBackup(e2eId: number, udId: number, cb: NativeUpdateBackup): NativeBackup;
}

/** Receives every new encrypted backup the native side produces. */
export type UpdateBackup = Capability<"updateBackup", [encryptedBackup: Uint8Array]>;
