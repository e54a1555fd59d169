/**
 * Encrypted account backups. The native side re-encrypts the backup on
 * every change and hands it to the host's `updateBackup`.
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { bindCapability } from "../callbacks.js";
import { bytesArg, copyBytes, intArg, stringArg } from "../marshal.js";
import type { NativeBackup, NativeUpdateBackup, UpdateBackup } from "./types.js";

function adaptUpdateBackup(label: string, host: UpdateBackup): NativeUpdateBackup {
  const fn = bindCapability(label, host, "updateBackup");
  return { updateBackup: (encrypted) => fn(copyBytes(encrypted)) };
}

export class Backup implements EntryPoints<NativeBackup> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeBackup,
  ) {
    Object.freeze(this);
  }

  /** Stop backing up and delete the stored backup key. */
  stopBackup(): void {
    this._ctx.boundary.call("Backup.stopBackup", () => this._native.stopBackup());
  }

  isBackupRunning(): boolean {
    return this._ctx.boundary.call("Backup.isBackupRunning", () =>
      this._native.isBackupRunning(),
    );
  }

  /** Store extra host JSON in the backup. Replaces anything stored before. */
  addJson(json: string): void {
    const data = stringArg("json", json);
    this._ctx.boundary.call("Backup.addJson", () => this._native.addJson(data));
  }
}

/**
 * Start backing up, encrypting with `backupPassphrase`. Fails if a backup
 * is already running.
 */
export function initializeBackup(
  e2eId: number,
  udId: number,
  backupPassphrase: string,
  cb: UpdateBackup,
  ctx: BindingsContext = ensureBindings(),
): Backup {
  const e2e = intArg("e2eId", e2eId);
  const ud = intArg("udId", udId);
  const passphrase = stringArg("backupPassphrase", backupPassphrase);
  const adapted = adaptUpdateBackup("cb", cb);
  const native = ctx.boundary.call("initializeBackup", () =>
    ctx.native.initializeBackup(e2e, ud, passphrase, adapted),
  );
  return new Backup(ctx, native);
}

/** Resume a backup started by {@link initializeBackup} in an earlier session. */
export function resumeBackup(
  e2eId: number,
  udId: number,
  cb: UpdateBackup,
  ctx: BindingsContext = ensureBindings(),
): Backup {
  const e2e = intArg("e2eId", e2eId);
  const ud = intArg("udId", udId);
  const adapted = adaptUpdateBackup("cb", cb);
  const native = ctx.boundary.call("resumeBackup", () =>
    ctx.native.resumeBackup(e2e, ud, adapted),
  );
  return new Backup(ctx, native);
}

/**
 * Create user storage from a backup file. Resolves to JSON of the backup
 * report (restored identity and facts).
 */
export async function newCmixFromBackup(
  ndfJson: string,
  storageDir: string,
  backupPassphrase: string,
  sessionPassword: Uint8Array,
  backupFileContents: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): Promise<Uint8Array> {
  const ndf = stringArg("ndfJson", ndfJson);
  const dir = stringArg("storageDir", storageDir);
  const passphrase = stringArg("backupPassphrase", backupPassphrase);
  const pw = bytesArg("sessionPassword", sessionPassword);
  const contents = bytesArg("backupFileContents", backupFileContents);
  return ctx.boundary.settleBytes("newCmixFromBackup", () =>
    ctx.native.newCmixFromBackup(ndf, dir, passphrase, pw, contents),
  );
}
