/**
 * Cmix — the network client. Owns the network follower and is the root
 * every other object is created from, by the id `getID()` returns.
 *
 * Usage:
 *   await newCmix(ndfJson, "/storage", password, "");
 *   const cmix = await loadCmix("/storage", password, getDefaultCMixParams());
 *   cmix.startNetworkFollower(5000);
 *   await cmix.waitForNetwork(30_000);
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { bindCapability } from "../callbacks.js";
import { AuthenticatedConnection, Connection } from "../e2e/connection.js";
import { NativeError } from "../errors.js";
import { bytesArg, copyBytes, intArg, stringArg, uintArg } from "../marshal.js";
import type {
  ClientErrorReporter,
  HealthCallback,
  NativeCmix,
  NativeTrackServicesCallback,
  RoundEventCallback,
  TrackServicesCallback,
} from "./types.js";

function adaptTrackServices(
  ctx: BindingsContext,
  cb: TrackServicesCallback,
): NativeTrackServicesCallback {
  const fn = bindCapability("cb", cb, "callback");
  return {
    callback(marshalData, err) {
      fn(copyBytes(marshalData), ctx.boundary.error(err));
    },
  };
}

export class Cmix implements EntryPoints<NativeCmix> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeCmix,
  ) {
    Object.freeze(this);
  }

  getID(): number {
    return this._ctx.boundary.call("Cmix.getID", () => this._native.getID());
  }

  // ==========================================================================
  // Network follower
  // ==========================================================================

  /** True when healthy and registered with enough nodes to send. */
  readyToSend(): boolean {
    return this._ctx.boundary.call("Cmix.readyToSend", () => this._native.readyToSend());
  }

  startNetworkFollower(timeoutMs: number): void {
    const timeout = uintArg("timeoutMs", timeoutMs);
    this._ctx.boundary.call("Cmix.startNetworkFollower", () =>
      this._native.startNetworkFollower(timeout),
    );
  }

  /** Throws if the follower is not running. */
  stopNetworkFollower(): void {
    this._ctx.boundary.call("Cmix.stopNetworkFollower", () =>
      this._native.stopNetworkFollower(),
    );
  }

  /**
   * Resolves once the network is healthy; rejects if it is not within
   * `timeoutMs`. The native side signals an unhealthy network either by
   * resolving `false` or by rejecting without a reason.
   */
  async waitForNetwork(timeoutMs: number): Promise<void> {
    const timeout = uintArg("timeoutMs", timeoutMs);
    const healthy = await this._ctx.boundary.settle("Cmix.waitForNetwork", async () => {
      try {
        return await this._native.waitForNetwork(timeout);
      } catch (err) {
        if (err === undefined) return false;
        throw err;
      }
    });
    if (healthy === false) throw new NativeError("network is not healthy");
  }

  /** One of {@link FollowerStatus}. */
  networkFollowerStatus(): number {
    return this._ctx.boundary.call("Cmix.networkFollowerStatus", () =>
      this._native.networkFollowerStatus(),
    );
  }

  /** JSON of the node registration status. */
  getNodeRegistrationStatus(): Uint8Array {
    return this._ctx.boundary.callBytes("Cmix.getNodeRegistrationStatus", () =>
      this._native.getNodeRegistrationStatus(),
    );
  }

  hasRunningProcessies(): boolean {
    return this._ctx.boundary.call("Cmix.hasRunningProcessies", () =>
      this._native.hasRunningProcessies(),
    );
  }

  isHealthy(): boolean {
    return this._ctx.boundary.call("Cmix.isHealthy", () => this._native.isHealthy());
  }

  /** JSON list of running process names. */
  getRunningProcesses(): Uint8Array {
    return this._ctx.boundary.callBytes("Cmix.getRunningProcesses", () =>
      this._native.getRunningProcesses(),
    );
  }

  /** Returns the registration id to pass to `removeHealthCallback`. */
  addHealthCallback(cb: HealthCallback): number {
    const fn = bindCapability("cb", cb, "callback");
    return this._ctx.boundary.call("Cmix.addHealthCallback", () =>
      this._native.addHealthCallback({ callback: (healthy) => fn(healthy) }),
    );
  }

  removeHealthCallback(funcId: number): void {
    const id = intArg("funcId", funcId);
    this._ctx.boundary.call("Cmix.removeHealthCallback", () =>
      this._native.removeHealthCallback(id),
    );
  }

  registerClientErrorCallback(reporter: ClientErrorReporter): void {
    const fn = bindCapability("reporter", reporter, "report");
    this._ctx.boundary.call("Cmix.registerClientErrorCallback", () =>
      this._native.registerClientErrorCallback({
        report: (source, message, trace) => fn(source, message, trace),
      }),
    );
  }

  trackServices(cb: TrackServicesCallback): void {
    const adapted = adaptTrackServices(this._ctx, cb);
    this._ctx.boundary.call("Cmix.trackServices", () =>
      this._native.trackServices(adapted),
    );
  }

  trackServicesWithIdentity(e2eId: number, cb: TrackServicesCallback): void {
    const id = intArg("e2eId", e2eId);
    const adapted = adaptTrackServices(this._ctx, cb);
    this._ctx.boundary.call("Cmix.trackServicesWithIdentity", () =>
      this._native.trackServicesWithIdentity(id, adapted),
    );
  }

  // ==========================================================================
  // Identities
  // ==========================================================================

  /** Resolves to JSON of a new reception identity. */
  async makeReceptionIdentity(): Promise<Uint8Array> {
    const identity = await this._ctx.boundary.settle("Cmix.makeReceptionIdentity", () =>
      this._native.makeReceptionIdentity(),
    );
    return copyBytes(identity);
  }

  async makeLegacyReceptionIdentity(): Promise<Uint8Array> {
    const identity = await this._ctx.boundary.settle(
      "Cmix.makeLegacyReceptionIdentity",
      () => this._native.makeLegacyReceptionIdentity(),
    );
    return copyBytes(identity);
  }

  getReceptionRegistrationValidationSignature(): Uint8Array {
    return this._ctx.boundary.callBytes("Cmix.getReceptionRegistrationValidationSignature", () =>
      this._native.getReceptionRegistrationValidationSignature(),
    );
  }

  // ==========================================================================
  // Connections and rounds
  // ==========================================================================

  async connect(
    e2eId: number,
    recipientContact: Uint8Array,
    e2eParams: Uint8Array,
  ): Promise<Connection> {
    const id = intArg("e2eId", e2eId);
    const contact = bytesArg("recipientContact", recipientContact);
    const params = bytesArg("e2eParams", e2eParams);
    const native = await this._ctx.boundary.settle("Cmix.connect", () =>
      this._native.connect(id, contact, params),
    );
    return new Connection(this._ctx, native);
  }

  async connectWithAuthentication(
    e2eId: number,
    recipientContact: Uint8Array,
    e2eParams: Uint8Array,
  ): Promise<AuthenticatedConnection> {
    const id = intArg("e2eId", e2eId);
    const contact = bytesArg("recipientContact", recipientContact);
    const params = bytesArg("e2eParams", e2eParams);
    const native = await this._ctx.boundary.settle("Cmix.connectWithAuthentication", () =>
      this._native.connectWithAuthentication(id, contact, params),
    );
    return new AuthenticatedConnection(this._ctx, native);
  }

  /**
   * Report the outcome of the rounds in `roundList` (JSON of a send report)
   * on `cb`, or a timeout after `timeoutMs`.
   */
  waitForRoundResult(
    roundList: Uint8Array,
    cb: RoundEventCallback,
    timeoutMs: number,
  ): void {
    const rounds = bytesArg("roundList", roundList);
    const fn = bindCapability("cb", cb, "eventCallback");
    const timeout = uintArg("timeoutMs", timeoutMs);
    this._ctx.boundary.call("Cmix.waitForRoundResult", () =>
      this._native.waitForRoundResult(
        rounds,
        {
          eventCallback: (delivered, timedOut, roundResults) =>
            fn(delivered, timedOut, copyBytes(roundResults)),
        },
        timeout,
      ),
    );
  }
}

// --- Factories ---

/** Create user storage and register with the network. Run once per storage dir. */
export async function newCmix(
  ndfJson: string,
  storageDir: string,
  password: Uint8Array,
  registrationCode: string,
  ctx: BindingsContext = ensureBindings(),
): Promise<void> {
  const ndf = stringArg("ndfJson", ndfJson);
  const dir = stringArg("storageDir", storageDir);
  const pw = bytesArg("password", password);
  const code = stringArg("registrationCode", registrationCode);
  await ctx.boundary.settle("newCmix", () => ctx.native.newCmix(ndf, dir, pw, code));
}

/** Load the storage `newCmix` created. */
export async function loadCmix(
  storageDir: string,
  password: Uint8Array,
  cmixParams: Uint8Array,
  ctx: BindingsContext = ensureBindings(),
): Promise<Cmix> {
  const dir = stringArg("storageDir", storageDir);
  const pw = bytesArg("password", password);
  const params = bytesArg("cmixParams", cmixParams);
  const native = await ctx.boundary.settle("loadCmix", () =>
    ctx.native.loadCmix(dir, pw, params),
  );
  return new Cmix(ctx, native);
}
