import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import type { EntryPoints } from "../boundary.js";
import { intArg, stringArg } from "../marshal.js";
import type { NativeNotifications } from "./types.js";

/** Push-notification registration for one cmix instance. */
export class Notifications implements EntryPoints<NativeNotifications> {
  constructor(
    private readonly _ctx: BindingsContext,
    private readonly _native: NativeNotifications,
  ) {
    Object.freeze(this);
  }

  getID(): number {
    return this._ctx.boundary.call("Notifications.getID", () => this._native.getID());
  }

  addToken(newToken: string, app: string): void {
    const token = stringArg("newToken", newToken);
    const a = stringArg("app", app);
    this._ctx.boundary.call("Notifications.addToken", () =>
      this._native.addToken(token, a),
    );
  }

  removeToken(): void {
    this._ctx.boundary.call("Notifications.removeToken", () =>
      this._native.removeToken(),
    );
  }

  setMaxState(maxState: number): void {
    const state = intArg("maxState", maxState);
    this._ctx.boundary.call("Notifications.setMaxState", () =>
      this._native.setMaxState(state),
    );
  }

  getMaxState(): number {
    return this._ctx.boundary.call("Notifications.getMaxState", () =>
      this._native.getMaxState(),
    );
  }
}

export function loadNotifications(
  cmixId: number,
  ctx: BindingsContext = ensureBindings(),
): Notifications {
  const id = intArg("cmixId", cmixId);
  const native = ctx.boundary.call("loadNotifications", () =>
    ctx.native.loadNotifications(id),
  );
  return new Notifications(ctx, native);
}

/** Same as {@link loadNotifications} but never contacts the notification server. */
export function loadNotificationsDummy(
  cmixId: number,
  ctx: BindingsContext = ensureBindings(),
): Notifications {
  const id = intArg("cmixId", cmixId);
  const native = ctx.boundary.call("loadNotificationsDummy", () =>
    ctx.native.loadNotificationsDummy(id),
  );
  return new Notifications(ctx, native);
}
