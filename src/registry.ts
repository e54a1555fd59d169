import { HandleNotFoundError } from "./errors.js";
import type { NativeDbCipher } from "./storage/types.js";

/**
 * Integer-handle table for objects other entry points refer to by id.
 *
 * Ids start at 0 and are never reused. Every operation completes
 * synchronously, so allocation cannot interleave with another caller.
 */
export class Tracker<T> {
  private readonly _items = new Map<number, T>();
  private _nextId = 0;

  constructor(readonly kind: string) {}

  add(item: T): number {
    const id = this._nextId++;
    this._items.set(id, item);
    return id;
  }

  get(id: number): T {
    const item = this._items.get(id);
    if (item === undefined) throw new HandleNotFoundError(this.kind, id);
    return item;
  }

  has(id: number): boolean {
    return this._items.has(id);
  }

  delete(id: number): boolean {
    return this._items.delete(id);
  }

  get size(): number {
    return this._items.size;
  }
}

/**
 * Handles owned by this layer. Objects the native library tracks itself
 * (cmix, e2e, user discovery, channels, DM) are referred to by the id their
 * own `getID()` returns.
 */
export class Registry {
  readonly ciphers = new Tracker<NativeDbCipher>("DbCipher");
}
