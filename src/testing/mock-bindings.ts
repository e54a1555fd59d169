/**
 * Test doubles for the native bindings. Not part of the published build.
 */

import { vi } from "vitest";
import type { Mock } from "vitest";
import { NATIVE_EXPORTS, createBindingsContext } from "../bindings-init.js";
import type { BindingsContext, NativeBindings } from "../bindings-init.js";
import type { ConfigOptions } from "../config.js";

/** Every method of `T` replaced by a `vi.fn()` with the same signature. */
export type Mocked<T> = {
  [K in keyof T]: T[K] extends (...args: infer A) => infer R
    ? Mock<(...args: A) => R>
    : never;
};

export function mockNative<T>(methods: Record<keyof T, true>): Mocked<T> {
  const mock: Record<string, Mock> = {};
  for (const name of Object.keys(methods)) {
    mock[name] = vi.fn();
  }
  return mock as unknown as Mocked<T>;
}

export function createTestContext(options: ConfigOptions = {}): {
  native: Mocked<NativeBindings>;
  ctx: BindingsContext;
} {
  const native = mockNative<NativeBindings>(NATIVE_EXPORTS);
  const ctx = createBindingsContext(native, { logLevel: "silent", ...options });
  return { native, ctx };
}

/** Public method names of `obj`, from its whole prototype chain, sorted. */
export function listEntryPoints(obj: object): string[] {
  const names = new Set<string>();
  let proto: unknown = Object.getPrototypeOf(obj);
  while (proto !== null && proto !== Object.prototype && typeof proto === "object") {
    for (const name of Object.getOwnPropertyNames(proto)) {
      if (name === "constructor") continue;
      const descriptor = Object.getOwnPropertyDescriptor(proto, name);
      if (typeof descriptor?.value === "function") names.add(name);
    }
    proto = Object.getPrototypeOf(proto);
  }
  return [...names].sort();
}

export function sortedKeys(methods: object): string[] {
  return Object.keys(methods).sort();
}

/** Narrow away `undefined`, failing the test when it is absent. */
export function defined<T>(value: T | undefined, what = "value"): T {
  if (value === undefined) throw new Error(`expected ${what} to be defined`);
  return value;
}
