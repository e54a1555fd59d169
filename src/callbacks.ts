/**
 * Callback capabilities: host callables the native library invokes.
 *
 * A capability is either a plain function or an object exposing the named
 * method(s). Shapes are checked when the adapter is built, so a missing
 * method fails the entry point that was handed it, not the first event.
 */

import { InvalidArgumentError } from "./errors.js";

/** A function, or an object with method `K`, taking `A` and returning `R`. */
export type Capability<K extends string, A extends unknown[], R = void> =
  | ((...args: A) => R)
  | { readonly [P in K]: (...args: A) => R };

export function bindCapability<K extends string, A extends unknown[], R>(
  label: string,
  host: Capability<K, A, R>,
  method: K,
): (...args: A) => R {
  if (typeof host === "function") return host;
  if (typeof host !== "object" || host === null) {
    throw new InvalidArgumentError(label, `a function or an object with ${method}()`);
  }
  const fn: (...args: A) => R = host[method];
  if (typeof fn !== "function") {
    throw new InvalidArgumentError(label, `an object with ${method}()`);
  }
  return (...args: A) => fn.apply(host, args);
}

/** Check every listed method is callable on a multi-method capability. */
export function requireMethods<T extends object>(
  label: string,
  host: T,
  methods: readonly (keyof T & string)[],
): T {
  if (typeof host !== "object" || host === null) {
    throw new InvalidArgumentError(label, `an object with ${methods.join(", ")}`);
  }
  const missing = methods.filter((m) => typeof Reflect.get(host, m) !== "function");
  if (missing.length > 0) {
    throw new InvalidArgumentError(
      label,
      `an object with ${missing.map((m) => `${m}()`).join(", ")}`,
    );
  }
  return host;
}

/** For capabilities whose methods may each be absent; present ones must be callable. */
export function optionalMethods<T extends object>(
  label: string,
  host: T,
  methods: readonly (keyof T & string)[],
): T {
  if (typeof host !== "object" || host === null) {
    throw new InvalidArgumentError(label, "an object");
  }
  for (const m of methods) {
    const fn: unknown = Reflect.get(host, m);
    if (fn !== undefined && typeof fn !== "function") {
      throw new InvalidArgumentError(`${label}.${m}`, "a function when present");
    }
  }
  return host;
}
