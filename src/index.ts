/**
 * cmix-host — typed host-side adapters over the cMix messaging client bindings.
 *
 * Usage:
 *   import { initBindings } from "cmix-host";
 *   await initBindings({ module: "./xxdk-bindings.js" });
 *
 *   // Then import specific modules:
 *   import { loadCmix } from "cmix-host/network";
 *   import { login } from "cmix-host/e2e";
 */

export {
  initBindings,
  ensureBindings,
  setBindingsForTesting,
  createBindingsContext,
  isNativeBindings,
  missingExports,
} from "./bindings-init.js";
export type {
  BindingsContext,
  BindingsOptions,
  NativeBindings,
} from "./bindings-init.js";
export type { BindingsConfig, ConfigOptions } from "./config.js";
export type { Capability } from "./callbacks.js";
export type { LogLevel, Logger } from "./logger.js";
export {
  BindingsError,
  BindingsLoadError,
  BindingsNotInitializedError,
  HandleNotFoundError,
  InvalidArgumentError,
  NativeError,
} from "./errors.js";
export { Registry, Tracker } from "./registry.js";
export { decodeJson, encodeJson } from "./marshal.js";
