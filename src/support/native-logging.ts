/**
 * Native-side logging: threshold and where the lines go.
 */

import { ensureBindings } from "../bindings-init.js";
import type { BindingsContext } from "../bindings-init.js";
import { bindCapability } from "../callbacks.js";
import { intArg } from "../marshal.js";
import type { LogWriter, NativeLogWriter } from "./types.js";

function adaptLogWriter(label: string, writer: LogWriter): NativeLogWriter {
  const fn = bindCapability(label, writer, "log");
  return { log: (message) => fn(message) };
}

/** @param level - One of {@link NativeLogLevel}. */
export function logLevel(level: number, ctx: BindingsContext = ensureBindings()): void {
  const l = intArg("level", level);
  ctx.boundary.call("logLevel", () => ctx.native.logLevel(l));
}

export function registerLogWriter(
  writer: LogWriter,
  ctx: BindingsContext = ensureBindings(),
): void {
  const adapted = adaptLogWriter("writer", writer);
  ctx.boundary.call("registerLogWriter", () => ctx.native.registerLogWriter(adapted));
}

/** Send the native gRPC logs to `writer`. */
export function enableGrpcLogs(
  writer: LogWriter,
  ctx: BindingsContext = ensureBindings(),
): void {
  const adapted = adaptLogWriter("writer", writer);
  ctx.boundary.call("enableGrpcLogs", () => ctx.native.enableGrpcLogs(adapted));
}

/** Route native log lines into the host logger at info level. */
export function forwardNativeLogs(ctx: BindingsContext = ensureBindings()): void {
  registerLogWriter((message) => ctx.logger.info(message.trimEnd()), ctx);
}
