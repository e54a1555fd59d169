/**
 * Boundary configuration, resolved once when the bindings are initialized.
 *
 * Explicit options win over environment variables, which win over defaults.
 */

import { InvalidArgumentError } from "./errors.js";
import { isLogLevel } from "./logger.js";
import type { LogLevel } from "./logger.js";

export interface BindingsConfig {
  /**
   * Attach the native structured trace to host errors. Older binding
   * revisions surfaced only the message; turning this off reproduces that.
   */
  readonly traces: boolean;
  readonly logLevel: LogLevel;
  readonly logPrefix: string;
}

export interface ConfigOptions {
  traces?: boolean;
  logLevel?: LogLevel;
  logPrefix?: string;
}

export const DEFAULT_CONFIG: BindingsConfig = {
  traces: true,
  logLevel: "warn",
  logPrefix: "[cmix-host]",
};

export type Env = Readonly<Record<string, string | undefined>>;

function envTraces(env: Env): boolean | undefined {
  const raw = env.CMIX_HOST_TRACES;
  if (raw === undefined || raw === "") return undefined;
  switch (raw.toLowerCase()) {
    case "1":
    case "true":
      return true;
    case "0":
    case "false":
      return false;
    default:
      throw new InvalidArgumentError("CMIX_HOST_TRACES", "one of 1, 0, true, false");
  }
}

function envLogLevel(env: Env): LogLevel | undefined {
  const raw = env.CMIX_HOST_LOG_LEVEL;
  if (raw === undefined || raw === "") return undefined;
  if (!isLogLevel(raw)) {
    throw new InvalidArgumentError(
      "CMIX_HOST_LOG_LEVEL",
      "one of debug, info, warn, error, silent",
    );
  }
  return raw;
}

export function resolveConfig(
  options: ConfigOptions = {},
  env: Env = process.env,
): BindingsConfig {
  return Object.freeze({
    traces: options.traces ?? envTraces(env) ?? DEFAULT_CONFIG.traces,
    logLevel: options.logLevel ?? envLogLevel(env) ?? DEFAULT_CONFIG.logLevel,
    logPrefix: options.logPrefix ?? DEFAULT_CONFIG.logPrefix,
  });
}
