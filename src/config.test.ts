import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, resolveConfig } from "./config.js";
import { InvalidArgumentError } from "./errors.js";

describe("resolveConfig", () => {
  it("uses defaults with no options or environment", () => {
    expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
  });

  it("reads the environment", () => {
    const config = resolveConfig({}, {
      CMIX_HOST_TRACES: "FALSE",
      CMIX_HOST_LOG_LEVEL: "debug",
    });
    expect(config.traces).toBe(false);
    expect(config.logLevel).toBe("debug");
  });

  it("lets explicit options win over the environment", () => {
    const config = resolveConfig(
      { traces: true, logLevel: "error", logPrefix: "[app]" },
      { CMIX_HOST_TRACES: "0", CMIX_HOST_LOG_LEVEL: "debug" },
    );
    expect(config).toEqual({ traces: true, logLevel: "error", logPrefix: "[app]" });
  });

  it("ignores empty variables", () => {
    expect(resolveConfig({}, { CMIX_HOST_TRACES: "" }).traces).toBe(true);
  });

  it("rejects unknown values", () => {
    expect(() => resolveConfig({}, { CMIX_HOST_TRACES: "yes" })).toThrow(
      'Invalid argument "CMIX_HOST_TRACES": expected one of 1, 0, true, false',
    );
    expect(() => resolveConfig({}, { CMIX_HOST_LOG_LEVEL: "verbose" })).toThrow(
      InvalidArgumentError,
    );
  });

  it("freezes the result", () => {
    expect(Object.isFrozen(resolveConfig({}, {}))).toBe(true);
  });
});
