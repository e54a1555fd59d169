import { afterEach, describe, it, expect, vi } from "vitest";
import {
  NATIVE_EXPORTS,
  ensureBindings,
  initBindings,
  missingExports,
  resolveNativeBindings,
  setBindingsForTesting,
} from "./bindings-init.js";
import type { NativeBindings } from "./bindings-init.js";
import { BindingsLoadError, BindingsNotInitializedError } from "./errors.js";
import { mockNative } from "./testing/mock-bindings.js";

function fakeModule() {
  return mockNative<NativeBindings>(NATIVE_EXPORTS);
}

afterEach(() => {
  setBindingsForTesting(null);
});

// ============================================================================
// Export checks
// ============================================================================

describe("resolveNativeBindings", () => {
  it("accepts a complete module namespace", () => {
    const mod = fakeModule();
    expect(resolveNativeBindings(mod)).toBe(mod);
  });

  it("falls back to the default export", () => {
    const mod = fakeModule();
    expect(resolveNativeBindings({ default: mod })).toBe(mod);
  });

  it("names the missing exports", () => {
    const { newCmix: _dropped, ...partial } = fakeModule();
    try {
      resolveNativeBindings(partial);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(BindingsLoadError);
      expect((err as BindingsLoadError).missing).toEqual(["newCmix"]);
      expect((err as BindingsLoadError).message).toBe(
        "Native bindings module is missing exports: newCmix",
      );
    }
  });

  it("treats non-functions as missing", () => {
    expect(missingExports({ ...fakeModule(), login: "nope" })).toEqual(["login"]);
    expect(missingExports(null)).toHaveLength(Object.keys(NATIVE_EXPORTS).length);
  });
});

// ============================================================================
// Singleton lifecycle
// ============================================================================

describe("initBindings", () => {
  it("requires initialization before use", () => {
    expect(() => ensureBindings()).toThrow(BindingsNotInitializedError);
  });

  it("loads once for concurrent callers", async () => {
    const mod = fakeModule();
    const load = vi.fn(async () => mod);
    const [a, b] = await Promise.all([
      initBindings({ load, logLevel: "silent" }),
      initBindings({ load, logLevel: "silent" }),
    ]);
    expect(a).toBe(b);
    expect(load).toHaveBeenCalledTimes(1);
    expect(ensureBindings()).toBe(a);
    expect(a.native).toBe(mod);
  });

  it("can be retried after a failed load", async () => {
    const load = vi
      .fn<() => Promise<unknown>>()
      .mockRejectedValueOnce(new Error("not built"))
      .mockResolvedValueOnce(fakeModule());
    await expect(initBindings({ load, logLevel: "silent" })).rejects.toThrow("not built");
    const ctx = await initBindings({ load, logLevel: "silent" });
    expect(ctx.config.logLevel).toBe("silent");
    expect(load).toHaveBeenCalledTimes(2);
  });

  it("wraps import failures", async () => {
    const err: unknown = await initBindings({
      module: "./definitely-not-a-bindings-module.js",
      logLevel: "silent",
    }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BindingsLoadError);
    expect((err as BindingsLoadError).message).toBe(
      'Failed to load native bindings from "./definitely-not-a-bindings-module.js"',
    );
    expect((err as BindingsLoadError).cause).toBeInstanceOf(Error);
  });
});

describe("setBindingsForTesting", () => {
  it("installs and clears a context", () => {
    const ctx = setBindingsForTesting(fakeModule(), { traces: false });
    expect(ctx?.config.traces).toBe(false);
    expect(ensureBindings()).toBe(ctx);
    expect(setBindingsForTesting(null)).toBeNull();
    expect(() => ensureBindings()).toThrow(BindingsNotInitializedError);
  });
});
