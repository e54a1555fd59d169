import { describe, it, expect } from "vitest";
import {
  BindingsError,
  BindingsLoadError,
  HandleNotFoundError,
  InvalidArgumentError,
  NativeError,
  toNativeError,
} from "./errors.js";

describe("error classes", () => {
  it("names the argument and the expected shape", () => {
    const err = new InvalidArgumentError("payload", "a Uint8Array");
    expect(err).toBeInstanceOf(BindingsError);
    expect(err.name).toBe("InvalidArgumentError");
    expect(err.argument).toBe("payload");
    expect(err.message).toBe('Invalid argument "payload": expected a Uint8Array');
  });

  it("formats missing handles", () => {
    const err = new HandleNotFoundError("DbCipher", 7);
    expect(err.message).toBe("Cannot get DbCipher for ID 7, does not exist");
    expect(err.kind).toBe("DbCipher");
    expect(err.id).toBe(7);
  });

  it("keeps the cause of a load failure", () => {
    const cause = new Error("ENOENT");
    const err = new BindingsLoadError("load failed", ["newCmix"], { cause });
    expect(err.cause).toBe(cause);
    expect(err.missing).toEqual(["newCmix"]);
  });
});

describe("toNativeError", () => {
  it("uses a thrown string as the message", () => {
    const err = toNativeError("network not ready");
    expect(err).toBeInstanceOf(NativeError);
    expect(err.message).toBe("network not ready");
    expect(err.trace).toBeUndefined();
  });

  it("prefers a structured trace over the stack", () => {
    const source = Object.assign(new Error("round failed"), {
      trace: "round failed\n  at follower.run",
    });
    const err = toNativeError(source);
    expect(err.message).toBe("round failed");
    expect(err.trace).toBe("round failed\n  at follower.run");
  });

  it("falls back to the stack of an Error", () => {
    const source = new Error("boom");
    expect(toNativeError(source).trace).toBe(source.stack);
  });

  it("drops traces when disabled", () => {
    const source = Object.assign(new Error("boom"), { trace: "detail" });
    expect(toNativeError(source, false).trace).toBeUndefined();
  });

  it("reads message-bearing plain objects", () => {
    const err = toNativeError({ message: "bad contact", trace: "t" });
    expect(err.message).toBe("bad contact");
    expect(err.trace).toBe("t");
  });

  it("passes an existing NativeError through", () => {
    const original = new NativeError("x", "trace");
    expect(toNativeError(original)).toBe(original);
    const stripped = toNativeError(original, false);
    expect(stripped).not.toBe(original);
    expect(stripped.message).toBe("x");
    expect(stripped.trace).toBeUndefined();
  });

  it("stringifies anything else", () => {
    expect(toNativeError(42).message).toBe("42");
    expect(toNativeError(null).message).toBe("null");
  });
});
