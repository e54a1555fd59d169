import { describe, it, expect, vi } from "vitest";
import { Boundary } from "./boundary.js";
import { resolveConfig } from "./config.js";
import { InvalidArgumentError, NativeError } from "./errors.js";
import type { Logger } from "./logger.js";

function createBoundary(traces = true) {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  const boundary = new Boundary(resolveConfig({ traces }, {}), logger);
  return { boundary, logger };
}

describe("Boundary", () => {
  describe("call", () => {
    it("returns the native result", () => {
      const { boundary } = createBoundary();
      expect(boundary.call("Cmix.getID", () => 4)).toBe(4);
    });

    it("rethrows native failures as NativeError with the message unchanged", () => {
      const { boundary } = createBoundary();
      const run = () =>
        boundary.call("Cmix.readyToSend", () => {
          throw new Error("failed to read ready state");
        });
      expect(run).toThrow(NativeError);
      expect(run).toThrow("failed to read ready state");
    });

    it("lets host argument errors through untouched", () => {
      const { boundary } = createBoundary();
      const argErr = new InvalidArgumentError("id", "an integer");
      try {
        boundary.call("op", () => {
          throw argErr;
        });
        expect.unreachable();
      } catch (err) {
        expect(err).toBe(argErr);
      }
    });

    it("logs the operation and the failure at debug", () => {
      const { boundary, logger } = createBoundary();
      expect(() =>
        boundary.call("E2e.reset", () => {
          throw "no partner";
        }),
      ).toThrow("no partner");
      expect(logger.debug).toHaveBeenCalledWith("E2e.reset");
      expect(logger.debug).toHaveBeenCalledWith("E2e.reset failed: no partner");
    });
  });

  describe("settle", () => {
    it("resolves with the native value", async () => {
      const { boundary } = createBoundary();
      await expect(boundary.settle("op", async () => "ok")).resolves.toBe("ok");
    });

    it("turns a synchronous throw into a rejection", async () => {
      const { boundary } = createBoundary();
      const promise = boundary.settle("op", () => {
        throw new Error("sync failure");
      });
      await expect(promise).rejects.toThrow(NativeError);
      await expect(promise).rejects.toThrow("sync failure");
    });

    it("converts a rejection", async () => {
      const { boundary } = createBoundary(false);
      const source = Object.assign(new Error("timed out"), { trace: "detail" });
      const err: unknown = await boundary
        .settle("op", () => Promise.reject(source))
        .catch((e: unknown) => e);
      expect(err).toBeInstanceOf(NativeError);
      expect((err as NativeError).message).toBe("timed out");
      expect((err as NativeError).trace).toBeUndefined();
    });
  });

  describe("bytes", () => {
    it("copies returned buffers out", () => {
      const { boundary } = createBoundary();
      const owned = new Uint8Array([1, 2, 3]);
      const result = boundary.callBytes("op", () => owned);
      owned[0] = 0;
      expect(Array.from(result)).toEqual([1, 2, 3]);
    });

    it("copies resolved buffers out", async () => {
      const { boundary } = createBoundary();
      const owned = new Uint8Array([7]);
      const result = await boundary.settleBytes("op", async () => owned);
      owned[0] = 0;
      expect(Array.from(result)).toEqual([7]);
    });
  });

  describe("check", () => {
    it("returns null when the validator passes", () => {
      const { boundary } = createBoundary();
      expect(boundary.check("isNicknameValid", () => undefined)).toBeNull();
    });

    it("returns the failure as a value", () => {
      const { boundary } = createBoundary();
      const err = boundary.check("isNicknameValid", () => {
        throw new Error("nickname too short");
      });
      expect(err).toBeInstanceOf(NativeError);
      expect(err?.message).toBe("nickname too short");
    });
  });

  describe("error", () => {
    it("maps absent callback errors to null", () => {
      const { boundary } = createBoundary();
      expect(boundary.error(null)).toBeNull();
      expect(boundary.error(undefined)).toBeNull();
    });

    it("converts present callback errors", () => {
      const { boundary } = createBoundary();
      expect(boundary.error("transfer stalled")?.message).toBe("transfer stalled");
    });
  });
});
