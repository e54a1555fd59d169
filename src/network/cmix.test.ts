import { describe, it, expect, vi } from "vitest";
import { Cmix, loadCmix, newCmix } from "./cmix.js";
import { newDummyTrafficManager } from "./dummy-traffic.js";
import { getIDFromContact, loadReceptionIdentity } from "./identity.js";
import { AuthenticatedConnection, Connection } from "../e2e/connection.js";
import { InvalidArgumentError, NativeError } from "../errors.js";
import { createTestContext, defined, mockNative } from "../testing/mock-bindings.js";
import {
  AUTHENTICATED_CONNECTION_METHODS,
  CMIX_METHODS,
  CONNECTION_METHODS,
  DUMMY_TRAFFIC_METHODS,
} from "../testing/native-methods.js";
import type { NativeAuthenticatedConnection, NativeConnection } from "../e2e/types.js";
import type { NativeCmix, NativeDummyTraffic } from "./types.js";

function setup() {
  const { native, ctx } = createTestContext();
  const cmixNative = mockNative<NativeCmix>(CMIX_METHODS);
  const cmix = new Cmix(ctx, cmixNative);
  return { native, ctx, cmixNative, cmix };
}

const password = new TextEncoder().encode("test-secret");

// ============================================================================
// Factories
// ============================================================================

describe("newCmix / loadCmix", () => {
  it("passes copies of the arguments through", async () => {
    const { native, ctx } = setup();
    native.newCmix.mockResolvedValue(undefined);
    await newCmix("{}", "/tmp/cmix", password, "", ctx);
    const [ndf, dir, pw, code] = defined(native.newCmix.mock.calls[0]);
    expect([ndf, dir, code]).toEqual(["{}", "/tmp/cmix", ""]);
    expect(pw).not.toBe(password);
    expect(Array.from(pw)).toEqual(Array.from(password));
  });

  it("wraps the loaded client", async () => {
    const { native, ctx, cmixNative } = setup();
    native.loadCmix.mockResolvedValue(cmixNative);
    cmixNative.getID.mockReturnValue(5);
    const cmix = await loadCmix("/tmp/cmix", password, new Uint8Array(0), ctx);
    expect(cmix).toBeInstanceOf(Cmix);
    expect(cmix.getID()).toBe(5);
  });

  it("rejects bad arguments before calling the native side", async () => {
    const { native, ctx } = setup();
    await expect(loadCmix("/tmp", "pw" as never, new Uint8Array(0), ctx)).rejects.toThrow(
      InvalidArgumentError,
    );
    expect(native.loadCmix).not.toHaveBeenCalled();
  });

  it("surfaces the native message unchanged", async () => {
    const { native, ctx } = setup();
    native.loadCmix.mockRejectedValue(new Error("failed to load storage: bad password"));
    await expect(loadCmix("/tmp", password, new Uint8Array(0), ctx)).rejects.toThrow(
      "failed to load storage: bad password",
    );
  });
});

// ============================================================================
// Follower
// ============================================================================

describe("Cmix follower", () => {
  it("resolves when the network becomes healthy", async () => {
    const { cmix, cmixNative } = setup();
    cmixNative.waitForNetwork.mockResolvedValue(true);
    await expect(cmix.waitForNetwork(1000)).resolves.toBeUndefined();
    expect(cmixNative.waitForNetwork).toHaveBeenCalledWith(1000);
  });

  it("rejects when the network stays unhealthy", async () => {
    const { cmix, cmixNative } = setup();
    cmixNative.waitForNetwork.mockResolvedValue(false);
    const err: unknown = await cmix.waitForNetwork(10).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NativeError);
    expect((err as NativeError).message).toBe("network is not healthy");
  });

  it("treats a reasonless native rejection as an unhealthy network", async () => {
    const { cmix, cmixNative } = setup();
    cmixNative.waitForNetwork.mockRejectedValue(undefined);
    const err: unknown = await cmix.waitForNetwork(10).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NativeError);
    expect((err as NativeError).message).toBe("network is not healthy");
  });

  it("resolves when the native promise resolves with no value", async () => {
    const { cmix, cmixNative } = setup();
    cmixNative.waitForNetwork.mockResolvedValue(undefined);
    await expect(cmix.waitForNetwork(10)).resolves.toBeUndefined();
  });

  it("keeps the message of a native rejection that has a reason", async () => {
    const { cmix, cmixNative } = setup();
    cmixNative.waitForNetwork.mockRejectedValue(new Error("follower stopped"));
    await expect(cmix.waitForNetwork(10)).rejects.toThrow("follower stopped");
  });

  it("rejects a negative timeout", () => {
    const { cmix } = setup();
    expect(() => cmix.startNetworkFollower(-1)).toThrow(InvalidArgumentError);
  });

  it("rethrows a stop on an idle follower", () => {
    const { cmix, cmixNative } = setup();
    cmixNative.stopNetworkFollower.mockImplementation(() => {
      throw new Error("network follower is not running");
    });
    expect(() => cmix.stopNetworkFollower()).toThrow("network follower is not running");
  });

  it("copies registration status bytes", () => {
    const { cmix, cmixNative } = setup();
    const status = new TextEncoder().encode('{"registered":3,"total":5}');
    cmixNative.getNodeRegistrationStatus.mockReturnValue(status);
    const result = cmix.getNodeRegistrationStatus();
    expect(result).not.toBe(status);
    expect(new TextDecoder().decode(result)).toBe('{"registered":3,"total":5}');
  });
});

// ============================================================================
// Callbacks
// ============================================================================

describe("Cmix callbacks", () => {
  it("forwards health updates in order", () => {
    const { cmix, cmixNative } = setup();
    cmixNative.addHealthCallback.mockReturnValue(1);
    const seen: boolean[] = [];
    expect(cmix.addHealthCallback({ callback: (healthy) => seen.push(healthy) })).toBe(1);

    const [nativeCb] = defined(cmixNative.addHealthCallback.mock.calls[0]);
    nativeCb.callback(true);
    nativeCb.callback(false);
    nativeCb.callback(true);
    expect(seen).toEqual([true, false, true]);
  });

  it("rejects a callback object without its method", () => {
    const { cmix, cmixNative } = setup();
    expect(() => cmix.addHealthCallback({} as never)).toThrow(InvalidArgumentError);
    expect(cmixNative.addHealthCallback).not.toHaveBeenCalled();
  });

  it("delivers tracked services with the error converted", () => {
    const { cmix, cmixNative } = setup();
    const cb = vi.fn();
    cmix.trackServices(cb);
    const [nativeCb] = defined(cmixNative.trackServices.mock.calls[0]);
    const data = new Uint8Array([1, 2]);
    nativeCb.callback(data, null);
    nativeCb.callback(new Uint8Array(0), "tracker stopped");

    expect(cb).toHaveBeenCalledTimes(2);
    const [firstData, firstErr] = defined(cb.mock.calls[0]);
    expect(Array.from(firstData as Uint8Array)).toEqual([1, 2]);
    expect(firstErr).toBeNull();
    const [, secondErr] = defined(cb.mock.calls[1]);
    expect(secondErr).toBeInstanceOf(NativeError);
    expect((secondErr as NativeError).message).toBe("tracker stopped");
  });

  it("reports round results", () => {
    const { cmix, cmixNative } = setup();
    const cb = vi.fn();
    cmix.waitForRoundResult(new Uint8Array([9]), { eventCallback: cb }, 500);
    const [, nativeCb, timeout] = defined(cmixNative.waitForRoundResult.mock.calls[0]);
    expect(timeout).toBe(500);
    nativeCb.eventCallback(true, false, new Uint8Array([4]));
    expect(cb).toHaveBeenCalledWith(true, false, new Uint8Array([4]));
  });
});

// ============================================================================
// Connections
// ============================================================================

describe("Cmix connections", () => {
  it("wraps plain and authenticated connections", async () => {
    const { cmix, cmixNative } = setup();
    cmixNative.connect.mockResolvedValue(mockNative<NativeConnection>(CONNECTION_METHODS));
    cmixNative.connectWithAuthentication.mockResolvedValue(
      mockNative<NativeAuthenticatedConnection>(AUTHENTICATED_CONNECTION_METHODS),
    );
    const contact = new Uint8Array([1]);
    const params = new Uint8Array([2]);

    const plain = await cmix.connect(0, contact, params);
    expect(plain).toBeInstanceOf(Connection);
    expect(plain).not.toBeInstanceOf(AuthenticatedConnection);
    expect(await cmix.connectWithAuthentication(0, contact, params)).toBeInstanceOf(
      AuthenticatedConnection,
    );
  });
});

// ============================================================================
// Identities and cover traffic
// ============================================================================

describe("identities", () => {
  it("loads a stored identity as a copy", () => {
    const { native, ctx } = setup();
    const stored = new Uint8Array([3, 4]);
    native.loadReceptionIdentity.mockReturnValue(stored);
    const identity = loadReceptionIdentity("alice", 0, ctx);
    expect(identity).not.toBe(stored);
    expect(native.loadReceptionIdentity).toHaveBeenCalledWith("alice", 0);
  });

  it("converts contact parsing failures", () => {
    const { native, ctx } = setup();
    native.getIDFromContact.mockImplementation(() => {
      throw new Error("failed to unmarshal contact");
    });
    expect(() => getIDFromContact(new Uint8Array(0), ctx)).toThrow(NativeError);
  });
});

describe("newDummyTrafficManager", () => {
  it("starts cover traffic paused and toggles it", () => {
    const { native, ctx } = setup();
    const trafficNative = mockNative<NativeDummyTraffic>(DUMMY_TRAFFIC_METHODS);
    trafficNative.getStatus.mockReturnValue(false);
    native.newDummyTrafficManager.mockReturnValue(trafficNative);

    const traffic = newDummyTrafficManager(0, 5, 1000, 200, ctx);
    expect(traffic.getStatus()).toBe(false);
    traffic.setStatus(true);
    expect(trafficNative.setStatus).toHaveBeenCalledWith(true);
    expect(native.newDummyTrafficManager).toHaveBeenCalledWith(0, 5, 1000, 200);
  });
});
