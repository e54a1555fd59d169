import { describe, it, expect, vi } from "vitest";
import { ChannelsFileTransfer, initChannelsFileTransfer } from "./channels-file-transfer.js";
import { initFileTransfer } from "./file-transfer.js";
import { FilePartTracker } from "./part-tracker.js";
import { PartStatus } from "./types.js";
import { NativeError } from "../errors.js";
import { createTestContext, defined, mockNative } from "../testing/mock-bindings.js";
import {
  CHANNELS_FILE_TRANSFER_METHODS,
  FILE_PART_TRACKER_METHODS,
  FILE_TRANSFER_METHODS,
} from "../testing/native-methods.js";
import type {
  NativeChannelsFileTransfer,
  NativeFilePartTracker,
  NativeFileTransfer,
} from "./types.js";

function setup() {
  const { native, ctx } = createTestContext();
  const ftNative = mockNative<NativeChannelsFileTransfer>(CHANNELS_FILE_TRANSFER_METHODS);
  native.initChannelsFileTransfer.mockResolvedValue(ftNative);
  return { native, ctx, ftNative, ft: new ChannelsFileTransfer(ctx, ftNative) };
}

function tracker(statuses: number[]) {
  const native = mockNative<NativeFilePartTracker>(FILE_PART_TRACKER_METHODS);
  native.getNumParts.mockReturnValue(statuses.length);
  native.getPartStatus.mockImplementation((n) => statuses[n] ?? PartStatus.Unsent);
  return native;
}

// ============================================================================
// Upload
// ============================================================================

describe("ChannelsFileTransfer.upload", () => {
  it("reports progress before an empty upload settles", async () => {
    const { ft, ftNative } = setup();
    const events: string[] = [];
    ftNative.upload.mockImplementation(async (_data, _retry, cb) => {
      cb.callback(new Uint8Array(0), tracker([]), null);
      return new Uint8Array([0xf1]);
    });

    const fileId = await ft.upload(
      new Uint8Array(0),
      0,
      (payload, partTracker, err) => {
        events.push(`progress:${payload.length}:${partTracker?.getNumParts()}:${err}`);
      },
      0,
    );
    events.push("settled");

    expect(Array.from(fileId)).toEqual([0xf1]);
    expect(events).toEqual(["progress:0:0:null", "settled"]);
    expect(defined(ftNative.upload.mock.calls[0]).slice(1, 2)).toEqual([0]);
  });

  it("delivers the fatal error on the callback and rejects once", async () => {
    const { ft, ftNative } = setup();
    ftNative.upload.mockImplementation(async (_data, _retry, cb) => {
      cb.callback(new Uint8Array(0), null, new Error("upload failed: no rounds"));
      throw new Error("upload failed: no rounds");
    });
    const progress = vi.fn();
    const onReject = vi.fn();

    await ft.upload(new Uint8Array(0), 0, progress, 0).catch(onReject);

    expect(progress).toHaveBeenCalledTimes(1);
    const [, partTracker, cbErr] = defined(progress.mock.calls[0]);
    expect(partTracker).toBeNull();
    expect((cbErr as NativeError).message).toBe("upload failed: no rounds");
    expect(onReject).toHaveBeenCalledTimes(1);
    expect(defined(onReject.mock.calls[0])[0]).toBeInstanceOf(NativeError);
  });

  it("hands the callback a wrapped part tracker", async () => {
    const { ft, ftNative } = setup();
    ftNative.upload.mockImplementation(async (_data, _retry, cb) => {
      cb.callback(new Uint8Array([1]), tracker([PartStatus.Sent, PartStatus.Received]), null);
      return new Uint8Array([1]);
    });
    const progress = vi.fn();
    await ft.upload(new Uint8Array([1]), 1.5, progress, 100);

    const [, partTracker] = defined(progress.mock.calls[0]);
    expect(partTracker).toBeInstanceOf(FilePartTracker);
    const t = partTracker as FilePartTracker;
    expect(t.getNumParts()).toBe(2);
    expect(t.getPartStatus(1)).toBe(PartStatus.Received);
  });
});

// ============================================================================
// Send and download
// ============================================================================

describe("ChannelsFileTransfer.send", () => {
  it("sends an empty ping list when none is given", async () => {
    const { ft, ftNative } = setup();
    ftNative.send.mockResolvedValue(new Uint8Array([7]));
    const report = await ft.send(
      new Uint8Array([1]),
      new Uint8Array([2]),
      "cat.png",
      "image",
      new Uint8Array(0),
      0,
      new Uint8Array(0),
    );
    expect(Array.from(report)).toEqual([7]);
    const args = defined(ftNative.send.mock.calls[0]);
    expect(args[2]).toBe("cat.png");
    expect(args[7]).toEqual(new Uint8Array(0));
  });

  it("forwards download progress", async () => {
    const { ft, ftNative } = setup();
    ftNative.download.mockImplementation(async (_info, cb) => {
      cb.callback(new Uint8Array([1]), null, null);
      cb.callback(new Uint8Array([1, 2]), null, null);
      return new Uint8Array([3]);
    });
    const sizes: number[] = [];
    await ft.download(new Uint8Array([9]), { callback: (p) => sizes.push(p.length) }, 10);
    expect(sizes).toEqual([1, 2]);
  });

  it("rejects a progress callback without its method", async () => {
    const { ft, ftNative } = setup();
    await expect(ft.download(new Uint8Array([9]), {} as never, 10)).rejects.toThrow(
      'Invalid argument "progressCb": expected an object with callback()',
    );
    expect(ftNative.download).not.toHaveBeenCalled();
  });
});

describe("initChannelsFileTransfer", () => {
  it("wraps the native manager", async () => {
    const { native, ctx, ftNative } = setup();
    ftNative.getExtensionBuilderID.mockReturnValue(3);
    const ft = await initChannelsFileTransfer(1, new Uint8Array(0), ctx);
    expect(ft.getExtensionBuilderID()).toBe(3);
    expect(native.initChannelsFileTransfer).toHaveBeenCalledWith(1, new Uint8Array(0));
  });
});

// ============================================================================
// E2E file transfer
// ============================================================================

describe("initFileTransfer", () => {
  it("forwards received files with converted errors", () => {
    const { native, ctx } = setup();
    const ftNative = mockNative<NativeFileTransfer>(FILE_TRANSFER_METHODS);
    native.initFileTransfer.mockReturnValue(ftNative);
    const received = vi.fn();

    const ft = initFileTransfer(0, received, new Uint8Array(0), new Uint8Array(0), ctx);
    const [, receiveCb] = defined(native.initFileTransfer.mock.calls[0]);
    receiveCb.callback(new Uint8Array([4]), null);
    receiveCb.callback(new Uint8Array(0), "bad file");

    expect(received).toHaveBeenNthCalledWith(1, new Uint8Array([4]), null);
    const [, err] = defined(received.mock.calls[1]);
    expect((err as NativeError).message).toBe("bad file");

    ftNative.maxFileSize.mockReturnValue(250_000);
    expect(ft.maxFileSize()).toBe(250_000);
  });
});
