import { BindingsError, NativeError, toNativeError } from "./errors.js";
import { copyBytes } from "./marshal.js";
import type { BindingsConfig } from "./config.js";
import type { Logger } from "./logger.js";

/**
 * Runs native operations and converts whatever they throw into
 * {@link NativeError}. Sync entry points go through `call`, async ones
 * through `settle`; an entry point never uses both.
 */
export class Boundary {
  constructor(
    private readonly config: BindingsConfig,
    private readonly logger: Logger,
  ) {}

  call<T>(op: string, fn: () => T): T {
    this.logger.debug(op);
    try {
      return fn();
    } catch (err) {
      throw this.wrap(op, err);
    }
  }

  /** Single-settlement wrapper: a sync throw and a rejection both reject. */
  async settle<T>(op: string, fn: () => Promise<T>): Promise<T> {
    this.logger.debug(op);
    try {
      return await fn();
    } catch (err) {
      throw this.wrap(op, err);
    }
  }

  /** `call` for operations returning bytes; the result is copied out. */
  callBytes(op: string, fn: () => Uint8Array): Uint8Array {
    return copyBytes(this.call(op, fn));
  }

  /** `settle` for operations resolving to bytes; the result is copied out. */
  async settleBytes(op: string, fn: () => Promise<Uint8Array>): Promise<Uint8Array> {
    return copyBytes(await this.settle(op, fn));
  }

  /** For native validators: the failure as a value, or null when `fn` passes. */
  check(op: string, fn: () => void): NativeError | null {
    try {
      this.call(op, fn);
      return null;
    } catch (err) {
      if (err instanceof NativeError) return err;
      throw err;
    }
  }

  /** Marshal the error argument of a native callback. */
  error(value: unknown): NativeError | null {
    if (value === null || value === undefined) return null;
    return toNativeError(value, this.config.traces);
  }

  private wrap(op: string, err: unknown): Error {
    if (err instanceof BindingsError && !(err instanceof NativeError)) return err;
    const nativeErr = toNativeError(err, this.config.traces);
    this.logger.debug(`${op} failed: ${nativeErr.message}`);
    return nativeErr;
  }
}

/**
 * Compile-time parity with a native object: the adapter must expose every
 * method the native interface declares. Extra methods are caught by the
 * entry-point parity tests.
 */
export type EntryPoints<N> = { [K in keyof N]: (...args: never[]) => unknown };
