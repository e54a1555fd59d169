/** Base error for everything raised at the host side of the bindings boundary. */
export class BindingsError extends Error {
  override name = "BindingsError";
}

/** A host-supplied argument had the wrong shape. Raised before any native call. */
export class InvalidArgumentError extends BindingsError {
  override name = "InvalidArgumentError";

  constructor(
    readonly argument: string,
    expected: string,
  ) {
    super(`Invalid argument "${argument}": expected ${expected}`);
  }
}

/**
 * A native operation failed. `message` is the native message, unchanged;
 * `trace` carries the structured native trace when traces are enabled.
 */
export class NativeError extends BindingsError {
  override name = "NativeError";

  constructor(
    message: string,
    readonly trace?: string,
  ) {
    super(message);
  }
}

/** No tracked object exists for the requested handle. */
export class HandleNotFoundError extends BindingsError {
  override name = "HandleNotFoundError";

  constructor(
    readonly kind: string,
    readonly id: number,
  ) {
    super(`Cannot get ${kind} for ID ${id}, does not exist`);
  }
}

export class BindingsNotInitializedError extends BindingsError {
  override name = "BindingsNotInitializedError";

  constructor() {
    super("Native bindings not initialized. Call `await initBindings()` first.");
  }
}

/** The native bindings module could not be loaded or lacks required exports. */
export class BindingsLoadError extends BindingsError {
  override name = "BindingsLoadError";

  constructor(
    message: string,
    readonly missing: readonly string[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

function stringProp(value: object, key: string): string | undefined {
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === "string" ? prop : undefined;
}

/**
 * Normalize anything the native side throws, rejects with, or passes as a
 * callback error into a {@link NativeError}.
 */
export function toNativeError(value: unknown, traces = true): NativeError {
  if (value instanceof NativeError) {
    return traces || value.trace === undefined
      ? value
      : new NativeError(value.message);
  }
  if (typeof value === "string") return new NativeError(value);
  if (value instanceof Error) {
    const trace = stringProp(value, "trace") ?? value.stack;
    return new NativeError(value.message, traces ? trace : undefined);
  }
  if (typeof value === "object" && value !== null) {
    const message = stringProp(value, "message");
    if (message !== undefined) {
      const trace = stringProp(value, "trace") ?? stringProp(value, "stack");
      return new NativeError(message, traces ? trace : undefined);
    }
  }
  return new NativeError(String(value));
}
