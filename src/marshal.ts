/**
 * Argument validation and value marshalling at the boundary.
 *
 * Every validator names the argument it rejects. Byte buffers are copied in
 * both directions so neither side can observe the other's in-place writes.
 */

import { InvalidArgumentError } from "./errors.js";

// --- Bytes ---

/** Fresh copy of `bytes`, never a view over the same memory. */
export function copyBytes(bytes: Uint8Array): Uint8Array {
  return new Uint8Array(bytes);
}

export function bytesArg(name: string, value: Uint8Array): Uint8Array {
  if (!(value instanceof Uint8Array)) {
    throw new InvalidArgumentError(name, "a Uint8Array");
  }
  return copyBytes(value);
}

export function optionalBytesArg(
  name: string,
  value: Uint8Array | undefined,
): Uint8Array {
  return value === undefined ? new Uint8Array(0) : bytesArg(name, value);
}

// --- Scalars ---

export function intArg(name: string, value: number): number {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidArgumentError(name, "an integer");
  }
  return value;
}

export function uintArg(name: string, value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(name, "a non-negative integer");
  }
  return value;
}

export function numberArg(name: string, value: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidArgumentError(name, "a finite number");
  }
  return value;
}

export function stringArg(name: string, value: string): string {
  if (typeof value !== "string") {
    throw new InvalidArgumentError(name, "a string");
  }
  return value;
}

export function boolArg(name: string, value: boolean): boolean {
  if (typeof value !== "boolean") {
    throw new InvalidArgumentError(name, "a boolean");
  }
  return value;
}

// --- JSON records ---

const decoder = new TextDecoder();
const encoder = new TextEncoder();

/** Parse a JSON record returned across the boundary. */
export function decodeJson(name: string, bytes: Uint8Array): unknown {
  try {
    return JSON.parse(decoder.decode(bytes));
  } catch (err) {
    throw new InvalidArgumentError(name, `JSON bytes (${String(err)})`);
  }
}

export function encodeJson(value: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

/** UTF-8 text carried as bytes, such as an error string. */
export function decodeText(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}
