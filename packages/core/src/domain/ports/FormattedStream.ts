import type { Capability } from '../model/Capability.js';
import { UnsupportedOperationError } from '../errors/FormatStreamError.js';

/**
 * Port for a typed stream of decoded values.
 *
 * `T` is the type of the values held by the stream. The first block of members
 * is available on every stream; the second is only usable when the matching
 * entry is present in `capabilities` and fails with `UnsupportedOperationError`
 * otherwise. A stream has one owner at a time and is not safe to share.
 */
export interface FormattedStream<T = unknown> {
  /** Optional operations this stream type implements. */
  readonly capabilities: ReadonlySet<Capability>;
  /** `true` once `close()` has been called. */
  readonly closed: boolean;
  /** Index of the next value. */
  position(): number;
  /** `true` when no value remains after the cursor. */
  eof(): boolean;
  /** Move the cursor back to the first value. */
  seekStart(): void;
  /** Release the stream and its byte stream. Calling it again has no effect. */
  close(): void;

  /** Decode and return the next value. */
  read(): T;
  /** Decode the next value into `output` and return `output`. */
  readInto(output: T): T;
  /** Move the cursor to value index `position`. */
  seek(position: number): void;
  /** Move the cursor past the last value. */
  seekEnd(): void;
  /** Number of values, when derivable from the layout without scanning. */
  length(): number;
  /** Write a value at the cursor, overwriting or appending. */
  write(value: T): void;
  /** Keep only the first `length` values. */
  truncate(length: number): void;
}

/** Return `true` if the stream declares the given optional operation. */
export function supports(stream: FormattedStream<unknown>, capability: Capability): boolean {
  return stream.capabilities.has(capability);
}

/** Throw `UnsupportedOperationError` unless the stream declares the given optional operation. */
export function requireCapability(stream: FormattedStream<unknown>, capability: Capability): void {
  if (!stream.capabilities.has(capability)) {
    throw new UnsupportedOperationError(capability, stream.constructor.name);
  }
}
