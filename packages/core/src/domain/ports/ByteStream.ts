/**
 * Port for a synchronous, cursor-based byte source (and optionally sink).
 *
 * This is what stream constructors receive: the opened file, the caller's own
 * stream, or a coding transform wrapped around either.
 */
export interface ByteStream {
  /** File name or path, when known. Used for classification and messages. */
  readonly name?: string;
  /** `true` when `write` and `truncate` are allowed. */
  readonly writable: boolean;
  /** `true` once `close()` has been called. */
  readonly closed: boolean;
  /** Current byte offset. */
  position(): number;
  /** `true` when no bytes remain after the cursor. */
  eof(): boolean;
  /** Read up to `maxBytes` (all remaining bytes when omitted). Returns an empty buffer at end of data. */
  read(maxBytes?: number): Buffer;
  /** Read every remaining byte. */
  readAll(): Buffer;
  /** Move the cursor to an absolute byte offset. */
  seek(offset: number): void;
  /** Write at the cursor, overwriting or extending the data. */
  write(data: Buffer | string): void;
  /** Cut the data to `length` bytes; the cursor is clamped. */
  truncate(length: number): void;
  /** Release the underlying resource. Calling it again has no effect. */
  close(): void;
}

/** Return `true` if the value looks like a `ByteStream` rather than a path or a classified resource. */
export function isByteStream(value: unknown): value is ByteStream {
  if (value === null || typeof value !== 'object') return false;
  return (
    'read' in value &&
    typeof value.read === 'function' &&
    'readAll' in value &&
    typeof value.readAll === 'function' &&
    'eof' in value &&
    typeof value.eof === 'function'
  );
}
