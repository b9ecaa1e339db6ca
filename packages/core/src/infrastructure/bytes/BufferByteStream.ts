import type { ByteStream } from '../../domain/ports/ByteStream.js';
import { NotWritableError, StreamClosedError } from '../../domain/errors/FormatStreamError.js';

export interface BufferByteStreamOptions {
  /** Name used for classification, e.g. `'upload.csv'`. Default: none. */
  readonly name?: string;
  /** Allow `write` and `truncate`. Default: `false`. */
  readonly writable?: boolean;
  /** Called once when the stream is closed, e.g. to close a wrapped stream. */
  readonly onClose?: () => void;
}

/** In-memory byte stream over a string or Buffer. Strings are encoded as UTF-8. */
export class BufferByteStream implements ByteStream {
  readonly name?: string;
  readonly writable: boolean;
  private data: Buffer;
  private cursor = 0;
  private isClosed = false;
  private readonly onClose: (() => void) | undefined;

  constructor(data: string | Buffer = Buffer.alloc(0), options?: BufferByteStreamOptions) {
    this.data = typeof data === 'string' ? Buffer.from(data, 'utf-8') : Buffer.from(data);
    this.name = options?.name;
    this.writable = options?.writable ?? false;
    this.onClose = options?.onClose;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  position(): number {
    return this.cursor;
  }

  eof(): boolean {
    this.assertOpen();
    return this.cursor >= this.data.length;
  }

  read(maxBytes?: number): Buffer {
    this.assertOpen();
    const end = maxBytes === undefined ? this.data.length : Math.min(this.data.length, this.cursor + maxBytes);
    const chunk = this.data.subarray(this.cursor, end);
    this.cursor = Math.max(this.cursor, end);
    return Buffer.from(chunk);
  }

  readAll(): Buffer {
    return this.read();
  }

  seek(offset: number): void {
    this.assertOpen();
    if (offset < 0) {
      throw new RangeError(`BufferByteStream: cannot seek to negative offset ${offset}`);
    }
    this.cursor = offset;
  }

  write(data: Buffer | string): void {
    this.assertOpen();
    if (!this.writable) {
      throw new NotWritableError(this.name ?? 'BufferByteStream');
    }
    const bytes = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
    const end = this.cursor + bytes.length;
    if (end > this.data.length) {
      const grown = Buffer.alloc(end);
      this.data.copy(grown);
      this.data = grown;
    }
    bytes.copy(this.data, this.cursor);
    this.cursor = end;
  }

  truncate(length: number): void {
    this.assertOpen();
    if (!this.writable) {
      throw new NotWritableError(this.name ?? 'BufferByteStream');
    }
    this.data = Buffer.from(this.data.subarray(0, length));
    this.cursor = Math.min(this.cursor, this.data.length);
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.onClose?.();
  }

  /** Copy of the current contents, regardless of the cursor. Still available after `close()`. */
  contents(): Buffer {
    return Buffer.from(this.data);
  }

  private assertOpen(): void {
    if (this.isClosed) {
      throw new StreamClosedError(this.name ?? 'BufferByteStream');
    }
  }
}
