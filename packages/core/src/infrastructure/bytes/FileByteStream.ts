import { closeSync, fstatSync, ftruncateSync, openSync, readSync, writeSync } from 'node:fs';
import type { ByteStream } from '../../domain/ports/ByteStream.js';
import { NotWritableError, StreamClosedError } from '../../domain/errors/FormatStreamError.js';

/** How a file is opened. `'w'` truncates, `'a'` starts at the end. */
export type FileOpenMode = 'r' | 'r+' | 'w' | 'a';

export interface FileByteStreamOptions {
  /** Open mode. Default: `'r'`. */
  readonly mode?: FileOpenMode;
  /** Bytes read per system call by `readAll()`. Default: 65536 (64KB). */
  readonly chunkSize?: number;
}

/** Byte stream over a local file descriptor, with blocking reads and writes. Node.js only. */
export class FileByteStream implements ByteStream {
  readonly name: string;
  readonly writable: boolean;
  private readonly fd: number;
  private readonly chunkSize: number;
  private cursor: number;
  private isClosed = false;

  private constructor(filePath: string, fd: number, options?: FileByteStreamOptions) {
    const mode = options?.mode ?? 'r';
    this.name = filePath;
    this.fd = fd;
    this.writable = mode !== 'r';
    this.chunkSize = options?.chunkSize ?? 65536;
    this.cursor = mode === 'a' ? fstatSync(fd).size : 0;
  }

  /** Open `filePath`. Errors from `node:fs` (missing file, permissions) propagate unchanged. */
  static open(filePath: string, options?: FileByteStreamOptions): FileByteStream {
    const mode = options?.mode ?? 'r';
    // Positional writes are ignored on descriptors opened with 'a' on Linux, so append
    // creates the file with 'a' and then reopens it read-write at the end.
    if (mode === 'a') {
      closeSync(openSync(filePath, 'a'));
    }
    const flags = mode === 'w' ? 'w+' : mode === 'a' ? 'r+' : mode;
    const fd = openSync(filePath, flags);
    try {
      return new FileByteStream(filePath, fd, options);
    } catch (error) {
      closeSync(fd);
      throw error;
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  position(): number {
    return this.cursor;
  }

  eof(): boolean {
    this.assertOpen();
    return this.cursor >= this.size();
  }

  read(maxBytes?: number): Buffer {
    this.assertOpen();
    const remaining = Math.max(0, this.size() - this.cursor);
    const length = maxBytes === undefined ? remaining : Math.min(maxBytes, remaining);
    const buffer = Buffer.alloc(length);
    let offset = 0;
    while (offset < length) {
      const bytesRead = readSync(this.fd, buffer, offset, Math.min(this.chunkSize, length - offset), this.cursor + offset);
      if (bytesRead === 0) break;
      offset += bytesRead;
    }
    this.cursor += offset;
    return buffer.subarray(0, offset);
  }

  readAll(): Buffer {
    return this.read();
  }

  seek(offset: number): void {
    this.assertOpen();
    if (offset < 0) {
      throw new RangeError(`FileByteStream: cannot seek to negative offset ${offset}`);
    }
    this.cursor = offset;
  }

  write(data: Buffer | string): void {
    this.assertOpen();
    if (!this.writable) {
      throw new NotWritableError(this.name);
    }
    const bytes = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
    let offset = 0;
    while (offset < bytes.length) {
      offset += writeSync(this.fd, bytes, offset, bytes.length - offset, this.cursor + offset);
    }
    this.cursor += bytes.length;
  }

  truncate(length: number): void {
    this.assertOpen();
    if (!this.writable) {
      throw new NotWritableError(this.name);
    }
    ftruncateSync(this.fd, length);
    this.cursor = Math.min(this.cursor, length);
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    closeSync(this.fd);
  }

  private size(): number {
    return fstatSync(this.fd).size;
  }

  private assertOpen(): void {
    if (this.isClosed) {
      throw new StreamClosedError(this.name);
    }
  }
}
