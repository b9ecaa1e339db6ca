import type { FormattedStream } from '../ports/FormattedStream.js';
import { Capability } from './Capability.js';
import { StreamClosedError, UnsupportedOperationError } from '../errors/FormatStreamError.js';

/**
 * Base class for concrete formatted streams.
 *
 * Subclasses declare `capabilities`, implement the mandatory cursor methods and
 * override the optional operations they declare. Undeclared operations throw
 * `UnsupportedOperationError`. `close()` runs `onClose()` exactly once.
 */
export abstract class AbstractFormattedStream<T> implements FormattedStream<T> {
  abstract readonly capabilities: ReadonlySet<Capability>;

  private isClosed = false;

  get closed(): boolean {
    return this.isClosed;
  }

  abstract position(): number;
  abstract eof(): boolean;
  abstract seekStart(): void;

  /** Release resources. Called once, by the first `close()`. */
  protected abstract onClose(): void;

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.onClose();
  }

  read(): T {
    throw this.unsupported(Capability.READ);
  }

  readInto(_output: T): T {
    throw this.unsupported(Capability.READ_INTO);
  }

  seek(_position: number): void {
    throw this.unsupported(Capability.SEEK);
  }

  seekEnd(): void {
    throw this.unsupported(Capability.SEEK_END);
  }

  length(): number {
    throw this.unsupported(Capability.LENGTH);
  }

  write(_value: T): void {
    throw this.unsupported(Capability.WRITE);
  }

  truncate(_length: number): void {
    throw this.unsupported(Capability.TRUNCATE);
  }

  /** Throw `StreamClosedError` if the stream has been closed. */
  protected assertOpen(): void {
    if (this.isClosed) {
      throw new StreamClosedError(this.constructor.name);
    }
  }

  private unsupported(capability: Capability): UnsupportedOperationError {
    return new UnsupportedOperationError(capability, this.constructor.name);
  }
}
