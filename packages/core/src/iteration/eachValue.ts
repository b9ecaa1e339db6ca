import type { FormattedStream } from '../domain/ports/FormattedStream.js';
import { requireCapability } from '../domain/ports/FormattedStream.js';
import { Capability } from '../domain/model/Capability.js';

/**
 * Lazy iterator over the values of a stream, one `read()` per step.
 *
 * The first step rewinds the stream. The iterator shares the stream's cursor,
 * so two live iterators over one stream interfere; create a new iterator to
 * walk the values again. The length is unknown until the stream reports end
 * of data.
 */
export class ValueIterator<T> implements IterableIterator<T> {
  private started = false;

  constructor(private readonly stream: FormattedStream<T>) {
    requireCapability(stream, Capability.READ);
  }

  next(): IteratorResult<T, undefined> {
    if (!this.started) {
      this.started = true;
      this.stream.seekStart();
    }
    if (this.stream.eof()) {
      return { done: true, value: undefined };
    }
    return { done: false, value: this.stream.read() };
  }

  [Symbol.iterator](): this {
    return this;
  }
}

/**
 * Like `ValueIterator`, but decodes every value into the same `output` object.
 *
 * Each step yields `output` itself. Copy it if you need it after the next step.
 */
export class BufferedValueIterator<T> implements IterableIterator<T> {
  private started = false;

  constructor(
    private readonly stream: FormattedStream<T>,
    private readonly output: T,
  ) {
    requireCapability(stream, Capability.READ_INTO);
  }

  next(): IteratorResult<T, undefined> {
    if (!this.started) {
      this.started = true;
      this.stream.seekStart();
    }
    if (this.stream.eof()) {
      return { done: true, value: undefined };
    }
    return { done: false, value: this.stream.readInto(this.output) };
  }

  [Symbol.iterator](): this {
    return this;
  }
}

/** Iterate over the values of `stream`, from the start. */
export function eachValue<T>(stream: FormattedStream<T>): ValueIterator<T> {
  return new ValueIterator(stream);
}

/** Iterate over the values of `stream`, from the start, reading each into `output`. */
export function eachValueInto<T>(stream: FormattedStream<T>, output: T): BufferedValueIterator<T> {
  return new BufferedValueIterator(stream, output);
}
