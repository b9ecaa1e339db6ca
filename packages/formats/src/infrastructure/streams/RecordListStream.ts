import { AbstractFormattedStream } from '@formatstreams/core';
import type { ByteStream } from '@formatstreams/core';

/** A decoded record: field name → value. */
export type DataRecord = Record<string, unknown>;

/**
 * Shared cursor logic for formats that decode every record up front.
 *
 * The layout is parsed once by the subclass constructor, so the number of
 * records is known and any record can be reached directly.
 */
export abstract class RecordListStream<T extends DataRecord> extends AbstractFormattedStream<T> {
  protected records: T[] = [];
  protected cursor = 0;

  protected constructor(protected readonly bytes: ByteStream) {
    super();
  }

  /** The whole layout, read from byte 0 whatever the cursor of `bytes` was. */
  protected readLayout(): Buffer {
    this.bytes.seek(0);
    return this.bytes.readAll();
  }

  position(): number {
    return this.cursor;
  }

  eof(): boolean {
    this.assertOpen();
    return this.cursor >= this.records.length;
  }

  seekStart(): void {
    this.assertOpen();
    this.cursor = 0;
  }

  override read(): T {
    const record = this.next();
    return { ...record };
  }

  override readInto(output: T): T {
    const record = this.next();
    for (const key of Object.keys(output)) {
      Reflect.deleteProperty(output, key);
    }
    Object.assign(output, record);
    return output;
  }

  override seek(position: number): void {
    this.assertOpen();
    if (!Number.isInteger(position) || position < 0 || position > this.records.length) {
      throw new RangeError(`${this.constructor.name}: position ${position} is outside 0..${this.records.length}`);
    }
    this.cursor = position;
  }

  override seekEnd(): void {
    this.assertOpen();
    this.cursor = this.records.length;
  }

  override length(): number {
    this.assertOpen();
    return this.records.length;
  }

  protected onClose(): void {
    this.bytes.close();
  }

  private next(): T {
    this.assertOpen();
    const record = this.records[this.cursor];
    if (record === undefined) {
      throw new RangeError(`${this.constructor.name}: read past end of data`);
    }
    this.cursor++;
    return record;
  }
}
