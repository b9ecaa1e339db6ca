import { Capability, capabilitySet, MalformedDataError, NotWritableError } from '@formatstreams/core';
import type { ByteStream } from '@formatstreams/core';
import { RecordListStream, type DataRecord } from './RecordListStream.js';
import { isPlainObject } from './JsonArrayStream.js';

const NDJSON_CAPABILITIES = capabilitySet(
  Capability.READ,
  Capability.READ_INTO,
  Capability.SEEK,
  Capability.SEEK_END,
  Capability.LENGTH,
  Capability.WRITE,
  Capability.TRUNCATE,
);

/**
 * Stream over newline-delimited JSON objects, one per line.
 *
 * `write` and `truncate` edit the records in memory; the byte stream is
 * rewritten on `close()` when anything changed. Writing requires a writable
 * byte stream.
 */
export class NdjsonStream extends RecordListStream<DataRecord> {
  readonly capabilities = NDJSON_CAPABILITIES;
  private readonly encoding: BufferEncoding;
  private dirty = false;

  constructor(bytes: ByteStream, encoding: BufferEncoding = 'utf-8') {
    super(bytes);
    this.encoding = encoding;
    const name = bytes.name ?? 'NDJSON data';
    const lines = this.readLayout().toString(encoding).split('\n');

    const records: DataRecord[] = [];
    lines.forEach((line, index) => {
      const trimmed = line.trim();
      if (trimmed === '') return;

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch (error) {
        throw new MalformedDataError(`${name}: invalid JSON on line ${index + 1}`, { cause: error });
      }
      if (!isPlainObject(parsed)) {
        throw new MalformedDataError(`${name}: line ${index + 1} must be a plain object`);
      }
      records.push(parsed);
    });
    this.records = records;
  }

  override write(value: DataRecord): void {
    this.assertWritable();
    this.records[this.cursor] = { ...value };
    this.cursor++;
    this.dirty = true;
  }

  override truncate(length: number): void {
    this.assertWritable();
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError(`NdjsonStream: invalid length ${length}`);
    }
    this.records = this.records.slice(0, length);
    this.cursor = Math.min(this.cursor, this.records.length);
    this.dirty = true;
  }

  protected override onClose(): void {
    try {
      if (this.dirty) {
        const body = this.records.map((record) => JSON.stringify(record)).join('\n');
        this.bytes.seek(0);
        this.bytes.truncate(0);
        this.bytes.write(Buffer.from(this.records.length > 0 ? `${body}\n` : '', this.encoding));
      }
    } finally {
      this.bytes.close();
    }
  }

  private assertWritable(): void {
    this.assertOpen();
    if (!this.bytes.writable) {
      throw new NotWritableError(this.bytes.name ?? 'NdjsonStream');
    }
  }
}
