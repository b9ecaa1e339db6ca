import { Capability, capabilitySet, MalformedDataError } from '@formatstreams/core';
import type { ByteStream } from '@formatstreams/core';
import { RecordListStream, type DataRecord } from './RecordListStream.js';

const JSON_ARRAY_CAPABILITIES = capabilitySet(
  Capability.READ,
  Capability.READ_INTO,
  Capability.SEEK,
  Capability.SEEK_END,
  Capability.LENGTH,
);

/** Return `true` for a non-null, non-array object. */
export function isPlainObject(value: unknown): value is DataRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Read-only stream over a JSON array of objects. */
export class JsonArrayStream extends RecordListStream<DataRecord> {
  readonly capabilities = JSON_ARRAY_CAPABILITIES;

  constructor(bytes: ByteStream, encoding: BufferEncoding = 'utf-8') {
    super(bytes);
    const name = bytes.name ?? 'JSON data';
    const content = this.readLayout().toString(encoding).trim();
    if (content === '') return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new MalformedDataError(`${name}: invalid JSON`, { cause: error });
    }

    if (!Array.isArray(parsed)) {
      throw new MalformedDataError(`${name}: expected a JSON array of objects`);
    }

    const records: DataRecord[] = [];
    for (const item of parsed) {
      if (!isPlainObject(item)) {
        throw new MalformedDataError(`${name}: each item in the array must be a plain object`);
      }
      records.push(item);
    }
    this.records = records;
  }
}
