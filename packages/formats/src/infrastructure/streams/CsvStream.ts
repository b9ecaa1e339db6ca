import Papa from 'papaparse';
import { Capability, capabilitySet, MalformedDataError } from '@formatstreams/core';
import type { ByteStream } from '@formatstreams/core';
import { RecordListStream } from './RecordListStream.js';

/** A CSV row keyed by header name. */
export type CsvRow = Record<string, string>;

export interface CsvStreamOptions {
  /** Column delimiter. Default: `','`. */
  readonly delimiter?: string;
  /** Character encoding of the bytes. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
}

const CSV_CAPABILITIES = capabilitySet(
  Capability.READ,
  Capability.READ_INTO,
  Capability.SEEK,
  Capability.SEEK_END,
  Capability.LENGTH,
);

/**
 * Read-only stream of CSV rows, parsed with PapaParse.
 *
 * The first row is the header. Empty lines are skipped. Rows whose field count
 * does not match the header, or unbalanced quotes, fail construction.
 */
export class CsvStream extends RecordListStream<CsvRow> {
  readonly capabilities = CSV_CAPABILITIES;
  private readonly headers: readonly string[];

  constructor(bytes: ByteStream, options?: CsvStreamOptions) {
    super(bytes);
    const content = this.readLayout().toString(options?.encoding ?? 'utf-8');

    const result = Papa.parse<CsvRow>(content, {
      header: true,
      delimiter: options?.delimiter ?? ',',
      skipEmptyLines: true,
      dynamicTyping: false,
    });

    const [firstError] = result.errors;
    if (firstError) {
      const where = firstError.row !== undefined ? ` (row ${firstError.row + 1})` : '';
      throw new MalformedDataError(`${bytes.name ?? 'CSV data'}: ${firstError.message}${where}`);
    }

    this.headers = result.meta.fields ?? [];
    this.records = result.data;
  }

  /** Column names from the header row. */
  columns(): readonly string[] {
    return this.headers;
  }
}
