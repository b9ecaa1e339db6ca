import { defaultRegistry, defineHandler } from '@formatstreams/core';
import type { StreamerRegistry } from '@formatstreams/core';
import { CsvStream, type CsvStreamOptions } from './infrastructure/streams/CsvStream.js';
import { JsonArrayStream } from './infrastructure/streams/JsonArrayStream.js';
import { NdjsonStream } from './infrastructure/streams/NdjsonStream.js';

/** Format ids the built-in streamers handle. */
export const FormatIds = {
  CSV: 'text/csv',
  TSV: 'text/tab-separated-values',
  JSON: 'application/json',
  NDJSON: 'application/x-ndjson',
} as const;

/** Streamer for delimiter-separated text. */
export const csvStreamer = defineHandler('csv');

/** Streamer for JSON arrays and newline-delimited JSON. */
export const jsonStreamer = defineHandler('json');

function isEncoding(value: unknown): value is BufferEncoding {
  return typeof value === 'string' && Buffer.isEncoding(value);
}

/** Pick the CSV options out of the first extra argument passed to `open()`, ignoring anything else. */
export function csvOptionsFrom(arg: unknown): CsvStreamOptions {
  if (arg === null || typeof arg !== 'object') return {};
  const delimiter = 'delimiter' in arg && typeof arg.delimiter === 'string' ? arg.delimiter : undefined;
  const encoding = 'encoding' in arg && isEncoding(arg.encoding) ? arg.encoding : undefined;
  return { delimiter, encoding };
}

/**
 * Register the CSV, TSV, JSON and NDJSON streamers and their constructors.
 *
 * Call once per registry: a second call throws `DuplicateRegistrationError`.
 */
export function registerBuiltinFormats(registry: StreamerRegistry = defaultRegistry): void {
  registry.register(FormatIds.CSV, csvStreamer);
  registry.setConstructor(csvStreamer, FormatIds.CSV, (_handler, _format, bytes, options) => {
    return new CsvStream(bytes, csvOptionsFrom(options));
  });

  registry.register(FormatIds.TSV, csvStreamer);
  registry.setConstructor(csvStreamer, FormatIds.TSV, (_handler, _format, bytes, options) => {
    return new CsvStream(bytes, { ...csvOptionsFrom(options), delimiter: '\t' });
  });

  registry.register(FormatIds.JSON, jsonStreamer);
  registry.setConstructor(jsonStreamer, FormatIds.JSON, (_handler, _format, bytes, encoding) => {
    return new JsonArrayStream(bytes, isEncoding(encoding) ? encoding : undefined);
  });

  registry.register(FormatIds.NDJSON, jsonStreamer);
  registry.setConstructor(jsonStreamer, FormatIds.NDJSON, (_handler, _format, bytes, encoding) => {
    return new NdjsonStream(bytes, isEncoding(encoding) ? encoding : undefined);
  });
}
