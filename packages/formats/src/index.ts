// Registration
export { registerBuiltinFormats, csvStreamer, jsonStreamer, FormatIds, csvOptionsFrom } from './builtins.js';

// Built-in streams
export { RecordListStream } from './infrastructure/streams/RecordListStream.js';
export type { DataRecord } from './infrastructure/streams/RecordListStream.js';
export { CsvStream } from './infrastructure/streams/CsvStream.js';
export type { CsvRow, CsvStreamOptions } from './infrastructure/streams/CsvStream.js';
export { JsonArrayStream, isPlainObject } from './infrastructure/streams/JsonArrayStream.js';
export { NdjsonStream } from './infrastructure/streams/NdjsonStream.js';
