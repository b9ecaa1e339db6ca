// Main entry point
export { FormatStreams, openStream, withStream, withStreamAsync } from './FormatStreams.js';
export type { FormatStreamsOptions } from './FormatStreams.js';

// Registry
export {
  StreamerRegistry,
  defaultRegistry,
  registerStreamer,
  preferStreamer,
  resolveStreamer,
} from './application/StreamerRegistry.js';
export type { StreamConstructor, StreamerRegistryOptions } from './application/StreamerRegistry.js';

// Domain model
export type { FormatHandler, FormatId, CodingId } from './domain/model/FormatHandler.js';
export { defineHandler } from './domain/model/FormatHandler.js';
export type { ClassifiedResource, StreamResource } from './domain/model/ClassifiedResource.js';
export { specify, isClassified } from './domain/model/ClassifiedResource.js';
export { Capability, capabilitySet } from './domain/model/Capability.js';
export type { ResolveResult, ResolveFailure } from './domain/model/ResolveResult.js';
export { AbstractFormattedStream } from './domain/model/AbstractFormattedStream.js';

// Errors
export {
  FormatStreamError,
  DuplicateRegistrationError,
  AmbiguousHandlerError,
  NoHandlerRegisteredError,
  UnregisteredHandlerPreferenceError,
  AlreadyGlobalFavoriteError,
  NoStreamConstructorError,
  UnsupportedOperationError,
  StreamClosedError,
  ClassificationError,
  UnknownCodingError,
  NotWritableError,
  MalformedDataError,
  isFormatStreamError,
} from './domain/errors/FormatStreamError.js';
export type { FormatStreamErrorCode } from './domain/errors/FormatStreamError.js';

// Ports (for custom implementations)
export type { FormattedStream } from './domain/ports/FormattedStream.js';
export { supports, requireCapability } from './domain/ports/FormattedStream.js';
export type { ByteStream } from './domain/ports/ByteStream.js';
export { isByteStream } from './domain/ports/ByteStream.js';
export type { FormatClassifier } from './domain/ports/FormatClassifier.js';
export type { CodingTransform, CodingResolver } from './domain/ports/CodingTransform.js';

// Iteration
export { ValueIterator, BufferedValueIterator, eachValue, eachValueInto } from './iteration/eachValue.js';

// Infrastructure adapters (built-in byte streams, classifier and codings)
export { BufferByteStream } from './infrastructure/bytes/BufferByteStream.js';
export type { BufferByteStreamOptions } from './infrastructure/bytes/BufferByteStream.js';
export { FileByteStream } from './infrastructure/bytes/FileByteStream.js';
export type { FileByteStreamOptions, FileOpenMode } from './infrastructure/bytes/FileByteStream.js';
export {
  ExtensionClassifier,
  DEFAULT_FORMAT_EXTENSIONS,
  DEFAULT_CODING_EXTENSIONS,
} from './infrastructure/classifiers/ExtensionClassifier.js';
export type { ExtensionClassifierOptions } from './infrastructure/classifiers/ExtensionClassifier.js';
export { CodingRegistry, gunzipTransform } from './infrastructure/codings/CodingRegistry.js';
export type { CodingRegistryOptions } from './infrastructure/codings/CodingRegistry.js';

// Logging and configuration
export { createLogger, getLogger, componentLogger } from './logging/logger.js';
export type { StreamsLogger } from './logging/logger.js';
export { loadConfig } from './config.js';
export type { RuntimeConfig } from './config.js';
