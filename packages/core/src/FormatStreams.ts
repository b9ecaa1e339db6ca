import type { ClassifiedResource, StreamResource } from './domain/model/ClassifiedResource.js';
import { isClassified } from './domain/model/ClassifiedResource.js';
import type { ByteStream } from './domain/ports/ByteStream.js';
import type { CodingResolver } from './domain/ports/CodingTransform.js';
import type { FormatClassifier } from './domain/ports/FormatClassifier.js';
import type { FormattedStream } from './domain/ports/FormattedStream.js';
import type { StreamerRegistry } from './application/StreamerRegistry.js';
import { defaultRegistry } from './application/StreamerRegistry.js';
import { FileByteStream } from './infrastructure/bytes/FileByteStream.js';
import { ExtensionClassifier } from './infrastructure/classifiers/ExtensionClassifier.js';
import { CodingRegistry } from './infrastructure/codings/CodingRegistry.js';
import { componentLogger, type StreamsLogger } from './logging/logger.js';

/** Collaborators used to turn a resource into a formatted stream. */
export interface FormatStreamsOptions {
  /** Streamer catalog. Default: the process-wide `defaultRegistry`. */
  readonly registry?: StreamerRegistry;
  /** Format inference for untagged paths and byte streams. Default: `ExtensionClassifier`. */
  readonly classifier?: FormatClassifier;
  /** Coding transforms. Default: a `CodingRegistry` with `gzip`. */
  readonly codings?: CodingResolver;
  /** Receives close failures that happen while another error is propagating. Default: the `dispatcher` component logger. */
  readonly logger?: StreamsLogger;
}

/**
 * Facade that resolves resources into formatted streams: classify → open → decode coding → resolve streamer → construct.
 *
 * @example
 * ```typescript
 * const streams = new FormatStreams({ registry });
 * const s = streams.open('rows.csv.gz');
 * for (const row of eachValue(s)) { ... }
 * s.close();
 *
 * const count = streams.using('rows.csv', (s) => s.length());
 * ```
 */
export class FormatStreams {
  readonly registry: StreamerRegistry;
  private readonly classifier: FormatClassifier;
  private readonly codings: CodingResolver;
  private readonly injectedLogger: StreamsLogger | undefined;

  constructor(config: FormatStreamsOptions = {}) {
    this.registry = config.registry ?? defaultRegistry;
    this.classifier = config.classifier ?? new ExtensionClassifier();
    this.codings = config.codings ?? new CodingRegistry();
    this.injectedLogger = config.logger;
  }

  private get logger(): StreamsLogger {
    return this.injectedLogger ?? componentLogger('dispatcher');
  }

  /** Tag an untagged path or byte stream through the classifier. Classified resources pass through. */
  classify(resource: StreamResource): ClassifiedResource {
    return isClassified(resource) ? resource : this.classifier.classify(resource);
  }

  /**
   * Open `resource` as a formatted stream. `args` are passed to the stream constructor.
   *
   * When a path is given, the file is opened here and closed again if any later
   * step fails. A caller-provided byte stream is left to the caller on failure.
   */
  open(resource: StreamResource, ...args: readonly unknown[]): FormattedStream {
    const classified = this.classify(resource);
    const opened = typeof classified.resource === 'string' ? FileByteStream.open(classified.resource) : undefined;
    let bytes: ByteStream = opened ?? this.givenStream(classified);

    try {
      if (classified.codingId !== undefined) {
        bytes = this.codings.transformFor(classified.codingId)(bytes);
      }
      const handler = this.registry.resolve(classified.formatId);
      const construct = this.registry.constructorFor(handler, classified.formatId);
      return construct(handler, classified.formatId, bytes, ...args);
    } catch (error) {
      // Only the file opened here is ours to release; a decoded wrapper closes it too.
      if (opened) {
        if (bytes !== opened) this.closeQuietly(bytes, error);
        if (!opened.closed) this.closeQuietly(opened, error);
      }
      throw error;
    }
  }

  /**
   * Open `resource`, call `fn` with the stream, and close the stream exactly once.
   *
   * If `fn` throws, a failing `close()` is logged and the error from `fn` is re-thrown.
   */
  using<R>(resource: StreamResource, fn: (stream: FormattedStream) => R, ...args: readonly unknown[]): R {
    const stream = this.open(resource, ...args);
    let result: R;
    try {
      result = fn(stream);
    } catch (error) {
      this.closeQuietly(stream, error);
      throw error;
    }
    stream.close();
    return result;
  }

  /** `using()` for an async callback. The stream is closed once the returned promise settles. */
  async usingAsync<R>(
    resource: StreamResource,
    fn: (stream: FormattedStream) => Promise<R>,
    ...args: readonly unknown[]
  ): Promise<R> {
    const stream = this.open(resource, ...args);
    let result: R;
    try {
      result = await fn(stream);
    } catch (error) {
      this.closeQuietly(stream, error);
      throw error;
    }
    stream.close();
    return result;
  }

  private givenStream(classified: ClassifiedResource): ByteStream {
    if (typeof classified.resource === 'string') {
      throw new TypeError('FormatStreams: expected a byte stream');
    }
    return classified.resource;
  }

  private closeQuietly(target: { close(): void }, primary: unknown): void {
    try {
      target.close();
    } catch (closeError) {
      this.logger.error(
        { err: closeError, primary: primary instanceof Error ? primary.message : String(primary) },
        'close failed while another error was propagating',
      );
    }
  }
}

let defaultStreams: FormatStreams | null = null;

function streams(): FormatStreams {
  if (!defaultStreams) {
    defaultStreams = new FormatStreams();
  }
  return defaultStreams;
}

/** Open a resource against the default registry, classifier and codings. */
export function openStream(resource: StreamResource, ...args: readonly unknown[]): FormattedStream {
  return streams().open(resource, ...args);
}

/** `FormatStreams.using()` against the defaults. */
export function withStream<R>(resource: StreamResource, fn: (stream: FormattedStream) => R, ...args: readonly unknown[]): R {
  return streams().using(resource, fn, ...args);
}

/** `FormatStreams.usingAsync()` against the defaults. */
export function withStreamAsync<R>(
  resource: StreamResource,
  fn: (stream: FormattedStream) => Promise<R>,
  ...args: readonly unknown[]
): Promise<R> {
  return streams().usingAsync(resource, fn, ...args);
}
