import { gunzipSync } from 'node:zlib';
import type { CodingId } from '../../domain/model/FormatHandler.js';
import type { ByteStream } from '../../domain/ports/ByteStream.js';
import type { CodingResolver, CodingTransform } from '../../domain/ports/CodingTransform.js';
import { MalformedDataError, UnknownCodingError } from '../../domain/errors/FormatStreamError.js';
import { BufferByteStream } from '../bytes/BufferByteStream.js';

/**
 * Decode a gzip-coded stream in memory. The result is read-only and closes `underlying` with it.
 * On invalid data `underlying` is left open; its owner closes it.
 */
export const gunzipTransform: CodingTransform = (underlying: ByteStream) => {
  let decoded: Buffer;
  try {
    decoded = gunzipSync(underlying.readAll());
  } catch (error) {
    throw new MalformedDataError(`${underlying.name ?? 'byte stream'}: invalid gzip data`, { cause: error });
  }
  return new BufferByteStream(decoded, {
    name: underlying.name?.replace(/\.gz$/i, ''),
    onClose: () => underlying.close(),
  });
};

export interface CodingRegistryOptions {
  /** Register the built-in `gzip` transform. Default: `true`. */
  readonly builtins?: boolean;
}

/** Coding id → transform lookup used by the dispatcher. */
export class CodingRegistry implements CodingResolver {
  private readonly transforms = new Map<CodingId, CodingTransform>();

  constructor(options?: CodingRegistryOptions) {
    if (options?.builtins ?? true) {
      this.register('gzip', gunzipTransform);
    }
  }

  /** Install or replace the transform for a coding. */
  register(codingId: CodingId, transform: CodingTransform): void {
    this.transforms.set(codingId, transform);
  }

  has(codingId: CodingId): boolean {
    return this.transforms.has(codingId);
  }

  transformFor(codingId: CodingId): CodingTransform {
    const transform = this.transforms.get(codingId);
    if (!transform) {
      throw new UnknownCodingError(codingId);
    }
    return transform;
  }
}
