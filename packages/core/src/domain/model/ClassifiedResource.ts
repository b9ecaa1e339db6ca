import type { ByteStream } from '../ports/ByteStream.js';
import { isByteStream } from '../ports/ByteStream.js';
import type { CodingId, FormatId } from './FormatHandler.js';

/** A path or byte stream tagged with its format and, optionally, its coding. */
export interface ClassifiedResource {
  readonly resource: string | ByteStream;
  readonly formatId: FormatId;
  readonly codingId?: CodingId;
}

/** Anything `FormatStreams.open()` accepts: a path, an open byte stream or a classified resource. */
export type StreamResource = string | ByteStream | ClassifiedResource;

/** Tag a path or byte stream with an explicit format (and coding), bypassing classification. */
export function specify(resource: string | ByteStream, formatId: FormatId, codingId?: CodingId): ClassifiedResource {
  return codingId !== undefined ? { resource, formatId, codingId } : { resource, formatId };
}

/** Return `true` if the resource already carries a format id. */
export function isClassified(resource: StreamResource): resource is ClassifiedResource {
  return typeof resource !== 'string' && !isByteStream(resource) && typeof resource.formatId === 'string';
}
