import type { CodingId } from '../model/FormatHandler.js';
import type { ByteStream } from './ByteStream.js';

/** Wrap a byte stream so that reads yield decoded bytes. Closing the result closes `underlying`. */
export type CodingTransform = (underlying: ByteStream) => ByteStream;

/** Port for looking up the transform of a coding. Throws `UnknownCodingError` for unknown codings. */
export interface CodingResolver {
  transformFor(codingId: CodingId): CodingTransform;
}
