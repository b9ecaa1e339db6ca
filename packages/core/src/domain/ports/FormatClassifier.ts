import type { ClassifiedResource } from '../model/ClassifiedResource.js';
import type { ByteStream } from './ByteStream.js';

/**
 * Port for format inference.
 *
 * Implementations inspect a path or byte stream (by name, by content, or both)
 * and throw `ClassificationError` when they cannot tell what it is.
 */
export interface FormatClassifier {
  classify(resource: string | ByteStream): ClassifiedResource;
}
