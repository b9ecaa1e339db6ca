import { basename } from 'node:path';
import type { ClassifiedResource } from '../../domain/model/ClassifiedResource.js';
import type { CodingId, FormatId } from '../../domain/model/FormatHandler.js';
import type { ByteStream } from '../../domain/ports/ByteStream.js';
import type { FormatClassifier } from '../../domain/ports/FormatClassifier.js';
import { ClassificationError } from '../../domain/errors/FormatStreamError.js';

/** Default extension → format id table. */
export const DEFAULT_FORMAT_EXTENSIONS: Readonly<Record<string, FormatId>> = {
  csv: 'text/csv',
  tsv: 'text/tab-separated-values',
  json: 'application/json',
  ndjson: 'application/x-ndjson',
  jsonl: 'application/x-ndjson',
};

/** Default extension → coding id table. */
export const DEFAULT_CODING_EXTENSIONS: Readonly<Record<string, CodingId>> = {
  gz: 'gzip',
};

export interface ExtensionClassifierOptions {
  /** Extension (without dot, lower case) → format id. Default: `DEFAULT_FORMAT_EXTENSIONS`. */
  readonly formats?: Readonly<Record<string, FormatId>>;
  /** Extension (without dot, lower case) → coding id. Default: `DEFAULT_CODING_EXTENSIONS`. */
  readonly codings?: Readonly<Record<string, CodingId>>;
}

/**
 * Classify a path, or a byte stream by its `name`, from its file extensions.
 *
 * A trailing coding extension is split off first, so `trajectory.csv.gz`
 * classifies as `text/csv` coded with `gzip`.
 */
export class ExtensionClassifier implements FormatClassifier {
  private readonly formats: Readonly<Record<string, FormatId>>;
  private readonly codings: Readonly<Record<string, CodingId>>;

  constructor(options?: ExtensionClassifierOptions) {
    this.formats = options?.formats ?? DEFAULT_FORMAT_EXTENSIONS;
    this.codings = options?.codings ?? DEFAULT_CODING_EXTENSIONS;
  }

  classify(resource: string | ByteStream): ClassifiedResource {
    const name = typeof resource === 'string' ? resource : resource.name;
    if (!name) {
      throw new ClassificationError('cannot classify an unnamed byte stream; use specify() to give its format');
    }

    // Leading dots mark a hidden file, not an extension: '.csv' has none.
    const parts = basename(name).toLowerCase().replace(/^\.+/, '').split('.').slice(1);
    let codingId: CodingId | undefined;
    const last = parts.at(-1);
    if (last !== undefined && Object.hasOwn(this.codings, last)) {
      codingId = this.codings[last];
      parts.pop();
    }

    const ext = parts.at(-1);
    const formatId = ext !== undefined && Object.hasOwn(this.formats, ext) ? this.formats[ext] : undefined;
    if (formatId === undefined) {
      throw new ClassificationError(`cannot classify ${name}: unknown file extension`);
    }

    return codingId !== undefined ? { resource, formatId, codingId } : { resource, formatId };
  }
}
