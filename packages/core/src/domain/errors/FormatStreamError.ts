import type { Capability } from '../model/Capability.js';
import type { FormatHandler } from '../model/FormatHandler.js';

/** Machine-readable codes carried by every error this package throws. */
export type FormatStreamErrorCode =
  | 'DUPLICATE_REGISTRATION'
  | 'AMBIGUOUS_HANDLER'
  | 'NO_HANDLER_REGISTERED'
  | 'UNREGISTERED_HANDLER_PREFERENCE'
  | 'ALREADY_GLOBAL_FAVORITE'
  | 'NO_STREAM_CONSTRUCTOR'
  | 'UNSUPPORTED_OPERATION'
  | 'STREAM_CLOSED'
  | 'CLASSIFICATION_FAILED'
  | 'UNKNOWN_CODING'
  | 'NOT_WRITABLE'
  | 'MALFORMED_DATA';

/** Base class for all format stream errors. Branch on `code`, not on the message. */
export class FormatStreamError extends Error {
  readonly code: FormatStreamErrorCode;

  constructor(code: FormatStreamErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FormatStreamError';
    this.code = code;
  }
}

export class DuplicateRegistrationError extends FormatStreamError {
  readonly formatId: string;
  readonly handler: FormatHandler;

  constructor(formatId: string, handler: FormatHandler) {
    super('DUPLICATE_REGISTRATION', `streamer ${handler.name} already registered for ${formatId}`);
    this.name = 'DuplicateRegistrationError';
    this.formatId = formatId;
    this.handler = handler;
  }
}

export class AmbiguousHandlerError extends FormatStreamError {
  readonly formatId: string;
  readonly candidates: readonly FormatHandler[];

  constructor(formatId: string, candidates: readonly FormatHandler[]) {
    const names = candidates.map((c) => c.name).join(', ');
    super('AMBIGUOUS_HANDLER', `multiple streamers registered for ${formatId}: ${names}. Prefer one of them.`);
    this.name = 'AmbiguousHandlerError';
    this.formatId = formatId;
    this.candidates = candidates;
  }
}

export class NoHandlerRegisteredError extends FormatStreamError {
  readonly formatId: string;

  constructor(formatId: string) {
    super('NO_HANDLER_REGISTERED', `no streamer registered for ${formatId}`);
    this.name = 'NoHandlerRegisteredError';
    this.formatId = formatId;
  }
}

export class UnregisteredHandlerPreferenceError extends FormatStreamError {
  readonly formatId: string;
  readonly handler: FormatHandler;

  constructor(formatId: string, handler: FormatHandler) {
    super('UNREGISTERED_HANDLER_PREFERENCE', `streamer ${handler.name} is not registered for ${formatId}`);
    this.name = 'UnregisteredHandlerPreferenceError';
    this.formatId = formatId;
    this.handler = handler;
  }
}

export class AlreadyGlobalFavoriteError extends FormatStreamError {
  readonly handler: FormatHandler;

  constructor(handler: FormatHandler) {
    super('ALREADY_GLOBAL_FAVORITE', `streamer ${handler.name} is already globally preferred`);
    this.name = 'AlreadyGlobalFavoriteError';
    this.handler = handler;
  }
}

export class NoStreamConstructorError extends FormatStreamError {
  readonly formatId: string;
  readonly handler: FormatHandler;

  constructor(formatId: string, handler: FormatHandler) {
    super('NO_STREAM_CONSTRUCTOR', `streamer ${handler.name} has no stream constructor for ${formatId}`);
    this.name = 'NoStreamConstructorError';
    this.formatId = formatId;
    this.handler = handler;
  }
}

export class UnsupportedOperationError extends FormatStreamError {
  readonly capability: Capability;

  constructor(capability: Capability, streamType: string) {
    super('UNSUPPORTED_OPERATION', `${streamType} does not support '${capability}'`);
    this.name = 'UnsupportedOperationError';
    this.capability = capability;
  }
}

export class StreamClosedError extends FormatStreamError {
  constructor(streamType: string) {
    super('STREAM_CLOSED', `${streamType}: stream is closed`);
    this.name = 'StreamClosedError';
  }
}

export class ClassificationError extends FormatStreamError {
  constructor(message: string) {
    super('CLASSIFICATION_FAILED', message);
    this.name = 'ClassificationError';
  }
}

export class UnknownCodingError extends FormatStreamError {
  readonly codingId: string;

  constructor(codingId: string) {
    super('UNKNOWN_CODING', `no transform registered for coding ${codingId}`);
    this.name = 'UnknownCodingError';
    this.codingId = codingId;
  }
}

export class NotWritableError extends FormatStreamError {
  constructor(target: string) {
    super('NOT_WRITABLE', `${target} was not opened for writing`);
    this.name = 'NotWritableError';
  }
}

export class MalformedDataError extends FormatStreamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MALFORMED_DATA', message, options);
    this.name = 'MalformedDataError';
  }
}

/** Narrow an unknown thrown value to a `FormatStreamError`, optionally of a given code. */
export function isFormatStreamError(error: unknown, code?: FormatStreamErrorCode): error is FormatStreamError {
  return error instanceof FormatStreamError && (code === undefined || error.code === code);
}
