import type { FormatHandler, FormatId } from '../domain/model/FormatHandler.js';
import type { ResolveResult } from '../domain/model/ResolveResult.js';
import { resolvedTo, unresolved } from '../domain/model/ResolveResult.js';
import type { ByteStream } from '../domain/ports/ByteStream.js';
import type { FormattedStream } from '../domain/ports/FormattedStream.js';
import {
  AlreadyGlobalFavoriteError,
  AmbiguousHandlerError,
  DuplicateRegistrationError,
  NoHandlerRegisteredError,
  NoStreamConstructorError,
  UnregisteredHandlerPreferenceError,
} from '../domain/errors/FormatStreamError.js';
import { componentLogger, type StreamsLogger } from '../logging/logger.js';

/**
 * Format-specific stream constructor: the extension point integrators provide
 * for each `(handler, formatId)` pair. It validates the layout of `bytes` and
 * returns a stream over it; `args` are passed through from the caller.
 */
export type StreamConstructor = (
  handler: FormatHandler,
  formatId: FormatId,
  bytes: ByteStream,
  ...args: readonly unknown[]
) => FormattedStream<unknown>;

export interface StreamerRegistryOptions {
  /** Receives multiplicity notices and favorite replacement warnings. Default: the `registry` component logger. */
  readonly logger?: StreamsLogger;
}

interface RegistrySnapshot {
  readonly streamers: Map<FormatId, FormatHandler[]>;
  readonly favorites: Map<FormatId, FormatHandler>;
  readonly globalFavorites: FormatHandler[];
  readonly constructors: Map<FormatHandler, Map<FormatId, StreamConstructor>>;
}

/**
 * Catalog of streamers per format, with per-format and global preferences.
 *
 * Mutations are meant to happen while packages load; resolution can then be
 * called from anywhere. There is no locking.
 *
 * @example
 * ```typescript
 * const csv = defineHandler('csv');
 * registry.register('text/csv', csv);
 * registry.setConstructor(csv, 'text/csv', (h, f, bytes) => new MyCsvStream(bytes));
 * registry.resolve('text/csv'); // csv
 * ```
 */
export class StreamerRegistry {
  private streamers = new Map<FormatId, FormatHandler[]>();
  private favorites = new Map<FormatId, FormatHandler>();
  private favoredEverywhere: FormatHandler[] = [];
  private constructors = new Map<FormatHandler, Map<FormatId, StreamConstructor>>();
  private readonly injectedLogger: StreamsLogger | undefined;

  constructor(options?: StreamerRegistryOptions) {
    this.injectedLogger = options?.logger;
  }

  private get logger(): StreamsLogger {
    return this.injectedLogger ?? componentLogger('registry');
  }

  /** Add `handler` to the streamers of `formatId`. Registering it twice for one format throws. */
  register(formatId: FormatId, handler: FormatHandler): void {
    const existing = this.streamers.get(formatId) ?? [];
    if (existing.includes(handler)) {
      throw new DuplicateRegistrationError(formatId, handler);
    }
    existing.push(handler);
    this.streamers.set(formatId, existing);

    if (existing.length > 1) {
      this.logger.info({ formatId, streamers: existing.map((h) => h.name) }, `${formatId} has multiple registered streamers`);
    }
  }

  /** Prefer `handler` for every format it is registered for, whenever resolution is otherwise ambiguous. */
  setGlobalFavorite(handler: FormatHandler): void {
    if (this.favoredEverywhere.includes(handler)) {
      throw new AlreadyGlobalFavoriteError(handler);
    }
    this.favoredEverywhere.push(handler);
  }

  /**
   * Prefer `handler` for `formatId` over every other candidate, global favorites included.
   *
   * Replacing an existing favorite is allowed and only logs a warning, unlike
   * duplicate registrations and duplicate global favorites.
   */
  setFormatFavorite(handler: FormatHandler, formatId: FormatId): void {
    const registered = this.streamers.get(formatId) ?? [];
    if (!registered.includes(handler)) {
      throw new UnregisteredHandlerPreferenceError(formatId, handler);
    }
    const previous = this.favorites.get(formatId);
    if (previous) {
      this.logger.warn({ formatId, previous: previous.name, next: handler.name }, `replacing preferred streamer for ${formatId}`);
    }
    this.favorites.set(formatId, handler);
  }

  /** Pick the streamer for `formatId`. Throws `NoHandlerRegisteredError` or `AmbiguousHandlerError`. */
  resolve(formatId: FormatId): FormatHandler {
    const result = this.tryResolve(formatId);
    if (!result.resolved) {
      throw result.error;
    }
    return result.handler;
  }

  /** Same as `resolve()`, returning the failure instead of throwing it. */
  tryResolve(formatId: FormatId): ResolveResult {
    const favorite = this.favorites.get(formatId);
    if (favorite) {
      return resolvedTo(favorite);
    }

    const candidates = this.streamers.get(formatId) ?? [];
    if (candidates.length === 0) {
      return unresolved(new NoHandlerRegisteredError(formatId));
    }

    const [only] = candidates;
    if (candidates.length === 1 && only) {
      return resolvedTo(only);
    }

    const favored = candidates.filter((h) => this.favoredEverywhere.includes(h));
    const [chosen] = favored;
    if (favored.length === 1 && chosen) {
      return resolvedTo(chosen);
    }

    return unresolved(new AmbiguousHandlerError(formatId, [...candidates]));
  }

  /** Install the constructor `handler` uses for `formatId`. Replacing one logs a warning. */
  setConstructor(handler: FormatHandler, formatId: FormatId, construct: StreamConstructor): void {
    const byFormat = this.constructors.get(handler) ?? new Map<FormatId, StreamConstructor>();
    if (byFormat.has(formatId)) {
      this.logger.warn({ formatId, streamer: handler.name }, `replacing stream constructor of ${handler.name} for ${formatId}`);
    }
    byFormat.set(formatId, construct);
    this.constructors.set(handler, byFormat);
  }

  /** Look up the constructor for a `(handler, formatId)` pair. Throws `NoStreamConstructorError`. */
  constructorFor(handler: FormatHandler, formatId: FormatId): StreamConstructor {
    const construct = this.constructors.get(handler)?.get(formatId);
    if (!construct) {
      throw new NoStreamConstructorError(formatId, handler);
    }
    return construct;
  }

  /** Streamers registered for `formatId`, in registration order. */
  handlersFor(formatId: FormatId): readonly FormatHandler[] {
    return [...(this.streamers.get(formatId) ?? [])];
  }

  /** The per-format favorite, if one is set. */
  favoriteFor(formatId: FormatId): FormatHandler | undefined {
    return this.favorites.get(formatId);
  }

  globalFavorites(): readonly FormatHandler[] {
    return [...this.favoredEverywhere];
  }

  /** Every format id with at least one registered streamer. */
  formats(): readonly FormatId[] {
    return [...this.streamers.keys()];
  }

  /** Remove every registration, preference and constructor. */
  clear(): void {
    this.streamers = new Map();
    this.favorites = new Map();
    this.favoredEverywhere = [];
    this.constructors = new Map();
  }

  /**
   * Run `body` against an emptied registry, then put the previous state back.
   *
   * `body` registers the temporary streamers it needs and uses them. The
   * previous state is restored on every exit path and nothing registered
   * inside `body` survives it.
   */
  scoped<R>(body: (registry: this) => R): R {
    const snapshot = this.takeSnapshot();
    this.clear();
    try {
      return body(this);
    } finally {
      this.restoreSnapshot(snapshot);
    }
  }

  /** `scoped()` for a body that returns a promise; the state is restored once it settles. */
  async scopedAsync<R>(body: (registry: this) => Promise<R>): Promise<R> {
    const snapshot = this.takeSnapshot();
    this.clear();
    try {
      return await body(this);
    } finally {
      this.restoreSnapshot(snapshot);
    }
  }

  private takeSnapshot(): RegistrySnapshot {
    const constructors = new Map<FormatHandler, Map<FormatId, StreamConstructor>>();
    for (const [handler, byFormat] of this.constructors) {
      constructors.set(handler, new Map(byFormat));
    }
    const streamers = new Map<FormatId, FormatHandler[]>();
    for (const [formatId, handlers] of this.streamers) {
      streamers.set(formatId, [...handlers]);
    }
    return {
      streamers,
      favorites: new Map(this.favorites),
      globalFavorites: [...this.favoredEverywhere],
      constructors,
    };
  }

  private restoreSnapshot(snapshot: RegistrySnapshot): void {
    this.streamers = snapshot.streamers;
    this.favorites = snapshot.favorites;
    this.favoredEverywhere = snapshot.globalFavorites;
    this.constructors = snapshot.constructors;
  }
}

/** Process-wide registry used when no registry is passed explicitly. */
export const defaultRegistry = new StreamerRegistry();

/** Register a streamer for a format on the default registry. */
export function registerStreamer(formatId: FormatId, handler: FormatHandler, construct?: StreamConstructor): void {
  defaultRegistry.register(formatId, handler);
  if (construct) {
    defaultRegistry.setConstructor(handler, formatId, construct);
  }
}

/**
 * Prefer a streamer on the default registry: globally without `formatId`,
 * for that format only with it.
 */
export function preferStreamer(handler: FormatHandler, formatId?: FormatId): void {
  if (formatId === undefined) {
    defaultRegistry.setGlobalFavorite(handler);
  } else {
    defaultRegistry.setFormatFavorite(handler, formatId);
  }
}

/** Resolve a format on the default registry. */
export function resolveStreamer(formatId: FormatId): FormatHandler {
  return defaultRegistry.resolve(formatId);
}
