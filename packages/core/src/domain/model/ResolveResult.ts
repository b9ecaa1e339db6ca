import type {
  AmbiguousHandlerError,
  NoHandlerRegisteredError,
} from '../errors/FormatStreamError.js';
import type { FormatHandler } from './FormatHandler.js';

/** Reasons a format can fail to resolve to a single handler. */
export type ResolveFailure = AmbiguousHandlerError | NoHandlerRegisteredError;

/** Outcome of `StreamerRegistry.tryResolve()`. */
export type ResolveResult =
  | { readonly resolved: true; readonly handler: FormatHandler }
  | { readonly resolved: false; readonly error: ResolveFailure };

/** Create a successful resolve result. */
export function resolvedTo(handler: FormatHandler): ResolveResult {
  return { resolved: true, handler };
}

/** Create a failed resolve result. */
export function unresolved(error: ResolveFailure): ResolveResult {
  return { resolved: false, error };
}
