/** Media-type style key naming a data format, e.g. `'text/csv'`. Never parsed. */
export type FormatId = string;

/** Key naming a transfer coding applied on top of a format, e.g. `'gzip'`. */
export type CodingId = string;

/**
 * Identity token for one streaming backend.
 *
 * Handlers are compared by reference; `name` is only used in messages and logs.
 */
export interface FormatHandler {
  readonly name: string;
}

/** Create a new, frozen handler token. Two calls with the same name yield distinct handlers. */
export function defineHandler(name: string): FormatHandler {
  if (!name) {
    throw new TypeError('defineHandler: handler name must be a non-empty string');
  }
  return Object.freeze({ name });
}
