/**
 * Optional operations a formatted stream may declare.
 *
 * Every stream supports `position`, `eof`, `seekStart` and `close`. Anything
 * listed here is opt-in and is declared once per concrete stream type.
 */
export const Capability = {
  READ: 'read',
  READ_INTO: 'readInto',
  SEEK: 'seek',
  SEEK_END: 'seekEnd',
  LENGTH: 'length',
  WRITE: 'write',
  TRUNCATE: 'truncate',
} as const;

export type Capability = (typeof Capability)[keyof typeof Capability];

/** Build the frozen capability set a stream type exposes through `capabilities`. */
export function capabilitySet(...capabilities: readonly Capability[]): ReadonlySet<Capability> {
  return Object.freeze(new Set(capabilities));
}
