/**
 * @fileoverview Shared types for exported variables
 */

/** Source of the current time in epoch milliseconds */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Key/value structure a variable may expand into.
 * Either a Map or a plain object literal.
 */
export type Mapping = ReadonlyMap<unknown, unknown> | Readonly<Record<string, unknown>>;

function isMapInstance(value: unknown): value is ReadonlyMap<unknown, unknown> {
  return value instanceof Map;
}

export function isMapping(value: unknown): value is Mapping {
  if (isMapInstance(value)) {
    return true;
  }
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Copy the entries of a mapping into a new Map.
 * Errors raised by the producer's structure while iterating propagate to the caller.
 */
export function copyMapping(mapping: Mapping): Map<unknown, unknown> {
  const copy = new Map<unknown, unknown>();
  if (isMapInstance(mapping)) {
    for (const [key, value] of mapping) {
      copy.set(key, value);
    }
  } else {
    for (const key of Object.keys(mapping)) {
      copy.set(key, mapping[key]);
    }
  }
  return copy;
}

/**
 * Member discovered by an attribute locator, ready to become a variable
 */
export interface ExportDescriptor<T = unknown> {
  name: string;
  doc?: string;
  tags?: Iterable<string>;
  /** Present the value's entries as sub-variables when it is a mapping */
  expand?: boolean;
  /** Values older than this many milliseconds are re-read; 0 or absent disables caching */
  cacheTimeoutMs?: number;
  /** How the value is read; fields are inspected once at registration */
  member?: 'field' | 'getter' | 'method';
  read: () => T;
}
