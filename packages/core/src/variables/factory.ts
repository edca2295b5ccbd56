/**
 * @fileoverview Turns export descriptors into variables
 */

import { AccessorVariable } from './accessor-variable';
import { CachingVariable } from './caching-variable';
import type { Variable } from './variable';
import type { Clock, ExportDescriptor } from './types';

export interface CreateVariableOptions {
  prefix?: string;
  clock?: Clock;
}

/**
 * Build the variable for a discovered member, wrapped in a
 * {@link CachingVariable} when the descriptor asks for caching.
 */
export function createVariable<T>(
  descriptor: ExportDescriptor<T>,
  options: CreateVariableOptions = {},
): Variable<T> {
  const variable = new AccessorVariable<T>({
    name: `${options.prefix ?? ''}${descriptor.name}`,
    doc: descriptor.doc,
    tags: descriptor.tags,
    expand: descriptor.expand,
    read: descriptor.read,
  });

  if (descriptor.cacheTimeoutMs !== undefined && descriptor.cacheTimeoutMs > 0) {
    return new CachingVariable<T>(variable, descriptor.cacheTimeoutMs, options.clock);
  }
  return variable;
}
