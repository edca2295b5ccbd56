/**
 * @fileoverview Variable backed by a read closure
 */

import { Variable, VariableOptions } from './variable';
import { VariableAccessError } from './errors';

export interface AccessorVariableOptions<T> extends VariableOptions {
  read: () => T;
}

/**
 * Reads its value from an accessor on every call. A failing accessor is
 * surfaced as a {@link VariableAccessError}, never replaced by a default.
 */
export class AccessorVariable<T = unknown> extends Variable<T> {
  private readonly read: () => T;

  constructor(options: AccessorVariableOptions<T>) {
    super(options);
    this.read = options.read;
  }

  getValue(): T {
    try {
      return this.read();
    } catch (error) {
      throw new VariableAccessError(
        this.getName(),
        error instanceof Error ? error : new Error(String(error)),
      );
    }
  }

  getLastUpdated(): number | null {
    return null;
  }
}
