/**
 * @fileoverview One entry of an expanded variable
 */

import { Variable } from './variable';

/**
 * Named `<container>#<key>`. Holds the entry value seen when it was
 * created; metadata comes from the container.
 */
export class EntryVariable<T = unknown> extends Variable<T> {
  private readonly key: unknown;
  private readonly value: T;
  private readonly container: Variable;

  constructor(key: unknown, value: T, container: Variable) {
    super({ name: `${container.getName()}#${String(key)}`, expand: true });
    this.key = key;
    this.value = value;
    this.container = container;
  }

  getKey(): unknown {
    return this.key;
  }

  getContainer(): Variable {
    return this.container;
  }

  getDoc(): string {
    return this.container.getDoc();
  }

  getTags(): ReadonlySet<string> {
    return this.container.getTags();
  }

  getValue(): T {
    return this.value;
  }

  getLastUpdated(): number | null {
    return this.container.getLastUpdated();
  }
}
