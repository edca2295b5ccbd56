/**
 * @fileoverview Variable that reads through to another variable
 */

import { Variable } from './variable';

/**
 * Delegates everything but its name to the wrapped variable. Used to
 * republish a variable in a parent namespace as `<namespace>-<name>`.
 */
export class ProxyVariable<T = unknown> extends Variable<T> {
  protected readonly target: Variable<T>;

  constructor(name: string, target: Variable<T>) {
    super({ name, doc: target.getDoc(), tags: target.getTags(), expand: true });
    this.target = target;
  }

  getTarget(): Variable<T> {
    return this.target;
  }

  getDoc(): string {
    return this.target.getDoc();
  }

  getTags(): ReadonlySet<string> {
    return this.target.getTags();
  }

  isLive(): boolean {
    return this.target.isLive();
  }

  isExpansionRequested(): boolean {
    return this.target.isExpansionRequested();
  }

  isExpandable(): boolean {
    return this.target.isExpandable();
  }

  getValue(): T {
    return this.target.getValue();
  }

  getLastUpdated(): number | null {
    return this.target.getLastUpdated();
  }
}
