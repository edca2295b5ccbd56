/**
 * @fileoverview Manually updated variable
 *
 * Used instead of an accessor when the owner pushes new values itself:
 *
 * ```typescript
 * const depth = ManagedVariable.builder<number>().setName('queueDepth').setValue(5).build();
 * exporter.export(depth);
 * depth.set(12);
 * ```
 */

import { Variable } from './variable';
import { InvalidVariableError } from './errors';
import { Clock, isMapping, systemClock } from './types';

export interface ManagedVariableOptions<T> {
  name: string | null;
  tags: Iterable<string> | null;
  doc?: string;
  expand?: boolean;
  value?: T | null;
  clock?: Clock;
}

export class ManagedVariable<T> extends Variable<T | null> {
  static builder<T>(): ManagedVariableBuilder<T> {
    return new ManagedVariableBuilder<T>();
  }

  private readonly clock: Clock;
  private value: T | null;
  private lastUpdated: number;

  constructor(options: ManagedVariableOptions<T>) {
    const { name, tags } = options;
    if (name === null || name === undefined) {
      throw new InvalidVariableError('name must not be null for ManagedVariable');
    }
    if (tags === null || tags === undefined) {
      throw new InvalidVariableError('tags must not be null for ManagedVariable');
    }
    super({ name, tags, doc: options.doc, expand: options.expand });
    this.clock = options.clock ?? systemClock;
    this.value = options.value ?? null;
    this.lastUpdated = this.clock();
  }

  set(value: T | null): void {
    this.value = value;
    this.lastUpdated = this.clock();
  }

  /** Managed variables are always considered live */
  isLive(): boolean {
    return true;
  }

  protected canExpand(): boolean {
    return this.value !== null && isMapping(this.value);
  }

  getLastUpdated(): number {
    return this.lastUpdated;
  }

  getValue(): T | null {
    return this.value;
  }
}

export class ManagedVariableBuilder<T> {
  private name: string | null = null;
  private doc = '';
  private expand = true;
  private tags: Iterable<string> | null = [];
  private value: T | null = null;
  private clock: Clock = systemClock;

  setName(name: string | null): this {
    this.name = name;
    return this;
  }

  setDoc(doc: string): this {
    this.doc = doc;
    return this;
  }

  /** Map values are expanded into entries unless this is set to false */
  setExpand(expand: boolean): this {
    this.expand = expand;
    return this;
  }

  setTags(tags: Iterable<string> | null): this {
    this.tags = tags;
    return this;
  }

  setValue(value: T | null): this {
    this.value = value;
    return this;
  }

  setClock(clock: Clock): this {
    this.clock = clock;
    return this;
  }

  build(): ManagedVariable<T> {
    return new ManagedVariable<T>({
      name: this.name,
      tags: this.tags,
      doc: this.doc,
      expand: this.expand,
      value: this.value,
      clock: this.clock,
    });
  }
}
