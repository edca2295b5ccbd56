/**
 * @fileoverview Base class of every exported variable
 */

import { Logger, logger as defaultLogger } from '../utils/logger';
import { InvalidVariableError } from './errors';
import { copyMapping, isMapping } from './types';

const variableLogger = defaultLogger.child({ component: 'variable' });

export interface VariableOptions {
  name: string;
  doc?: string;
  tags?: Iterable<string>;
  expand?: boolean;
}

/**
 * A named value source exposed for introspection.
 *
 * Subclasses decide where the value comes from; the base class owns the
 * metadata and the expansion of map-valued variables into entries.
 */
export abstract class Variable<T = unknown> {
  private readonly name: string;
  private readonly doc: string;
  private readonly tags: ReadonlySet<string>;
  private readonly expandRequested: boolean;

  constructor(options: VariableOptions) {
    if (typeof options.name !== 'string' || options.name.length === 0) {
      throw new InvalidVariableError('Variable name must be a non-empty string');
    }
    this.name = options.name;
    this.doc = options.doc ?? '';
    this.tags = new Set(options.tags ?? []);
    this.expandRequested = options.expand ?? false;
  }

  getName(): string {
    return this.name;
  }

  getDoc(): string {
    return this.doc;
  }

  getTags(): ReadonlySet<string> {
    return this.tags;
  }

  /** Whether the value is always current rather than derived or cached */
  isLive(): boolean {
    return false;
  }

  /** Whether the registrant asked for map values to be shown as entries */
  isExpansionRequested(): boolean {
    return this.expandRequested;
  }

  isExpandable(): boolean {
    return this.isExpansionRequested() && this.canExpand();
  }

  /**
   * Snapshot of the current value's entries.
   *
   * The mapping belongs to the producer and may change while it is copied.
   * A failure during the copy is logged to `logger` and reported as a
   * single `error` entry.
   */
  expand(logger: Logger = variableLogger): Map<unknown, unknown> {
    try {
      return this.entries();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Failed to iterate map entry set for variable ${this.getName()}`, error);
      return new Map<unknown, unknown>([['error', message]]);
    }
  }

  /**
   * Snapshot of the current value's entries, empty when the value is not a
   * mapping. Failures while copying propagate.
   */
  entries(): Map<unknown, unknown> {
    const value: unknown = this.getValue();
    return isMapping(value) ? copyMapping(value) : new Map();
  }

  protected canExpand(): boolean {
    return isMapping(this.getValue());
  }

  abstract getValue(): T;

  /** Epoch millis of the last known change, or null when unknown */
  abstract getLastUpdated(): number | null;
}
