/**
 * @fileoverview Registry of the variables exported into one namespace
 */

import { Logger, logger as defaultLogger } from '../utils/logger';
import type { Variable } from '../variables/variable';
import { ProxyVariable } from '../variables/proxy-variable';
import { EntryVariable } from '../variables/entry-variable';
import { createVariable } from '../variables/factory';
import { isMapping } from '../variables/types';
import type { ExportDescriptor } from '../variables/types';
import { formatJsonField, formatPropertyLines } from './dump';

export type VariableVisitor = (variable: Variable) => void;

/**
 * What an exporter needs from the directory that created it
 */
export interface ExporterHost {
  global(): VarExporter;
  getStartTimeVariable(): Variable;
}

export interface VarExporterOptions {
  namespace: string;
  host: ExporterHost;
  logger?: Logger;
  /** Default for {@link VarExporter.dump} when includeDoc is not given */
  includeDoc?: boolean;
}

const SUB_VARIABLE_SEPARATOR = '#';
const NAMESPACE_SEPARATOR = '-';

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Exports variables under one namespace.
 *
 * Variables added while a parent is set are also added to the parent as
 * `<namespace>-<name>` proxies. Obtain instances through
 * {@link NamespaceDirectory.forNamespace}.
 */
export class VarExporter {
  private readonly namespace: string;
  private readonly host: ExporterHost;
  private readonly logger: Logger;
  private readonly includeDoc: boolean;
  private readonly variables: Map<string, Variable> = new Map();
  private parent: VarExporter | null = null;

  constructor(options: VarExporterOptions) {
    this.namespace = options.namespace;
    this.host = options.host;
    this.includeDoc = options.includeDoc ?? false;
    this.logger = (options.logger ?? defaultLogger).child({ namespace: this.namespace });
  }

  getNamespace(): string {
    return this.namespace;
  }

  getParentNamespace(): VarExporter | null {
    return this.parent;
  }

  /**
   * Forward variables subsequently exported here to the global namespace.
   * @returns this exporter, not the parent
   */
  includeInGlobal(): VarExporter {
    if (this.namespace.length === 0) {
      // already global
      return this;
    }
    return this.setParentNamespace(this.host.global());
  }

  /**
   * Forward variables subsequently exported here to `parent`. Setting an
   * exporter as its own parent is ignored.
   * @returns this exporter, not the parent
   */
  setParentNamespace(parent: VarExporter): VarExporter {
    if (parent !== this) {
      this.parent = parent;
    }
    return this;
  }

  /**
   * Register a variable, replacing any variable with the same name
   */
  addVariable(variable: Variable): void {
    const name = variable.getName();
    const previous = this.variables.get(name);
    this.variables.set(name, variable);

    if (previous) {
      this.logger.warn(
        `In namespace '${this.namespace}': Exporting variable named ${name} hides a previously exported variable`,
      );
    } else if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(`In namespace '${this.namespace}': Added variable ${name}`);
    }

    if (this.parent !== null && this.parent !== this) {
      this.parent.addVariable(
        new ProxyVariable(`${this.namespace}${NAMESPACE_SEPARATOR}${name}`, variable),
      );
    }
  }

  export(variable: Variable): void {
    this.addVariable(variable);
  }

  /**
   * Register a member found by an attribute locator
   */
  exportAccessor(descriptor: ExportDescriptor, prefix = ''): Variable {
    const variable = createVariable(descriptor, { prefix });
    if (descriptor.expand && descriptor.member === 'field') {
      this.warnIfMutableMapping(variable.getName(), descriptor.read());
    }
    this.addVariable(variable);
    return variable;
  }

  /**
   * Look up a variable. `container#key` addresses one entry of an
   * expandable variable; when no such entry exists the full name is
   * looked up literally.
   */
  getVariable(name: string): Variable | undefined {
    const separator = name.indexOf(SUB_VARIABLE_SEPARATOR);
    if (separator >= 0) {
      const entry = this.getSubVariable(name.slice(0, separator), name.slice(separator + 1));
      if (entry) {
        return entry;
      }
    }
    return this.variables.get(name);
  }

  /**
   * Current value of a variable, or undefined when no variable has that name.
   * Accessor failures propagate.
   */
  getValue(name: string): unknown {
    const variable = this.getVariable(name);
    return variable === undefined ? undefined : variable.getValue();
  }

  /**
   * Visit a snapshot of the exported variables in name order. Expandable
   * variables are visited as one entry per key. The exporter start time
   * follows when anything was visited.
   */
  visitVariables(visitor: VariableVisitor): void {
    const snapshot = Array.from(this.variables.entries())
      .sort(([a], [b]) => compareNames(a, b))
      .map(([, variable]) => variable);

    for (const variable of snapshot) {
      if (variable.isExpandable()) {
        for (const [key, value] of variable.expand(this.logger)) {
          visitor(new EntryVariable(key, value, variable));
        }
      } else {
        visitor(variable);
      }
    }

    if (snapshot.length > 0) {
      visitor(this.host.getStartTimeVariable());
    }
  }

  getVariables(): Variable[] {
    const visited: Variable[] = [];
    this.visitVariables((variable) => visited.push(variable));
    return visited;
  }

  /**
   * All variables as `name=value` lines, escaped for a properties file
   */
  dump(includeDoc: boolean = this.includeDoc): string {
    let out = '';
    this.visitVariables((variable) => {
      out += formatPropertyLines(variable, includeDoc);
    });
    return out;
  }

  /**
   * All variables as `{name='value', ...}`. Names and values are not escaped.
   */
  dumpJson(): string {
    const fields: string[] = [];
    this.visitVariables((variable) => {
      fields.push(formatJsonField(variable));
    });
    return `{${fields.join(', ')}}`;
  }

  /** Remove this namespace's variables. Copies already forwarded to a parent remain. */
  reset(): void {
    this.variables.clear();
  }

  private getSubVariable(containerName: string, key: string): Variable | undefined {
    const container = this.variables.get(containerName);
    if (!container || !container.isExpandable()) {
      return undefined;
    }
    let entries: Map<unknown, unknown>;
    try {
      entries = container.entries();
    } catch (error) {
      this.logger.warn(`Failed to iterate map entry set for variable ${containerName}`, error);
      return undefined;
    }
    for (const [entryKey, value] of entries) {
      if (String(entryKey) === key) {
        return new EntryVariable(entryKey, value, container);
      }
    }
    return undefined;
  }

  /** A Map, or a plain object that is not frozen, can change under a traversal */
  private warnIfMutableMapping(name: string, value: unknown): void {
    if (isMapping(value) && (value instanceof Map || !Object.isFrozen(value))) {
      this.logger.warn(
        `In namespace '${this.namespace}': Variable ${name} exports a mutable map, which may result in sporadic errors`,
      );
    }
  }
}
