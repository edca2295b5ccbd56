/**
 * @fileoverview Directory of namespace exporters
 */

import { Logger } from '../utils/logger';
import { DEFAULT_CONFIG, VarExportConfig } from '../config/types';
import { ManagedVariable } from '../variables/managed-variable';
import type { Variable } from '../variables/variable';
import type { Clock } from '../variables/types';
import { ExporterHost, VarExporter, VariableVisitor } from './var-exporter';

export const GLOBAL_NAMESPACE = '';
export const START_TIME_VARIABLE_NAME = 'exporter-start-time';

export interface NamespaceDirectoryOptions {
  config?: VarExportConfig;
  logger?: Logger;
  /** Instant reported by the start time variable; defaults to construction time */
  startedAt?: Date;
  clock?: Clock;
}

/**
 * ISO 8601 timestamp with second precision, e.g. `2024-01-31T08:15:00Z`
 */
export function formatStartTime(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function createStartTimeVariable(date: Date, clock?: Clock): ManagedVariable<string> {
  const builder = ManagedVariable.builder<string>()
    .setName(START_TIME_VARIABLE_NAME)
    .setDoc('global start time of variable exporter')
    .setValue(formatStartTime(date));
  if (clock) {
    builder.setClock(clock);
  }
  return builder.build();
}

/**
 * Maps namespace names to their exporters, creating exporters on first
 * access. The empty name is the global namespace.
 */
export class NamespaceDirectory implements ExporterHost {
  private readonly config: VarExportConfig;
  private readonly logger: Logger;
  private readonly startTime: ManagedVariable<string>;
  private readonly exporters: Map<string, VarExporter> = new Map();

  constructor(options: NamespaceDirectoryOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.logger = options.logger ?? new Logger(this.config.logging);
    this.startTime = createStartTimeVariable(options.startedAt ?? new Date(), options.clock);
  }

  getConfig(): VarExportConfig {
    return this.config;
  }

  /**
   * Exporter for a namespace, created if never accessed before.
   * Null, undefined and '' all name the global namespace.
   */
  forNamespace(namespace?: string | null): VarExporter {
    const name = namespace ? namespace : GLOBAL_NAMESPACE;
    let exporter = this.exporters.get(name);
    if (!exporter) {
      exporter = new VarExporter({
        namespace: name,
        host: this,
        logger: this.logger,
        includeDoc: this.config.dump.includeDoc,
      });
      this.exporters.set(name, exporter);
    }
    return exporter;
  }

  global(): VarExporter {
    return this.forNamespace(GLOBAL_NAMESPACE);
  }

  listNamespaces(): string[] {
    return Array.from(this.exporters.keys());
  }

  visitNamespaceVariables(namespace: string | null | undefined, visitor: VariableVisitor): void {
    this.forNamespace(namespace).visitVariables(visitor);
  }

  getStartTimeVariable(): Variable {
    return this.startTime;
  }
}
