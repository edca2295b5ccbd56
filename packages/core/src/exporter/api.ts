/**
 * @fileoverview Process-wide namespace directory and the functions that
 * register into and query it by namespace name
 */

import { loadConfig } from '../config/loader';
import { DirectoryAlreadyInitializedError } from '../variables/errors';
import type { Variable } from '../variables/variable';
import { NamespaceDirectory, NamespaceDirectoryOptions } from './namespace-directory';
import type { VarExporter, VariableVisitor } from './var-exporter';

let directory: NamespaceDirectory | null = null;

/**
 * Create the process-wide directory. Call once at startup, before anything
 * exports variables, to choose its configuration.
 *
 * @throws {DirectoryAlreadyInitializedError} if the directory already exists
 */
export function initializeNamespaceDirectory(
  options: NamespaceDirectoryOptions = {},
): NamespaceDirectory {
  if (directory) {
    throw new DirectoryAlreadyInitializedError();
  }
  directory = new NamespaceDirectory({ ...options, config: options.config ?? loadConfig() });
  return directory;
}

/**
 * The process-wide directory, created from {@link loadConfig} if it was
 * never initialized explicitly
 */
export function getNamespaceDirectory(): NamespaceDirectory {
  if (!directory) {
    directory = new NamespaceDirectory({ config: loadConfig() });
  }
  return directory;
}

export function forNamespace(namespace?: string | null): VarExporter {
  return getNamespaceDirectory().forNamespace(namespace);
}

export function globalExporter(): VarExporter {
  return getNamespaceDirectory().global();
}

export function listNamespaces(): string[] {
  return getNamespaceDirectory().listNamespaces();
}

export function register(namespace: string | null, variable: Variable): void {
  forNamespace(namespace).addVariable(variable);
}

export function getVariable(namespace: string | null, name: string): Variable | undefined {
  return forNamespace(namespace).getVariable(name);
}

export function getValue(namespace: string | null, name: string): unknown {
  return forNamespace(namespace).getValue(name);
}

export function visitVariables(namespace: string | null, visitor: VariableVisitor): void {
  forNamespace(namespace).visitVariables(visitor);
}
