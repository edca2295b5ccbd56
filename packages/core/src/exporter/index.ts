/**
 * @fileoverview Exporter module - namespaces, traversal and dump formats
 */

export { VarExporter } from './var-exporter';
export type { VariableVisitor, ExporterHost, VarExporterOptions } from './var-exporter';

export {
  NamespaceDirectory,
  GLOBAL_NAMESPACE,
  START_TIME_VARIABLE_NAME,
  createStartTimeVariable,
  formatStartTime,
} from './namespace-directory';
export type { NamespaceDirectoryOptions } from './namespace-directory';

export {
  initializeNamespaceDirectory,
  getNamespaceDirectory,
  forNamespace,
  globalExporter,
  listNamespaces,
  register,
  getVariable,
  getValue,
  visitVariables,
} from './api';

export {
  escapePropertyKey,
  escapePropertyValue,
  stringifyValue,
  formatPropertyLines,
  formatJsonField,
} from './dump';
