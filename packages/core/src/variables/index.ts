/**
 * @fileoverview Variables module - exported value sources and their decorators
 */

// Types
export type { Clock, Mapping, ExportDescriptor } from './types';
export { systemClock, isMapping, copyMapping } from './types';

// Variable hierarchy
export { Variable } from './variable';
export type { VariableOptions } from './variable';
export { AccessorVariable } from './accessor-variable';
export type { AccessorVariableOptions } from './accessor-variable';
export { ManagedVariable, ManagedVariableBuilder } from './managed-variable';
export type { ManagedVariableOptions } from './managed-variable';
export { ProxyVariable } from './proxy-variable';
export { CachingVariable } from './caching-variable';
export { EntryVariable } from './entry-variable';

// Construction from descriptors
export { createVariable } from './factory';
export type { CreateVariableOptions } from './factory';

// Errors
export {
  VariableError,
  InvalidVariableError,
  VariableAccessError,
  UnsupportedMemberError,
  NonStaticMemberError,
  DirectoryAlreadyInitializedError,
} from './errors';
