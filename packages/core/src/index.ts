// Variables and their decorators
export * from './variables';

// Namespaces, lookup and dumping
export * from './exporter';

// Configuration
export * from './config';

// Logging
export { Logger, logger } from './utils/logger';
export type { LogLevel, LogFormat, LoggerOptions } from './utils/logger';
