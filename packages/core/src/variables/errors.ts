/**
 * @fileoverview Error classes for the variables module
 */

/**
 * Base error class for variables module
 */
export class VariableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VariableError';
  }
}

/**
 * Thrown when a variable is constructed with missing or invalid parameters
 */
export class InvalidVariableError extends VariableError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidVariableError';
  }
}

/**
 * Thrown when the accessor behind an exported variable fails
 */
export class VariableAccessError extends VariableError {
  constructor(
    public readonly variableName: string,
    public readonly cause?: Error,
  ) {
    super(`Failed to read variable ${variableName}${cause ? `: ${cause.message}` : ''}`);
    this.name = 'VariableAccessError';
  }
}

/**
 * Thrown when a member cannot be turned into a variable
 */
export class UnsupportedMemberError extends VariableError {
  constructor(member: string, reason: string) {
    super(`${member} not supported by export: ${reason}`);
    this.name = 'UnsupportedMemberError';
  }
}

/**
 * Thrown when an instance member is exported as if it were static
 */
export class NonStaticMemberError extends VariableError {
  constructor(member: string, className: string) {
    super(`${member} is not static in ${className}`);
    this.name = 'NonStaticMemberError';
  }
}

/**
 * Thrown when the process-wide namespace directory is initialized twice
 */
export class DirectoryAlreadyInitializedError extends VariableError {
  constructor() {
    super('Namespace directory has already been initialized');
    this.name = 'DirectoryAlreadyInitializedError';
  }
}
