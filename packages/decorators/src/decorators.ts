import 'reflect-metadata';
import { UnsupportedMemberError } from '@varexport/core';

export const EXPORT_METADATA_KEY = 'varexport:export';
export const EXPORTED_MEMBERS_KEY = 'varexport:exported_members';

/**
 * Export options stored on a decorated member
 */
export interface ExportOptions {
  /** Variable name (default: the member name) */
  name?: string;
  /** Documentation shown in dumps */
  doc?: string;
  /** Present a map value's entries as `<name>#<key>` sub-variables */
  expand?: boolean;
  /** Cache the value for this many milliseconds (default: read on every access) */
  cacheTimeoutMs?: number;
  tags?: string[];
}

/**
 * Mark a field, getter or zero-argument method for export.
 *
 * @example
 * ```typescript
 * class Worker {
 *   @Export({ doc: 'jobs waiting to run' })
 *   queueDepth = 0;
 *
 *   @Export({ name: 'uptime-ms', cacheTimeoutMs: 1000 })
 *   uptime(): number { ... }
 * }
 * ```
 */
export function Export(options: ExportOptions = {}) {
  return (target: object, propertyKey: string | symbol, _descriptor?: PropertyDescriptor): void => {
    if (typeof propertyKey !== 'string') {
      throw new UnsupportedMemberError(String(propertyKey), 'symbol-keyed members cannot be exported');
    }
    Reflect.defineMetadata(EXPORT_METADATA_KEY, { ...options }, target, propertyKey);

    const members = getOwnExportedMembers(target);
    if (!members.includes(propertyKey)) {
      Reflect.defineMetadata(EXPORTED_MEMBERS_KEY, [...members, propertyKey], target);
    }
  };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isExportOptions(value: unknown): value is ExportOptions {
  return typeof value === 'object' && value !== null;
}

/**
 * Members decorated directly on `target` (a prototype or a constructor)
 */
export function getOwnExportedMembers(target: object): string[] {
  const members: unknown = Reflect.getOwnMetadata(EXPORTED_MEMBERS_KEY, target);
  return isStringArray(members) ? members : [];
}

/**
 * Decorated members of `target` and everything it inherits from, nearest first
 */
export function getExportedMembers(target: object): Array<{ member: string; options: ExportOptions }> {
  const seen = new Set<string>();
  const result: Array<{ member: string; options: ExportOptions }> = [];

  for (let current: object | null = target; current !== null; current = Object.getPrototypeOf(current)) {
    if (current === Object.prototype || current === Function.prototype) {
      break;
    }
    for (const member of getOwnExportedMembers(current)) {
      if (seen.has(member)) continue;
      seen.add(member);
      const options = getExportOptions(current, member);
      if (options) {
        result.push({ member, options });
      }
    }
  }

  return result;
}

/**
 * Options of `@Export` on a member, if it has the decorator
 */
export function getExportOptions(target: object, member: string): ExportOptions | undefined {
  const options: unknown = Reflect.getMetadata(EXPORT_METADATA_KEY, target, member);
  return isExportOptions(options) ? options : undefined;
}
