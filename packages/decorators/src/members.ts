/**
 * Resolves a named member of an object or class into a read function
 */

import { UnsupportedMemberError } from '@varexport/core';
import type { ExportDescriptor } from '@varexport/core';

export type MemberKind = NonNullable<ExportDescriptor['member']>;

export interface ResolvedMember {
  kind: MemberKind;
  read: () => unknown;
}

function findDescriptor(holder: object, member: string): PropertyDescriptor | undefined {
  for (let current: object | null = holder; current !== null; current = Object.getPrototypeOf(current)) {
    const descriptor = Object.getOwnPropertyDescriptor(current, member);
    if (descriptor) {
      return descriptor;
    }
  }
  return undefined;
}

/**
 * Decide how to read `member` on `holder`.
 *
 * @throws {UnsupportedMemberError} for missing members, setter-only
 *   accessors and methods that take arguments
 */
export function resolveMember(holder: object, member: string, label: string): ResolvedMember {
  const descriptor = findDescriptor(holder, member);
  if (!descriptor) {
    throw new UnsupportedMemberError(label, 'no such member');
  }

  if (descriptor.get) {
    return { kind: 'getter', read: () => Reflect.get(holder, member) };
  }
  if (descriptor.set) {
    throw new UnsupportedMemberError(label, 'accessor has no getter');
  }

  const value: unknown = descriptor.value;
  if (typeof value === 'function') {
    if (value.length > 0) {
      throw new UnsupportedMemberError(label, `method takes ${value.length} argument(s)`);
    }
    return {
      kind: 'method',
      read: () => {
        const method: unknown = Reflect.get(holder, member);
        if (typeof method !== 'function') {
          throw new TypeError(`${label} is no longer a method`);
        }
        return Reflect.apply(method, holder, []);
      },
    };
  }

  return { kind: 'field', read: () => Reflect.get(holder, member) };
}

/**
 * Whether `member` is defined on `ctor` or a superclass constructor
 */
export function isStaticMember(ctor: object, member: string): boolean {
  for (let current: object | null = ctor; current !== null; current = Object.getPrototypeOf(current)) {
    if (current === Function.prototype) {
      return false;
    }
    if (Object.prototype.hasOwnProperty.call(current, member)) {
      return true;
    }
  }
  return false;
}
