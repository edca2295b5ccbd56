/**
 * Attribute locator: exports the `@Export` members of objects and classes
 * through the explicit registration API of `@varexport/core`
 */

import { NonStaticMemberError } from '@varexport/core';
import type { ExportDescriptor, VarExporter, Variable } from '@varexport/core';
import { getExportOptions, getExportedMembers } from './decorators';
import type { ExportOptions } from './decorators';
import { isStaticMember, resolveMember } from './members';

export type ExportableClass = abstract new (...args: never[]) => object;

export interface ExportMemberOptions {
  /** Prepended to the variable name, e.g. `mywidget-` */
  prefix?: string;
  /** Name to use when the member has no `@Export` name */
  name?: string;
}

function describeMember(
  holder: object,
  member: string,
  label: string,
  options: ExportOptions | undefined,
  suppliedName?: string,
): ExportDescriptor {
  const { kind, read } = resolveMember(holder, member, label);
  const name = options?.name ? options.name : suppliedName ? suppliedName : member;
  return {
    name,
    doc: options?.doc ?? '',
    tags: options?.tags ?? [],
    expand: options?.expand ?? false,
    cacheTimeoutMs: options?.cacheTimeoutMs,
    member: kind,
    read,
  };
}

function className(ctor: object): string {
  const name: unknown = Reflect.get(ctor, 'name');
  return typeof name === 'string' && name.length > 0 ? name : '<anonymous>';
}

/**
 * Descriptors for the decorated statics of `ctor` and its superclasses
 */
export function locateStaticExports(ctor: ExportableClass): ExportDescriptor[] {
  return getExportedMembers(ctor).map(({ member, options }) =>
    describeMember(ctor, member, `${className(ctor)}.${member}`, options),
  );
}

/**
 * Descriptors for every decorated member visible on `obj`, statics of its
 * class included
 */
export function locateInstanceExports(obj: object): ExportDescriptor[] {
  const ctor: unknown = Reflect.get(obj, 'constructor');
  const name = typeof ctor === 'function' ? className(ctor) : 'object';

  const descriptors = getExportedMembers(Object.getPrototypeOf(obj)).map(({ member, options }) =>
    describeMember(obj, member, `${name}#${member}`, options),
  );

  if (typeof ctor === 'function') {
    for (const { member, options } of getExportedMembers(ctor)) {
      descriptors.push(describeMember(ctor, member, `${name}.${member}`, options));
    }
  }
  return descriptors;
}

/**
 * Export all `@Export` members of an object instance, including statics
 */
export function exportObject(exporter: VarExporter, obj: object, prefix = ''): Variable[] {
  return locateInstanceExports(obj).map((descriptor) => exporter.exportAccessor(descriptor, prefix));
}

/**
 * Export all `@Export` static members of a class
 */
export function exportClass(exporter: VarExporter, ctor: ExportableClass, prefix = ''): Variable[] {
  return locateStaticExports(ctor).map((descriptor) => exporter.exportAccessor(descriptor, prefix));
}

/**
 * Export one member of an object, decorated or not. Useful for code that
 * cannot be annotated.
 */
export function exportMember(
  exporter: VarExporter,
  obj: object,
  member: string,
  options: ExportMemberOptions = {},
): Variable {
  const descriptor = describeMember(obj, member, member, getExportOptions(obj, member), options.name);
  return exporter.exportAccessor(descriptor, options.prefix);
}

/**
 * Export one static member of a class, decorated or not.
 *
 * @throws {NonStaticMemberError} if `member` belongs to instances
 */
export function exportStaticMember(
  exporter: VarExporter,
  ctor: ExportableClass,
  member: string,
  options: ExportMemberOptions = {},
): Variable {
  const proto: unknown = Reflect.get(ctor, 'prototype');
  const onInstances =
    typeof proto === 'object' &&
    proto !== null &&
    (member in proto || getExportOptions(proto, member) !== undefined);
  if (!isStaticMember(ctor, member) && onInstances) {
    throw new NonStaticMemberError(member, className(ctor));
  }
  return exportMember(exporter, ctor, member, options);
}
