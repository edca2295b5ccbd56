/**
 * @fileoverview Text formats for dumping variables
 *
 * - Property lines: `name=value`, escaped so the output loads as a
 *   key=value properties file
 * - JSON-ish object: `{name='value', ...}`, unescaped, values stringified
 */

import type { Variable } from '../variables/variable';
import { isMapping, copyMapping } from '../variables/types';

function escapeProperty(text: string, escapeSpace: boolean): string {
  let out = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    const code = text.charCodeAt(i);

    if (code > 61 && code < 127) {
      out += ch === '\\' ? '\\\\' : ch;
      continue;
    }

    switch (ch) {
      case ' ':
        out += i === 0 || escapeSpace ? '\\ ' : ' ';
        break;
      case '\t':
        out += '\\t';
        break;
      case '\n':
        out += '\\n';
        break;
      case '\r':
        out += '\\r';
        break;
      case '\f':
        out += '\\f';
        break;
      case '=':
      case ':':
      case '#':
      case '!':
        out += `\\${ch}`;
        break;
      default:
        if (code < 0x20 || code > 0x7e) {
          out += `\\u${code.toString(16).toUpperCase().padStart(4, '0')}`;
        } else {
          out += ch;
        }
    }
  }
  return out;
}

export function escapePropertyKey(key: string): string {
  return escapeProperty(key, true);
}

export function escapePropertyValue(value: string): string {
  return escapeProperty(value, false);
}

/**
 * String form of an exported value. Mappings render as `{k=v, ...}` and
 * arrays as `[a, b]`, recursively. A container met again inside itself
 * renders as `(this Map)` or `(this Collection)`.
 */
export function stringifyValue(value: unknown, seen: ReadonlySet<unknown> = new Set()): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    if (seen.has(value)) {
      return '(this Collection)';
    }
    const inner = new Set(seen).add(value);
    return `[${value.map((item: unknown) => stringifyValue(item, inner)).join(', ')}]`;
  }
  if (isMapping(value)) {
    if (seen.has(value)) {
      return '(this Map)';
    }
    const inner = new Set(seen).add(value);
    const parts: string[] = [];
    for (const [key, entry] of copyMapping(value)) {
      parts.push(`${String(key)}=${stringifyValue(entry, inner)}`);
    }
    return `{${parts.join(', ')}}`;
  }
  return String(value);
}

/**
 * Property-file lines for one variable, each terminated by a newline
 */
export function formatPropertyLines(variable: Variable, includeDoc: boolean): string {
  let out = '';
  const doc = variable.getDoc();
  if (includeDoc && doc.length > 0) {
    out += `# ${doc.replace(/\r?\n/g, ' ')}\n`;
  }
  out += `${escapePropertyKey(variable.getName())}=${escapePropertyValue(stringifyValue(variable.getValue()))}\n`;
  return out;
}

export function formatJsonField(variable: Variable): string {
  return `${variable.getName()}='${stringifyValue(variable.getValue())}'`;
}
