/**
 * @fileoverview Unit tests for AccessorVariable and createVariable
 */

import { describe, it, expect } from 'vitest';
import { AccessorVariable } from '../../../src/variables/accessor-variable';
import { CachingVariable } from '../../../src/variables/caching-variable';
import { createVariable } from '../../../src/variables/factory';
import { InvalidVariableError, VariableAccessError } from '../../../src/variables/errors';

describe('AccessorVariable', () => {
  it('should read the accessor on every call', () => {
    let hits = 1;
    const variable = new AccessorVariable({ name: 'hits', read: () => hits });

    expect(variable.getValue()).toBe(1);
    hits = 7;
    expect(variable.getValue()).toBe(7);
  });

  it('should have no last-updated time and not be live', () => {
    const variable = new AccessorVariable({ name: 'hits', read: () => 1 });

    expect(variable.getLastUpdated()).toBeNull();
    expect(variable.isLive()).toBe(false);
  });

  it('should surface accessor failures as VariableAccessError', () => {
    const failure = new Error('connection refused');
    const variable = new AccessorVariable({
      name: 'db-status',
      read: (): string => {
        throw failure;
      },
    });

    let caught: unknown;
    try {
      variable.getValue();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(VariableAccessError);
    expect(caught).toMatchObject({
      message: 'Failed to read variable db-status: connection refused',
      variableName: 'db-status',
      cause: failure,
    });
  });

  it('should wrap non-Error throws', () => {
    const variable = new AccessorVariable({
      name: 'odd',
      read: (): string => {
        throw 'plain string';
      },
    });

    expect(() => variable.getValue()).toThrow('Failed to read variable odd: plain string');
  });

  it('should only expand when asked to', () => {
    const plain = new AccessorVariable({ name: 'a', read: () => ({ x: 1 }) });
    const expanding = new AccessorVariable({ name: 'b', expand: true, read: () => ({ x: 1 }) });

    expect(plain.isExpandable()).toBe(false);
    expect(expanding.isExpandable()).toBe(true);
  });

  it('should reject an empty name', () => {
    expect(() => new AccessorVariable({ name: '', read: () => 1 })).toThrow(
      'Variable name must be a non-empty string',
    );
  });
});

describe('createVariable', () => {
  it('should build an accessor variable with the prefixed name', () => {
    const variable = createVariable(
      { name: 'hits', doc: 'requests served', tags: ['http'], read: () => 10 },
      { prefix: 'web-' },
    );

    expect(variable).toBeInstanceOf(AccessorVariable);
    expect(variable.getName()).toBe('web-hits');
    expect(variable.getDoc()).toBe('requests served');
    expect([...variable.getTags()]).toEqual(['http']);
    expect(variable.getValue()).toBe(10);
  });

  it('should wrap in a CachingVariable when a cache timeout is given', () => {
    let now = 0;
    let hits = 1;
    const variable = createVariable(
      { name: 'hits', cacheTimeoutMs: 100, read: () => hits },
      { clock: () => now },
    );

    expect(variable).toBeInstanceOf(CachingVariable);
    expect(variable.getValue()).toBe(1);
    hits = 2;
    now = 100;
    expect(variable.getValue()).toBe(1);
    now = 101;
    expect(variable.getValue()).toBe(2);
  });

  it('should not cache for a zero timeout', () => {
    const variable = createVariable({ name: 'hits', cacheTimeoutMs: 0, read: () => 1 });
    expect(variable).toBeInstanceOf(AccessorVariable);
  });

  it('should carry the expand flag', () => {
    const variable = createVariable({ name: 'sizes', expand: true, read: () => new Map([['a', 1]]) });

    expect(variable.isExpandable()).toBe(true);
    expect([...variable.expand().keys()]).toEqual(['a']);
  });

  it('should reject an empty name without a prefix', () => {
    expect(() => createVariable({ name: '', read: () => 1 })).toThrow(InvalidVariableError);
  });
});
