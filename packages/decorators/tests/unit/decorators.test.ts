/**
 * Tests for the @Export decorator metadata
 */

import { describe, it, expect } from 'vitest';
import { UnsupportedMemberError } from '@varexport/core';
import {
  Export,
  getExportOptions,
  getExportedMembers,
  getOwnExportedMembers,
} from '../../src/decorators';

describe('@Export', () => {
  class Base {
    @Export({ doc: 'from the base class' })
    shared = 1;

    @Export()
    inherited = 2;
  }

  class Derived extends Base {
    @Export({ doc: 'redeclared' })
    shared = 10;

    @Export({ name: 'jobs-started', cacheTimeoutMs: 500, tags: ['jobs'] })
    static started = 3;

    @Export({ expand: true })
    get byState(): Record<string, number> {
      return { idle: 1 };
    }
  }

  it('should store the options per member', () => {
    expect(getExportOptions(Base.prototype, 'shared')).toEqual({ doc: 'from the base class' });
    expect(getExportOptions(Derived, 'started')).toEqual({
      name: 'jobs-started',
      cacheTimeoutMs: 500,
      tags: ['jobs'],
    });
    expect(getExportOptions(Derived.prototype, 'byState')).toEqual({ expand: true });
  });

  it('should return undefined for undecorated members', () => {
    expect(getExportOptions(Base.prototype, 'missing')).toBeUndefined();
  });

  it('should list members decorated on the target itself', () => {
    expect([...getOwnExportedMembers(Derived.prototype)].sort()).toEqual(['byState', 'shared']);
    expect(getOwnExportedMembers(Derived)).toEqual(['started']);
    expect([...getOwnExportedMembers(Base.prototype)].sort()).toEqual(['inherited', 'shared']);
  });

  it('should list inherited members once, nearest declaration first', () => {
    const members = getExportedMembers(Derived.prototype);

    expect(members.map((m) => m.member).sort()).toEqual(['byState', 'inherited', 'shared']);
    expect(members.find((m) => m.member === 'shared')?.options).toEqual({ doc: 'redeclared' });
  });

  it('should reject symbol-keyed members', () => {
    const decorate = Export();
    expect(() => decorate({}, Symbol('hidden'))).toThrow(UnsupportedMemberError);
  });
});
