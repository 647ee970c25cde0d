/**
 * Unit tests for the layer merger
 */

import { describe, it, expect } from 'vitest';

import { deepMergeLayers, firstPresent, mergeLayers } from '../../src/config/merger.js';

describe('mergeLayers()', () => {
  it('should let later layers replace earlier keys', () => {
    const merged = mergeLayers({ a: 1, b: 1 }, { b: 2, c: 2 }, { c: 3 });

    expect(merged).toEqual({ a: 1, b: 2, c: 3 });
  });

  it('should return an empty mapping without layers', () => {
    expect(mergeLayers()).toEqual({});
  });

  it('should let an explicit null replace a value', () => {
    expect(mergeLayers({ availability_zone: 'us-east-1a' }, { availability_zone: null })).toEqual({
      availability_zone: null,
    });
  });

  it('should replace arrays instead of concatenating them', () => {
    const merged = mergeLayers({ security_groups: ['base'] }, { security_groups: ['web'] });

    expect(merged['security_groups']).toEqual(['web']);
  });

  it('should replace nested objects instead of merging them', () => {
    const merged = mergeLayers({ tags: { team: 'ops', tier: 'db' } }, { tags: { team: 'web' } });

    expect(merged['tags']).toEqual({ team: 'web' });
  });

  it('should copy values out of the layers', () => {
    const tags = { team: 'web' };
    const merged = mergeLayers({ tags });

    expect(merged['tags']).toEqual(tags);
    expect(merged['tags']).not.toBe(tags);
  });

  it('should not modify its inputs', () => {
    const base = { a: 1 };
    const top = { a: 2, b: 2 };
    mergeLayers(base, top);

    expect(base).toEqual({ a: 1 });
    expect(top).toEqual({ a: 2, b: 2 });
  });
});

describe('deepMergeLayers()', () => {
  it('should merge nested mappings key by key', () => {
    const merged = deepMergeLayers(
      { tags: { team: 'ops', tier: 'db' }, count: 1 },
      { tags: { team: 'web' } },
      { tags: { owner: 'alice' }, count: 2 }
    );

    expect(merged).toEqual({ tags: { team: 'web', tier: 'db', owner: 'alice' }, count: 2 });
  });

  it('should replace arrays', () => {
    expect(deepMergeLayers({ security_groups: ['base'] }, { security_groups: ['web'] })).toEqual({
      security_groups: ['web'],
    });
  });

  it('should let a scalar replace a mapping and a mapping replace a scalar', () => {
    expect(deepMergeLayers({ tags: { team: 'ops' } }, { tags: null })).toEqual({ tags: null });
    expect(deepMergeLayers({ tags: 'none' }, { tags: { team: 'ops' } })).toEqual({
      tags: { team: 'ops' },
    });
  });

  it('should not modify its inputs', () => {
    const base = { tags: { team: 'ops' } };
    const top = { tags: { tier: 'db' } };
    const merged = deepMergeLayers(base, top);

    expect(base).toEqual({ tags: { team: 'ops' } });
    expect(top).toEqual({ tags: { tier: 'db' } });
    expect(merged['tags']).not.toBe(top.tags);
  });
});

describe('firstPresent()', () => {
  it('should skip null and undefined', () => {
    expect(firstPresent(undefined, null, 'ebs', 'instance_store')).toBe('ebs');
  });

  it('should return undefined when nothing is present', () => {
    expect(firstPresent(undefined, null)).toBeUndefined();
  });

  it('should keep falsy values that are present', () => {
    expect(firstPresent(0, 'x')).toBe(0);
    expect(firstPresent('', 'x')).toBe('');
    expect(firstPresent(false, 'x')).toBe(false);
  });
});
