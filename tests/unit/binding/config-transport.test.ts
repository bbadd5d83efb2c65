import { describe, it, expect } from 'vitest';

import { flattenConfig, unflattenConfig } from '@/binding/index.js';

describe('flattenConfig()', () => {
  it('should emit alternating keys and values with the pair count', () => {
    expect(flattenConfig({ root: '/tmp', max_bytes: '64' })).toEqual({
      params: ['root', '/tmp', 'max_bytes', '64'],
      count: 2,
    });
  });

  it('should flatten an empty map to no parameters', () => {
    expect(flattenConfig({})).toEqual({ params: [], count: 0 });
  });
});

describe('unflattenConfig()', () => {
  it('should rebuild the config map', () => {
    expect(unflattenConfig('memory', ['root', '/tmp', 'max_bytes', '64'], 2)).toEqual({
      root: '/tmp',
      max_bytes: '64',
    });
  });

  it('should keep the last value for a repeated key', () => {
    expect(unflattenConfig('memory', ['root', '/a', 'root', '/b'], 2)).toEqual({ root: '/b' });
  });

  it('should accept zero pairs', () => {
    expect(unflattenConfig('memory', [], 0)).toEqual({});
  });

  it('should keep keys that look like object internals as plain entries', () => {
    const config = unflattenConfig('memory', ['__proto__', 'x'], 1);

    expect(Object.keys(config)).toEqual(['__proto__']);
    expect(config['__proto__']).toBe('x');
  });

  it('should reject a count that does not match the parameter list', () => {
    expect(() => unflattenConfig('memory', ['root', '/tmp'], 2)).toThrow(
      'Invalid configuration for scheme memory: expected 4 parameters for 2 pairs, got 2'
    );
  });

  it('should reject an odd parameter list', () => {
    expect(() => unflattenConfig('fs', ['root', '/tmp', 'dangling'], 1)).toThrow(
      'expected 2 parameters for 1 pairs, got 3'
    );
  });

  it.each([-1, 1.5, Number.NaN])('should reject pair count %s', (count) => {
    expect(() => unflattenConfig('memory', [], count)).toThrow(
      `pair count must be a non-negative integer, got ${count}`
    );
  });

  it('should reject an empty key', () => {
    expect(() => unflattenConfig('memory', ['', 'value'], 1)).toThrow('empty key at position 0');
  });
});
