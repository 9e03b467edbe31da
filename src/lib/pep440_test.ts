/**
 * Tests for PEP 440 utilities.
 */

import { describe, expect, it } from 'vitest';
import { bump, compare, format, parse } from './pep440.ts';

describe('parse', () => {
  it('parses a final release', () => {
    expect(parse('1.4.0')).toEqual({
      epoch: 0,
      release: [1, 4, 0],
      pre: null,
      post: null,
      dev: null,
    });
  });

  it('parses every segment', () => {
    expect(parse('2!1.0rc3.post1.dev4')).toEqual({
      epoch: 2,
      release: [1, 0],
      pre: { label: 'rc', number: 3 },
      post: 1,
      dev: 4,
    });
  });

  it('rejects non-canonical versions', () => {
    expect(parse('1.0.0-rc1')).toBeNull();
    expect(parse('1.0.0alpha1')).toBeNull();
    expect(parse('v1.0')).toBeNull();
    expect(parse('01.0')).toBeNull();
    expect(parse('1.0+local')).toBeNull();
    expect(parse('')).toBeNull();
  });
});

describe('format', () => {
  it('formats back to the canonical string', () => {
    expect(format({ epoch: 1, release: [1, 2], pre: { label: 'b', number: 2 }, post: 0, dev: null })).toBe(
      '1!1.2b2.post0',
    );
  });
});

describe('compare', () => {
  it('orders by release segments, padding with zeros', () => {
    expect(compare('1.10', '1.9')).toBeGreaterThan(0);
    expect(compare('1.0', '1.0.0')).toBe(0);
  });

  it('orders epochs first', () => {
    expect(compare('1!0.1', '9.9')).toBeGreaterThan(0);
  });

  it('orders dev < pre < final < post', () => {
    const ordered = ['1.0.dev0', '1.0a1', '1.0b1', '1.0rc1.dev1', '1.0rc1', '1.0rc1.post1', '1.0', '1.0.post0.dev1', '1.0.post0'];
    for (let i = 1; i < ordered.length; i++) {
      expect(compare(ordered[i], ordered[i - 1])).toBeGreaterThan(0);
    }
  });

  it('throws for invalid versions', () => {
    expect(() => compare('invalid', '1.0')).toThrow('Invalid versions: invalid, 1.0');
  });
});

describe('bump', () => {
  it('bumps release segments', () => {
    expect(bump('1.4.0', 'major', 'rc')).toBe('2.0.0');
    expect(bump('1.4.0', 'minor', 'rc')).toBe('1.5.0');
    expect(bump('1.4', 'patch', 'rc')).toBe('1.4.1');
    expect(bump('1!1.4.0', 'minor', 'rc')).toBe('1!1.5.0');
  });

  it('finalizes pre-releases and developmental releases', () => {
    expect(bump('2.0.0rc1', 'major', 'rc')).toBe('2.0.0');
    expect(bump('1.3.0b2', 'minor', 'rc')).toBe('1.3.0');
    expect(bump('1.0.1.dev3', 'patch', 'rc')).toBe('1.0.1');
  });

  it('starts and increments pre-releases', () => {
    expect(bump('1.4.0', 'prerelease', 'rc')).toBe('1.4.1rc0');
    expect(bump('1.4.1rc0', 'prerelease', 'rc')).toBe('1.4.1rc1');
    expect(bump('1.4.1a3', 'prerelease', 'b')).toBe('1.4.1b0');
    expect(bump('1.0.1.dev3', 'prerelease', 'a')).toBe('1.0.1a0');
  });

  it('starts and increments post-releases', () => {
    expect(bump('1.4.0', 'post', 'rc')).toBe('1.4.0.post0');
    expect(bump('1.4.0.post0', 'post', 'rc')).toBe('1.4.0.post1');
    expect(bump('1.4.0.post1.dev2', 'post', 'rc')).toBe('1.4.0.post1');
  });
});
