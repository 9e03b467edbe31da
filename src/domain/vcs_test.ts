import { describe, expect, it } from 'vitest';
import { hasConflictMarkers, isValidTagName } from './vcs.ts';

describe('hasConflictMarkers', () => {
  it('finds a conflict block', () => {
    expect(hasConflictMarkers('<<<<<<< HEAD\nours\n=======\ntheirs\n>>>>>>> develop\n')).toBe(true);
    expect(hasConflictMarkers('a\r\n<<<<<<< HEAD\r\nours\r\n=======\r\ntheirs\r\n>>>>>>> develop\r\n')).toBe(true);
  });

  it('finds a block with a common ancestor section', () => {
    const content = '<<<<<<< HEAD\nours\n||||||| base\nbase\n=======\ntheirs\n>>>>>>> develop\n';
    expect(hasConflictMarkers(content)).toBe(true);
  });

  it('ignores heading underlines', () => {
    expect(hasConflictMarkers('Changelog\n=======\n\n1.4.1\n-----\n')).toBe(false);
    expect(hasConflictMarkers('Title\n=======\nText\n>>>>>>> quoted\n')).toBe(false);
  });

  it('ignores markers out of order or incomplete', () => {
    expect(hasConflictMarkers('>>>>>>> develop\n=======\n<<<<<<< HEAD\n')).toBe(false);
    expect(hasConflictMarkers('<<<<<<< HEAD\nours\n=======\ntheirs\n')).toBe(false);
    expect(hasConflictMarkers('<<<<<<<<< not a marker\n=======\n>>>>>>> develop\n')).toBe(false);
  });
});

describe('isValidTagName', () => {
  it('accepts ordinary tag names', () => {
    expect(isValidTagName('v1.4.1')).toBe(true);
    expect(isValidTagName('release/1.4.1')).toBe(true);
  });

  it('rejects names git refuses', () => {
    expect(isValidTagName('v1..4')).toBe(false);
    expect(isValidTagName('v 1.4')).toBe(false);
    expect(isValidTagName('v1.4.')).toBe(false);
    expect(isValidTagName('.v1')).toBe(false);
    expect(isValidTagName('v1.lock')).toBe(false);
  });
});
