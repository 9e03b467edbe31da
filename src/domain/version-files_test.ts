import { describe, expect, it } from 'vitest';
import { findVersions, readProjectVersion, readVersion, writeVersion } from './version-files.ts';
import type { VersionFileSpec } from './version-files.ts';
import { VersionError } from '../lib/error.ts';

const plain: VersionFileSpec = { kind: 'plain', path: 'VERSION' };
const formatted: VersionFileSpec = {
  kind: 'formatted',
  path: 'src/version.ts',
  format: "export const VERSION = '{version}';\n",
};
const pattern: VersionFileSpec = {
  kind: 'pattern',
  path: 'pyproject.toml',
  pattern: '(?<=^version = ")[^"]+',
};

const PYPROJECT = '[project]\nname = "demo"\nversion = "1.4.0"\n\n[tool.x]\nversion = "1.4.0"\n';

describe('plain version files', () => {
  it('reads the trimmed content', () => {
    expect(readVersion(plain, '1.4.0\n')).toBe('1.4.0');
  });

  it('keeps the trailing newline when writing', () => {
    expect(writeVersion(plain, '1.4.0\n', '1.5.0')).toBe('1.5.0\n');
    expect(writeVersion(plain, '1.4.0', '1.5.0')).toBe('1.5.0');
  });

  it('rejects an empty file', () => {
    expect(() => readVersion(plain, '\n')).toThrow('Empty version found in file: VERSION');
  });
});

describe('formatted version files', () => {
  it('reads the version from the template', () => {
    expect(readVersion(formatted, "export const VERSION = '1.4.0';\n")).toBe('1.4.0');
  });

  it('rejects content that does not follow the template', () => {
    expect(findVersions(formatted, 'export const VERSION = "1.4.0";\n')).toEqual([]);
    expect(() => readVersion(formatted, '')).toThrow('No version found in file: src/version.ts');
  });

  it('renders the whole file', () => {
    expect(writeVersion(formatted, 'anything', '1.5.0')).toBe("export const VERSION = '1.5.0';\n");
  });

  it('renders every template value', () => {
    const release: VersionFileSpec = {
      kind: 'formatted',
      path: 'RELEASE',
      format: '{version} (after {previous}, {source} into {target})\n',
    };
    const values = { version: 'ignored', previous: '1.4.0', source: 'develop', target: 'main' };

    const written = writeVersion(release, '1.4.0 (after 1.3.0, develop into main)\n', '1.5.0', values);

    expect(written).toBe('1.5.0 (after 1.4.0, develop into main)\n');
    expect(readVersion(release, written)).toBe('1.5.0');
  });
});

describe('pattern version files', () => {
  it('reads every match', () => {
    expect(findVersions(pattern, PYPROJECT)).toEqual(['1.4.0', '1.4.0']);
    expect(readVersion(pattern, PYPROJECT)).toBe('1.4.0');
  });

  it('rejects inconsistent matches', () => {
    const content = PYPROJECT.replace('version = "1.4.0"\n\n', 'version = "1.3.0"\n\n');
    expect(() => readVersion(pattern, content)).toThrow(
      'Multiple inconsistent versions found in file: pyproject.toml: 1.3.0, 1.4.0',
    );
  });

  it('replaces every match', () => {
    expect(writeVersion(pattern, PYPROJECT, '1.5.0')).toBe(
      '[project]\nname = "demo"\nversion = "1.5.0"\n\n[tool.x]\nversion = "1.5.0"\n',
    );
  });
});

describe('readProjectVersion', () => {
  it('returns the version shared by every file', () => {
    expect(
      readProjectVersion([
        [plain, '1.4.0\n'],
        [pattern, PYPROJECT],
      ]),
    ).toBe('1.4.0');
  });

  it('rejects files that disagree', () => {
    expect(() =>
      readProjectVersion([
        [plain, '1.3.9\n'],
        [pattern, PYPROJECT],
      ]),
    ).toThrow('Inconsistent versions: VERSION has 1.3.9, pyproject.toml has 1.4.0');
  });

  it('requires at least one file', () => {
    try {
      readProjectVersion([]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(VersionError);
      if (error instanceof VersionError) expect(error.code).toBe('NO_VERSION_FILE');
    }
  });
});
