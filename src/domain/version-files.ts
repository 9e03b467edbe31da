/**
 * Version files - files that embed the project version.
 *
 * Three kinds:
 * - plain: the whole file is the version (`VERSION`)
 * - formatted: the whole file is rendered from a template
 *   (`export const VERSION = '{version}';\n`)
 * - pattern: edited in place, every regex match is the version
 *   (`(?<=^version = ")[^"]+` in pyproject.toml)
 *
 * Pure functions, no I/O.
 */

import { VersionError } from '../lib/error.ts';
import { render, toPattern } from './template.ts';
import type { TemplateValues } from './template.ts';

export type VersionFileSpec =
  | { kind: 'plain'; path: string }
  | { kind: 'formatted'; path: string; format: string }
  | { kind: 'pattern'; path: string; pattern: string };

/**
 * All versions found in the file content.
 */
export function findVersions(spec: VersionFileSpec, content: string): string[] {
  switch (spec.kind) {
    case 'plain':
      return [content.trim()];
    case 'formatted': {
      const match = new RegExp(`^${toPattern(spec.format)}\\s*$`, 's').exec(content);
      return match?.[1] !== undefined ? [match[1]] : [];
    }
    case 'pattern':
      return Array.from(content.matchAll(new RegExp(spec.pattern, 'gm')), (m) => m[0]);
  }
}

/**
 * The single version embedded in the file.
 */
export function readVersion(spec: VersionFileSpec, content: string): string {
  const versions = findVersions(spec, content);
  if (versions.length === 0) {
    throw new VersionError(`No version found in file: ${spec.path}`, 'VERSION_NOT_FOUND', {
      path: spec.path,
    });
  }
  if (!versions.every((v) => v === versions[0])) {
    throw new VersionError(
      `Multiple inconsistent versions found in file: ${spec.path}: ${versions.join(', ')}`,
      'VERSION_INCONSISTENT',
      { path: spec.path, versions },
    );
  }
  if (versions[0] === '') {
    throw new VersionError(`Empty version found in file: ${spec.path}`, 'VERSION_EMPTY', {
      path: spec.path,
    });
  }
  return versions[0];
}

/**
 * File content with the version replaced. A formatted file also gets the
 * other template values (`{previous}`, `{source}`, `{target}`).
 */
export function writeVersion(
  spec: VersionFileSpec,
  content: string,
  version: string,
  values: TemplateValues = {},
): string {
  switch (spec.kind) {
    case 'plain': {
      const trailing = /\s*$/.exec(content)?.[0] ?? '';
      return version + trailing;
    }
    case 'formatted':
      return render(spec.format, { ...values, version });
    case 'pattern':
      return content.replace(new RegExp(spec.pattern, 'gm'), () => version);
  }
}

/**
 * The version shared by every file. Files are given as [spec, content] pairs.
 */
export function readProjectVersion(files: [VersionFileSpec, string][]): string {
  if (files.length === 0) {
    throw new VersionError(
      'No version file configured. Add "versionFiles" to .relcut/config.json.',
      'NO_VERSION_FILE',
    );
  }

  const found = files.map(([spec, content]) => ({ path: spec.path, version: readVersion(spec, content) }));
  const first = found[0];
  const mismatch = found.find((f) => f.version !== first.version);
  if (mismatch) {
    throw new VersionError(
      `Inconsistent versions: ${first.path} has ${first.version}, ${mismatch.path} has ${mismatch.version}`,
      'VERSION_INCONSISTENT',
      { versions: found },
    );
  }
  return first.version;
}
