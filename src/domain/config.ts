/**
 * Configuration management for relcut.
 *
 * Reads .relcut/config.json and provides sensible defaults.
 * Convention over configuration - only the version files are required.
 */

import { ConfigError } from '../lib/error.ts';
import { isBumpKind, isSchemeName } from './types.ts';
import type { BumpKind, SchemeName } from './types.ts';
import { render, unknownPlaceholders } from './template.ts';
import type { VersionFileSpec } from './version-files.ts';
import { isValidTagName } from './vcs.ts';

export const CONFIG_FILE = '.relcut/config.json';

/**
 * relcut configuration schema.
 */
export interface RelcutConfig {
  /** Branch the release is cut from (default: develop) */
  sourceBranch: string;
  /** Branch the release is merged into and tagged on (default: main) */
  targetBranch: string;
  scheme: SchemeName;
  /** Prerelease identifier (default: rc) */
  preid: string;
  /** Bump kind when --bump is not given (default: patch) */
  defaultBump: BumpKind;
  versionFiles: VersionFileSpec[];
  merge: { message: string; fastForward: boolean };
  commit: { message: string; signOff: boolean; gpgSign: boolean };
  tag: { format: string; message: string; annotate: boolean; gpgSign: boolean };
  /** Keep the release record after completion or abort */
  keepRecord: boolean;
  /** Age after which status warns about an in-progress release */
  staleAfterDays: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: RelcutConfig = {
  sourceBranch: 'develop',
  targetBranch: 'main',
  scheme: 'semver',
  preid: 'rc',
  defaultBump: 'patch',
  versionFiles: [],
  merge: { message: "Merge branch '{source}' into {target}", fastForward: false },
  commit: { message: 'bump: version {version}', signOff: false, gpgSign: false },
  tag: { format: 'v{version}', message: 'version {version}', annotate: true, gpgSign: false },
  keepRecord: false,
  staleAfterDays: 14,
};

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(field: string, expected: string, value: unknown): ConfigError {
  return new ConfigError(`Invalid config: ${field} must be ${expected}`, 'CONFIG_VALIDATION_ERROR', {
    field,
    value,
  });
}

function readString(data: Json, key: string, field: string, fallback: string): string {
  if (!(key in data)) return fallback;
  const value = data[key];
  if (typeof value !== 'string' || value === '') {
    throw invalid(field, 'a non-empty string', value);
  }
  return value;
}

function readBoolean(data: Json, key: string, field: string, fallback: boolean): boolean {
  if (!(key in data)) return fallback;
  const value = data[key];
  if (typeof value !== 'boolean') {
    throw invalid(field, 'a boolean', value);
  }
  return value;
}

function readSection(data: Json, key: string): Json {
  if (!(key in data)) return {};
  const value = data[key];
  if (!isObject(value)) {
    throw invalid(key, 'an object', value);
  }
  return value;
}

function readTemplate(data: Json, key: string, field: string, fallback: string): string {
  const template = readString(data, key, field, fallback);
  const unknown = unknownPlaceholders(template);
  if (unknown.length > 0) {
    throw new ConfigError(
      `Invalid config: ${field} uses unknown placeholder {${unknown[0]}}`,
      'CONFIG_VALIDATION_ERROR',
      { field, value: template },
    );
  }
  return template;
}

function parseVersionFile(value: unknown, index: number): VersionFileSpec {
  const field = `versionFiles[${index}]`;
  if (typeof value === 'string' && value !== '') {
    return { kind: 'plain', path: value };
  }
  if (!isObject(value)) {
    throw invalid(field, 'a path or an object with a path', value);
  }

  const path = readString(value, 'path', `${field}.path`, '');
  if (path === '') {
    throw invalid(`${field}.path`, 'a non-empty string', value.path);
  }
  if ('format' in value && 'pattern' in value) {
    throw new ConfigError(
      `Invalid config: ${field} format and pattern fields are exclusive`,
      'CONFIG_VALIDATION_ERROR',
      { field, value },
    );
  }
  if ('format' in value) {
    const format = readTemplate(value, 'format', `${field}.format`, '');
    if (!format.includes('{version}')) {
      throw invalid(`${field}.format`, 'a template containing {version}', format);
    }
    return { kind: 'formatted', path, format };
  }
  if ('pattern' in value) {
    const pattern = readString(value, 'pattern', `${field}.pattern`, '');
    try {
      new RegExp(pattern, 'gm');
    } catch (error) {
      throw invalid(`${field}.pattern`, `a valid regular expression (${String(error)})`, pattern);
    }
    return { kind: 'pattern', path, pattern };
  }
  return { kind: 'plain', path };
}

/**
 * Parse and validate configuration from JSON content.
 */
export function parseConfig(content: string): RelcutConfig {
  let parsed: unknown;

  try {
    parsed = JSON.parse(content);
  } catch {
    throw new ConfigError(`Invalid ${CONFIG_FILE}: not valid JSON`, 'CONFIG_PARSE_ERROR');
  }

  if (!isObject(parsed)) {
    throw new ConfigError(`Invalid ${CONFIG_FILE}: expected an object`, 'CONFIG_PARSE_ERROR');
  }

  const scheme = readString(parsed, 'scheme', 'scheme', DEFAULT_CONFIG.scheme);
  if (!isSchemeName(scheme)) {
    throw invalid('scheme', '"semver" or "pep440"', scheme);
  }

  const defaultBump = readString(parsed, 'defaultBump', 'defaultBump', DEFAULT_CONFIG.defaultBump);
  if (!isBumpKind(defaultBump)) {
    throw invalid('defaultBump', 'a bump kind', defaultBump);
  }

  const preid = readString(parsed, 'preid', 'preid', DEFAULT_CONFIG.preid);
  if (!/^[0-9A-Za-z-]+$/.test(preid)) {
    throw invalid('preid', 'a prerelease identifier', preid);
  }

  let versionFiles: VersionFileSpec[] = [];
  if ('versionFiles' in parsed) {
    const value = parsed.versionFiles;
    const items = Array.isArray(value) ? value : [value];
    versionFiles = items.map((item, index) => parseVersionFile(item, index));
  }

  let staleAfterDays = DEFAULT_CONFIG.staleAfterDays;
  if ('staleAfterDays' in parsed) {
    const value = parsed.staleAfterDays;
    if (typeof value !== 'number' || !(value > 0)) {
      throw invalid('staleAfterDays', 'a positive number', value);
    }
    staleAfterDays = value;
  }

  const merge = readSection(parsed, 'merge');
  const commit = readSection(parsed, 'commit');
  const tag = readSection(parsed, 'tag');
  const defaults = DEFAULT_CONFIG;

  const tagFormat = readTemplate(tag, 'format', 'tag.format', defaults.tag.format);
  if (!tagFormat.includes('{version}') || !isValidTagName(render(tagFormat, { version: '1.0.0' }))) {
    throw invalid('tag.format', 'a valid tag name containing {version}', tagFormat);
  }

  return {
    sourceBranch: readString(parsed, 'sourceBranch', 'sourceBranch', defaults.sourceBranch),
    targetBranch: readString(parsed, 'targetBranch', 'targetBranch', defaults.targetBranch),
    scheme,
    preid,
    defaultBump,
    versionFiles,
    merge: {
      message: readTemplate(merge, 'message', 'merge.message', defaults.merge.message),
      fastForward: readBoolean(merge, 'fastForward', 'merge.fastForward', defaults.merge.fastForward),
    },
    commit: {
      message: readTemplate(commit, 'message', 'commit.message', defaults.commit.message),
      signOff: readBoolean(commit, 'signOff', 'commit.signOff', defaults.commit.signOff),
      gpgSign: readBoolean(commit, 'gpgSign', 'commit.gpgSign', defaults.commit.gpgSign),
    },
    tag: {
      format: tagFormat,
      message: readTemplate(tag, 'message', 'tag.message', defaults.tag.message),
      annotate: readBoolean(tag, 'annotate', 'tag.annotate', defaults.tag.annotate),
      gpgSign: readBoolean(tag, 'gpgSign', 'tag.gpgSign', defaults.tag.gpgSign),
    },
    keepRecord: readBoolean(parsed, 'keepRecord', 'keepRecord', defaults.keepRecord),
    staleAfterDays,
  };
}

/**
 * Load configuration from content, with defaults.
 */
export function loadConfig(content: string | null): RelcutConfig {
  if (!content) {
    return DEFAULT_CONFIG;
  }
  return parseConfig(content);
}

/**
 * Apply command line overrides for the branches.
 */
export function withBranches(
  config: RelcutConfig,
  overrides: { source?: string; target?: string },
): RelcutConfig {
  const sourceBranch = overrides.source || config.sourceBranch;
  const targetBranch = overrides.target || config.targetBranch;
  if (sourceBranch === targetBranch) {
    throw new ConfigError(
      `Source and target branch are both '${sourceBranch}'`,
      'CONFIG_VALIDATION_ERROR',
      { sourceBranch, targetBranch },
    );
  }
  return { ...config, sourceBranch, targetBranch };
}

/**
 * Sample configuration file content, printed by --sample-config.
 */
export function generateSampleConfig(): string {
  const sample = {
    sourceBranch: DEFAULT_CONFIG.sourceBranch,
    targetBranch: DEFAULT_CONFIG.targetBranch,
    scheme: DEFAULT_CONFIG.scheme,
    preid: DEFAULT_CONFIG.preid,
    defaultBump: DEFAULT_CONFIG.defaultBump,
    versionFiles: [
      'VERSION',
      { path: 'src/version.ts', format: "export const VERSION = '{version}';\n" },
      { path: 'pyproject.toml', pattern: '(?<=^version = ")[^"]+' },
    ],
    merge: DEFAULT_CONFIG.merge,
    commit: DEFAULT_CONFIG.commit,
    tag: DEFAULT_CONFIG.tag,
    keepRecord: DEFAULT_CONFIG.keepRecord,
    staleAfterDays: DEFAULT_CONFIG.staleAfterDays,
  };
  return JSON.stringify(sample, null, 2) + '\n';
}
