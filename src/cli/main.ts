/**
 * relcut - Resumable release CLI
 *
 * Modes:
 *   relcut               Start or advance a release
 *   relcut --status      Report the release in progress
 *   relcut --edit        Pause before the bump for a custom commit
 *   relcut --continue    Resume after resolving conflicts or committing
 *   relcut --abort       Roll the release back
 */

import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import minimist from 'minimist';
import { LocalGit } from '../clients/git/local.ts';
import { CONFIG_FILE, generateSampleConfig, loadConfig, withBranches } from '../domain/config.ts';
import { isBumpKind } from '../domain/types.ts';
import type { BumpKind, Command } from '../domain/types.ts';
import type { ReleaseRepo } from '../domain/vcs.ts';
import { nextStep } from '../core/machine.ts';
import { AdapterError, ConfigError, exitCodeFor, ExitCode, RelcutError, RepositoryStateError } from '../lib/error.ts';
import type { StateStore } from '../storage/interface.ts';
import { LocalStateStore } from '../storage/local.ts';
import { releaseWorkflow } from '../workflows/release.ts';
import type { ReleaseResult } from '../workflows/release.ts';
import { releaseStatus } from '../workflows/status.ts';
import type { StatusReport } from '../workflows/status.ts';
import * as output from './output.ts';

export const VERSION = '0.1.0';

const STATE_DIR = 'relcut';

const MODES = ['status', 'edit', 'continue', 'abort', 'sample-config'] as const;

type Mode = (typeof MODES)[number];

const BOOLEAN_FLAGS = ['help', 'version', 'verbose', 'json', 'color', ...MODES];
const STRING_FLAGS = ['bump', 'source', 'target', 'config'];
const ALIASES: Record<string, string> = { h: 'help', v: 'verbose', b: 'bump', c: 'config' };

function helpText(): string {
  return `
${output.bold('relcut')} - Resumable release tool

${output.bold('USAGE:')}
  relcut [OPTIONS]             Merge, bump and tag (or carry on where it stopped)
  relcut --status [--json]     Show the release in progress
  relcut --edit                Pause before the bump for a custom commit
  relcut --continue            Resume after resolving conflicts or committing
  relcut --abort               Roll back the release in progress
  relcut --sample-config       Print a sample .relcut/config.json

${output.bold('OPTIONS:')}
  -b, --bump <kind>      major, minor, patch, premajor, preminor, prepatch,
                         prerelease or post (default from config: patch)
  --source <branch>      Branch to release from (default: develop)
  --target <branch>      Branch to release to (default: main)
  -c, --config <path>    Configuration file (default: ${CONFIG_FILE})
  -v, --verbose          Trace every step
  --no-color             Plain output
  -h, --help             Show this help
  --version              Show version

${output.bold('EXIT CODES:')}
  0 done or paused, 2 usage or config, 3 repository state, 4 conflict,
  5 version, 6 corrupt record, 7 locked, 10 release in progress (--status)
`;
}

/**
 * What the CLI works on: the repository, its release record and the raw
 * configuration file.
 */
export interface Workspace {
  repo: ReleaseRepo;
  store: StateStore;
  /** Config file content, or null when there is none */
  configContent: string | null;
}

export type OpenWorkspace = (configPath: string | undefined) => Promise<Workspace>;

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Workspace for the git repository around the current directory. The
 * record lives in `<git-dir>/relcut`, out of the working tree.
 */
export async function openLocalWorkspace(configPath: string | undefined): Promise<Workspace> {
  const probe = new LocalGit();
  let root: string;
  let gitDir: string;
  try {
    root = await probe.root();
    gitDir = await probe.gitDir();
  } catch (error) {
    if (error instanceof AdapterError) {
      throw new RepositoryStateError('Not inside a git working tree', 'NOT_A_REPOSITORY', {
        cwd: process.cwd(),
      });
    }
    throw error;
  }

  const path = configPath === undefined ? join(root, CONFIG_FILE) : resolve(configPath);
  let configContent: string | null = null;
  try {
    configContent = await readFile(path, 'utf-8');
  } catch (error) {
    if (!hasCode(error, 'ENOENT')) throw error;
    if (configPath !== undefined) {
      throw new ConfigError(`Config file not found: ${path}`, 'CONFIG_NOT_FOUND', { path });
    }
  }

  return {
    repo: new LocalGit(root),
    store: new LocalStateStore(join(gitDir, STATE_DIR)),
    configContent,
  };
}

interface Flags {
  help: boolean;
  version: boolean;
  verbose: boolean;
  json: boolean;
  color: boolean;
  mode: Mode | null;
  bump?: BumpKind;
  source?: string;
  target?: string;
  config?: string;
}

function parseFlags(argv: string[]): Flags {
  const unknown: string[] = [];
  const parsed = minimist(argv, {
    boolean: BOOLEAN_FLAGS,
    string: STRING_FLAGS,
    alias: ALIASES,
    default: { color: true },
    unknown: (arg) => {
      if (!arg.startsWith('-')) return true;
      unknown.push(arg);
      return false;
    },
  });

  if (unknown.length > 0) {
    throw new ConfigError(`Unknown option: ${unknown.join(', ')}. See relcut --help.`, 'USAGE_ERROR');
  }
  if (parsed._.length > 0) {
    throw new ConfigError(`Unexpected argument: ${parsed._.join(' ')}. See relcut --help.`, 'USAGE_ERROR');
  }

  const flag = (name: string): boolean => parsed[name] === true;
  const option = (name: string): string | undefined => {
    const value: unknown = parsed[name];
    if (value === undefined || value === '') return undefined;
    if (typeof value !== 'string') {
      throw new ConfigError(`Option --${name} takes a single value`, 'USAGE_ERROR');
    }
    return value;
  };

  const modes = MODES.filter((mode) => flag(mode));
  if (modes.length > 1) {
    throw new ConfigError(
      `Options ${modes.map((mode) => `--${mode}`).join(', ')} are mutually exclusive`,
      'USAGE_ERROR',
    );
  }
  const mode = modes[0] ?? null;

  const bumpOption = option('bump');
  let bump: BumpKind | undefined;
  if (bumpOption !== undefined) {
    if (!isBumpKind(bumpOption)) {
      throw new ConfigError(`Invalid bump kind: ${bumpOption}. See relcut --help.`, 'USAGE_ERROR', {
        bump: bumpOption,
      });
    }
    if (mode !== null && mode !== 'edit') {
      throw new ConfigError(`--bump only applies when starting a release, not with --${mode}`, 'USAGE_ERROR');
    }
    bump = bumpOption;
  }

  return {
    help: flag('help'),
    version: flag('version'),
    verbose: flag('verbose'),
    json: flag('json'),
    color: parsed.color !== false,
    mode,
    bump,
    source: option('source'),
    target: option('target'),
    config: option('config'),
  };
}

function commandFor(mode: Mode | null): Command {
  switch (mode) {
    case 'edit':
    case 'continue':
    case 'abort':
      return mode;
    default:
      return 'run';
  }
}

function printStatus(report: StatusReport): void {
  output.header('📦 relcut status');

  const attempt = report.attempt;
  if (!report.inProgress || attempt === null) {
    if (attempt !== null) {
      output.info('Last release', `${attempt.tagName ?? attempt.resolvedVersion ?? '-'} (${attempt.phase})`);
    }
    console.log(report.next);
    return;
  }

  output.info('Phase', attempt.phase);
  output.info('Branches', `${attempt.sourceBranch} → ${attempt.targetBranch}`);
  output.info('Version', `${attempt.baseVersion} → ${attempt.resolvedVersion ?? `? (${attempt.bumpKind})`}`);
  if (attempt.conflictPaths.length > 0) {
    output.warn(`Conflicts: ${attempt.conflictPaths.join(', ')}`);
  }
  if (attempt.editRequested && attempt.phase !== 'AwaitingCustomCommit') {
    output.info('Custom commit', 'requested');
  }
  if (report.stale) {
    output.warn(`Started ${report.ageDays} days ago`);
  }
  for (const problem of report.problems) {
    output.warn(problem);
  }
  console.log();
  console.log(report.next);
}

function printResult(result: ReleaseResult): void {
  const attempt = result.attempt;

  switch (result.reason) {
    case 'completed':
      if (attempt?.resolvedVersion) {
        output.versionBump(attempt.baseVersion, attempt.resolvedVersion, attempt.bumpKind);
      }
      console.log();
      output.success(`Released ${attempt?.tagName ?? ''}`);
      return;
    case 'aborted':
      output.success('Release aborted, repository rolled back');
      return;
    case 'no-release':
      output.warn('No release in progress');
      return;
    case 'edit-requested':
      output.success('Custom commit requested: the release pauses before the bump');
      break;
    case 'ready':
      output.success('Merge concluded');
      break;
    case 'awaiting-commit':
      output.warn('Paused for your custom commit');
      break;
  }

  if (attempt !== null) {
    output.info('Phase', attempt.phase);
    console.log(nextStep(attempt));
  }
}

function report(error: unknown): void {
  if (error instanceof RelcutError) {
    output.error(error.message);
    if (error.details) {
      output.debug(`${error.code}: ${JSON.stringify(error.details)}`);
    }
  } else {
    output.error('Unexpected error', String(error));
  }
}

async function dispatch(argv: string[], open: OpenWorkspace): Promise<number> {
  const flags = parseFlags(argv);
  output.setColor(flags.color);
  output.setVerbose(flags.verbose);

  if (flags.help) {
    output.help(helpText());
    return ExitCode.Success;
  }
  if (flags.version) {
    console.log(`relcut v${VERSION}`);
    return ExitCode.Success;
  }
  if (flags.mode === 'sample-config') {
    console.log(generateSampleConfig().trimEnd());
    return ExitCode.Success;
  }

  const workspace = await open(flags.config);
  const config = withBranches(loadConfig(workspace.configContent), {
    source: flags.source,
    target: flags.target,
  });

  if (flags.mode === 'status') {
    const status = await releaseStatus({ repo: workspace.repo, store: workspace.store, config });
    if (flags.json) {
      output.json(status);
    } else {
      printStatus(status);
    }
    return status.inProgress ? ExitCode.InProgress : ExitCode.Success;
  }

  output.header('📦 relcut');
  const result = await releaseWorkflow(
    { repo: workspace.repo, store: workspace.store, config, debug: output.debug },
    commandFor(flags.mode),
    { bumpKind: flags.bump },
  );
  printResult(result);
  return ExitCode.Success;
}

/**
 * Run the CLI and return the exit code. Errors are reported, not thrown.
 */
export async function main(argv: string[], open: OpenWorkspace = openLocalWorkspace): Promise<number> {
  try {
    return await dispatch(argv, open);
  } catch (error) {
    report(error);
    return exitCodeFor(error);
  }
}
