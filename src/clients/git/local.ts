/**
 * Local git client - wraps git CLI commands.
 *
 * Implements ReleaseRepo from domain/vcs.ts.
 */

import { execFile } from 'node:child_process';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type {
  CommitOptions,
  MergeOptions,
  MergeOutcome,
  ReleaseRepo,
  RevisionId,
  TagOptions,
} from '../../domain/vcs.ts';
import { hasConflictMarkers } from '../../domain/vcs.ts';
import { parseCount, parseNameList, parseStatusPaths } from './parse.ts';
import { AdapterError } from '../../lib/error.ts';

export interface GitResult {
  code: number;
  stdout: string;
  stderr: string;
}

/** Runs git with the given arguments; resolves for any exit code. */
export type GitRunner = (args: string[], cwd: string) => Promise<GitResult>;

/**
 * Spawn the git executable.
 */
export const runGit: GitRunner = (args, cwd) =>
  new Promise((resolve, reject) => {
    execFile(
      'git',
      args,
      { cwd, maxBuffer: 64 * 1024 * 1024, env: { ...process.env, GIT_TERMINAL_PROMPT: '0' } },
      (error, stdout, stderr) => {
        if (error === null) {
          resolve({ code: 0, stdout, stderr });
        } else if (typeof error.code === 'number') {
          resolve({ code: error.code, stdout, stderr });
        } else {
          reject(new AdapterError(`Failed to run git: ${error.message}`, { args }));
        }
      },
    );
  });

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class LocalGit implements ReleaseRepo {
  constructor(
    private cwd: string = process.cwd(),
    private runner: GitRunner = runGit,
  ) {}

  /**
   * Execute a git command and return its raw stdout.
   */
  private async output(args: string[]): Promise<string> {
    const { code, stdout, stderr } = await this.runner(args, this.cwd);

    if (code !== 0) {
      throw new AdapterError(`Git command failed: git ${args.join(' ')}\n${stderr.trim()}`, {
        args,
        code,
        error: stderr.trim(),
      });
    }

    return stdout;
  }

  /**
   * Execute a git command and return trimmed stdout.
   */
  private async exec(args: string[]): Promise<string> {
    return (await this.output(args)).trim();
  }

  /**
   * Execute a git command whose exit status is the answer: 0 is yes, 1 is no.
   */
  private async test(args: string[]): Promise<boolean> {
    const { code, stderr } = await this.runner(args, this.cwd);
    if (code === 0) return true;
    if (code === 1) return false;
    throw new AdapterError(`Git command failed: git ${args.join(' ')}\n${stderr.trim()}`, {
      args,
      code,
      error: stderr.trim(),
    });
  }

  // --- Repository layout ---

  /** Absolute path of the .git directory */
  async gitDir(): Promise<string> {
    return await this.exec(['rev-parse', '--absolute-git-dir']);
  }

  /** Absolute path of the working tree root */
  async root(): Promise<string> {
    return await this.exec(['rev-parse', '--show-toplevel']);
  }

  // --- Working tree ---

  async isClean(): Promise<boolean> {
    return (await this.changedPaths()).length === 0;
  }

  async changedPaths(): Promise<string[]> {
    return parseStatusPaths(await this.output(['status', '--porcelain', '-z']));
  }

  async readFile(path: string): Promise<string | null> {
    try {
      return await readFile(join(this.cwd, path), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new AdapterError(`Cannot read ${path}: ${String(error)}`, { path });
    }
  }

  async readFileAt(rev: RevisionId, path: string): Promise<string | null> {
    const { code, stdout } = await this.runner(['show', `${rev}:${path}`], this.cwd);
    return code === 0 ? stdout : null;
  }

  async writeFile(path: string, content: string): Promise<void> {
    const fullPath = join(this.cwd, path);
    try {
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, content, 'utf-8');
    } catch (error) {
      throw new AdapterError(`Cannot write ${path}: ${String(error)}`, { path });
    }
  }

  // --- Branches ---

  async currentBranch(): Promise<string | null> {
    const args = ['symbolic-ref', '--quiet', '--short', 'HEAD'];
    const { code, stdout } = await this.runner(args, this.cwd);
    if (code === 0) return stdout.trim();
    // Exit status 1 means HEAD is detached
    if (code === 1) return null;
    throw new AdapterError(`Git command failed: git ${args.join(' ')}`, { args, code });
  }

  async checkout(branch: string): Promise<void> {
    await this.exec(['checkout', branch, '--']);
  }

  async branchExists(name: string): Promise<boolean> {
    return await this.test(['show-ref', '--verify', '--quiet', `refs/heads/${name}`]);
  }

  async hasCommitsNotIn(source: string, target: string): Promise<boolean> {
    const output = await this.exec(['rev-list', '--count', `refs/heads/${target}..refs/heads/${source}`]);
    return parseCount(output) > 0;
  }

  // --- Merging ---

  async merge(source: string, target: string, options: MergeOptions): Promise<MergeOutcome> {
    if ((await this.currentBranch()) !== target) {
      await this.checkout(target);
    }

    const args = ['merge', options.fastForward ? '--ff' : '--no-ff', '--no-edit', '-m', options.message, source];
    const { code, stderr } = await this.runner(args, this.cwd);
    if (code === 0) {
      return { kind: 'clean', rev: await this.head() };
    }

    const paths = (await this.isMerging()) ? await this.conflictedPaths() : [];
    if (paths.length === 0) {
      throw new AdapterError(`Git command failed: git ${args.join(' ')}\n${stderr.trim()}`, {
        args,
        code,
        error: stderr.trim(),
      });
    }
    return { kind: 'conflicted', paths };
  }

  async isMerging(): Promise<boolean> {
    return await this.test(['rev-parse', '--quiet', '--verify', 'MERGE_HEAD']);
  }

  async abortMerge(): Promise<void> {
    await this.exec(['merge', '--abort']);
  }

  async conflictedPaths(): Promise<string[]> {
    return parseNameList(await this.output(['diff', '--name-only', '--diff-filter=U', '-z']));
  }

  async hasUnresolvedConflicts(paths: string[]): Promise<boolean> {
    if ((await this.conflictedPaths()).length > 0) return true;

    for (const path of paths) {
      const content = await this.readFile(path);
      if (content !== null && hasConflictMarkers(content)) return true;
    }
    return false;
  }

  // --- History ---

  async head(): Promise<RevisionId> {
    return await this.exec(['rev-parse', 'HEAD']);
  }

  async resolveRef(ref: string): Promise<RevisionId | null> {
    const { code, stdout } = await this.runner(['rev-parse', '--quiet', '--verify', `${ref}^{commit}`], this.cwd);
    return code === 0 ? stdout.trim() : null;
  }

  async parentOf(rev: RevisionId): Promise<RevisionId | null> {
    return await this.resolveRef(`${rev}^`);
  }

  async getCommitMessage(rev: RevisionId): Promise<string> {
    return await this.exec(['log', '-1', '--format=%B', rev]);
  }

  async commitExists(rev: RevisionId): Promise<boolean> {
    const { code } = await this.runner(['cat-file', '-e', `${rev}^{commit}`], this.cwd);
    return code === 0;
  }

  async isAncestor(ancestor: RevisionId, descendant: RevisionId): Promise<boolean> {
    return await this.test(['merge-base', '--is-ancestor', ancestor, descendant]);
  }

  async commit(message: string, options: CommitOptions = {}): Promise<RevisionId> {
    if (options.paths && options.paths.length > 0) {
      await this.exec(['add', '--', ...options.paths]);
    }

    const args = ['commit', '-m', message];
    if (options.signOff) args.push('--signoff');
    if (options.gpgSign) args.push('--gpg-sign');
    await this.exec(args);

    return await this.head();
  }

  async resetHard(rev: RevisionId): Promise<void> {
    await this.exec(['reset', '--hard', rev]);
  }

  // --- Tags ---

  async tagExists(name: string): Promise<boolean> {
    return await this.test(['show-ref', '--verify', '--quiet', `refs/tags/${name}`]);
  }

  async tagTarget(name: string): Promise<RevisionId | null> {
    return await this.resolveRef(`refs/tags/${name}`);
  }

  async tag(name: string, target: RevisionId, options: TagOptions): Promise<string> {
    const args = ['tag'];
    if (options.gpgSign) {
      args.push('--sign', '-m', options.message);
    } else if (options.annotate) {
      args.push('--annotate', '-m', options.message);
    }
    args.push(name, target);
    await this.exec(args);

    return await this.exec(['rev-parse', `refs/tags/${name}`]);
  }

  async deleteTag(name: string): Promise<void> {
    await this.exec(['tag', '--delete', name]);
  }
}
