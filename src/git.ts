import { execFileSync } from 'child_process';
import fs from 'fs';
import path from 'path';
import { ChangedFile, FileStatus } from './types.js';

/** Hash of git's empty tree; diffing against it includes the root commit's own changes. */
export const EMPTY_TREE = '4b825dc642cb6eb9a060e54bf8d69288fbee4904';

export interface DiffSource {
  rootCommit(): string;
  headCommit(): string;
  listChanges(from: string, to: string): ChangedFile[];
  fileDiff(from: string, to: string, change: ChangedFile): string;
  /** Blob contents at `ref`, or undefined when the path does not exist there. */
  readFile(ref: string, filePath: string): Buffer | undefined;
}

export type GitRunner = (dir: string, args: string[]) => Buffer;

// Plain paths, no pager colors and no diff.external, whatever the user's git config says.
const SAFE_OPTIONS = ['-c', 'core.quotePath=false', '-c', 'color.ui=never'];
const DIFF_FLAGS = ['--no-color', '--no-ext-diff', '-M'];

export const git: GitRunner = (dir, args) =>
  execFileSync('git', [...SAFE_OPTIONS, ...args], {
    cwd: dir,
    stdio: ['ignore', 'pipe', 'ignore'],
    maxBuffer: 1024 * 1024 * 50
  });

const STATUS_CODES: Record<string, FileStatus> = {
  A: 'added',
  D: 'removed',
  M: 'modified',
  T: 'modified'
};

/**
 * Parses `git diff --name-status -z` output, keeping git's order. Fields are
 * NUL-terminated; renames and copies carry two paths.
 */
export function parseNameStatus(raw: string): ChangedFile[] {
  const fields = raw.split('\0');
  const changes: ChangedFile[] = [];
  let i = 0;
  while (i < fields.length && fields[i]) {
    const kind = fields[i].charAt(0);
    if (kind === 'R') {
      changes.push({ path: fields[i + 2], oldPath: fields[i + 1], status: 'renamed' });
      i += 3;
    } else if (kind === 'C') {
      changes.push({ path: fields[i + 2], status: 'added' });
      i += 3;
    } else {
      changes.push({ path: fields[i + 1], status: STATUS_CODES[kind] ?? 'modified' });
      i += 2;
    }
  }
  return changes;
}

export function isGitRepository(dir: string): boolean {
  return fs.existsSync(path.join(dir, '.git'));
}

export function getRootCommit(dir: string, run: GitRunner = git): string {
  const roots = run(dir, ['rev-list', '--max-parents=0', 'HEAD']).toString('utf-8').trim().split('\n');
  return roots[roots.length - 1];
}

export function getHeadCommit(dir: string, run: GitRunner = git): string {
  return run(dir, ['rev-parse', 'HEAD']).toString('utf-8').trim();
}

export class GitDiffSource implements DiffSource {
  constructor(
    private repoDir: string,
    private encoding: BufferEncoding = 'utf-8',
    private run: GitRunner = git
  ) {}

  rootCommit(): string {
    return getRootCommit(this.repoDir, this.run);
  }

  headCommit(): string {
    return getHeadCommit(this.repoDir, this.run);
  }

  listChanges(from: string, to: string): ChangedFile[] {
    const raw = this.run(this.repoDir, ['diff', ...DIFF_FLAGS, '--name-status', '-z', from, to]);
    return parseNameStatus(raw.toString('utf-8'));
  }

  fileDiff(from: string, to: string, change: ChangedFile): string {
    const paths = change.oldPath ? [change.oldPath, change.path] : [change.path];
    return this.run(this.repoDir, ['diff', ...DIFF_FLAGS, from, to, '--', ...paths]).toString(this.encoding);
  }

  readFile(ref: string, filePath: string): Buffer | undefined {
    try {
      return this.run(this.repoDir, ['show', `${ref}:${filePath}`]);
    } catch {
      return undefined;
    }
  }
}
