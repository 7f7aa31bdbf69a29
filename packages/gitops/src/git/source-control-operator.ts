/**
 * Source Control Operator
 * Owns one working copy of one remote repository and walks it through a
 * deploy attempt: clone, fresh work branch, file overwrites, drift check,
 * commit and push.
 */

import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '@autodeploy/logger';
import {
  CloneError,
  DriftError,
  InvalidStateError,
  OverwriteError,
  TransportError,
  UnsafeCleanError,
  errorMessage,
} from '../errors.js';
import { CliGitExecutor, type GitExecutor, type GitResult } from './git-executor.js';
import type { OverwriteStrategy } from './overwrite-strategies.js';
import { PathLock, repositoryLocks } from './path-lock.js';
import { localRepositoryPath } from './repository-url.js';

export type OperatorState =
  | 'Idle'
  | 'Cloned'
  | 'MainBranchCheckedOut'
  | 'WorkBranchCreated'
  | 'FilesCommitted'
  | 'Verified'
  | 'Committed'
  | 'Pushed';

export interface SourceControlOperatorOptions {
  /** `https://host/owner/repo.git` */
  repository: string;
  /** Any non-empty name works when `token` is a personal access token. */
  username: string;
  token: string;
  defaultBranch?: string;
  /**
   * Persistent storage root. Without it the working copy lives in a private
   * scratch directory that `clean()` removes.
   */
  gitRoot?: string;
  authorEmail?: string;
  git?: GitExecutor;
  locks?: PathLock;
}

export interface StatusEntry {
  index: string;
  worktree: string;
  path: string;
}

export function parsePorcelainStatus(stdout: string): StatusEntry[] {
  return stdout
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line) => {
      const rawPath = line.slice(3);
      const arrow = rawPath.indexOf(' -> ');
      return {
        index: line.charAt(0),
        worktree: line.charAt(1),
        path: arrow === -1 ? rawPath : rawPath.slice(arrow + 4),
      };
    });
}

export class SourceControlOperator {
  readonly repository: string;
  readonly username: string;
  readonly defaultBranch: string;
  readonly localPath: string;

  private readonly root: string;
  private readonly scratch: boolean;
  private readonly authHeader: string;
  private readonly authorEmail: string;
  private readonly git: GitExecutor;
  private readonly locks: PathLock;

  private currentState: OperatorState = 'Idle';
  private workBranch?: string;

  constructor(options: SourceControlOperatorOptions) {
    this.repository = options.repository;
    this.username = options.username;
    this.defaultBranch = options.defaultBranch || 'master';
    this.scratch = !options.gitRoot;
    this.root = options.gitRoot ?? path.join(os.tmpdir(), 'autodeploy-scratch', uuidv4());
    this.localPath = localRepositoryPath(this.root, options.repository);
    this.authHeader = `Authorization: Basic ${Buffer.from(`${options.username}:${options.token}`).toString('base64')}`;
    this.authorEmail = options.authorEmail ?? `${options.username}@users.noreply.github.com`;
    this.git = options.git ?? new CliGitExecutor();
    this.locks = options.locks ?? repositoryLocks;
  }

  get state(): OperatorState {
    return this.currentState;
  }

  get isScratch(): boolean {
    return this.scratch;
  }

  /**
   * Run a whole attempt while holding the lock for this working copy path.
   */
  async exclusive<T>(work: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(this.localPath, work);
  }

  /**
   * Establish the local mirror, replacing any previous working copy.
   */
  async clone(): Promise<void> {
    if (await fs.pathExists(path.join(this.localPath, '.git'))) {
      await this.clean();
    }
    await fs.ensureDir(path.dirname(this.localPath));

    try {
      await this.git.run([...this.authArgs(), 'clone', this.repository, this.localPath], {
        cwd: path.dirname(this.localPath),
      });
    } catch (error) {
      this.transition('Idle');
      logger.error({ repository: this.repository, error: errorMessage(error) }, 'Failed to clone repository');
      throw new CloneError(this.repository, error);
    }

    this.transition('Cloned');
    logger.info({ repository: this.repository, localPath: this.localPath }, 'Repository cloned');
  }

  /**
   * Remove the working copy. Refuses unless `<localPath>/.git` exists; a
   * scratch root is always removed since only this operator writes to it.
   */
  async clean(): Promise<void> {
    if (this.scratch) {
      await fs.remove(this.root);
    } else {
      const dotGit = path.join(this.localPath, '.git');
      if (!(await fs.pathExists(dotGit))) {
        throw new UnsafeCleanError(this.localPath);
      }
      await fs.remove(this.localPath);
    }

    this.transition('Idle');
    logger.info({ localPath: this.localPath }, 'Working copy removed');
  }

  async deleteBranch(branch: string): Promise<void> {
    await this.run(['branch', '-D', branch]);
  }

  /**
   * Check out the default branch and bring it up to date with the remote.
   * Clones first when there is no working copy, and recovers a failed pull
   * by cloning again.
   */
  async checkoutMainBranch(): Promise<void> {
    if (this.currentState === 'Idle') {
      logger.info({ repository: this.repository }, 'No working copy, cloning before checkout');
      await this.clone();
    }

    await this.run(['checkout', '--force', this.defaultBranch]);
    await this.run(['clean', '-fd']);

    try {
      await this.run([...this.authArgs(), 'pull', '--ff-only', 'origin', this.defaultBranch]);
    } catch (error) {
      logger.error({ repository: this.repository, error: errorMessage(error) }, 'Failed to pull default branch');
      logger.info({ repository: this.repository }, 'Running clone to see if it fixes the issue');
      await this.clone();
      await this.run(['checkout', '--force', this.defaultBranch]);
      logger.info({ repository: this.repository }, 'Recovered working copy by cloning again');
    }

    this.transition('MainBranchCheckedOut');
  }

  /**
   * Start a work branch from a fresh view of the default branch. A branch
   * with the same name is deleted first and never reused.
   */
  async createAndCheckoutBranch(branch: string): Promise<void> {
    try {
      await this.deleteBranch(branch);
    } catch (error) {
      logger.warn({ branch, error: errorMessage(error) }, 'Failed to delete branch');
    }

    await this.checkoutMainBranch();
    await this.run(['checkout', '-B', branch]);

    this.workBranch = branch;
    this.transition('WorkBranchCreated');
    logger.info({ repository: this.repository, branch }, 'Work branch created');
  }

  /**
   * Rewrite one file with an overwrite strategy and stage it. Returns false
   * when the file does not exist in the working copy.
   */
  async commitOverwrite(branch: string, filePath: string, strategy: OverwriteStrategy): Promise<boolean> {
    this.expectState('overwrite files', ['WorkBranchCreated', 'FilesCommitted']);
    this.expectWorkBranch(branch);

    const target = this.resolveInWorkingCopy(filePath);
    if (!(await fs.pathExists(target))) {
      logger.info({ file: filePath }, 'The file does not exist, skipping overwrite');
      return false;
    }

    const content = await fs.readFile(target, 'utf8');
    let serialized: string;
    try {
      serialized = strategy.update(content);
    } catch (error) {
      throw new OverwriteError(filePath, errorMessage(error));
    }

    await fs.writeFile(target, serialized);
    await this.run(['add', '--', filePath]);

    this.transition('FilesCommitted');
    logger.debug({ file: filePath, change: strategy.description }, 'File overwritten and staged');
    return true;
  }

  async status(): Promise<StatusEntry[]> {
    const { stdout } = await this.run(['status', '--porcelain']);
    return parsePorcelainStatus(stdout);
  }

  async stagedFiles(): Promise<string[]> {
    const { stdout } = await this.run(['diff', '--cached', '--name-only']);
    return stdout.split('\n').filter((line) => line.trim().length > 0);
  }

  /**
   * Fail closed unless every change in the working copy is a staged
   * modification of an existing file.
   */
  async verify(): Promise<void> {
    this.expectState('verify', ['WorkBranchCreated', 'FilesCommitted']);

    const unexpected = (await this.status()).filter((entry) => entry.index !== 'M');
    if (unexpected.length > 0) {
      const paths = unexpected.map((entry) => entry.path);
      logger.error({ repository: this.repository, paths }, 'There are some extra file updates');
      throw new DriftError(paths);
    }

    this.transition('Verified');
  }

  /**
   * Commit the staged changes on the work branch and return the commit sha.
   */
  async commit(message: string): Promise<string> {
    this.expectState('commit', ['Verified']);

    await this.run([
      '-c', `user.name=${this.username}`,
      '-c', `user.email=${this.authorEmail}`,
      'commit', '-m', message,
    ]);
    const { stdout } = await this.run(['rev-parse', 'HEAD']);

    this.transition('Committed');
    return stdout.trim();
  }

  async push(branch: string): Promise<void> {
    this.expectState('push', ['Committed']);
    this.expectWorkBranch(branch);

    try {
      await this.run([...this.authArgs(), 'push', 'origin', `refs/heads/${branch}:refs/heads/${branch}`]);
    } catch (error) {
      logger.error({ repository: this.repository, branch, error: errorMessage(error) }, 'Failed to push branch');
      throw new TransportError('push', this.repository, error);
    }

    this.transition('Pushed');
    logger.info({ repository: this.repository, branch }, 'Branch pushed');
  }

  /**
   * Contents of a file in the working copy, or undefined when absent.
   */
  async readFile(filePath: string): Promise<string | undefined> {
    const target = this.resolveInWorkingCopy(filePath);
    if (!(await fs.pathExists(target))) {
      return undefined;
    }
    return fs.readFile(target, 'utf8');
  }

  private resolveInWorkingCopy(filePath: string): string {
    const target = path.resolve(this.localPath, filePath);
    const relative = path.relative(this.localPath, target);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new OverwriteError(filePath, 'path is outside the working copy');
    }
    return target;
  }

  private authArgs(): string[] {
    return ['-c', `http.extraHeader=${this.authHeader}`];
  }

  private run(args: string[]): Promise<GitResult> {
    return this.git.run(args, { cwd: this.localPath });
  }

  private transition(next: OperatorState): void {
    if (next === 'Idle' || next === 'Cloned' || next === 'MainBranchCheckedOut') {
      this.workBranch = undefined;
    }
    this.currentState = next;
  }

  private expectState(action: string, allowed: OperatorState[]): void {
    if (!allowed.includes(this.currentState)) {
      throw new InvalidStateError(`Cannot ${action} while the working copy is ${this.currentState}`, {
        state: this.currentState,
        allowed,
      });
    }
  }

  private expectWorkBranch(branch: string): void {
    if (this.workBranch !== branch) {
      throw new InvalidStateError(`Branch ${branch} is not the checked out work branch`, {
        branch,
        workBranch: this.workBranch,
      });
    }
  }
}
