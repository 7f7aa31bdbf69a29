import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { logger } from '@autodeploy/logger';
import { GitCommandError } from '../errors.js';

const execFileAsync = promisify(execFile);

export interface GitRunOptions {
  cwd: string;
  env?: Record<string, string>;
}

export interface GitResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs one git command. Implementations reject with GitCommandError.
 */
export interface GitExecutor {
  run(args: string[], options: GitRunOptions): Promise<GitResult>;
}

const SECRET_CONFIG = /^(http\.extraHeader=Authorization:).*/i;

/**
 * The command line with credentials removed, for logs and error messages.
 */
export function describeGitCommand(args: string[]): string {
  return args.map((arg) => arg.replace(SECRET_CONFIG, '$1 ***')).join(' ');
}

interface ExecFailure {
  code?: number | string;
  stderr?: string;
  message?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return typeof error === 'object' && error !== null;
}

/**
 * GitExecutor backed by the `git` binary on PATH.
 */
export class CliGitExecutor implements GitExecutor {
  constructor(private readonly binary = 'git') {}

  async run(args: string[], options: GitRunOptions): Promise<GitResult> {
    const command = describeGitCommand(args);
    logger.debug({ command, cwd: options.cwd }, 'Running git command');

    try {
      const { stdout, stderr } = await execFileAsync(this.binary, args, {
        cwd: options.cwd,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0', ...options.env },
        maxBuffer: 16 * 1024 * 1024,
      });
      return { stdout, stderr };
    } catch (error) {
      const failure = isExecFailure(error) ? error : {};
      const exitCode = typeof failure.code === 'number' ? failure.code : undefined;
      const stderr = failure.stderr || failure.message || String(error);
      // The raw failure carries the full command line, so it is not kept as the cause.
      throw new GitCommandError(command, exitCode, stderr);
    }
  }
}
