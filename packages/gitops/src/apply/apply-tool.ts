import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';
import { logger } from '@autodeploy/logger';
import { ApplyToolError, errorMessage } from '../errors.js';

const execFileAsync = promisify(execFile);

export interface ApplyRequest {
  /** Absolute path of the tool's config file. */
  configPath: string;
  /** The tool's environment; equals the phase name. */
  environment: string;
  /** Unit name → outputs the tool should treat as already produced. */
  skippedUnits: Record<string, Record<string, string>>;
  pullRequestHead: string;
  assigneeIds: string[];
  gitUserName: string;
  env: Record<string, string>;
}

export interface AppliedPullRequest {
  number: number;
  nodeId: string;
  htmlUrl: string;
}

export interface ApplyResult {
  pullRequests: AppliedPullRequest[];
}

/**
 * An external declarative-apply tool that turns a config file into pull requests.
 */
export interface ApplyTool {
  apply(request: ApplyRequest): Promise<ApplyResult>;
}

const applyOutputSchema = z.object({
  pullRequests: z
    .array(
      z.object({
        number: z.coerce.number().int().positive(),
        nodeId: z.string().min(1),
        htmlUrl: z.string().url(),
      })
    )
    .default([]),
});

export function parseApplyOutput(stdout: string): ApplyResult {
  let document: unknown;
  try {
    document = stdout.trim() === '' ? {} : JSON.parse(stdout);
  } catch (error) {
    throw new ApplyToolError(`Apply tool printed invalid JSON: ${errorMessage(error)}`);
  }

  const result = applyOutputSchema.safeParse(document);
  if (!result.success) {
    throw new ApplyToolError(`Apply tool printed an unexpected result: ${result.error.message}`, {}, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Runs `<command> apply --env <env> --config <path> --skipped-jobs-outputs <json>`
 * and reads the created pull requests from its JSON output.
 */
export class CommandApplyTool implements ApplyTool {
  constructor(private readonly command: string) {}

  async apply(request: ApplyRequest): Promise<ApplyResult> {
    const args = [
      'apply',
      '--env', request.environment,
      '--config', request.configPath,
      '--skipped-jobs-outputs', JSON.stringify(request.skippedUnits),
    ];

    logger.info({
      command: this.command,
      environment: request.environment,
      config: request.configPath,
      head: request.pullRequestHead,
    }, 'Running apply tool');

    let stdout: string;
    try {
      ({ stdout } = await execFileAsync(this.command, args, {
        env: {
          ...process.env,
          ...request.env,
          KANVAS_PULLREQUEST_HEAD: request.pullRequestHead,
          KANVAS_PULLREQUEST_ASSIGNEE_IDS: request.assigneeIds.join(','),
          KANVAS_GIT_USER_NAME: request.gitUserName,
        },
        maxBuffer: 16 * 1024 * 1024,
      }));
    } catch (error) {
      throw new ApplyToolError(`${this.command} apply failed: ${errorMessage(error)}`, {
        environment: request.environment,
        config: request.configPath,
      });
    }

    return parseApplyOutput(stdout);
  }
}
