import path from 'node:path';
import fs from 'fs-extra';
import { logger } from '@autodeploy/logger';
import type { ApplyTool } from '../apply/apply-tool.js';
import { AmbiguousResultError, errorMessage } from '../errors.js';
import { repositoryUrl } from '../git/repository-url.js';
import type { SourceControlOperator } from '../git/source-control-operator.js';
import type { PullRequestOutcome, VersionSource } from '../types.js';
import { GitOpsStrategy, dockerImageTagBranch, type ResolvedRequest } from './gitops-strategy.js';

export const APPLY_CONFIG_FILE = 'kanvas.yaml';

/** Unit that builds the image; its outputs are handed over instead of rebuilt. */
export const IMAGE_UNIT = 'image';
/** Unit that is never run when a deploy comes from here. */
export const PREREQUISITE_UNIT = 'prereq';

const SCRATCH_DIRECTORY = '.kanvastmp';

export type OperatorFactory = (repository: string, defaultBranch: string) => SourceControlOperator;

export interface DelegatedApplyStrategyOptions {
  versionSource: VersionSource;
  applyTool: ApplyTool;
  createOperator: OperatorFactory;
  organization: string;
  token: string;
  gitHost?: string;
}

/**
 * `phase.path` may name the config file or the directory holding it.
 */
export function resolveApplyConfigPath(phasePath: string): string {
  if (!phasePath) {
    return APPLY_CONFIG_FILE;
  }
  if (path.posix.basename(phasePath) === APPLY_CONFIG_FILE) {
    return phasePath;
  }
  return path.posix.join(phasePath, APPLY_CONFIG_FILE);
}

/**
 * Clones the project's own repository and lets the apply tool open the pull
 * request against whichever repository its config declares.
 */
export class DelegatedApplyStrategy extends GitOpsStrategy {
  readonly kind = 'kanvas' as const;

  private readonly applyTool: ApplyTool;
  private readonly createOperator: OperatorFactory;
  private readonly organization: string;
  private readonly token: string;
  private readonly gitHost: string;

  constructor(options: DelegatedApplyStrategyOptions) {
    super(options.versionSource);
    this.applyTool = options.applyTool;
    this.createOperator = options.createOperator;
    this.organization = options.organization;
    this.token = options.token;
    this.gitHost = options.gitHost ?? 'github.com';
  }

  protected async preparePullRequest({ project, phase, tag, requester }: ResolvedRequest): Promise<PullRequestOutcome> {
    const head = dockerImageTagBranch(project.id, phase.name, tag);
    const operator = this.createOperator(
      repositoryUrl(this.gitHost, this.organization, project.repository),
      project.defaultBranch
    );

    const result = await operator.exclusive(async () => {
      try {
        await operator.clone();
        await operator.checkoutMainBranch();

        const scratch = path.join(operator.localPath, SCRATCH_DIRECTORY);
        await fs.ensureDir(scratch);

        return await this.applyTool.apply({
          configPath: path.join(operator.localPath, resolveApplyConfigPath(phase.path)),
          environment: phase.name,
          skippedUnits: {
            [IMAGE_UNIT]: { tag, id: tag },
            [PREREQUISITE_UNIT]: {},
          },
          pullRequestHead: head,
          assigneeIds: requester?.githubNodeId ? [requester.githubNodeId] : [],
          gitUserName: operator.username,
          env: {
            TMPDIR: scratch,
            GITHUB_TOKEN: this.token,
          },
        });
      } finally {
        await this.cleanUp(operator);
      }
    });

    const pullRequests = result.pullRequests;
    if (pullRequests.length === 0) {
      logger.info({ project: project.id, phase: phase.name, tag }, 'Apply tool created no pull request');
      return { status: 'AlreadyDeployed' };
    }
    if (pullRequests.length > 1) {
      logger.error({ pullRequests }, 'Apply tool created multiple pull requests');
      throw new AmbiguousResultError(pullRequests.length);
    }

    const [pullRequest] = pullRequests;
    return {
      status: 'Success',
      pullRequest: { id: pullRequest.nodeId, number: pullRequest.number, url: pullRequest.htmlUrl },
      branch: head,
    };
  }

  private async cleanUp(operator: SourceControlOperator): Promise<void> {
    try {
      await operator.clean();
    } catch (error) {
      logger.error({ localPath: operator.localPath, error: errorMessage(error) }, 'Failed to clean working copy');
    }
  }
}
