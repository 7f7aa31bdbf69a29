import type { Project, User } from '@autodeploy/config';
import {
  type GitOpsStrategy,
  type PullRequestHost,
  type PullRequestOutcome,
  parsePullRequestUrl,
} from '@autodeploy/gitops';
import { logger } from '@autodeploy/logger';

export interface DeployOptions {
  /** Branch the image was built from. */
  branch: string;
  /** Merge the pull request before returning. */
  wait: boolean;
  tag?: string;
  requester?: User;
}

export type DeployOutcome = Exclude<PullRequestOutcome, { status: 'Failed' }>;

export interface DeployResult {
  outcome: DeployOutcome;
  merged: boolean;
}

/**
 * Performs the deployment for one phase kind. Rejects when the deploy failed.
 */
export interface DeployModel {
  deploy(project: Project, phaseName: string, options: DeployOptions): Promise<DeployResult>;
}

export class GitOpsDeployModel implements DeployModel {
  constructor(
    private readonly strategy: GitOpsStrategy,
    private readonly host: PullRequestHost
  ) {}

  async deploy(project: Project, phaseName: string, options: DeployOptions): Promise<DeployResult> {
    const outcome = await this.strategy.prepare({
      project,
      phaseName,
      branch: options.branch,
      requester: options.requester,
      tag: options.tag,
    });

    if (outcome.status === 'Failed') {
      throw outcome.error;
    }
    if (outcome.status === 'AlreadyDeployed' || !options.wait) {
      return { outcome, merged: false };
    }

    await this.host.mergePullRequest(parsePullRequestUrl(outcome.pullRequest.url));
    logger.info({
      project: project.id,
      phase: phaseName,
      pullRequest: outcome.pullRequest.url,
    }, 'Deploy pull request merged');

    return { outcome, merged: true };
  }
}
