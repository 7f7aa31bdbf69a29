import path from 'node:path';
import { logger } from '@autodeploy/logger';
import { NotFoundError } from '../errors.js';
import type { PullRequestHost } from '../github/github-client.js';
import {
  CACHE_PREFIX_KEY,
  CachePrefixOverwrite,
  ImageTagOverwrite,
} from '../git/overwrite-strategies.js';
import { parseRepositoryUrl } from '../git/repository-url.js';
import type { SourceControlOperator } from '../git/source-control-operator.js';
import type { Phase, PullRequestOutcome, VersionSource } from '../types.js';
import { GitOpsStrategy, dockerImageTagBranch, type ResolvedRequest } from './gitops-strategy.js';

export interface DirectMutationStrategyOptions {
  operator: SourceControlOperator;
  versionSource: VersionSource;
  host: PullRequestHost;
  now?: () => Date;
}

/**
 * The ConfigMap that sits next to a kustomization, if the phase points at one.
 */
export function siblingConfigMapPath(kustomizationPath: string): string | undefined {
  if (path.posix.basename(kustomizationPath) !== 'kustomization.yaml') {
    return undefined;
  }
  return path.posix.join(path.posix.dirname(kustomizationPath), 'configmap.yaml');
}

export function imageTagCommitMessage(phase: Phase, tag: string): string {
  return `Change docker image tag. target: ${phase.path}, phase: ${phase.name}, tag: ${tag}.`;
}

/**
 * Edits the phase's kustomization in the config repository itself and opens
 * a pull request for the pushed branch.
 */
export class DirectMutationStrategy extends GitOpsStrategy {
  readonly kind = 'kustomize' as const;

  private readonly operator: SourceControlOperator;
  private readonly host: PullRequestHost;
  private readonly now: () => Date;

  constructor(options: DirectMutationStrategyOptions) {
    super(options.versionSource);
    this.operator = options.operator;
    this.host = options.host;
    this.now = options.now ?? (() => new Date());
  }

  protected async preparePullRequest({ project, phase, tag, requester }: ResolvedRequest): Promise<PullRequestOutcome> {
    const operator = this.operator;
    const branch = dockerImageTagBranch(project.id, phase.name, tag);
    const manifestPath = path.posix.normalize(phase.path);

    const pushed = await operator.exclusive(async () => {
      await operator.createAndCheckoutBranch(branch);

      const found = await operator.commitOverwrite(branch, manifestPath, new ImageTagOverwrite(project.imageName, tag));
      if (!found) {
        throw new NotFoundError(`manifest ${manifestPath} not found in ${operator.repository}`, {
          path: manifestPath,
          repository: operator.repository,
        });
      }
      if (!(await operator.stagedFiles()).includes(manifestPath)) {
        logger.info({ project: project.id, phase: phase.name, tag }, 'Image tag is already deployed');
        return false;
      }

      const configMapPath = siblingConfigMapPath(manifestPath);
      if (configMapPath) {
        await operator.commitOverwrite(branch, configMapPath, new CachePrefixOverwrite(CACHE_PREFIX_KEY, this.now));
      }

      await operator.verify();
      await operator.commit(imageTagCommitMessage(phase, tag));
      await operator.push(branch);
      return true;
    });

    if (!pushed) {
      return { status: 'AlreadyDeployed' };
    }

    const { owner, repo } = parseRepositoryUrl(operator.repository);
    const pullRequest = await this.host.openPullRequest({
      owner,
      repo,
      head: branch,
      base: operator.defaultBranch,
      title: `Deploy ${project.id} ${phase.name}: ${tag}`,
      body: `Change the image tag of \`${project.imageName}\` in \`${phase.path}\` to \`${tag}\`.`,
      assignees: requester?.githubLogin ? [requester.githubLogin] : [],
    });

    return { status: 'Success', pullRequest, branch };
  }
}
