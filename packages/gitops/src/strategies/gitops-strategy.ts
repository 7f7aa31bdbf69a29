import { findPhase, type Phase, type PhaseKind, type Project, type User } from '@autodeploy/config';
import { logger } from '@autodeploy/logger';
import { GitOpsError, NotFoundError } from '../errors.js';
import { tagQueryFor, type PullRequestOutcome, type VersionSource } from '../types.js';

export interface PrepareRequest {
  project: Project;
  phaseName: string;
  /** Source branch the image was built from; defaults to the project's default branch. */
  branch?: string;
  requester?: User;
  /** Resolved from the registry when empty. */
  tag?: string;
}

export interface ResolvedRequest {
  project: Project;
  phase: Phase;
  tag: string;
  requester?: User;
}

/**
 * Head branch of every deploy pull request. Downstream tooling parses it.
 */
export function dockerImageTagBranch(projectId: string, phaseName: string, tag: string): string {
  return `bot/docker-image-tag-${projectId}-${phaseName}-${tag}`;
}

/**
 * Turns a desired (project, phase, tag) into a pull request. There are exactly
 * two strategies, one per phase kind.
 */
export abstract class GitOpsStrategy {
  abstract readonly kind: PhaseKind;

  protected constructor(protected readonly versionSource: VersionSource) {}

  async prepare(request: PrepareRequest): Promise<PullRequestOutcome> {
    const { project, phaseName, requester } = request;

    try {
      const phase = findPhase(project, phaseName);
      if (!phase) {
        throw new NotFoundError(`phase ${phaseName} not found for project ${project.id}`, {
          project: project.id,
          phase: phaseName,
        });
      }

      const tag =
        request.tag ||
        (await this.versionSource.findTag(
          tagQueryFor(project, { branch: request.branch || project.defaultBranch, phase: phase.name })
        ));

      return await this.preparePullRequest({ project, phase, tag, requester });
    } catch (error) {
      if (!(error instanceof GitOpsError)) {
        throw error;
      }
      logger.error({
        strategy: this.kind,
        project: project.id,
        phase: phaseName,
        code: error.code,
        error: error.message,
      }, 'Failed to prepare deployment');
      return { status: 'Failed', error };
    }
  }

  protected abstract preparePullRequest(request: ResolvedRequest): Promise<PullRequestOutcome>;
}
