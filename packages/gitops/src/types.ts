import type { Phase, PhaseName, Project, RegistryCoordinates, User } from '@autodeploy/config';
import type { GitOpsError } from './errors.js';

export interface ImageTagVars {
  branch: string;
  phase?: PhaseName;
}

export interface TagQuery extends RegistryCoordinates {
  vars: ImageTagVars;
}

/**
 * Answers "which image tag should be deployed".
 */
export interface VersionSource {
  findTag(query: TagQuery): Promise<string>;
}

export interface RevisionContext {
  project: Project;
  phase: Phase;
}

/**
 * Answers "which image tag is live right now". `undefined` means the tracker
 * cannot tell for this phase, which never equals a desired tag.
 */
export interface RevisionTracker {
  getCurrentRevision(context: RevisionContext): Promise<string | undefined>;
}

export interface PullRequestRef {
  id: string;
  number: number;
  url: string;
}

export type PullRequestOutcome =
  | { status: 'Success'; pullRequest: PullRequestRef; branch: string }
  | { status: 'AlreadyDeployed' }
  | { status: 'Failed'; error: GitOpsError };

export type DeployStatus = PullRequestOutcome['status'];

export function tagQueryFor(project: Project, vars: ImageTagVars): TagQuery {
  return { ...project.registry, vars };
}

export type { Phase, PhaseName, Project, User };
