/**
 * GitOps Package
 * Deployment orchestration engine
 */

export * from './errors.js';
export * from './types.js';

export { SourceControlOperator, parsePorcelainStatus } from './git/source-control-operator.js';
export type { OperatorState, SourceControlOperatorOptions, StatusEntry } from './git/source-control-operator.js';
export { CliGitExecutor, describeGitCommand } from './git/git-executor.js';
export type { GitExecutor, GitResult, GitRunOptions } from './git/git-executor.js';
export {
  ImageTagOverwrite,
  CachePrefixOverwrite,
  CACHE_PREFIX_KEY,
  formatCachePrefix,
  serializeLike,
} from './git/overwrite-strategies.js';
export type { OverwriteStrategy } from './git/overwrite-strategies.js';
export { PathLock, repositoryLocks } from './git/path-lock.js';
export { parseRepositoryUrl, repositoryUrl, localRepositoryPath } from './git/repository-url.js';
export type { RepositoryCoordinates } from './git/repository-url.js';

export { GitOpsStrategy, dockerImageTagBranch } from './strategies/gitops-strategy.js';
export type { PrepareRequest, ResolvedRequest } from './strategies/gitops-strategy.js';
export { DirectMutationStrategy, siblingConfigMapPath, imageTagCommitMessage } from './strategies/direct-mutation-strategy.js';
export type { DirectMutationStrategyOptions } from './strategies/direct-mutation-strategy.js';
export { DelegatedApplyStrategy, resolveApplyConfigPath } from './strategies/delegated-apply-strategy.js';
export type { DelegatedApplyStrategyOptions, OperatorFactory } from './strategies/delegated-apply-strategy.js';

export { CommandApplyTool, parseApplyOutput } from './apply/apply-tool.js';
export type { ApplyTool, ApplyRequest, ApplyResult, AppliedPullRequest } from './apply/apply-tool.js';
export { GitHubClient, parsePullRequestUrl } from './github/github-client.js';
export type {
  PullRequestHost,
  RepositoryName,
  OpenPullRequestInput,
  PullRequestLocation,
} from './github/github-client.js';
export { EcrVersionSource, expandTagPattern } from './registry/ecr-version-source.js';
export type { DescribeImages } from './registry/ecr-version-source.js';
export { KustomizationRevisionTracker } from './revision/kustomization-revision-tracker.js';
