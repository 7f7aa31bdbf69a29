import { describe, expect, it, vi } from 'vitest';
import {
  GitOpsStrategy,
  NotFoundError,
  type PullRequestHost,
  type PullRequestOutcome,
} from '@autodeploy/gitops';
import { DeployModelDispatcher } from '../src/deploy/deploy-model-dispatcher.js';
import { GitOpsDeployModel, type DeployModel } from '../src/deploy/deploy-model.js';
import { apiProject, pullRequestResult } from './helpers/fixtures.js';

class FixedOutcomeStrategy extends GitOpsStrategy {
  readonly kind = 'kustomize' as const;

  constructor(private readonly outcome: PullRequestOutcome) {
    super({ findTag: async () => 'main-0002' });
  }

  protected async preparePullRequest(): Promise<PullRequestOutcome> {
    return this.outcome;
  }
}

const success: PullRequestOutcome = {
  status: 'Success',
  pullRequest: { id: 'PR_kwDOA', number: 7, url: 'https://github.com/acme/config/pull/7' },
  branch: 'bot/docker-image-tag-api-staging-main-0002',
};

const fakeHost = (): PullRequestHost => ({
  openPullRequest: vi.fn(),
  mergePullRequest: vi.fn(async () => undefined),
  readFile: vi.fn(),
});

describe('GitOpsDeployModel', () => {
  it('merges the pull request when asked to wait', async () => {
    const host = fakeHost();
    const model = new GitOpsDeployModel(new FixedOutcomeStrategy(success), host);

    const result = await model.deploy(apiProject, 'staging', { branch: 'main', wait: true });

    expect(result).toEqual({ outcome: success, merged: true });
    expect(host.mergePullRequest).toHaveBeenCalledWith({ owner: 'acme', repo: 'config', number: 7 });
  });

  it('leaves the pull request open without wait', async () => {
    const host = fakeHost();
    const model = new GitOpsDeployModel(new FixedOutcomeStrategy(success), host);

    await expect(model.deploy(apiProject, 'staging', { branch: 'main', wait: false })).resolves.toEqual({
      outcome: success,
      merged: false,
    });
    expect(host.mergePullRequest).not.toHaveBeenCalled();
  });

  it('has nothing to merge when already deployed', async () => {
    const host = fakeHost();
    const model = new GitOpsDeployModel(new FixedOutcomeStrategy({ status: 'AlreadyDeployed' }), host);

    await expect(model.deploy(apiProject, 'staging', { branch: 'main', wait: true })).resolves.toEqual({
      outcome: { status: 'AlreadyDeployed' },
      merged: false,
    });
    expect(host.mergePullRequest).not.toHaveBeenCalled();
  });

  it('rejects with the error of a failed outcome', async () => {
    const model = new GitOpsDeployModel(new FixedOutcomeStrategy(success), fakeHost());

    await expect(model.deploy(apiProject, 'sandbox', { branch: 'main', wait: true })).rejects.toThrow(
      new NotFoundError('phase sandbox not found for project api')
    );
  });
});

describe('DeployModelDispatcher', () => {
  const modelReturning = (branch: string): DeployModel => ({
    deploy: vi.fn(async () => pullRequestResult(branch)),
  });

  it('routes by the phase kind with the canonical phase name', async () => {
    const kustomize = modelReturning('kustomize-branch');
    const kanvas = modelReturning('kanvas-branch');
    const dispatcher = new DeployModelDispatcher({ kustomize, kanvas });

    const result = await dispatcher.deploy(apiProject, 'prd', { branch: 'main', wait: false });

    expect(result).toEqual(pullRequestResult('kanvas-branch'));
    expect(kanvas.deploy).toHaveBeenCalledWith(apiProject, 'production', { branch: 'main', wait: false });
    expect(kustomize.deploy).not.toHaveBeenCalled();
    expect(dispatcher.modelFor('kustomize')).toBe(kustomize);
  });

  it('rejects phases the project does not declare', async () => {
    const dispatcher = new DeployModelDispatcher({ kustomize: modelReturning('a'), kanvas: modelReturning('b') });

    await expect(dispatcher.deploy(apiProject, 'sandbox', { branch: 'main', wait: false })).rejects.toBeInstanceOf(
      NotFoundError
    );
  });
});
