import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';
import { parse } from 'yaml';
import { CloneError, DriftError, NotFoundError, TransportError } from '../src/errors.js';
import type { PullRequestHost } from '../src/github/github-client.js';
import { PathLock } from '../src/git/path-lock.js';
import { SourceControlOperator } from '../src/git/source-control-operator.js';
import {
  DirectMutationStrategy,
  imageTagCommitMessage,
  siblingConfigMapPath,
} from '../src/strategies/direct-mutation-strategy.js';
import type { VersionSource } from '../src/types.js';
import { apiProject, requester, stagingPhase } from './helpers/fixtures.js';
import { FakeGit } from './helpers/fake-git.js';

const MANIFEST = 'overlays/staging/kustomization.yaml';
const CONFIG_MAP = 'overlays/staging/configmap.yaml';
const BRANCH = 'bot/docker-image-tag-api-staging-main-0002';

const files = {
  [MANIFEST]: 'apiVersion: kustomize.config.k8s.io/v1beta1\nkind: Kustomization\nimages:\n  - name: api\n    newTag: main-0001\n',
  [CONFIG_MAP]: 'apiVersion: v1\nkind: ConfigMap\ndata:\n  MEMCACHED_PREFIX: old-prefix\n',
};

describe('siblingConfigMapPath', () => {
  it('only applies to kustomization files', () => {
    expect(siblingConfigMapPath('overlays/staging/kustomization.yaml')).toBe('overlays/staging/configmap.yaml');
    expect(siblingConfigMapPath('overlays/staging/deployment.yaml')).toBeUndefined();
  });
});

describe('DirectMutationStrategy', () => {
  let root: string;
  let git: FakeGit;
  let operator: SourceControlOperator;
  let host: PullRequestHost;
  let versionSource: VersionSource;
  let strategy: DirectMutationStrategy;

  const setUp = async (seed: Record<string, string>) => {
    git = new FakeGit(seed);
    operator = new SourceControlOperator({
      repository: 'https://github.com/acme/config.git',
      username: 'autodeploy',
      token: 'test-secret',
      gitRoot: root,
      git,
      locks: new PathLock(),
    });
    await operator.clone();
    strategy = new DirectMutationStrategy({
      operator,
      versionSource,
      host,
      now: () => new Date(2024, 4, 6, 7, 8, 9),
    });
  };

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'direct-mutation-test-'));
    host = {
      openPullRequest: vi.fn(async () => ({ id: 'PR_kwDOA', number: 7, url: 'https://github.com/acme/config/pull/7' })),
      mergePullRequest: vi.fn(),
      readFile: vi.fn(),
    };
    versionSource = { findTag: vi.fn(async () => 'main-0002') };
    await setUp(files);
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('commits the new tag, busts the cache prefix and opens a pull request', async () => {
    const outcome = await strategy.prepare({ project: apiProject, phaseName: 'stg', requester });

    expect(outcome).toEqual({
      status: 'Success',
      pullRequest: { id: 'PR_kwDOA', number: 7, url: 'https://github.com/acme/config/pull/7' },
      branch: BRANCH,
    });
    expect(versionSource.findTag).toHaveBeenCalledWith({
      registryId: '123456789012',
      repository: 'api',
      tagPattern: '^{{branch}}-',
      vars: { branch: 'main', phase: 'staging' },
    });

    const manifest: unknown = parse((await operator.readFile(MANIFEST)) ?? '');
    const configMap: unknown = parse((await operator.readFile(CONFIG_MAP)) ?? '');
    expect(manifest).toMatchObject({ images: [{ name: 'api', newTag: 'main-0002' }] });
    expect(configMap).toMatchObject({ data: { MEMCACHED_PREFIX: '2024-05-06T07:08:09' } });

    expect(git.commits).toEqual([imageTagCommitMessage(stagingPhase, 'main-0002')]);
    expect(git.commits[0]).toBe(
      'Change docker image tag. target: overlays/staging/kustomization.yaml, phase: staging, tag: main-0002.'
    );
    expect(git.pushed).toEqual([`refs/heads/${BRANCH}:refs/heads/${BRANCH}`]);
    expect(host.openPullRequest).toHaveBeenCalledWith(expect.objectContaining({
      owner: 'acme',
      repo: 'config',
      head: BRANCH,
      base: 'master',
      assignees: ['octo-dev'],
    }));
  });

  it('uses an explicit tag without asking the registry', async () => {
    const outcome = await strategy.prepare({ project: apiProject, phaseName: 'staging', tag: 'hotfix-0003' });

    expect(outcome).toMatchObject({ status: 'Success', branch: 'bot/docker-image-tag-api-staging-hotfix-0003' });
    expect(versionSource.findTag).not.toHaveBeenCalled();
    expect(host.openPullRequest).toHaveBeenCalledWith(expect.objectContaining({ assignees: [] }));
  });

  it('reports AlreadyDeployed when the tag is unchanged', async () => {
    const outcome = await strategy.prepare({ project: apiProject, phaseName: 'staging', tag: 'main-0001' });

    expect(outcome).toEqual({ status: 'AlreadyDeployed' });
    expect(git.commandsOf('commit')).toEqual([]);
    expect(git.pushed).toEqual([]);
    expect(host.openPullRequest).not.toHaveBeenCalled();
  });

  it('reports AlreadyDeployed for an unindented kustomization that already has the tag', async () => {
    await setUp({ ...files, [MANIFEST]: 'images:\n- name: api\n  newTag: main-0001\n' });

    const outcome = await strategy.prepare({ project: apiProject, phaseName: 'staging', tag: 'main-0001' });

    expect(outcome).toEqual({ status: 'AlreadyDeployed' });
    expect(await operator.readFile(CONFIG_MAP)).toBe(files[CONFIG_MAP]);
    expect(git.pushed).toEqual([]);
    expect(host.openPullRequest).not.toHaveBeenCalled();
  });

  it('fails when the manifest is missing from the config repository', async () => {
    await setUp({ [CONFIG_MAP]: files[CONFIG_MAP] });

    const outcome = await strategy.prepare({ project: apiProject, phaseName: 'staging', tag: 'main-0002' });

    expect(outcome).toEqual({ status: 'Failed', error: expect.any(NotFoundError) });
    expect(outcome.status === 'Failed' && outcome.error.message).toBe(
      'manifest overlays/staging/kustomization.yaml not found in https://github.com/acme/config.git'
    );
    expect(git.pushed).toEqual([]);
    expect(host.openPullRequest).not.toHaveBeenCalled();
  });

  it('clones again after a failed clone and deploys', async () => {
    git.failNext('clone');
    await expect(operator.clone()).rejects.toBeInstanceOf(CloneError);

    const outcome = await strategy.prepare({ project: apiProject, phaseName: 'staging', tag: 'main-0002' });

    expect(outcome).toMatchObject({ status: 'Success', branch: BRANCH });
    expect(git.commandsOf('clone')).toHaveLength(3);
    expect(git.pushed).toEqual([`refs/heads/${BRANCH}:refs/heads/${BRANCH}`]);
  });

  it('fails without pushing when the working copy has drifted', async () => {
    git.extraStatus = ['?? overlays/staging/debug.yaml'];

    const outcome = await strategy.prepare({ project: apiProject, phaseName: 'staging' });

    expect(outcome.status).toBe('Failed');
    expect(outcome.status === 'Failed' && outcome.error).toBeInstanceOf(DriftError);
    expect(git.pushed).toEqual([]);
    expect(host.openPullRequest).not.toHaveBeenCalled();
  });

  it('fails for a phase the project does not have', async () => {
    const outcome = await strategy.prepare({ project: apiProject, phaseName: 'sandbox' });

    expect(outcome).toEqual({ status: 'Failed', error: expect.any(NotFoundError) });
    expect(outcome.status === 'Failed' && outcome.error.message).toBe('phase sandbox not found for project api');
  });

  it('fails when the push is rejected', async () => {
    git.failNext('push');

    const outcome = await strategy.prepare({ project: apiProject, phaseName: 'staging' });

    expect(outcome.status === 'Failed' && outcome.error).toBeInstanceOf(TransportError);
    expect(host.openPullRequest).not.toHaveBeenCalled();
  });
});
