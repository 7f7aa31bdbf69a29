import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Project } from '@autodeploy/config';
import type { RevisionTracker, VersionSource } from '@autodeploy/gitops';
import type { DeployModel, DeployResult } from '../src/deploy/deploy-model.js';
import type { Notifier } from '../src/notify/notifier.js';
import { DeployWatcher } from '../src/watcher/deploy-watcher.js';
import { apiProject, pullRequestResult, stagingPhase } from './helpers/fixtures.js';

const BRANCH = 'bot/docker-image-tag-api-staging-main-0002';

describe('DeployWatcher', () => {
  let versionSource: VersionSource;
  let revisionTracker: RevisionTracker;
  let deployer: DeployModel;
  let notifier: Notifier;
  let watcher: DeployWatcher;

  beforeEach(() => {
    versionSource = { findTag: vi.fn(async () => 'main-0002') };
    revisionTracker = { getCurrentRevision: vi.fn(async () => 'main-0001') };
    deployer = { deploy: vi.fn(async () => pullRequestResult(BRANCH)) };
    notifier = { notify: vi.fn(async () => undefined) };
    watcher = new DeployWatcher({ versionSource, revisionTracker, deployer, notifier, intervalMs: 1000 });
  });

  afterEach(() => {
    watcher.stop();
    vi.useRealTimers();
  });

  describe('checkAndDeploy', () => {
    it('deploys the newest tag and notifies the phase channel', async () => {
      await expect(watcher.checkAndDeploy(apiProject, stagingPhase)).resolves.toBe('deployed');

      expect(versionSource.findTag).toHaveBeenCalledWith({
        registryId: '123456789012',
        repository: 'api',
        tagPattern: '^{{branch}}-',
        vars: { branch: 'main', phase: 'staging' },
      });
      expect(deployer.deploy).toHaveBeenCalledWith(apiProject, 'staging', { branch: 'main', wait: true, tag: 'main-0002' });
      expect(notifier.notify).toHaveBeenCalledWith('42', { project: 'api', phase: 'staging', tag: 'main-0002' });
    });

    it('skips without deploying or notifying when the tags are equal', async () => {
      vi.mocked(revisionTracker.getCurrentRevision).mockResolvedValue('main-0002');

      await expect(watcher.checkAndDeploy(apiProject, stagingPhase)).resolves.toBe('skipped');

      expect(deployer.deploy).not.toHaveBeenCalled();
      expect(notifier.notify).not.toHaveBeenCalled();
    });

    it('skips when a tag lookup fails', async () => {
      vi.mocked(versionSource.findTag).mockRejectedValue(new Error('registry unavailable'));

      await expect(watcher.checkAndDeploy(apiProject, stagingPhase)).resolves.toBe('skipped');
      expect(deployer.deploy).not.toHaveBeenCalled();
    });

    it('does not notify when nothing changed', async () => {
      vi.mocked(deployer.deploy).mockResolvedValue({ outcome: { status: 'AlreadyDeployed' }, merged: false });

      await expect(watcher.checkAndDeploy(apiProject, stagingPhase)).resolves.toBe('already-deployed');
      expect(notifier.notify).not.toHaveBeenCalled();
    });

    it('does not notify phases without a channel', async () => {
      await expect(
        watcher.checkAndDeploy(apiProject, { ...stagingPhase, notifyChannel: undefined })
      ).resolves.toBe('deployed');
      expect(notifier.notify).not.toHaveBeenCalled();
    });

    it('contains deploy failures', async () => {
      vi.mocked(deployer.deploy).mockRejectedValue(new Error('push rejected'));

      await expect(watcher.checkAndDeploy(apiProject, stagingPhase)).resolves.toBe('failed');
      expect(notifier.notify).not.toHaveBeenCalled();
    });
  });

  describe('sync', () => {
    it('runs one task per phase with auto deploy enabled', () => {
      watcher.sync([apiProject]);
      expect(watcher.keys).toEqual(['api:staging']);

      const disabled: Project = {
        ...apiProject,
        phases: apiProject.phases.map((phase) => ({ ...phase, autoDeploy: phase.name === 'production' })),
      };
      watcher.sync([disabled]);
      expect(watcher.keys).toEqual(['api:production']);

      watcher.sync([]);
      expect(watcher.keys).toEqual([]);
    });

    it('ticks on the interval and stops with the task', async () => {
      vi.useFakeTimers();
      watcher.sync([apiProject]);

      await vi.advanceTimersByTimeAsync(999);
      expect(versionSource.findTag).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(deployer.deploy).toHaveBeenCalledTimes(1);

      watcher.sync([]);
      await vi.advanceTimersByTimeAsync(5000);
      expect(versionSource.findTag).toHaveBeenCalledTimes(1);
    });

    it('uses the values of the latest snapshot on later ticks', async () => {
      vi.useFakeTimers();
      watcher.sync([apiProject]);
      watcher.sync([{ ...apiProject, defaultBranch: 'develop' }]);

      await vi.advanceTimersByTimeAsync(1000);

      expect(versionSource.findTag).toHaveBeenCalledWith(
        expect.objectContaining({ vars: { branch: 'develop', phase: 'staging' } })
      );
    });

    it('drops a tick while the previous one is still deploying', async () => {
      vi.useFakeTimers();
      let finishDeploy: (result: DeployResult) => void = () => undefined;
      vi.mocked(deployer.deploy).mockImplementationOnce(
        () => new Promise<DeployResult>((resolve) => {
          finishDeploy = resolve;
        })
      );
      watcher.sync([apiProject]);

      await vi.advanceTimersByTimeAsync(1000);
      expect(deployer.deploy).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1000);
      expect(versionSource.findTag).toHaveBeenCalledTimes(1);

      finishDeploy(pullRequestResult(BRANCH));
      await vi.advanceTimersByTimeAsync(1000);
      expect(versionSource.findTag).toHaveBeenCalledTimes(2);
      expect(deployer.deploy).toHaveBeenCalledTimes(2);
    });
  });
});
