/**
 * Deploy Watcher
 * One periodic task per (project, phase) with auto deploy enabled. Each tick
 * compares the live tag with the newest matching image and deploys when they
 * differ.
 */

import type { Phase, Project } from '@autodeploy/config';
import { errorMessage, tagQueryFor, type RevisionTracker, type VersionSource } from '@autodeploy/gitops';
import { logger } from '@autodeploy/logger';
import type { DeployModel } from '../deploy/deploy-model.js';
import type { Notifier } from '../notify/notifier.js';

export type TickResult = 'skipped' | 'deployed' | 'already-deployed' | 'failed';

export interface DeployWatcherOptions {
  versionSource: VersionSource;
  revisionTracker: RevisionTracker;
  deployer: DeployModel;
  notifier: Notifier;
  intervalMs: number;
}

interface WatchTask {
  readonly key: string;
  project: Project;
  phase: Phase;
  readonly controller: AbortController;
  running: boolean;
}

export function watchKey(project: Project, phase: Phase): string {
  return `${project.id}:${phase.name}`;
}

export class DeployWatcher {
  private readonly tasks = new Map<string, WatchTask>();

  constructor(private readonly options: DeployWatcherOptions) {}

  get keys(): string[] {
    return [...this.tasks.keys()];
  }

  /**
   * Align running tasks with a project snapshot. New pairs start, removed or
   * disabled pairs stop, and existing tasks pick up the new values on their
   * next tick.
   */
  sync(projects: readonly Project[]): void {
    const wanted = new Map<string, { project: Project; phase: Phase }>();
    for (const project of projects) {
      for (const phase of project.phases) {
        if (phase.autoDeploy) {
          wanted.set(watchKey(project, phase), { project, phase });
        }
      }
    }

    for (const [key, task] of this.tasks) {
      const next = wanted.get(key);
      if (!next) {
        this.stopTask(task);
        continue;
      }
      task.project = next.project;
      task.phase = next.phase;
      wanted.delete(key);
    }

    for (const [key, { project, phase }] of wanted) {
      this.startTask(key, project, phase);
    }
  }

  stop(): void {
    for (const task of this.tasks.values()) {
      this.stopTask(task);
    }
  }

  /**
   * One tick. Never rejects.
   */
  async checkAndDeploy(project: Project, phase: Phase, signal?: AbortSignal): Promise<TickResult> {
    const context = { project: project.id, phase: phase.name };
    const { versionSource, revisionTracker, deployer, notifier } = this.options;

    let desired: string;
    let current: string | undefined;
    try {
      desired = await versionSource.findTag(
        tagQueryFor(project, { branch: project.defaultBranch, phase: phase.name })
      );
      current = await revisionTracker.getCurrentRevision({ project, phase });
    } catch (error) {
      logger.info({ ...context, error: errorMessage(error) }, 'Skipping auto deploy: tag lookup failed');
      return 'skipped';
    }

    if (desired === current) {
      logger.info({ ...context, tag: desired }, 'Skipping auto deploy: already on the newest tag');
      return 'skipped';
    }
    if (signal?.aborted) {
      return 'skipped';
    }

    logger.info({ ...context, current, desired }, 'Starting auto deploy');

    try {
      const { outcome } = await deployer.deploy(project, phase.name, {
        branch: project.defaultBranch,
        wait: true,
        tag: desired,
      });

      if (outcome.status === 'AlreadyDeployed') {
        logger.info({ ...context, tag: desired }, 'Auto deploy found nothing to change');
        return 'already-deployed';
      }

      logger.info({ ...context, tag: desired, pullRequest: outcome.pullRequest.url }, 'Auto deploy finished');
      if (phase.notifyChannel) {
        await notifier.notify(phase.notifyChannel, { project: project.id, phase: phase.name, tag: desired });
      }
      return 'deployed';
    } catch (error) {
      logger.error({ ...context, tag: desired, error: errorMessage(error) }, 'Auto deploy failed');
      return 'failed';
    }
  }

  private startTask(key: string, project: Project, phase: Phase): void {
    const task: WatchTask = { key, project, phase, controller: new AbortController(), running: false };

    const timer = setInterval(() => {
      this.tick(task).catch((error: unknown) => {
        logger.error({ task: key, error: errorMessage(error) }, 'Auto deploy tick crashed');
      });
    }, this.options.intervalMs);
    task.controller.signal.addEventListener('abort', () => clearInterval(timer), { once: true });

    this.tasks.set(key, task);
    logger.info({ task: key, intervalMs: this.options.intervalMs }, 'Auto deploy task started');
  }

  private stopTask(task: WatchTask): void {
    task.controller.abort();
    this.tasks.delete(task.key);
    logger.info({ task: task.key }, 'Auto deploy task stopped');
  }

  private async tick(task: WatchTask): Promise<void> {
    if (task.running) {
      logger.warn({ task: task.key }, 'Previous auto deploy check is still running, dropping tick');
      return;
    }

    task.running = true;
    try {
      // Captured for the whole tick; a reload only affects later ticks.
      const { project, phase } = task;
      await this.checkAndDeploy(project, phase, task.controller.signal);
    } finally {
      task.running = false;
    }
  }
}
