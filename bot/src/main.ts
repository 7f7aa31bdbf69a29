/**
 * Autodeploy Application
 * Wires the catalog, the GitOps engine, the watcher and the chat listener.
 */

import path from 'node:path';
import { ECRClient } from '@aws-sdk/client-ecr';
import { Octokit } from '@octokit/rest';
import type { Client } from 'discord.js';
import { ProjectCatalog, type Env, type PhaseKind } from '@autodeploy/config';
import {
  CommandApplyTool,
  DelegatedApplyStrategy,
  DirectMutationStrategy,
  EcrVersionSource,
  GitHubClient,
  KustomizationRevisionTracker,
  SourceControlOperator,
  errorMessage,
  parseRepositoryUrl,
  type GitOpsStrategy,
  type PullRequestHost,
  type VersionSource,
} from '@autodeploy/gitops';
import { logger } from '@autodeploy/logger';
import { CommandHandler } from './chat/command-handler.js';
import { createDiscordClient, setupMessageHandler } from './chat/discord-listener.js';
import { DeployModelDispatcher } from './deploy/deploy-model-dispatcher.js';
import { GitOpsDeployModel } from './deploy/deploy-model.js';
import { DiscordNotifier } from './notify/discord-notifier.js';
import { DeployWatcher } from './watcher/deploy-watcher.js';

interface StrategyDependencies {
  env: Env;
  configOperator: SourceControlOperator;
  versionSource: VersionSource;
  host: PullRequestHost;
}

export function createStrategy(kind: PhaseKind, deps: StrategyDependencies): GitOpsStrategy {
  const { env, configOperator, versionSource, host } = deps;

  switch (kind) {
    case 'kustomize':
      return new DirectMutationStrategy({ operator: configOperator, versionSource, host });
    case 'kanvas':
      return new DelegatedApplyStrategy({
        versionSource,
        applyTool: new CommandApplyTool(env.APPLY_TOOL_COMMAND),
        organization: env.GITHUB_ORG,
        token: env.GITHUB_TOKEN,
        createOperator: (repository, defaultBranch) =>
          new SourceControlOperator({
            repository,
            username: env.GIT_USERNAME,
            token: env.GITHUB_TOKEN,
            defaultBranch,
            authorEmail: env.GIT_AUTHOR_EMAIL,
          }),
      });
  }
}

export class AutodeployApplication {
  private readonly catalog: ProjectCatalog;
  private readonly client: Client;
  private watcher?: DeployWatcher;
  private reloadTimer?: NodeJS.Timeout;
  private unsubscribeReload?: () => void;

  constructor(private readonly env: Env) {
    this.catalog = new ProjectCatalog(path.resolve(env.PROJECTS_FILE));
    this.client = createDiscordClient();
  }

  async initialize(): Promise<void> {
    const env = this.env;
    logger.info({ configRepository: env.CONFIG_REPOSITORY, projectsFile: env.PROJECTS_FILE }, 'Starting autodeploy');

    await this.catalog.reload();

    const host = new GitHubClient(new Octokit({ auth: env.GITHUB_TOKEN }));
    const versionSource = new EcrVersionSource(new ECRClient({ region: env.AWS_REGION }));
    const configOperator = new SourceControlOperator({
      repository: env.CONFIG_REPOSITORY,
      username: env.GIT_USERNAME,
      token: env.GITHUB_TOKEN,
      defaultBranch: env.CONFIG_DEFAULT_BRANCH,
      gitRoot: env.GIT_ROOT,
      authorEmail: env.GIT_AUTHOR_EMAIL,
    });

    try {
      await configOperator.exclusive(() => configOperator.clone());
    } catch (error) {
      logger.error({ repository: env.CONFIG_REPOSITORY, error: errorMessage(error) }, 'Initial clone of the config repository failed');
    }

    const deps: StrategyDependencies = { env, configOperator, versionSource, host };
    const dispatcher = new DeployModelDispatcher({
      kustomize: new GitOpsDeployModel(createStrategy('kustomize', deps), host),
      kanvas: new GitOpsDeployModel(createStrategy('kanvas', deps), host),
    });

    const { owner, repo } = parseRepositoryUrl(env.CONFIG_REPOSITORY);
    const watcher = new DeployWatcher({
      versionSource,
      revisionTracker: new KustomizationRevisionTracker(host, { owner, repo }, env.CONFIG_DEFAULT_BRANCH),
      deployer: dispatcher,
      notifier: new DiscordNotifier(this.client),
      intervalMs: env.AUTO_DEPLOY_INTERVAL_SECONDS * 1000,
    });
    watcher.sync(this.catalog.current.projects);
    this.unsubscribeReload = this.catalog.onReload((snapshot) => watcher.sync(snapshot.projects));
    this.watcher = watcher;

    if (env.RELOAD_INTERVAL_SECONDS > 0) {
      this.reloadTimer = setInterval(() => {
        this.catalog.reload().catch((error: unknown) => {
          logger.error({ error: errorMessage(error) }, 'Periodic reload failed');
        });
      }, env.RELOAD_INTERVAL_SECONDS * 1000);
    }

    setupMessageHandler(this.client, new CommandHandler({ catalog: this.catalog, deployer: dispatcher }));

    try {
      await this.client.login(env.DISCORD_TOKEN);
      logger.info('Discord client logged in successfully');
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Failed to login to Discord');
      throw error;
    }
  }

  async shutdown(): Promise<void> {
    if (this.reloadTimer) {
      clearInterval(this.reloadTimer);
    }
    this.unsubscribeReload?.();
    this.watcher?.stop();
    await this.client.destroy();
    logger.info('Autodeploy stopped');
  }
}
