import {
  findPhase,
  findProject,
  findUser,
  type ProjectCatalog,
  type ProjectSnapshot,
} from '@autodeploy/config';
import { errorMessage } from '@autodeploy/gitops';
import { logger } from '@autodeploy/logger';
import type { DeployModel } from '../deploy/deploy-model.js';
import type { ChatCommand } from './command-parser.js';

export const HELP_MESSAGE = [
  '**Deploy the default branch**',
  '`@bot deploy api staging`',
  'Replace `api` with any project from `ls` and `staging` with `production` or `sandbox` (`stg`, `pro` and `prd` work too).',
  '',
  '**Deploy a branch**',
  '`@bot deploy api staging branch feature/login`',
  'Not available for phases that disable branch deploys.',
  '',
  '**Other commands**',
  '`@bot ls` lists projects and their repositories.',
  '`@bot reload` reloads projects and users.',
].join('\n');

export interface CommandContext {
  /** Chat id of the user who sent the command. */
  authorId: string;
}

export interface CommandHandlerOptions {
  catalog: ProjectCatalog;
  deployer: DeployModel;
}

/**
 * Runs chat commands and returns the reply text.
 */
export class CommandHandler {
  constructor(private readonly options: CommandHandlerOptions) {}

  async handle(command: ChatCommand, context: CommandContext): Promise<string> {
    switch (command.type) {
      case 'help':
        return HELP_MESSAGE;
      case 'list':
        return this.listProjects(this.options.catalog.current);
      case 'reload':
        return this.reload();
      case 'deploy':
        return this.deploy(command, context);
    }
  }

  private listProjects(snapshot: ProjectSnapshot): string {
    if (snapshot.projects.length === 0) {
      return 'No projects are configured.';
    }
    return snapshot.projects.map((project) => `**${project.id}** (${project.repository})`).join('\n');
  }

  private async reload(): Promise<string> {
    try {
      await this.options.catalog.reload();
      return 'Deploy projects and users are reloaded.';
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Failed to reload projects');
      return `Failed to reload projects: ${errorMessage(error)}`;
    }
  }

  private async deploy(
    command: Extract<ChatCommand, { type: 'deploy' }>,
    context: CommandContext
  ): Promise<string> {
    const { catalog, deployer } = this.options;

    let snapshot = catalog.current;
    try {
      snapshot = await catalog.reload();
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Reload before deploy failed, using the loaded projects');
    }

    const project = findProject(snapshot, command.project);
    if (!project) {
      return `Project ${command.project} is not found.`;
    }
    const phase = findPhase(project, command.phase);
    if (!phase) {
      return `phase ${command.phase} not found for project ${project.id}`;
    }
    if (command.branch && phase.disableBranchDeploy) {
      return `Branch deploy is disabled for ${project.id} ${phase.name}.`;
    }

    const branch = command.branch ?? project.defaultBranch;
    logger.info({ project: project.id, phase: phase.name, branch, requester: context.authorId }, 'Deploy requested from chat');

    try {
      const { outcome } = await deployer.deploy(project, phase.name, {
        branch,
        wait: false,
        requester: findUser(snapshot, context.authorId),
      });
      if (outcome.status === 'AlreadyDeployed') {
        return `${project.id} ${phase.name} is already deployed.`;
      }
      return `Created a pull request to deploy ${project.id} ${phase.name} from ${branch}: ${outcome.pullRequest.url}`;
    } catch (error) {
      logger.error({ project: project.id, phase: phase.name, branch, error: errorMessage(error) }, 'Deploy from chat failed');
      return `Failed to deploy ${project.id} ${phase.name}: ${errorMessage(error)}`;
    }
  }
}
