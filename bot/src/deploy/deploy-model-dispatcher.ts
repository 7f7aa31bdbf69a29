import { findPhase, type PhaseKind, type Project } from '@autodeploy/config';
import { NotFoundError } from '@autodeploy/gitops';
import type { DeployModel, DeployOptions, DeployResult } from './deploy-model.js';

/**
 * Routes a deploy to the model registered for the phase's kind.
 */
export class DeployModelDispatcher implements DeployModel {
  constructor(private readonly models: Readonly<Record<PhaseKind, DeployModel>>) {}

  modelFor(kind: PhaseKind): DeployModel {
    return this.models[kind];
  }

  async deploy(project: Project, phaseName: string, options: DeployOptions): Promise<DeployResult> {
    const phase = findPhase(project, phaseName);
    if (!phase) {
      throw new NotFoundError(`phase ${phaseName} not found for project ${project.id}`, {
        project: project.id,
        phase: phaseName,
      });
    }
    return this.modelFor(phase.kind).deploy(project, phase.name, options);
  }
}
