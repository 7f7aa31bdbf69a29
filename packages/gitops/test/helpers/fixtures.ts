import type { Phase, Project, User } from '@autodeploy/config';

export const stagingPhase: Phase = {
  name: 'staging',
  kind: 'kustomize',
  path: 'overlays/staging/kustomization.yaml',
  autoDeploy: true,
  notifyChannel: '42',
  disableBranchDeploy: false,
};

export const productionPhase: Phase = {
  name: 'production',
  kind: 'kanvas',
  path: 'deploy',
  autoDeploy: false,
  disableBranchDeploy: true,
};

export const apiProject: Project = {
  id: 'api',
  repository: 'api-server',
  defaultBranch: 'main',
  imageName: 'api',
  registry: { registryId: '123456789012', repository: 'api', tagPattern: '^{{branch}}-' },
  phases: [stagingPhase, productionPhase],
};

export const requester: User = {
  chatId: '1001',
  githubLogin: 'octo-dev',
  githubNodeId: 'MDQ6VXNlcjE=',
};
