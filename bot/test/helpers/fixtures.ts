import type { Phase, Project } from '@autodeploy/config';
import type { DeployResult } from '../../src/deploy/deploy-model.js';

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

export const pullRequestResult = (branch: string): DeployResult => ({
  outcome: {
    status: 'Success',
    pullRequest: { id: 'PR_kwDOA', number: 7, url: 'https://github.com/acme/config/pull/7' },
    branch,
  },
  merged: false,
});

export const PROJECTS_YAML = `
users:
  - chatId: "1001"
    githubLogin: octo-dev
    githubNodeId: MDQ6VXNlcjE=
projects:
  - id: api
    repository: api-server
    defaultBranch: main
    registry:
      registryId: "123456789012"
      repository: api
      tagPattern: "^{{branch}}-"
    phases:
      - name: stg
        kind: kustomize
        path: overlays/staging/kustomization.yaml
        autoDeploy: true
        notifyChannel: "42"
      - name: prd
        kind: kanvas
        path: deploy
        disableBranchDeploy: true
  - id: web
    repository: web-app
    registry:
      registryId: "123456789012"
      repository: web
      tagPattern: "^{{branch}}-"
    phases:
      - name: staging
        kind: kustomize
        path: overlays/web/kustomization.yaml
`;
