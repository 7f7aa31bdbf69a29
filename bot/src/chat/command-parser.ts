import { normalizePhaseName, type PhaseName } from '@autodeploy/config';

export type ChatCommand =
  | { type: 'help' }
  | { type: 'list' }
  | { type: 'reload' }
  | { type: 'deploy'; project: string; phase: PhaseName; branch?: string };

const PHASE = '(staging|production|sandbox|stg|pro|prd)';
const DEPLOY_BRANCH = new RegExp(`\\bdeploy ([0-9a-zA-Z-]+) ${PHASE} branch(?: (\\S+))?`);
const DEPLOY = new RegExp(`\\bdeploy ([0-9a-zA-Z-]+) ${PHASE}\\b`);

/**
 * Matches a command anywhere in a message. The first matching rule wins:
 * help, ls, reload, branch deploy, deploy.
 */
export function parseCommand(text: string): ChatCommand | undefined {
  if (/\bhelp\b/.test(text)) {
    return { type: 'help' };
  }
  if (/\bls\b/.test(text)) {
    return { type: 'list' };
  }
  if (/\breload\b/.test(text)) {
    return { type: 'reload' };
  }

  const branchMatch = DEPLOY_BRANCH.exec(text);
  if (branchMatch) {
    const phase = normalizePhaseName(branchMatch[2]);
    // A branch deploy needs the branch name.
    if (!phase || !branchMatch[3]) {
      return { type: 'help' };
    }
    return { type: 'deploy', project: branchMatch[1], phase, branch: branchMatch[3] };
  }

  const match = DEPLOY.exec(text);
  if (match) {
    const phase = normalizePhaseName(match[2]);
    return phase ? { type: 'deploy', project: match[1], phase } : undefined;
  }

  return undefined;
}
