import type { PhaseName } from '@autodeploy/config';

export interface DeploySummary {
  project: string;
  phase: PhaseName;
  tag: string;
}

/**
 * Posts deploy summaries to a chat channel. Implementations never reject.
 */
export interface Notifier {
  notify(channelId: string, summary: DeploySummary): Promise<void>;
}
