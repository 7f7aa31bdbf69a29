import { Octokit } from '@octokit/rest';
import { logger } from '@autodeploy/logger';
import { TransportError, errorMessage } from '../errors.js';
import type { PullRequestRef } from '../types.js';

export interface RepositoryName {
  owner: string;
  repo: string;
}

export interface OpenPullRequestInput extends RepositoryName {
  head: string;
  base: string;
  title: string;
  body: string;
  assignees?: string[];
}

export interface PullRequestLocation extends RepositoryName {
  number: number;
}

/**
 * The part of the hosting API the orchestrator needs: opening and merging
 * pull requests and reading files.
 */
export interface PullRequestHost {
  openPullRequest(input: OpenPullRequestInput): Promise<PullRequestRef>;
  mergePullRequest(location: PullRequestLocation): Promise<void>;
  readFile(repository: RepositoryName, filePath: string, ref: string): Promise<string | undefined>;
}

/**
 * `https://github.com/<owner>/<repo>/pull/<number>` → its parts.
 */
export function parsePullRequestUrl(url: string): PullRequestLocation {
  const match = /^https:\/\/[^/]+\/([^/]+)\/([^/]+)\/pull\/(\d+)/.exec(url);
  if (!match) {
    throw new Error(`Not a pull request URL: ${url}`);
  }
  return { owner: match[1], repo: match[2], number: Number(match[3]) };
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'status' in error && error.status === 404;
}

export class GitHubClient implements PullRequestHost {
  constructor(private readonly octokit: Octokit) {}

  async openPullRequest(input: OpenPullRequestInput): Promise<PullRequestRef> {
    const { owner, repo, head, base, title, body, assignees } = input;

    try {
      const { data } = await this.octokit.rest.pulls.create({ owner, repo, head, base, title, body });

      if (assignees && assignees.length > 0) {
        await this.octokit.rest.issues.addAssignees({ owner, repo, issue_number: data.number, assignees });
      }

      logger.info({ owner, repo, number: data.number, head }, 'Pull request opened');
      return { id: data.node_id, number: data.number, url: data.html_url };
    } catch (error) {
      logger.error({ owner, repo, head, error: errorMessage(error) }, 'Failed to open pull request');
      throw new TransportError('open pull request on', `${owner}/${repo}`, error);
    }
  }

  async mergePullRequest({ owner, repo, number }: PullRequestLocation): Promise<void> {
    try {
      await this.octokit.rest.pulls.merge({ owner, repo, pull_number: number });
      logger.info({ owner, repo, number }, 'Pull request merged');
    } catch (error) {
      logger.error({ owner, repo, number, error: errorMessage(error) }, 'Failed to merge pull request');
      throw new TransportError('merge pull request on', `${owner}/${repo}`, error);
    }
  }

  async readFile({ owner, repo }: RepositoryName, filePath: string, ref: string): Promise<string | undefined> {
    try {
      const { data } = await this.octokit.rest.repos.getContent({ owner, repo, path: filePath, ref });
      if (Array.isArray(data) || data.type !== 'file' || !('content' in data)) {
        return undefined;
      }
      return Buffer.from(data.content, 'base64').toString('utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw new TransportError('read file from', `${owner}/${repo}`, error);
    }
  }
}
