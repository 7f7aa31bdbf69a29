import { isMap, isSeq, parseDocument } from 'yaml';
import type { PullRequestHost, RepositoryName } from '../github/github-client.js';
import type { RevisionContext, RevisionTracker } from '../types.js';

/**
 * Reads the live tag of a kustomize phase from its kustomization on the
 * config repository's default branch.
 */
export class KustomizationRevisionTracker implements RevisionTracker {
  constructor(
    private readonly host: PullRequestHost,
    private readonly configRepository: RepositoryName,
    private readonly ref: string
  ) {}

  async getCurrentRevision({ project, phase }: RevisionContext): Promise<string | undefined> {
    if (phase.kind !== 'kustomize') {
      return undefined;
    }

    const content = await this.host.readFile(this.configRepository, phase.path, this.ref);
    if (content === undefined) {
      return undefined;
    }

    const images = parseDocument(content).get('images');
    if (!isSeq(images)) {
      return undefined;
    }

    for (const item of images.items) {
      if (isMap(item) && item.get('name') === project.imageName) {
        const tag = item.get('newTag');
        return tag === undefined || tag === null ? undefined : String(tag);
      }
    }
    return undefined;
  }
}
