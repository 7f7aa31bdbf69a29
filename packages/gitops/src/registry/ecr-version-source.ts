import {
  DescribeImagesCommand,
  type DescribeImagesCommandInput,
  type DescribeImagesCommandOutput,
  type ECRClient,
  type ImageDetail,
} from '@aws-sdk/client-ecr';
import { logger } from '@autodeploy/logger';
import { GitOpsError, VersionLookupError, errorMessage } from '../errors.js';
import type { ImageTagVars, TagQuery, VersionSource } from '../types.js';

export type DescribeImages = (input: DescribeImagesCommandInput) => Promise<DescribeImagesCommandOutput>;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Replace `{{branch}}` and `{{phase}}` in a tag pattern. Branch names are
 * matched the way they appear in tags, with `/` turned into `-`.
 */
export function expandTagPattern(pattern: string, vars: ImageTagVars): RegExp {
  const expanded = pattern
    .replace(/\{\{\s*branch\s*\}\}/g, escapeRegExp(vars.branch.replace(/\//g, '-')))
    .replace(/\{\{\s*phase\s*\}\}/g, escapeRegExp(vars.phase ?? ''));
  return new RegExp(expanded);
}

function pushedAt(image: ImageDetail): number {
  return image.imagePushedAt ? image.imagePushedAt.getTime() : 0;
}

/**
 * Finds the tag to deploy among the images of an ECR repository: the newest
 * image carrying a tag that matches `tagPattern`, reported by its tag that
 * matches `targetPattern`.
 */
export class EcrVersionSource implements VersionSource {
  private readonly describeImages: DescribeImages;

  constructor(client: ECRClient | DescribeImages) {
    if (typeof client === 'function') {
      this.describeImages = client;
    } else {
      const ecr = client;
      this.describeImages = (input) => ecr.send(new DescribeImagesCommand(input));
    }
  }

  async findTag(query: TagQuery): Promise<string> {
    const { registryId, repository, tagPattern, targetPattern, vars } = query;
    const tagRegExp = expandTagPattern(tagPattern, vars);
    const targetRegExp = expandTagPattern(targetPattern ?? tagPattern, vars);

    try {
      const images = await this.listTaggedImages(registryId, repository);
      images.sort((a, b) => pushedAt(b) - pushedAt(a));

      for (const image of images) {
        const tags = image.imageTags ?? [];
        if (!tags.some((tag) => tagRegExp.test(tag))) {
          continue;
        }
        const target = tags.find((tag) => targetRegExp.test(tag));
        if (target) {
          logger.debug({ repository, tag: target }, 'Resolved image tag');
          return target;
        }
      }
    } catch (error) {
      if (error instanceof GitOpsError) {
        throw error;
      }
      throw new VersionLookupError(
        `Failed to list images of ${repository}: ${errorMessage(error)}`,
        { registryId, repository },
        { cause: error }
      );
    }

    throw new VersionLookupError(`No image tag of ${repository} matches ${tagRegExp.source}`, {
      registryId,
      repository,
      tagPattern,
      targetPattern,
    });
  }

  private async listTaggedImages(registryId: string, repository: string): Promise<ImageDetail[]> {
    const images: ImageDetail[] = [];
    let nextToken: string | undefined;

    do {
      const output = await this.describeImages({
        registryId,
        repositoryName: repository,
        filter: { tagStatus: 'TAGGED' },
        nextToken,
      });
      images.push(...(output.imageDetails ?? []));
      nextToken = output.nextToken;
    } while (nextToken);

    return images;
  }
}
