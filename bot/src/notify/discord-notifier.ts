import { EmbedBuilder, type Client } from 'discord.js';
import { logger } from '@autodeploy/logger';
import type { DeploySummary, Notifier } from './notifier.js';

export const DEPLOY_SUCCESS_COLOR = 0x36a64f;

export function buildDeploySummaryEmbed(summary: DeploySummary): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(DEPLOY_SUCCESS_COLOR)
    .setTitle('Succeed to auto deploy')
    .addFields(
      { name: 'Project', value: summary.project, inline: true },
      { name: 'Phase', value: summary.phase, inline: true },
      { name: 'Tag', value: summary.tag, inline: true }
    )
    .setTimestamp();
}

export class DiscordNotifier implements Notifier {
  constructor(private readonly client: Client) {}

  async notify(channelId: string, summary: DeploySummary): Promise<void> {
    try {
      const channel = await this.client.channels.fetch(channelId);
      if (!channel || !channel.isSendable()) {
        logger.warn({ channelId, ...summary }, 'Notification channel is not available');
        return;
      }

      await channel.send({ embeds: [buildDeploySummaryEmbed(summary)] });
      logger.info({ channelId, ...summary }, 'Deploy summary posted');
    } catch (error) {
      logger.error({
        channelId,
        ...summary,
        error: error instanceof Error ? error.message : String(error),
      }, 'Failed to post deploy summary');
    }
  }
}
