import { Client, Events, GatewayIntentBits, type Message } from 'discord.js';
import { errorMessage } from '@autodeploy/gitops';
import { logger } from '@autodeploy/logger';
import type { CommandHandler } from './command-handler.js';
import { parseCommand } from './command-parser.js';

/**
 * The parts of a chat message the listener reads.
 */
export interface IncomingMessage {
  authorId: string;
  channelId: string;
  fromBot: boolean;
  mentionsBot: boolean;
  content: string;
  reply(text: string): Promise<unknown>;
}

export function createDiscordClient(): Client {
  return new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.MessageContent,
    ],
  });
}

/**
 * Answers messages that mention the bot. Others are ignored.
 */
export async function handleMention(message: IncomingMessage, handler: CommandHandler): Promise<boolean> {
  if (message.fromBot || !message.mentionsBot) {
    return false;
  }

  const command = parseCommand(message.content);
  if (!command) {
    logger.debug({ author: message.authorId, channel: message.channelId }, 'Mention without a command');
    return false;
  }

  logger.info({ command: command.type, author: message.authorId, channel: message.channelId }, 'Chat command received');
  const reply = await handler.handle(command, { authorId: message.authorId });
  await message.reply(reply);
  return true;
}

function toIncomingMessage(client: Client, message: Message): IncomingMessage {
  return {
    authorId: message.author.id,
    channelId: message.channelId,
    fromBot: message.author.bot,
    mentionsBot: client.user ? message.mentions.has(client.user) : false,
    content: message.content,
    reply: (text) => message.reply(text),
  };
}

export function setupMessageHandler(client: Client, handler: CommandHandler): void {
  client.once(Events.ClientReady, (ready) => {
    logger.info({ tag: ready.user.tag, id: ready.user.id, guilds: ready.guilds.cache.size }, 'Bot logged in successfully');
  });

  client.on(Events.MessageCreate, (message) => {
    handleMention(toIncomingMessage(client, message), handler).catch((error: unknown) => {
      logger.error({ messageId: message.id, error: errorMessage(error) }, 'Failed to handle chat message');
    });
  });

  logger.info('Discord event handlers registered');
}
