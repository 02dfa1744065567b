import type { AllMiddlewareArgs, RespondFn, SayFn, SlashCommand } from '@slack/bolt';
import { ChatContext } from '../types';

type SlackClient = AllMiddlewareArgs['client'];

/**
 * Turn Slack's escaped user references into plain "@name" text.
 * Slash commands send "<@U123|name>"; messages send "<@U123>", which needs
 * a lookup.
 */
export const unescapeMentions = (text: string): string =>
  text.replace(/<@[A-Z0-9]+\|([^>]+)>/g, '@$1');

export const splitArgs = (text: string): string[] =>
  unescapeMentions(text).trim().split(/\s+/).filter(arg => arg.length > 0);

export async function resolveUsername(client: SlackClient, userId: string): Promise<string | undefined> {
  try {
    const result = await client.users.info({ user: userId });
    if (!result.ok || !result.user) {
      console.error(`Failed to fetch user ${userId}:`, result.error);
      return undefined;
    }
    return result.user.name;
  } catch (error) {
    console.error(`Error resolving username for ${userId}:`, error);
    return undefined;
  }
}

export async function expandUserMentions(client: SlackClient, text: string): Promise<string> {
  const ids = [...new Set([...text.matchAll(/<@([A-Z0-9]+)>/g)].map(match => match[1]))];
  let expanded = unescapeMentions(text);

  for (const id of ids) {
    const name = await resolveUsername(client, id);
    if (name) {
      expanded = expanded.split(`<@${id}>`).join(`@${name}`);
    }
  }

  return expanded;
}

export const createCommandContext = (command: SlashCommand, respond: RespondFn): ChatContext => ({
  authorUsername: command.user_name,
  messageText: command.text,
  commandArgs: splitArgs(command.text),
  reply: async (text: string) => {
    await respond({ text, response_type: 'in_channel' });
  }
});

export const createMessageContext = (
  text: string,
  authorUsername: string | undefined,
  say: SayFn
): ChatContext => ({
  authorUsername,
  messageText: text,
  commandArgs: [],
  reply: async (reply: string) => {
    await say(reply);
  }
});
