import { App, LogLevel, GenericMessageEvent } from '@slack/bolt';
import dotenv from 'dotenv';

import { readAppConfig } from './config';
import { createStorageService } from './services/storageService';
import { createFoodService } from './services/foodService';
import { createDebtService } from './services/debtService';
import { createDebtMentionService } from './services/mentionService';
import { createAccessPolicy } from './services/accessPolicy';
import { createCommandService } from './services/commandService';
import {
  createCommandContext,
  createMessageContext,
  expandUserMentions,
  resolveUsername
} from './adapters/slackContext';
import { CommandName } from './types';

dotenv.config();

const config = readAppConfig();

const storage = createStorageService();
const foodService = createFoodService(
  storage,
  { foodListPath: config.foodListPath, foodCachePath: config.foodCachePath },
  { cacheDurationMs: config.foodCacheHours * 60 * 60 * 1000 }
);
const debtService = createDebtService(storage, config.debtDbPath);
const mentionService = createDebtMentionService(debtService);
const accessPolicy = createAccessPolicy(config.restrictedUsers, config.restrictedMessage);
const commandService = createCommandService(
  foodService,
  debtService,
  mentionService,
  accessPolicy,
  config.maxMessageLength
);

const app = new App({
  token: config.slack.botToken,
  signingSecret: config.slack.signingSecret,
  socketMode: config.slack.socketMode,
  appToken: config.slack.appToken,
  logLevel: LogLevel.INFO,
});

const commands: CommandName[] = [
  'start',
  'help',
  'food',
  'newfood',
  'clearfood',
  'addfood',
  'removefood',
  'foodlist',
  'debt',
  'done'
];

for (const name of commands) {
  app.command(`/${name}`, async ({ command, ack, respond }) => {
    await ack();
    await commandService.execute(name, createCommandContext(command, respond));
  });
}

app.message(async ({ message, say, client }) => {
  if (!('text' in message) || !('user' in message) || message.subtype !== undefined) return;

  const messageEvent = message as GenericMessageEvent;

  if (!messageEvent.text || !messageEvent.user || messageEvent.bot_id) return;

  const text = await expandUserMentions(client, messageEvent.text);
  const author = await resolveUsername(client, messageEvent.user);

  await commandService.handleMessage(createMessageContext(text, author, say));
});

app.error(async (error) => {
  console.error('Unhandled Slack error:', error);
});

(async () => {
  await app.start(config.port);
  console.log(`⚡️ Lunch ledger bot is running on port ${config.port}`);
  console.log(`Food list: ${config.foodListPath}`);
  console.log(`Debt ledger: ${config.debtDbPath}`);
})().catch(error => {
  console.error('Failed to start the app:', error);
  process.exit(1);
});
