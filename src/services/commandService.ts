import { FoodService } from './foodService';
import { DebtService } from './debtService';
import { DebtMentionService } from './mentionService';
import { AccessPolicy } from './accessPolicy';
import { ChatContext, CommandHandler, CommandName } from '../types';
import {
  FOOD_CACHE_CLEARED,
  GENERIC_FAILURE,
  NO_FOODS_AVAILABLE,
  USAGE,
  buildDebtAdded,
  buildDebtBalance,
  buildDebtCleared,
  buildFoodAdded,
  buildFoodListMessages,
  buildFoodSuggestion,
  buildHelpText,
  buildStartText
} from '../views/messages';

export const DEFAULT_MAX_MESSAGE_LENGTH = 4000;

const stripAt = (username: string): string => username.replace(/^@/, '');

export class CommandService {
  private foodService: FoodService;
  private debtService: DebtService;
  private mentionService: DebtMentionService;
  private accessPolicy: AccessPolicy;
  private maxMessageLength: number;
  private handlers: Record<CommandName, CommandHandler>;

  constructor(
    foodService: FoodService,
    debtService: DebtService,
    mentionService: DebtMentionService,
    accessPolicy: AccessPolicy,
    maxMessageLength: number = DEFAULT_MAX_MESSAGE_LENGTH
  ) {
    this.foodService = foodService;
    this.debtService = debtService;
    this.mentionService = mentionService;
    this.accessPolicy = accessPolicy;
    this.maxMessageLength = maxMessageLength;
    this.handlers = {
      start: ctx => this.start(ctx),
      help: ctx => this.help(ctx),
      food: ctx => this.food(ctx, false),
      newfood: ctx => this.food(ctx, true),
      clearfood: ctx => this.clearFood(ctx),
      addfood: ctx => this.addFood(ctx),
      removefood: ctx => this.removeFood(ctx),
      foodlist: ctx => this.foodList(ctx),
      debt: ctx => this.debt(ctx),
      done: ctx => this.done(ctx)
    };
  }

  /**
   * Run a command for the invoking user. Restricted users get the denial
   * message; failures are logged and answered with a generic reply.
   */
  async execute(command: CommandName, ctx: ChatContext): Promise<void> {
    try {
      if (this.accessPolicy.isRestricted(ctx.authorUsername)) {
        console.log(`Restricted user ${ctx.authorUsername} tried /${command}`);
        await ctx.reply(this.accessPolicy.denialMessage);
        return;
      }
      await this.handlers[command](ctx);
    } catch (error) {
      console.error(`Error handling /${command}:`, error);
      await ctx.reply(GENERIC_FAILURE);
    }
  }

  /**
   * Scan an ordinary message for "@username amount" debts
   */
  async handleMessage(ctx: ChatContext): Promise<void> {
    try {
      const mentions = this.mentionService.parseMentions(ctx.messageText);
      if (mentions.length === 0) return;

      if (this.accessPolicy.isRestricted(ctx.authorUsername)) {
        console.log(`Restricted user ${ctx.authorUsername} tried to add debt`);
        await ctx.reply(this.accessPolicy.denialMessage);
        return;
      }

      await this.mentionService.processMentions(ctx.messageText, async ({ username, amount, total }) => {
        await ctx.reply(buildDebtAdded(username, amount, total));
      });
    } catch (error) {
      console.error('Error handling message:', error);
      await ctx.reply(GENERIC_FAILURE);
    }
  }

  private async start(ctx: ChatContext): Promise<void> {
    await ctx.reply(buildStartText(ctx.authorUsername));
  }

  private async help(ctx: ChatContext): Promise<void> {
    await ctx.reply(buildHelpText());
  }

  private async food(ctx: ChatContext, forceNew: boolean): Promise<void> {
    const food = await this.foodService.getRandomFood(forceNew);
    await ctx.reply(food ? buildFoodSuggestion(food, forceNew) : NO_FOODS_AVAILABLE);
  }

  private async clearFood(ctx: ChatContext): Promise<void> {
    await this.foodService.clearFoodCache();
    await ctx.reply(FOOD_CACHE_CLEARED);
  }

  private async addFood(ctx: ChatContext): Promise<void> {
    const food = ctx.commandArgs.join(' ').trim();
    if (!food) {
      await ctx.reply(USAGE.addfood);
      return;
    }

    const added = await this.foodService.addFood(food);
    await ctx.reply(buildFoodAdded(food, added));
  }

  private async removeFood(ctx: ChatContext): Promise<void> {
    const food = ctx.commandArgs.join(' ').trim();
    if (!food) {
      await ctx.reply(USAGE.removefood);
      return;
    }

    const result = await this.foodService.removeFood(food);
    await ctx.reply(result.message);
  }

  private async foodList(ctx: ChatContext): Promise<void> {
    const { text } = await this.foodService.listFoods(true);
    for (const message of buildFoodListMessages(text, this.maxMessageLength)) {
      await ctx.reply(message);
    }
  }

  private async debt(ctx: ChatContext): Promise<void> {
    const username = stripAt(ctx.commandArgs[0] ?? '');
    if (!username) {
      await ctx.reply(USAGE.debt);
      return;
    }

    const debt = await this.debtService.getDebt(username);
    await ctx.reply(buildDebtBalance(username, debt));
  }

  private async done(ctx: ChatContext): Promise<void> {
    const username = stripAt(ctx.commandArgs[0] ?? '');
    if (!username) {
      await ctx.reply(USAGE.done);
      return;
    }

    const previousDebt = await this.debtService.getDebt(username);
    await this.debtService.clearDebt(username);
    await ctx.reply(buildDebtCleared(username, previousDebt));
  }
}

export const createCommandService = (
  foodService: FoodService,
  debtService: DebtService,
  mentionService: DebtMentionService,
  accessPolicy: AccessPolicy,
  maxMessageLength: number = DEFAULT_MAX_MESSAGE_LENGTH
): CommandService => {
  return new CommandService(foodService, debtService, mentionService, accessPolicy, maxMessageLength);
};
