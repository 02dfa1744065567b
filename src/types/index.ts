/**
 * Core types for the lunch ledger bot
 */

export interface AppConfig {
  slack: SlackConfig;
  port: number;
  foodListPath: string;
  foodCachePath: string;
  debtDbPath: string;
  foodCacheHours: number;
  restrictedUsers: string[];
  restrictedMessage: string;
  maxMessageLength: number;
}

export interface SlackConfig {
  botToken?: string;
  signingSecret?: string;
  appToken?: string;
  socketMode: boolean;
}

export interface FoodCacheEntry {
  food: string;
  timestamp: string;
}

export type FoodCacheState =
  | { state: 'empty' }
  | { state: 'fresh'; entry: FoodCacheEntry }
  | { state: 'stale'; entry: FoodCacheEntry };

export interface FoodListing {
  foods: string[];
  text: string;
}

export type DecodeResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'missing' }
  | { status: 'corrupt'; error: unknown };

export interface DebtMention {
  username: string;
  rawAmount: string;
}

export interface AppliedDebt {
  username: string;
  amount: number;
  total: number;
}

export interface CommandResult {
  success: boolean;
  message: string;
}

/**
 * What the command layer sees of an incoming Slack command or message
 */
export interface ChatContext {
  authorUsername?: string;
  messageText: string;
  commandArgs: string[];
  reply(text: string): Promise<void>;
}

export type CommandName =
  | 'start'
  | 'help'
  | 'food'
  | 'newfood'
  | 'clearfood'
  | 'addfood'
  | 'removefood'
  | 'foodlist'
  | 'debt'
  | 'done';

export type CommandHandler = (ctx: ChatContext) => Promise<void>;
