/**
 * Reply texts shown in Slack
 */

export const GENERIC_FAILURE = 'An error occurred while processing your request.';
export const NO_FOODS_AVAILABLE = 'No foods available. Add some with /addfood first.';
export const FOOD_CACHE_CLEARED = 'Food suggestion cleared! Use /food or /newfood to get a new suggestion.';

export const USAGE = {
  addfood: 'Please specify a food to add, e.g. /addfood Fried Rice',
  removefood: 'Please specify a food to remove, e.g. /removefood Fried Rice',
  debt: 'Please specify a username, e.g. /debt @username',
  done: 'Please specify a username, e.g. /done @username'
} as const;

const COMMAND_LIST = [
  '/food - Get a random food suggestion',
  '/newfood - Force a new food suggestion',
  '/clearfood - Clear current food suggestion',
  '/addfood - Add a new food to the list',
  '/removefood - Remove a food from the list',
  '/foodlist - Show all foods in the list',
  '/debt username - Check debt for a user',
  '/done username - Clear debt for a user',
  '/help - Show all available commands'
];

export const formatAmount = (amount: number): string => amount.toFixed(2);

export const buildHelpText = (): string =>
  `Commands:\n${COMMAND_LIST.join('\n')}\n\n` +
  'You can also tag a user with an amount (e.g. @username 100) to add to their debt.';

export const buildStartText = (username?: string): string => {
  const greeting = username ? `Hi @${username}!` : 'Hi!';
  return `${greeting} I am your Food and Debt Tracker Bot.\n\n${buildHelpText()}`;
};

export const buildFoodSuggestion = (food: string, forced: boolean): string =>
  forced ? `🍽️ New food suggestion: ${food}` : `🍽️ Random food suggestion: ${food}`;

export const buildFoodAdded = (food: string, added: boolean): string =>
  added ? `Added "${food}" to the food list!` : `"${food}" already exists in the food list.`;

export const buildDebtBalance = (username: string, debt: number): string =>
  `@${username} has a debt of ${formatAmount(debt)}`;

export const buildDebtCleared = (username: string, previousDebt: number): string =>
  `Cleared debt of ${formatAmount(previousDebt)} for @${username}`;

export const buildDebtAdded = (username: string, amount: number, total: number): string =>
  `Added ${formatAmount(amount)} to @${username}'s debt. New total: ${formatAmount(total)}`;

/**
 * Split text into pieces no longer than maxLength
 */
export const chunkText = (text: string, maxLength: number): string[] => {
  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += maxLength) {
    chunks.push(text.slice(i, i + maxLength));
  }
  return chunks.length > 0 ? chunks : [''];
};

/**
 * Food list replies. Long lists are sent in parts and only the first
 * part carries the header.
 */
export const buildFoodListMessages = (text: string, maxLength: number): string[] => {
  if (text.length <= maxLength) {
    return [`🍽️ Food List:\n\n${text}`];
  }

  const chunks = chunkText(text, maxLength);
  return chunks.map((chunk, i) =>
    i === 0 ? `🍽️ Food List (Part 1/${chunks.length}):\n\n${chunk}` : chunk
  );
};
