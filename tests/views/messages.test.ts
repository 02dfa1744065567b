import {
  buildDebtAdded,
  buildDebtBalance,
  buildDebtCleared,
  buildFoodAdded,
  buildFoodListMessages,
  buildFoodSuggestion,
  buildHelpText,
  buildStartText,
  chunkText,
  formatAmount
} from '../../src/views/messages';

describe('Reply Messages', () => {
  test('formats amounts with exactly two decimals', () => {
    expect(formatAmount(30)).toBe('30.00');
    expect(formatAmount(-5.5)).toBe('-5.50');
    expect(formatAmount(0.1 + 0.2)).toBe('0.30');
  });

  test('builds debt replies', () => {
    expect(buildDebtBalance('bob', 30)).toBe('@bob has a debt of 30.00');
    expect(buildDebtCleared('bob', 12.5)).toBe('Cleared debt of 12.50 for @bob');
    expect(buildDebtAdded('carol', -5.5, 94.5)).toBe("Added -5.50 to @carol's debt. New total: 94.50");
  });

  test('builds food replies', () => {
    expect(buildFoodSuggestion('Pho', false)).toBe('🍽️ Random food suggestion: Pho');
    expect(buildFoodSuggestion('Pho', true)).toBe('🍽️ New food suggestion: Pho');
    expect(buildFoodAdded('Pho', true)).toBe('Added "Pho" to the food list!');
    expect(buildFoodAdded('Pho', false)).toBe('"Pho" already exists in the food list.');
  });

  test('lists every command in the help text', () => {
    const help = buildHelpText();

    for (const command of ['/food', '/newfood', '/clearfood', '/addfood', '/removefood', '/foodlist', '/debt', '/done', '/help']) {
      expect(help).toContain(`\n${command} `);
    }
    expect(help.endsWith('(e.g. @username 100) to add to their debt.')).toBe(true);
  });

  test('greets with or without a username', () => {
    expect(buildStartText('alice').split('\n')[0]).toBe('Hi @alice! I am your Food and Debt Tracker Bot.');
    expect(buildStartText().split('\n')[0]).toBe('Hi! I am your Food and Debt Tracker Bot.');
  });

  test('chunks text at the size limit', () => {
    expect(chunkText('abcdefgh', 3)).toEqual(['abc', 'def', 'gh']);
    expect(chunkText('abc', 3)).toEqual(['abc']);
    expect(chunkText('', 3)).toEqual(['']);
  });

  test('keeps a short food list in one message', () => {
    expect(buildFoodListMessages('1. Pho', 4000)).toEqual(['🍽️ Food List:\n\n1. Pho']);
  });

  test('numbers parts of a long food list', () => {
    const text = 'x'.repeat(8001);

    const messages = buildFoodListMessages(text, 4000);

    expect(messages).toHaveLength(3);
    expect(messages[0]).toBe(`🍽️ Food List (Part 1/3):\n\n${'x'.repeat(4000)}`);
    expect(messages[1]).toBe('x'.repeat(4000));
    expect(messages[2]).toBe('x');
  });
});
