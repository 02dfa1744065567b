import { DebtService } from './debtService';
import { AppliedDebt, DebtMention } from '../types';

/**
 * Service for debts written as free text, e.g. "@bob 100 @carol -5.5"
 */
export class DebtMentionService {
  private debtService: DebtService;

  constructor(debtService: DebtService) {
    this.debtService = debtService;
  }

  /**
   * Find every "@username amount" pair, in order of appearance. Names may
   * use any letters and may contain "." or "-" between them, as Slack
   * handles do.
   */
  parseMentions(text: string): DebtMention[] {
    const regex = /@([\p{L}\p{M}\p{N}_]+(?:[.-][\p{L}\p{M}\p{N}_]+)*)\s+([+-]?\d+(?:\.\d+)?)/gu;
    return [...text.matchAll(regex)].map(([, username, rawAmount]) => ({ username, rawAmount }));
  }

  /**
   * Apply each mention to the ledger. Amounts that do not convert to a
   * finite number are skipped. onApplied runs after each write, before the
   * next mention is applied.
   */
  async processMentions(
    text: string,
    onApplied?: (debt: AppliedDebt) => Promise<void>
  ): Promise<AppliedDebt[]> {
    const applied: AppliedDebt[] = [];

    for (const { username, rawAmount } of this.parseMentions(text)) {
      const amount = Number(rawAmount);
      if (!Number.isFinite(amount)) {
        console.warn(`Could not convert ${rawAmount} to a number for @${username}`);
        continue;
      }

      const total = await this.debtService.addDebt(username, amount);
      const debt: AppliedDebt = { username, amount, total };
      applied.push(debt);
      if (onApplied) {
        await onApplied(debt);
      }
    }

    return applied;
  }
}

export const createDebtMentionService = (debtService: DebtService): DebtMentionService => {
  return new DebtMentionService(debtService);
};
