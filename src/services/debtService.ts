import { StorageService } from './storageService';

/**
 * Service for the per-user debt ledger.
 * Each call loads the full ledger, changes it and writes it back.
 */
export class DebtService {
  private storage: StorageService;
  private debtDbPath: string;

  constructor(storage: StorageService, debtDbPath: string) {
    this.storage = storage;
    this.debtDbPath = debtDbPath;
  }

  /**
   * Add to a user's debt. Negative amounts pay it down.
   */
  async addDebt(username: string, amount: number): Promise<number> {
    const ledger = await this.loadLedger();
    const total = (ledger.get(username) ?? 0) + amount;
    ledger.set(username, total);
    await this.saveLedger(ledger);
    return total;
  }

  async getDebt(username: string): Promise<number> {
    const ledger = await this.loadLedger();
    return ledger.get(username) ?? 0;
  }

  /**
   * Reset a known user's debt to zero. Unknown users are left out of the ledger.
   */
  async clearDebt(username: string): Promise<void> {
    const ledger = await this.loadLedger();
    if (!ledger.has(username)) return;

    ledger.set(username, 0);
    await this.saveLedger(ledger);
  }

  private async loadLedger(): Promise<Map<string, number>> {
    const raw = await this.storage.loadJSON(this.debtDbPath);
    const ledger = new Map<string, number>();

    for (const [username, value] of Object.entries(raw)) {
      if (typeof value === 'number' && Number.isFinite(value)) {
        ledger.set(username, value);
      } else {
        console.warn(`Dropping non-numeric debt for ${username}:`, value);
      }
    }

    return ledger;
  }

  private async saveLedger(ledger: Map<string, number>): Promise<void> {
    await this.storage.saveJSON(this.debtDbPath, Object.fromEntries(ledger));
  }
}

export const createDebtService = (storage: StorageService, debtDbPath: string): DebtService => {
  return new DebtService(storage, debtDbPath);
};
