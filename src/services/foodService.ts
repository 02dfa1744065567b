import { z } from 'zod';
import { StorageService } from './storageService';
import { CommandResult, FoodCacheEntry, FoodCacheState, FoodListing } from '../types';

export const DEFAULT_CACHE_DURATION_MS = 12 * 60 * 60 * 1000;
export const MAX_SUGGESTIONS = 5;
export const NO_FOODS_TEXT = 'No foods in the list yet.';

const FoodCacheEntrySchema = z.object({
  food: z.string().min(1),
  timestamp: z.string().refine(value => !Number.isNaN(Date.parse(value)), {
    message: 'timestamp must be an ISO-8601 date'
  })
});

export interface FoodServicePaths {
  foodListPath: string;
  foodCachePath: string;
}

export interface FoodServiceOptions {
  cacheDurationMs?: number;
  clock?: () => Date;
  random?: () => number;
}

const compareFoods = (a: string, b: string): number => {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left !== right) return left < right ? -1 : 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
};

const quote = (items: string[]): string => items.map(item => `"${item}"`).join(', ');

/**
 * Service for food suggestions and the editable food list
 */
export class FoodService {
  private storage: StorageService;
  private paths: FoodServicePaths;
  private cacheDurationMs: number;
  private clock: () => Date;
  private random: () => number;

  constructor(storage: StorageService, paths: FoodServicePaths, options: FoodServiceOptions = {}) {
    this.storage = storage;
    this.paths = paths;
    this.cacheDurationMs = options.cacheDurationMs ?? DEFAULT_CACHE_DURATION_MS;
    this.clock = options.clock ?? (() => new Date());
    this.random = options.random ?? Math.random;
  }

  /**
   * Current state of the cached suggestion
   */
  async getCacheState(): Promise<FoodCacheState> {
    const result = await this.storage.readJSON(this.paths.foodCachePath);
    if (result.status === 'missing') {
      return { state: 'empty' };
    }
    if (result.status === 'corrupt') {
      console.warn('Food cache is unreadable, treating it as empty:', result.error);
      return { state: 'empty' };
    }

    const parsed = FoodCacheEntrySchema.safeParse(result.value);
    if (!parsed.success) {
      console.warn('Food cache has an unexpected shape, treating it as empty:', parsed.error.message);
      return { state: 'empty' };
    }

    const entry: FoodCacheEntry = parsed.data;
    const age = this.clock().getTime() - Date.parse(entry.timestamp);
    return age < this.cacheDurationMs ? { state: 'fresh', entry } : { state: 'stale', entry };
  }

  /**
   * Get a random food. The same food is returned until the cache goes
   * stale, unless forceNew is set.
   */
  async getRandomFood(forceNew: boolean = false): Promise<string | null> {
    if (!forceNew) {
      const cache = await this.getCacheState();
      if (cache.state === 'fresh') {
        return cache.entry.food;
      }
    }

    const foods = await this.loadFoods();
    if (foods.length === 0) {
      return null;
    }

    const index = Math.min(Math.floor(this.random() * foods.length), foods.length - 1);
    const food = foods[index];

    const entry: FoodCacheEntry = { food, timestamp: this.clock().toISOString() };
    await this.storage.saveJSON(this.paths.foodCachePath, entry);

    return food;
  }

  async clearFoodCache(): Promise<void> {
    try {
      await this.storage.removeFile(this.paths.foodCachePath);
    } catch (error) {
      console.error('Error clearing food cache:', error);
    }
  }

  /**
   * Add a food unless a case-insensitive duplicate exists
   */
  async addFood(name: string): Promise<boolean> {
    const food = name.trim();
    if (!food) return false;

    const foods = await this.loadFoods();
    const normalized = food.toLowerCase();
    if (foods.some(existing => existing.toLowerCase() === normalized)) {
      return false;
    }

    await this.storage.appendLine(this.paths.foodListPath, food);
    return true;
  }

  /**
   * Remove every exact (case-insensitive) match, or suggest close candidates
   */
  async removeFood(name: string): Promise<CommandResult> {
    const query = name.trim();
    const normalized = query.toLowerCase();
    const foods = await this.loadFoods();

    if (foods.length === 0) {
      return { success: false, message: 'The food list is empty.' };
    }

    const removed = foods.filter(food => food.toLowerCase() === normalized);
    if (removed.length > 0) {
      const remaining = foods.filter(food => food.toLowerCase() !== normalized);
      await this.storage.rewriteLines(this.paths.foodListPath, remaining);

      const cache = await this.getCacheState();
      if (cache.state !== 'empty' && cache.entry.food.toLowerCase() === normalized) {
        await this.clearFoodCache();
      }

      const count = removed.length === 1 ? '1 entry' : `${removed.length} entries`;
      return {
        success: true,
        message: `Removed ${quote(removed)} from the food list (${count}).`
      };
    }

    const candidates = foods.filter(food => food.toLowerCase().includes(normalized));
    if (candidates.length > 0) {
      const shown = candidates.slice(0, MAX_SUGGESTIONS);
      const extra = candidates.length - shown.length;
      const more = extra > 0 ? ` (and ${extra} more)` : '';
      return {
        success: false,
        message: `"${query}" was not found. Did you mean: ${quote(shown)}${more}?`
      };
    }

    return { success: false, message: `"${query}" was not found in the food list.` };
  }

  /**
   * Sorted food list with its display text
   */
  async listFoods(numbered: boolean = true): Promise<FoodListing> {
    const foods = (await this.loadFoods()).sort(compareFoods);
    if (foods.length === 0) {
      return { foods: [], text: NO_FOODS_TEXT };
    }

    const text = foods
      .map((food, i) => (numbered ? `${i + 1}. ${food}` : `• ${food}`))
      .join('\n');
    return { foods, text };
  }

  private async loadFoods(): Promise<string[]> {
    return this.storage.loadLines(this.paths.foodListPath);
  }
}

export const createFoodService = (
  storage: StorageService,
  paths: FoodServicePaths,
  options: FoodServiceOptions = {}
): FoodService => {
  return new FoodService(storage, paths, options);
};
