import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { DecodeResult } from '../types';

/**
 * Raised when a file cannot be written or removed
 */
export class StorageError extends Error {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause: unknown) {
    super(message, { cause });
    this.name = 'StorageError';
    this.filePath = filePath;
  }
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Service for file storage and retrieval.
 * Nothing is cached: every call goes to disk.
 */
export class StorageService {
  /**
   * Read and parse a JSON document without throwing
   */
  async readJSON(filePath: string): Promise<DecodeResult<Record<string, unknown>>> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { status: 'missing' };
      }
      return { status: 'corrupt', error };
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      if (!isPlainObject(parsed)) {
        return { status: 'corrupt', error: new Error('Top-level JSON value is not an object') };
      }
      return { status: 'ok', value: parsed };
    } catch (error) {
      return { status: 'corrupt', error };
    }
  }

  /**
   * Load a JSON document, falling back to an empty object
   */
  async loadJSON(filePath: string): Promise<Record<string, unknown>> {
    const result = await this.readJSON(filePath);
    if (result.status === 'ok') {
      return result.value;
    }
    if (result.status === 'corrupt') {
      console.warn(`Ignoring unreadable JSON file ${filePath}:`, result.error);
    }
    return {};
  }

  /**
   * Replace a JSON document on disk. Each write gets its own temp file, so
   * overlapping saves end with the last rename in place.
   */
  async saveJSON(filePath: string, data: unknown): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await this.ensureDir(filePath);
      await fs.promises.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf8');
      await fs.promises.rename(tempPath, filePath);
    } catch (error) {
      console.error(`Error saving ${filePath}:`, error);
      await fs.promises.rm(tempPath, { force: true }).catch(cleanupError => {
        console.error(`Error removing ${tempPath}:`, cleanupError);
      });
      throw new StorageError(`Failed to save ${filePath}`, filePath, error);
    }
  }

  /**
   * Load the non-blank, trimmed lines of a text file
   */
  async loadLines(filePath: string): Promise<string[]> {
    try {
      const content = await fs.promises.readFile(filePath, 'utf8');
      return content
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0);
    } catch (error) {
      if (!isMissingFile(error)) {
        console.error(`Error loading lines from ${filePath}:`, error);
      }
      return [];
    }
  }

  async appendLine(filePath: string, line: string): Promise<void> {
    try {
      await this.ensureDir(filePath);
      const existing = await this.readRaw(filePath);
      const separator = existing.length > 0 && !existing.endsWith('\n') ? '\n' : '';
      await fs.promises.appendFile(filePath, `${separator}${line}\n`, 'utf8');
    } catch (error) {
      console.error(`Error appending to ${filePath}:`, error);
      throw new StorageError(`Failed to append to ${filePath}`, filePath, error);
    }
  }

  async rewriteLines(filePath: string, lines: string[]): Promise<void> {
    try {
      await this.ensureDir(filePath);
      await fs.promises.writeFile(filePath, lines.join('\n'), 'utf8');
    } catch (error) {
      console.error(`Error rewriting ${filePath}:`, error);
      throw new StorageError(`Failed to rewrite ${filePath}`, filePath, error);
    }
  }

  /**
   * Delete a file. Returns false if it did not exist.
   */
  async removeFile(filePath: string): Promise<boolean> {
    try {
      await fs.promises.unlink(filePath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw new StorageError(`Failed to remove ${filePath}`, filePath, error);
    }
  }

  private async ensureDir(filePath: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  }

  private async readRaw(filePath: string): Promise<string> {
    try {
      return await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return '';
      }
      throw error;
    }
  }
}

export const createStorageService = (): StorageService => {
  return new StorageService();
};
