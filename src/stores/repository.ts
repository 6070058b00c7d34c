/**
 * Record persistence
 * Links, sessions and recordings are kept behind this interface so they survive restarts.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface Repository<T> {
  get(id: string): Promise<T | undefined>;
  put(id: string, record: T): Promise<void>;
  list(): Promise<T[]>;
  delete(id: string): Promise<boolean>;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{1,3})?Z$/;

/**
 * JSON.parse reviver turning ISO timestamps back into Date objects
 */
export function reviveDates(_key: string, value: unknown): unknown {
  if (typeof value === 'string' && ISO_DATE.test(value)) {
    return new Date(value);
  }
  return value;
}

/**
 * Volatile store, used by tests and when no data directory is configured
 */
export class InMemoryRepository<T> implements Repository<T> {
  private records: Map<string, T> = new Map();

  async get(id: string): Promise<T | undefined> {
    const record = this.records.get(id);
    return record === undefined ? undefined : structuredClone(record);
  }

  async put(id: string, record: T): Promise<void> {
    this.records.set(id, structuredClone(record));
  }

  async list(): Promise<T[]> {
    return Array.from(this.records.values()).map(record => structuredClone(record));
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }
}

/**
 * One JSON file per record under a directory
 */
export class JsonFileRepository<T> implements Repository<T> {
  private readonly dir: string;

  constructor(dir: string, private readonly name: string) {
    this.dir = dir;
    if (!fs.existsSync(this.dir)) {
      fs.mkdirSync(this.dir, { recursive: true });
    }
  }

  private isValidId(id: string): boolean {
    return /^[A-Za-z0-9_-]+$/.test(id);
  }

  private filePath(id: string): string {
    if (!this.isValidId(id)) {
      throw new Error(`[${this.name}] Invalid record id: ${id}`);
    }
    return path.join(this.dir, `${id}.json`);
  }

  private read(filepath: string): T {
    return JSON.parse(fs.readFileSync(filepath, 'utf-8'), reviveDates);
  }

  /**
   * Ids that could never have been stored read as missing
   */
  async get(id: string): Promise<T | undefined> {
    if (!this.isValidId(id)) {
      return undefined;
    }
    const filepath = this.filePath(id);
    if (!fs.existsSync(filepath)) {
      return undefined;
    }
    return this.read(filepath);
  }

  async put(id: string, record: T): Promise<void> {
    const filepath = this.filePath(id);
    // Write then rename so a crash never leaves a half-written record
    const tmpPath = `${filepath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(record, null, 2));
    fs.renameSync(tmpPath, filepath);
  }

  async list(): Promise<T[]> {
    const records: T[] = [];
    for (const file of fs.readdirSync(this.dir)) {
      if (!file.endsWith('.json')) continue;

      try {
        records.push(this.read(path.join(this.dir, file)));
      } catch (error) {
        console.error(`[${this.name}] Skipping unreadable record ${file}:`, error);
      }
    }
    return records;
  }

  async delete(id: string): Promise<boolean> {
    if (!this.isValidId(id)) {
      return false;
    }
    const filepath = this.filePath(id);
    if (!fs.existsSync(filepath)) {
      return false;
    }
    fs.unlinkSync(filepath);
    return true;
  }
}
