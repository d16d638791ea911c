/**
 * Memory Store
 *
 * Small key/value record that survives between sessions. Writes are atomic:
 * a reader sees either the previous file or the new one, never a partial one.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { MemoryError, errorMessage } from '../utils/errors.js';
import { isNotFound, writeFileAtomic } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('memory');

export type MemoryRecord = Record<string, string>;

export interface MemoryAck {
  path: string;
  keys: number;
}

const MemoryRecordSchema = z.record(z.string());

export class MemoryStore {
  constructor(private readonly filePath: string) {}

  getPath(): string {
    return this.filePath;
  }

  /**
   * Read the record; a missing file is an empty record
   */
  async load(): Promise<MemoryRecord> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        logger.debug(`No memory file at ${this.filePath}, starting empty`);
        return {};
      }
      throw new MemoryError(`Failed to read memory: ${errorMessage(error)}`, this.filePath);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new MemoryError(`Memory file is not valid JSON: ${errorMessage(error)}`, this.filePath);
    }

    const parsed = MemoryRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MemoryError('Memory file must be a JSON object of string values', this.filePath);
    }
    return parsed.data;
  }

  async save(record: MemoryRecord): Promise<MemoryAck> {
    const validated = MemoryRecordSchema.parse(record);
    try {
      await writeFileAtomic(this.filePath, JSON.stringify(validated, null, 2));
    } catch (error) {
      throw new MemoryError(`Failed to save memory: ${errorMessage(error)}`, this.filePath);
    }
    return { path: this.filePath, keys: Object.keys(validated).length };
  }
}
