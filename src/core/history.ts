/**
 * Session History
 *
 * Rolling log of user prompts and final answers. The tail of it is given to
 * the model as context at the start of each run.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { MemoryError, errorMessage } from '../utils/errors.js';
import { isNotFound, writeFileAtomic } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('history');

const HistoryEntrySchema = z.object({
  ts: z.string(),
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

export class SessionHistory {
  constructor(
    private readonly filePath: string,
    private readonly limit: number = 200
  ) {}

  async readAll(): Promise<HistoryEntry[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw new MemoryError(`Failed to read history: ${errorMessage(error)}`, this.filePath);
    }

    try {
      return z.array(HistoryEntrySchema).parse(JSON.parse(content));
    } catch (error) {
      // History is advisory context; a damaged file is replaced on the next append
      logger.warn(`Ignoring unreadable history file ${this.filePath}: ${errorMessage(error)}`);
      return [];
    }
  }

  async append(role: HistoryEntry['role'], content: string): Promise<void> {
    const entries = await this.readAll();
    entries.push({ ts: new Date().toISOString(), role, content });
    const kept = entries.slice(-this.limit);
    await writeFileAtomic(this.filePath, JSON.stringify(kept, null, 2));
  }

  async recent(count = 8): Promise<HistoryEntry[]> {
    if (count <= 0) {
      return [];
    }
    const entries = await this.readAll();
    return entries.slice(-count);
  }

  async clear(): Promise<void> {
    await writeFileAtomic(this.filePath, '[]');
  }
}
