/**
 * Workspace Handler
 *
 * Prepares the workspace directory and knows where Keel keeps its own state
 * inside it.
 */

import { mkdir, realpath, stat } from 'fs/promises';
import { join, resolve } from 'path';
import { WorkspaceError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('workspace');

export const STATE_DIR_NAME = '.keel';

export interface WorkspaceConfig {
  workspaceDir: string;
}

export class WorkspaceManager {
  private workspaceDir: string;

  constructor(config: WorkspaceConfig) {
    this.workspaceDir = resolve(config.workspaceDir);
  }

  /**
   * Create the workspace if needed and pin it to its real path
   */
  async initialize(): Promise<void> {
    logger.info(`Initializing workspace: ${this.workspaceDir}`);

    try {
      await mkdir(this.workspaceDir, { recursive: true });
      this.workspaceDir = await realpath(this.workspaceDir);
      const info = await stat(this.workspaceDir);
      if (!info.isDirectory()) {
        throw new WorkspaceError(`Workspace is not a directory: ${this.workspaceDir}`);
      }
    } catch (error) {
      if (error instanceof WorkspaceError) {
        throw error;
      }
      throw new WorkspaceError(`Cannot prepare workspace ${this.workspaceDir}: ${errorMessage(error)}`);
    }
  }

  getWorkspaceDir(): string {
    return this.workspaceDir;
  }

  getStateDir(): string {
    return join(this.workspaceDir, STATE_DIR_NAME);
  }

  getMemoryPath(): string {
    return join(this.getStateDir(), 'memory.json');
  }

  getHistoryPath(): string {
    return join(this.getStateDir(), 'history.json');
  }
}
