import type { HistoryEntry } from './history.js';
import type { MemoryRecord } from './memory.js';

export interface PromptContext {
  workspaceDir: string;
  platform: string;
  allowlist: readonly string[];
  memory: MemoryRecord;
  recentHistory: HistoryEntry[];
}

export function buildSystemPrompt(context: PromptContext): string {
  const parts: string[] = [
    'You are Keel, a pragmatic coding agent working inside a single workspace directory.',
    'Use tools when needed. Prefer precise, minimal edits.',
    'Never claim to run commands you did not run.',
    'Understand both Dutch and English user input, including casual greetings and slang.',
    '',
    `Workspace: ${context.workspaceDir}`,
    `Shell: ${context.platform}`,
    `Allowed command prefixes: ${context.allowlist.join(', ') || '(none)'}`,
    'File paths are relative to the workspace; anything outside it is refused.',
  ];

  const memoryEntries = Object.entries(context.memory);
  if (memoryEntries.length > 0) {
    parts.push('', 'Remembered facts:');
    for (const [key, value] of memoryEntries) {
      parts.push(`- ${key}: ${value}`);
    }
  }

  if (context.recentHistory.length > 0) {
    parts.push('', 'Recent memory:');
    for (const entry of context.recentHistory) {
      parts.push(`${entry.role}: ${entry.content}`);
    }
  }

  return parts.join('\n');
}
