/**
 * File tools: read_file, write_file, list_files
 *
 * Paths handed to these functions have already been confined to the workspace.
 */

import { mkdir, readFile, readdir, stat, writeFile } from 'fs/promises';
import { dirname, join, relative, sep } from 'path';

export interface ReadOutcome {
  content: string;
  truncated: boolean;
}

export interface ListOutcome {
  files: string[];
  truncated: boolean;
}

/**
 * Keep the last `maxChars` characters of `text`
 */
export function capTail(text: string, maxChars: number): { text: string; truncated: boolean } {
  if (text.length <= maxChars) {
    return { text, truncated: false };
  }
  return { text: text.slice(text.length - maxChars), truncated: true };
}

export async function readTextFile(absPath: string, maxChars: number): Promise<ReadOutcome> {
  const raw = await readFile(absPath, 'utf-8');
  const capped = capTail(raw, maxChars);
  return { content: capped.text, truncated: capped.truncated };
}

export async function writeTextFile(absPath: string, content: string): Promise<number> {
  await mkdir(dirname(absPath), { recursive: true });
  await writeFile(absPath, content, 'utf-8');
  return Buffer.byteLength(content, 'utf-8');
}

/**
 * Recursively list files under `absPath`, relative to `root`, in sorted
 * depth-first order. Stops after `maxEntries` files.
 */
export async function listFilesRecursive(root: string, absPath: string, maxEntries: number): Promise<ListOutcome> {
  const files: string[] = [];

  const info = await stat(absPath);
  if (info.isFile()) {
    return { files: [toPosix(relative(root, absPath))], truncated: false };
  }

  const walk = async (dir: string): Promise<boolean> => {
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (await walk(full)) {
          return true;
        }
      } else if (entry.isFile()) {
        if (files.length >= maxEntries) {
          return true;
        }
        files.push(toPosix(relative(root, full)));
      }
    }
    return false;
  };

  const truncated = await walk(absPath);
  return { files, truncated };
}

function toPosix(p: string): string {
  return sep === '/' ? p : p.split(sep).join('/');
}
