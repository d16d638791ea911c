import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ToolRegistry } from './registry.js';
import type { ToolRegistryConfig } from './registry.js';
import type { ToolArguments, ToolResult } from './types.js';

function registryConfig(root: string, overrides: Partial<ToolRegistryConfig> = {}): ToolRegistryConfig {
  return {
    workspaceRoot: root,
    allowlist: ['echo', 'sleep', 'ls'],
    shellTimeoutMs: 5000,
    maxReadChars: 16000,
    maxOutputChars: 8000,
    maxListEntries: 200,
    ...overrides,
  };
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

function errorReason(result: ToolResult): string | undefined {
  return result.status === 'error' ? result.reason : undefined;
}

describe('ToolRegistry', () => {
  let base: string;
  let root: string;
  let registry: ToolRegistry;
  let callCounter = 0;

  const call = (name: string, args: ToolArguments, target: ToolRegistry = registry) =>
    target.invoke({ id: `call_${++callCounter}`, name, arguments: args });

  beforeEach(async () => {
    base = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'keel-registry-')));
    root = path.join(base, 'ws');
    await fs.mkdir(root);
    registry = new ToolRegistry(registryConfig(root));
  });

  afterEach(async () => {
    await fs.rm(base, { recursive: true, force: true });
  });

  it('declares the four tools', () => {
    expect(registry.getDefinitions().map(tool => tool.name)).toEqual([
      'run_shell',
      'read_file',
      'write_file',
      'list_files',
    ]);
  });

  it('echoes the call id in the result', async () => {
    const result = await registry.invoke({ id: 'abc', name: 'list_files', arguments: {} });
    expect(result.callId).toBe('abc');
  });

  describe('write_file and read_file', () => {
    it('writes then reads back the same content', async () => {
      const written = await call('write_file', { path: 'notes/a.txt', content: 'hello' });
      expect(written).toMatchObject({ status: 'ok', output: 'Wrote 5 bytes to notes/a.txt' });

      const read = await call('read_file', { path: 'notes/a.txt' });
      expect(read).toMatchObject({ status: 'ok', output: 'hello', truncated: false });
      await expect(fs.readFile(path.join(root, 'notes', 'a.txt'), 'utf-8')).resolves.toBe('hello');
    });

    it('counts bytes, not characters', async () => {
      const written = await call('write_file', { path: 'u.txt', content: 'é' });
      expect(written.output).toBe('Wrote 2 bytes to u.txt');
    });

    it('reports a missing file as NotFound', async () => {
      const result = await call('read_file', { path: 'nope.txt' });
      expect(result).toMatchObject({ status: 'error', reason: 'NotFound', output: 'File does not exist: nope.txt' });
    });

    it('keeps the tail of long files and flags the truncation', async () => {
      const small = new ToolRegistry(registryConfig(root, { maxReadChars: 5 }));
      await fs.writeFile(path.join(root, 'digits.txt'), '0123456789', 'utf-8');

      const result = await call('read_file', { path: 'digits.txt' }, small);
      expect(result).toMatchObject({ status: 'ok', output: '56789', truncated: true });
    });

    it('refuses to write outside the workspace and leaves the disk untouched', async () => {
      const result = await call('write_file', { path: '../escape.txt', content: 'x' });
      expect(errorReason(result)).toBe('PathViolation');
      expect(await exists(path.join(base, 'escape.txt'))).toBe(false);
    });

    it('refuses to write through a dangling symlink that leads outside', async () => {
      await fs.symlink(path.join('..', 'evil.txt'), path.join(root, 'dangling'));

      const result = await call('write_file', { path: 'dangling', content: 'pwned' });
      expect(errorReason(result)).toBe('PathViolation');
      expect(await exists(path.join(base, 'evil.txt'))).toBe(false);
    });

    it('refuses absolute paths outside the workspace', async () => {
      const result = await call('read_file', { path: '/etc/hostname' });
      expect(errorReason(result)).toBe('PathViolation');
    });
  });

  describe('list_files', () => {
    beforeEach(async () => {
      await fs.mkdir(path.join(root, 'a', 'b'), { recursive: true });
      await fs.writeFile(path.join(root, 'b.txt'), 'b', 'utf-8');
      await fs.writeFile(path.join(root, 'a', 'c.txt'), 'c', 'utf-8');
      await fs.writeFile(path.join(root, 'a', 'b', 'd.txt'), 'd', 'utf-8');
    });

    it('lists files depth-first in sorted order', async () => {
      const result = await call('list_files', {});
      expect(result).toMatchObject({ status: 'ok', output: 'a/b/d.txt\na/c.txt\nb.txt', truncated: false });
    });

    it('lists a subdirectory relative to the workspace root', async () => {
      const result = await call('list_files', { path: 'a/b' });
      expect(result.output).toBe('a/b/d.txt');
    });

    it('stops at the entry cap', async () => {
      const capped = new ToolRegistry(registryConfig(root, { maxListEntries: 2 }));
      const result = await call('list_files', {}, capped);
      expect(result).toMatchObject({ status: 'ok', output: 'a/b/d.txt\na/c.txt', truncated: true });
    });

    it('reports a missing path as NotFound', async () => {
      const result = await call('list_files', { path: 'missing' });
      expect(result).toMatchObject({ status: 'error', reason: 'NotFound', output: 'Path does not exist: missing' });
    });

    it('refuses to list outside the workspace', async () => {
      const result = await call('list_files', { path: '..' });
      expect(errorReason(result)).toBe('PathViolation');
    });
  });

  describe('run_shell', () => {
    it('runs allowlisted commands and reports their output', async () => {
      const result = await call('run_shell', { command: 'echo hello' });
      expect(result.status).toBe('ok');
      expect(JSON.parse(result.output)).toEqual({ exitCode: 0, stdout: 'hello\n', stderr: '' });
    });

    it('runs in the requested workspace subdirectory', async () => {
      await fs.mkdir(path.join(root, 'sub'));
      await fs.writeFile(path.join(root, 'sub', 'only-here.txt'), '', 'utf-8');

      const result = await call('run_shell', { command: 'ls', cwd: 'sub' });
      expect(JSON.parse(result.output)).toEqual({ exitCode: 0, stdout: 'only-here.txt\n', stderr: '' });
    });

    it('denies commands outside the allowlist without running them', async () => {
      const marker = path.join(root, 'marker.txt');

      for (let attempt = 0; attempt < 2; attempt++) {
        const result = await call('run_shell', { command: 'touch marker.txt' });
        expect(result).toMatchObject({
          status: 'error',
          reason: 'PermissionDenied',
          output: 'Command "touch marker.txt" is blocked by the allowlist. Allowed prefixes: echo, sleep, ls',
        });
      }
      expect(await exists(marker)).toBe(false);
    });

    it('denies destructive commands under a narrow allowlist', async () => {
      const narrow = new ToolRegistry(registryConfig(root, { allowlist: ['git status'] }));
      const result = await call('run_shell', { command: 'rm -rf /' }, narrow);
      expect(errorReason(result)).toBe('PermissionDenied');
    });

    it('refuses a working directory outside the workspace', async () => {
      const result = await call('run_shell', { command: 'echo hi', cwd: '..' });
      expect(errorReason(result)).toBe('PathViolation');
    });

    it('kills commands that exceed the timeout', async () => {
      const quick = new ToolRegistry(registryConfig(root, { shellTimeoutMs: 300 }));
      const started = Date.now();

      const result = await call('run_shell', { command: 'sleep 5' }, quick);
      expect(result).toMatchObject({ status: 'error', reason: 'ExecutionTimeout', output: 'Command timed out after 0.3s' });
      expect(Date.now() - started).toBeLessThan(4000);
    });

    it('reports a non-zero exit as ExecutionFailed with the captured output', async () => {
      const result = await call('run_shell', { command: 'ls does-not-exist' });
      expect(errorReason(result)).toBe('ExecutionFailed');

      const payload: unknown = JSON.parse(result.output);
      expect(payload).toMatchObject({ stdout: '' });
      expect(payload).not.toMatchObject({ exitCode: 0 });
      expect(result.output).toContain('does-not-exist');
    });

    it('keeps the tail of long output', async () => {
      const tiny = new ToolRegistry(registryConfig(root, { maxOutputChars: 4 }));
      const result = await call('run_shell', { command: 'echo abcdefgh' }, tiny);
      expect(result.truncated).toBe(true);
      expect(JSON.parse(result.output)).toEqual({ exitCode: 0, stdout: 'fgh\n', stderr: '' });
    });
  });

  describe('argument and name validation', () => {
    it('answers unknown tools with UnknownTool', async () => {
      const result = await call('web_lookup', { query: 'x' });
      expect(result).toMatchObject({ status: 'error', reason: 'UnknownTool', output: 'Unknown tool: web_lookup' });
    });

    it('rejects missing required arguments', async () => {
      const result = await call('read_file', {});
      expect(result).toMatchObject({
        status: 'error',
        reason: 'InvalidArguments',
        output: 'Invalid arguments for read_file: path: Required',
      });
    });

    it('rejects unexpected arguments', async () => {
      const result = await call('write_file', { path: 'a.txt', content: 'b', mode: 'append' });
      expect(result).toMatchObject({
        status: 'error',
        reason: 'InvalidArguments',
        output: "Invalid arguments for write_file: Unrecognized key(s) in object: 'mode'",
      });
      expect(await exists(path.join(root, 'a.txt'))).toBe(false);
    });

    it('rejects arguments of the wrong type', async () => {
      const result = await call('run_shell', { command: 42 });
      expect(errorReason(result)).toBe('InvalidArguments');
    });
  });
});
