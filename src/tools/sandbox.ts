/**
 * Sandbox checks
 *
 * Path confinement and command allowlisting. Both are functions of their
 * arguments only; the registry calls them before any side effect.
 */

import { readlink, realpath } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'path';
import { PathViolationError } from '../utils/errors.js';
import { hasErrorCode, isNotFound } from '../utils/fs.js';

export function isWithinRoot(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  if (rel === '') {
    return true;
  }
  return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/**
 * Lexical resolution of a user path against the workspace root
 */
export function resolveInWorkspace(workspaceRoot: string, userPath: string): string {
  const root = resolve(workspaceRoot);
  const candidate = isAbsolute(userPath) ? resolve(userPath) : resolve(root, userPath);

  if (!isWithinRoot(root, candidate)) {
    throw new PathViolationError(userPath, root);
  }
  return candidate;
}

// Same bound the kernel puts on symlink chains (ELOOP)
const MAX_LINK_HOPS = 40;

/**
 * Resolve a user path and make sure it stays inside the workspace once
 * symlinks are followed. The target itself may not exist yet (write_file);
 * its nearest existing ancestor is what gets resolved. A dangling symlink on
 * the way is followed to the path it names, since writing through it would
 * create that path.
 */
export async function confineToWorkspace(workspaceRoot: string, userPath: string): Promise<string> {
  const candidate = resolveInWorkspace(workspaceRoot, userPath);
  const realRoot = await realpath(resolve(workspaceRoot));

  let existing = candidate;
  let suffix = '';
  let hops = 0;
  for (;;) {
    const realExisting = await realpathIfExists(existing);
    if (realExisting !== undefined) {
      if (!isWithinRoot(realRoot, realExisting)) {
        throw new PathViolationError(userPath, realRoot);
      }
      return suffix ? resolve(realExisting, suffix) : realExisting;
    }

    const linkTarget = await readLinkIfSymlink(existing);
    if (linkTarget !== undefined) {
      if (++hops > MAX_LINK_HOPS) {
        throw new PathViolationError(userPath, realRoot);
      }
      existing = resolve(dirname(existing), linkTarget);
      continue;
    }

    const parent = dirname(existing);
    if (parent === existing) {
      throw new PathViolationError(userPath, realRoot);
    }
    suffix = suffix ? `${relative(parent, existing)}${sep}${suffix}` : relative(parent, existing);
    existing = parent;
  }
}

async function realpathIfExists(p: string): Promise<string | undefined> {
  try {
    return await realpath(p);
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Target of `p` when it is a symlink; undefined when it is missing or not a link
 */
async function readLinkIfSymlink(p: string): Promise<string | undefined> {
  try {
    return await readlink(p);
  } catch (error) {
    if (isNotFound(error) || hasErrorCode(error, 'EINVAL')) {
      return undefined;
    }
    throw error;
  }
}

/**
 * A rule admits a command when the trimmed command equals the rule or
 * continues after it with whitespace. `git` admits `git status`, not `gitk`.
 */
export function matchesAllowRule(rule: string, command: string): boolean {
  const normalizedRule = rule.trim();
  const normalizedCommand = command.trim();
  if (!normalizedRule || !normalizedCommand.startsWith(normalizedRule)) {
    return false;
  }
  if (normalizedCommand.length === normalizedRule.length) {
    return true;
  }
  return /\s/.test(normalizedCommand.charAt(normalizedRule.length));
}

export function isCommandAllowed(allowlist: readonly string[], command: string): boolean {
  return allowlist.some(rule => matchesAllowRule(rule, command));
}
