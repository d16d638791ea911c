import Conf from 'conf';
import { resolve } from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

export const DEFAULT_MODEL = 'google/gemma-3-4b';
export const LOCAL_API_KEY = 'lm-studio';

export const DEFAULT_ALLOWLIST: readonly string[] = [
  'python',
  'py',
  'git',
  'rg',
  'Get-ChildItem',
  'dir',
  'type',
  'echo',
  'Get-Content',
  'ls',
  'cat',
  'node',
  'npm',
];

// Zod schemas for validation
const ApiModeOptionSchema = z.enum(['auto', 'responses', 'chat']);

const UserDefaultsSchema = z.object({
  model: z.string().min(1).optional(),
  apiMode: ApiModeOptionSchema.optional(),
  baseUrl: z.string().url().optional(),
  allowlist: z.array(z.string().min(1)).optional(),
  maxIterations: z.number().int().positive().optional(),
  debug: z.boolean().optional(),
});

const KeelConfigSchema = z.object({
  workspaceRoot: z.string().min(1),
  model: z.string().min(1),
  apiMode: z.enum(['responses', 'chat']),
  baseUrl: z.string().url().optional(),
  apiKey: z.string().min(1),
  allowlist: z.array(z.string().min(1)),
  maxIterations: z.number().int().positive(),
  maxRetries: z.number().int().nonnegative(),
  retryBaseDelayMs: z.number().nonnegative(),
  shellTimeoutMs: z.number().int().positive(),
  maxReadChars: z.number().int().positive(),
  maxOutputChars: z.number().int().positive(),
  maxListEntries: z.number().int().positive(),
  historyLimit: z.number().int().positive(),
  historyContextSize: z.number().int().nonnegative(),
});

export type ApiModeOption = z.infer<typeof ApiModeOptionSchema>;
export type UserDefaults = z.infer<typeof UserDefaultsSchema>;
export type KeelConfig = Readonly<z.infer<typeof KeelConfigSchema>>;

export const BUILTIN_LIMITS = {
  maxIterations: 12,
  maxRetries: 2,
  retryBaseDelayMs: 1000,
  shellTimeoutMs: 45_000,
  maxReadChars: 16_000,
  maxOutputChars: 8_000,
  maxListEntries: 200,
  historyLimit: 200,
  historyContextSize: 8,
} as const;

/**
 * Options as they arrive from the command line
 */
export interface CliOptions {
  workspace?: string;
  model?: string;
  apiMode?: string;
  baseUrl?: string;
  allow?: string[];
  maxIterations?: number;
}

export function isLocalEndpoint(baseUrl: string | undefined): boolean {
  if (!baseUrl) {
    return false;
  }
  const lower = baseUrl.toLowerCase();
  return lower.includes('localhost') || lower.includes('127.0.0.1');
}

/**
 * `auto` talks chat completions to local servers and the responses API
 * everywhere else
 */
export function chooseApiMode(mode: ApiModeOption, baseUrl: string | undefined): 'responses' | 'chat' {
  if (mode === 'responses' || mode === 'chat') {
    return mode;
  }
  return isLocalEndpoint(baseUrl) ? 'chat' : 'responses';
}

export function resolveApiKey(env: NodeJS.ProcessEnv, baseUrl: string | undefined): string {
  const apiKey = env.OPENAI_API_KEY;
  if (apiKey) {
    return apiKey;
  }
  if (isLocalEndpoint(baseUrl)) {
    return LOCAL_API_KEY;
  }
  throw new ConfigurationError('OPENAI_API_KEY not set. Set it first and retry.');
}

/**
 * Merge command-line options over persisted user defaults over built-in
 * defaults into the configuration every core component is constructed with.
 */
export function resolveKeelConfig(
  options: CliOptions,
  defaults: UserDefaults = {},
  env: NodeJS.ProcessEnv = process.env
): KeelConfig {
  const parsedDefaults = UserDefaultsSchema.safeParse(defaults);
  if (!parsedDefaults.success) {
    throw new ConfigurationError(`Invalid saved defaults: ${parsedDefaults.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  const saved = parsedDefaults.data;

  const modeOption = ApiModeOptionSchema.safeParse(options.apiMode ?? saved.apiMode ?? 'auto');
  if (!modeOption.success) {
    throw new ConfigurationError(`Invalid API mode "${options.apiMode}". Expected auto, responses or chat.`);
  }

  const baseUrl = options.baseUrl || env.OPENAI_BASE_URL || saved.baseUrl || undefined;

  const candidate = {
    workspaceRoot: resolve(options.workspace ?? '.'),
    model: options.model ?? saved.model ?? DEFAULT_MODEL,
    apiMode: chooseApiMode(modeOption.data, baseUrl),
    baseUrl,
    apiKey: resolveApiKey(env, baseUrl),
    allowlist: options.allow && options.allow.length > 0 ? options.allow : (saved.allowlist ?? [...DEFAULT_ALLOWLIST]),
    ...BUILTIN_LIMITS,
    maxIterations: options.maxIterations ?? saved.maxIterations ?? BUILTIN_LIMITS.maxIterations,
  };

  const parsed = KeelConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      `Invalid configuration: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue'}`
    );
  }
  return Object.freeze(parsed.data);
}

/**
 * Persisted per-user defaults, edited with `keel config`
 */
export class ConfigManager {
  private store: Conf<UserDefaults>;
  private static instance: ConfigManager;

  private constructor() {
    this.store = new Conf<UserDefaults>({
      projectName: 'keel',
    });
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  getDefaults(): UserDefaults {
    const parsed = UserDefaultsSchema.safeParse(this.store.store);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Saved defaults at ${this.store.path} are invalid. Run "keel config --reset" to start over.`
      );
    }
    return parsed.data;
  }

  setDefaults(defaults: UserDefaults) {
    const validated = UserDefaultsSchema.parse(defaults);
    this.store.clear();

    // conf rejects undefined values, so only present keys are written
    if (validated.model !== undefined) this.store.set('model', validated.model);
    if (validated.apiMode !== undefined) this.store.set('apiMode', validated.apiMode);
    if (validated.baseUrl !== undefined) this.store.set('baseUrl', validated.baseUrl);
    if (validated.allowlist !== undefined) this.store.set('allowlist', validated.allowlist);
    if (validated.maxIterations !== undefined) this.store.set('maxIterations', validated.maxIterations);
    if (validated.debug !== undefined) this.store.set('debug', validated.debug);
  }

  isDebug(): boolean {
    return this.store.get('debug') ?? false;
  }

  reset() {
    this.store.clear();
  }

  getConfigPath(): string {
    return this.store.path;
  }
}
