import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import {
  LedgerSchedConfigSchema,
  type LedgerSchedConfig,
  type LedgerSchedConfigInput,
} from './types.js';
import { ConfigError } from './errors.js';

/** Environment variable → config path under `blockchain` */
const ENV_NUMERIC_KEYS: Record<string, string> = {
  LEDGERSCHED_BLOCK_SIZE: 'blockSize',
  LEDGERSCHED_HISTORY_WINDOW: 'historyWindow',
  LEDGERSCHED_ALPHA: 'alpha',
  LEDGERSCHED_BETA: 'beta',
};

export class ConfigManager {
  private config: LedgerSchedConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectDir?: string, options: { globalDir?: string; env?: NodeJS.ProcessEnv } = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.ledgersched');
    this.projectDir = projectDir || process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: LedgerSchedConfigInput): LedgerSchedConfig {
    let raw: Record<string, unknown> = {};

    raw = this.mergeFile(raw, join(this.globalDir, 'config.yaml'), 'global');
    raw = this.mergeFile(raw, join(this.projectDir, '.ledgersched.yaml'), 'project');
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const parsed = LedgerSchedConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${detail}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): LedgerSchedConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  private mergeFile(
    raw: Record<string, unknown>,
    path: string,
    label: 'global' | 'project',
  ): Record<string, unknown> {
    if (!existsSync(path)) return raw;

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(
        `Failed to parse ${label} config at ${path}`,
        err instanceof Error ? err : undefined,
      );
    }

    if (isRecord(parsed)) {
      return this.deepMerge(raw, parsed);
    }
    return raw;
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const blockchain: Record<string, unknown> = isRecord(raw.blockchain) ? { ...raw.blockchain } : {};

    for (const [envKey, field] of Object.entries(ENV_NUMERIC_KEYS)) {
      const value = this.env[envKey];
      if (value === undefined || value.trim() === '') continue;

      const num = Number(value);
      if (Number.isNaN(num)) {
        throw new ConfigError(`Environment variable ${envKey} must be numeric, got "${value}"`);
      }
      blockchain[field] = num;
    }

    return { ...raw, blockchain };
  }

  private deepMerge(target: Record<string, unknown>, source: object): Record<string, unknown> {
    const result = { ...target };
    for (const [key, value] of Object.entries(source)) {
      const existing = target[key];
      if (isRecord(value) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
