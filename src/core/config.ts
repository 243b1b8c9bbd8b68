import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { GeneratorConfigSchema, type GeneratorConfig, type GeneratorConfigOverrides } from './types.js';
import { ConfigError, toError } from './errors.js';

export const GLOBAL_DIR_NAME = '.create-pwa-game';
export const WORKSPACE_CONFIG_FILE = '.create-pwa-game.yaml';

export interface ConfigManagerOptions {
  /** Directory the project is created in; its workspace config is read */
  workspaceDir?: string;
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private globalDir: string;
  private workspaceDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.globalDir = options.globalDir ?? this.env.PWA_GAME_CONFIG_DIR ?? join(homedir(), GLOBAL_DIR_NAME);
    this.workspaceDir = options.workspaceDir ?? process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- workspace config <- env vars <- overrides
   */
  load(overrides?: GeneratorConfigOverrides): GeneratorConfig {
    let raw: Record<string, unknown> = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.workspaceDir, WORKSPACE_CONFIG_FILE), 'workspace'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, { ...overrides });
    }

    const parsed = GeneratorConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${details}`, parsed.error);
    }

    return parsed.data;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  private readYaml(path: string, label: string): Record<string, unknown> {
    if (!existsSync(path)) return {};

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }

    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`Expected a mapping at the top of ${label} config ${path}`);
    }
    return parsed;
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const result = { ...raw };

    const maxLength = this.env.PWA_GAME_MAX_NAME_LENGTH;
    if (maxLength) {
      const value = Number(maxLength);
      if (!Number.isInteger(value)) {
        throw new ConfigError(`PWA_GAME_MAX_NAME_LENGTH must be an integer, got "${maxLength}"`);
      }
      const naming = isRecord(result.naming) ? result.naming : {};
      result.naming = { ...naming, maxLength: value };
    }

    const level = this.env.PWA_GAME_LOG_LEVEL;
    if (level) {
      const logging = isRecord(result.logging) ? result.logging : {};
      result.logging = { ...logging, level };
    }

    return result;
  }

  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = target[key];
      if (incoming === undefined) continue;
      if (isRecord(incoming) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, incoming);
      } else {
        result[key] = incoming;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
