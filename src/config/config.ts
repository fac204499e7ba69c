/**
 * Configuration System
 *
 * Manages config file at ~/.roffsmith/config.json.
 * Supports environment variable overrides.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { ConfigurationError } from '../errors/roff-error.js';
import type { Apostrophes } from '../renderer/escape.js';

export interface RoffsmithConfig {
  render: {
    /** Default: 'handle' (groff prints a straight apostrophe) */
    apostrophes: Apostrophes;
    /** Default: false */
    stripNewlines: boolean;
  };
  output: {
    /** Directory pages are written to when `render` gets no --output. Default: stdout */
    dir?: string;
    /** Only report outdated pages, never write them. Default: false */
    checkOnly: boolean;
  };
}

export interface PartialRoffsmithConfig {
  render?: Partial<RoffsmithConfig['render']>;
  output?: Partial<RoffsmithConfig['output']>;
}

/** Keys accepted by `get` / `set`, in dotted form. */
export const CONFIG_KEYS = [
  'render.apostrophes',
  'render.stripNewlines',
  'output.dir',
  'output.checkOnly',
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

const APOSTROPHE_MODES: readonly string[] = ['handle', 'ignore'];

export class ConfigManager {
  private readonly configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath ?? path.join(os.homedir(), '.roffsmith', 'config.json');
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Load config from disk. Returns defaults if file doesn't exist.
   */
  load(): RoffsmithConfig {
    if (!fs.existsSync(this.configPath)) {
      return ConfigManager.defaults();
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(
        `Failed to read config at ${this.configPath}: ${err instanceof Error ? err.message : String(err)}`,
        { path: this.configPath }
      );
    }
    if (!isPartialConfig(parsed)) {
      const { errors } = this.validate(parsed);
      throw new ConfigurationError(`Invalid config at ${this.configPath}: ${errors.join('; ')}`, {
        path: this.configPath,
        errors,
      });
    }
    return this.merge(ConfigManager.defaults(), parsed);
  }

  /**
   * Save config to disk, creating parent directories as needed.
   */
  save(config: RoffsmithConfig): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  }

  /**
   * Validate a config object. Returns errors array: empty means valid.
   * Missing keys are allowed; they fall back to defaults on load.
   */
  validate(config: unknown): { valid: boolean; errors: string[] } {
    const errors = collectConfigErrors(config);
    return { valid: errors.length === 0, errors };
  }

  /**
   * Validate the file on disk without loading it. A missing file is valid.
   */
  validateFile(): { valid: boolean; errors: string[] } {
    if (!fs.existsSync(this.configPath)) {
      return { valid: true, errors: [] };
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (err) {
      return { valid: false, errors: [`not valid JSON: ${err instanceof Error ? err.message : String(err)}`] };
    }
    return this.validate(parsed);
  }

  /**
   * Load config, then apply environment variable overrides.
   *
   * Supported env vars:
   *   ROFFSMITH_APOSTROPHES, ROFFSMITH_STRIP_NEWLINES,
   *   ROFFSMITH_OUTPUT_DIR, ROFFSMITH_CHECK_ONLY
   */
  loadWithEnvOverrides(env: NodeJS.ProcessEnv = process.env): RoffsmithConfig {
    const config = this.load();

    if (env.ROFFSMITH_APOSTROPHES) {
      config.render.apostrophes = parseApostrophes(env.ROFFSMITH_APOSTROPHES, 'ROFFSMITH_APOSTROPHES');
    }
    if (env.ROFFSMITH_STRIP_NEWLINES) {
      config.render.stripNewlines = parseFlag(env.ROFFSMITH_STRIP_NEWLINES, 'ROFFSMITH_STRIP_NEWLINES');
    }
    if (env.ROFFSMITH_OUTPUT_DIR) config.output.dir = env.ROFFSMITH_OUTPUT_DIR;
    if (env.ROFFSMITH_CHECK_ONLY) {
      config.output.checkOnly = parseFlag(env.ROFFSMITH_CHECK_ONLY, 'ROFFSMITH_CHECK_ONLY');
    }

    return config;
  }

  /**
   * Return a default configuration.
   */
  static defaults(): RoffsmithConfig {
    return {
      render: {
        apostrophes: 'handle',
        stripNewlines: false,
      },
      output: {
        checkOnly: false,
      },
    };
  }

  /** Read one dotted key, or undefined for an unknown key. */
  static getValue(config: RoffsmithConfig, key: string): unknown {
    switch (key) {
      case 'render':
        return config.render;
      case 'output':
        return config.output;
      case 'render.apostrophes':
        return config.render.apostrophes;
      case 'render.stripNewlines':
        return config.render.stripNewlines;
      case 'output.dir':
        return config.output.dir;
      case 'output.checkOnly':
        return config.output.checkOnly;
      default:
        return undefined;
    }
  }

  /**
   * Return a copy of `config` with one key set from its command-line string form.
   *
   * @throws ConfigurationError for an unknown key or a value of the wrong kind
   */
  static setValue(config: RoffsmithConfig, key: string, value: string): RoffsmithConfig {
    const next: RoffsmithConfig = {
      render: { ...config.render },
      output: { ...config.output },
    };
    switch (key) {
      case 'render.apostrophes':
        next.render.apostrophes = parseApostrophes(value, key);
        break;
      case 'render.stripNewlines':
        next.render.stripNewlines = parseFlag(value, key);
        break;
      case 'output.dir':
        if (value === '') {
          delete next.output.dir;
        } else {
          next.output.dir = value;
        }
        break;
      case 'output.checkOnly':
        next.output.checkOnly = parseFlag(value, key);
        break;
      default:
        throw new ConfigurationError(`Unknown config key: ${key}`, { key, known: [...CONFIG_KEYS] });
    }
    return next;
  }

  /** Deep-merge source into target (non-destructive). */
  private merge(target: RoffsmithConfig, source: PartialRoffsmithConfig): RoffsmithConfig {
    return {
      render: { ...target.render, ...source.render },
      output: { ...target.output, ...source.output },
    };
  }
}

// ─── Validation ──────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function collectConfigErrors(config: unknown): string[] {
  const errors: string[] = [];
  if (!isRecord(config)) {
    return ['config must be a JSON object'];
  }

  const render = config.render;
  if (render !== undefined) {
    if (!isRecord(render)) {
      errors.push('render must be an object');
    } else {
      if (
        render.apostrophes !== undefined &&
        (typeof render.apostrophes !== 'string' || !APOSTROPHE_MODES.includes(render.apostrophes))
      ) {
        errors.push(`render.apostrophes must be handle | ignore, got: ${String(render.apostrophes)}`);
      }
      if (render.stripNewlines !== undefined && typeof render.stripNewlines !== 'boolean') {
        errors.push('render.stripNewlines must be true or false');
      }
    }
  }

  const output = config.output;
  if (output !== undefined) {
    if (!isRecord(output)) {
      errors.push('output must be an object');
    } else {
      if (output.dir !== undefined && (typeof output.dir !== 'string' || output.dir === '')) {
        errors.push('output.dir must be a non-empty path');
      }
      if (output.checkOnly !== undefined && typeof output.checkOnly !== 'boolean') {
        errors.push('output.checkOnly must be true or false');
      }
    }
  }

  return errors;
}

export function isPartialConfig(value: unknown): value is PartialRoffsmithConfig {
  return collectConfigErrors(value).length === 0;
}

function parseApostrophes(value: string, source: string): Apostrophes {
  if (value === 'handle' || value === 'ignore') return value;
  throw new ConfigurationError(`${source} must be handle | ignore, got: ${value}`, { source, value });
}

function parseFlag(value: string, source: string): boolean {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      throw new ConfigurationError(`${source} must be true or false, got: ${value}`, { source, value });
  }
}
