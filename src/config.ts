/**
 * Server configuration module.
 *
 * Loads config from a JSON file (default: ./config.json). Command-line
 * arguments override file values.
 */

import fs from 'fs-extra';

export interface ServerConfig {
  /** Port to listen on (default: 3000) */
  port: number;
  /** Directory to load control files from */
  contentDir: string;
  /** Whether to include dot-files when scanning */
  includeHidden: boolean;
}

export const DEFAULT_CONFIG: ServerConfig = {
  port: 3000,
  contentDir: process.cwd(),
  includeHidden: false
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pick the recognised settings out of parsed JSON, ignoring anything of the
 * wrong type.
 */
export function toServerConfig(raw: unknown, base: ServerConfig = DEFAULT_CONFIG): ServerConfig {
  const config = { ...base };
  if (!isRecord(raw)) {
    return config;
  }

  if (typeof raw.port === 'number' && Number.isInteger(raw.port) && raw.port > 0) {
    config.port = raw.port;
  }
  if (typeof raw.contentDir === 'string') {
    config.contentDir = raw.contentDir;
  }
  if (typeof raw.includeHidden === 'boolean') {
    config.includeHidden = raw.includeHidden;
  }
  return config;
}

/**
 * Load configuration from file, falling back to defaults when it is missing.
 */
export async function loadConfig(configPath: string): Promise<ServerConfig> {
  if (!(await fs.pathExists(configPath))) {
    console.warn(`Config file ${configPath} not found, using defaults`);
    return { ...DEFAULT_CONFIG };
  }

  const raw: unknown = await fs.readJson(configPath);
  console.log(`Loaded config from ${configPath}`);
  return toServerConfig(raw);
}

/**
 * Apply `--port=`, `--dir=` and `--hidden` arguments on top of a config.
 */
export function applyArgs(config: ServerConfig, args: string[]): ServerConfig {
  const result = { ...config };

  for (const arg of args) {
    if (arg.startsWith('--port=')) {
      const port = parseInt(arg.slice('--port='.length), 10);
      if (!isNaN(port) && port > 0) {
        result.port = port;
      }
    } else if (arg.startsWith('--dir=')) {
      result.contentDir = arg.slice('--dir='.length);
    } else if (arg === '--hidden') {
      result.includeHidden = true;
    }
  }

  return result;
}
