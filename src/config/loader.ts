import { type ArgsiftConfig, type PartialConfig, validateConfig } from './schema.js';
import { getDefaultConfig } from './defaults.js';
import { logger } from '../observability/logger.js';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';

// Search order: CLI flags > env vars > config file > defaults
export interface LoadConfigOptions {
  cliFlags?: PartialConfig;
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertValidConfig(config: RawConfig): asserts config is RawConfig & ArgsiftConfig {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration: ${errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
  }
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ArgsiftConfig> {
  const defaults = getDefaultConfig();
  const envConfig = loadEnvConfig(options.env ?? process.env);
  const fileConfig = await loadFileConfig(options.configPath, options.cwd);

  // Merge in precedence order
  const merged: RawConfig = {
    ...defaults,
    ...fileConfig,
    ...envConfig,
    ...options.cliFlags,
  };

  assertValidConfig(merged);
  return {
    logLevel: merged.logLevel,
    json: merged.json,
    helpWidth: merged.helpWidth,
    color: merged.color,
  };
}

function parseBooleanEnv(value: string): boolean | string {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return value; // left for validateConfig to reject
}

// Load from environment variables
function loadEnvConfig(env: NodeJS.ProcessEnv): RawConfig {
  const config: RawConfig = {};

  if (env['ARGSIFT_LOG_LEVEL']) {
    config['logLevel'] = env['ARGSIFT_LOG_LEVEL'];
  }
  if (env['ARGSIFT_JSON']) {
    config['json'] = parseBooleanEnv(env['ARGSIFT_JSON']);
  }
  if (env['ARGSIFT_HELP_WIDTH']) {
    config['helpWidth'] = Number(env['ARGSIFT_HELP_WIDTH']);
  }
  if (env['NO_COLOR']) {
    config['color'] = false;
  }
  if (env['ARGSIFT_COLOR']) {
    config['color'] = parseBooleanEnv(env['ARGSIFT_COLOR']);
  }

  return config;
}

// Load from config file
// Search: argsift.config.js, argsift.config.mjs, .argsiftrc, .argsiftrc.json, package.json#argsift
async function loadFileConfig(configPath?: string, cwd?: string): Promise<RawConfig> {
  const searchDir = cwd ?? process.cwd();

  // If explicit path provided, use it
  if (configPath) {
    return loadConfigFile(path.resolve(searchDir, configPath));
  }

  const candidates = [
    'argsift.config.js',
    'argsift.config.mjs',
    '.argsiftrc',
    '.argsiftrc.json',
  ];

  for (const candidate of candidates) {
    const fullPath = path.join(searchDir, candidate);
    if (fs.existsSync(fullPath)) {
      return loadConfigFile(fullPath);
    }
  }

  const pkgPath = path.join(searchDir, 'package.json');
  if (fs.existsSync(pkgPath)) {
    try {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
      if (isRecord(pkg) && isRecord(pkg['argsift'])) {
        return pkg['argsift'];
      }
    } catch (error) {
      logger.warn('Ignoring unreadable package.json', { path: pkgPath, error: String(error) });
    }
  }

  return {};
}

async function loadConfigFile(filePath: string): Promise<RawConfig> {
  const ext = path.extname(filePath);
  let loaded: unknown;

  if (ext === '.js' || ext === '.mjs') {
    // Convert to file URL for proper ESM import
    const module: unknown = await import(pathToFileURL(filePath).href);
    loaded = isRecord(module) && 'default' in module ? module['default'] : module;
  } else {
    // JSON or .argsiftrc (treat as JSON)
    loaded = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  }

  if (!isRecord(loaded)) {
    throw new Error(`Config file must export an object: ${filePath}`);
  }
  return loaded;
}

// Singleton for global access
let cachedConfig: ArgsiftConfig | null = null;

export function getConfig(): ArgsiftConfig {
  if (!cachedConfig) {
    throw new Error('Config not loaded. Call loadConfig() first.');
  }
  return cachedConfig;
}

export function setConfig(config: ArgsiftConfig): void {
  cachedConfig = config;
}
