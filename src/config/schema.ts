import { LOG_LEVELS, type LogLevel } from '../observability/logger.js';

export interface ArgsiftConfig {
  logLevel: LogLevel;
  json: boolean;
  helpWidth: number; // 20-200 columns
  color: boolean;
}

export type PartialConfig = Partial<ArgsiftConfig>;

export interface ValidationError {
  path: string;
  message: string;
}

export const MIN_HELP_WIDTH = 20;
export const MAX_HELP_WIDTH = 200;

const KNOWN_KEYS: readonly string[] = ['logLevel', 'json', 'helpWidth', 'color'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Validate and return errors (empty array if valid)
export function validateConfig(config: unknown): ValidationError[] {
  const errors: ValidationError[] = [];

  if (!isRecord(config)) {
    errors.push({ path: 'root', message: 'Config must be an object' });
    return errors;
  }

  if ('logLevel' in config) {
    const level = config['logLevel'];
    if (typeof level !== 'string' || !(LOG_LEVELS as readonly string[]).includes(level)) {
      errors.push({
        path: 'logLevel',
        message: `Must be one of: ${LOG_LEVELS.join(', ')}`,
      });
    }
  }

  if ('helpWidth' in config) {
    const width = config['helpWidth'];
    if (typeof width !== 'number' || !Number.isInteger(width) || width < MIN_HELP_WIDTH || width > MAX_HELP_WIDTH) {
      errors.push({
        path: 'helpWidth',
        message: `Must be an integer between ${MIN_HELP_WIDTH} and ${MAX_HELP_WIDTH}`,
      });
    }
  }

  for (const key of ['json', 'color']) {
    if (key in config && typeof config[key] !== 'boolean') {
      errors.push({ path: key, message: 'Must be a boolean' });
    }
  }

  for (const key of Object.keys(config)) {
    if (!KNOWN_KEYS.includes(key)) {
      errors.push({
        path: key,
        message: 'Unknown configuration key',
      });
    }
  }

  return errors;
}

// Type guard
export function isValidConfig(config: unknown): config is PartialConfig {
  return validateConfig(config).length === 0;
}
