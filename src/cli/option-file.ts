import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ValidationError } from '../config/schema.js';
import type { LogTarget } from '../observability/logger.js';
import { ArgParser } from '../parser/registry.js';
import { Kind, type OptionKind, type OptionKindType } from '../parser/types.js';

export interface OptionFileEntry {
  name: string;
  flag: string;
  kind: OptionKindType;
  index?: number; // positional only
  required?: boolean;
  default?: string;
  help?: string;
}

export interface OptionFile {
  program?: string;
  options: OptionFileEntry[];
}

const KINDS: readonly string[] = ['value', 'switch', 'multi', 'keyValue', 'positional'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateEntry(entry: unknown, at: string): ValidationError[] {
  if (!isRecord(entry)) {
    return [{ path: at, message: 'Option must be an object' }];
  }

  const errors: ValidationError[] = [];

  if (typeof entry['name'] !== 'string' || entry['name'] === '') {
    errors.push({ path: `${at}.name`, message: 'Must be a non-empty string' });
  }
  if (typeof entry['flag'] !== 'string' || Array.from(entry['flag']).length !== 1) {
    errors.push({ path: `${at}.flag`, message: 'Must be a single character' });
  }

  const kind = entry['kind'];
  if (typeof kind !== 'string' || !KINDS.includes(kind)) {
    errors.push({ path: `${at}.kind`, message: `Must be one of: ${KINDS.join(', ')}` });
  }

  if (kind === 'positional') {
    const index = entry['index'];
    if (typeof index !== 'number' || !Number.isInteger(index) || index < 0) {
      errors.push({ path: `${at}.index`, message: 'Positional options need a non-negative integer index' });
    }
  }

  if ('required' in entry && typeof entry['required'] !== 'boolean') {
    errors.push({ path: `${at}.required`, message: 'Must be a boolean' });
  }
  for (const key of ['default', 'help']) {
    if (key in entry && typeof entry[key] !== 'string') {
      errors.push({ path: `${at}.${key}`, message: 'Must be a string' });
    }
  }

  return errors;
}

// Validate and return errors (empty array if valid)
export function validateOptionFile(data: unknown): ValidationError[] {
  if (!isRecord(data)) {
    return [{ path: 'root', message: 'Option file must be an object' }];
  }

  const errors: ValidationError[] = [];

  if ('program' in data && typeof data['program'] !== 'string') {
    errors.push({ path: 'program', message: 'Must be a string' });
  }

  const options = data['options'];
  if (!Array.isArray(options)) {
    errors.push({ path: 'options', message: 'Must be an array' });
    return errors;
  }

  options.forEach((entry: unknown, i) => {
    errors.push(...validateEntry(entry, `options[${i}]`));
  });

  return errors;
}

export function isOptionFile(data: unknown): data is OptionFile {
  return validateOptionFile(data).length === 0;
}

export function loadOptionFile(filePath: string): OptionFile {
  const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (!isOptionFile(data)) {
    const errors = validateOptionFile(data);
    throw new Error(`Invalid option file ${filePath}: ${errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
  }
  return data;
}

function toKind(entry: OptionFileEntry): OptionKind {
  return entry.kind === 'positional' ? Kind.positional(entry.index ?? 0) : { type: entry.kind };
}

export function buildParser(file: OptionFile, filePath: string, logger?: LogTarget): ArgParser {
  const program = file.program ?? path.basename(filePath, path.extname(filePath));
  const parser = new ArgParser(program, logger ? { logger } : {});

  for (const entry of file.options) {
    parser.declare(entry.name, {
      flag: entry.flag,
      kind: toKind(entry),
      required: entry.required,
      default: entry.default,
      help: entry.help,
    });
  }

  return parser;
}

export function openParser(specPath: string, cwd: string, logger?: LogTarget): ArgParser {
  const filePath = path.resolve(cwd, specPath);
  return buildParser(loadOptionFile(filePath), filePath, logger);
}
