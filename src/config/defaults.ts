import type { ArgsiftConfig } from './schema.js';
import { DEFAULT_HELP_WIDTH } from '../help/renderer.js';

export function getDefaultConfig(): ArgsiftConfig {
  return {
    logLevel: 'info',
    json: false,
    helpWidth: DEFAULT_HELP_WIDTH,
    color: process.stdout.isTTY === true,
  };
}
