import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { validateConfig, isValidConfig } from '../../src/config/schema.js';
import { getDefaultConfig } from '../../src/config/defaults.js';
import { loadConfig, setConfig, getConfig } from '../../src/config/loader.js';
import { TestProject } from '../helpers/test-utils.js';

describe('Config Schema Validation', () => {
  it('should validate a valid config', () => {
    const config = {
      logLevel: 'info' as const,
      json: false,
      helpWidth: 60,
      color: true,
    };

    expect(validateConfig(config)).toHaveLength(0);
    expect(isValidConfig(config)).toBe(true);
  });

  it('should reject invalid logLevel', () => {
    const errors = validateConfig({ logLevel: 'trace' });
    expect(errors).toHaveLength(1);
    expect(errors[0]?.path).toBe('logLevel');
    expect(isValidConfig({ logLevel: 'trace' })).toBe(false);
  });

  it('should reject helpWidth out of range or fractional', () => {
    for (const helpWidth of [19, 201, 60.5, '60']) {
      const errors = validateConfig({ helpWidth });
      expect(errors).toHaveLength(1);
      expect(errors[0]?.path).toBe('helpWidth');
    }
  });

  it('should reject non-boolean json and color', () => {
    const errors = validateConfig({ json: 'yes', color: 1 });
    expect(errors.map(e => e.path)).toEqual(['json', 'color']);
  });

  it('should reject non-object config', () => {
    expect(validateConfig('not an object')).toEqual([{ path: 'root', message: 'Config must be an object' }]);
    expect(validateConfig([])).toEqual([{ path: 'root', message: 'Config must be an object' }]);
  });

  it('should detect unknown keys', () => {
    expect(validateConfig({ unknownKey: 'value' })).toEqual([
      { path: 'unknownKey', message: 'Unknown configuration key' },
    ]);
  });

  it('should accept partial and empty config', () => {
    expect(validateConfig({ logLevel: 'debug' })).toHaveLength(0);
    expect(validateConfig({})).toHaveLength(0);
  });
});

describe('Default Config', () => {
  it('should provide valid defaults', () => {
    const config = getDefaultConfig();
    expect(validateConfig(config)).toHaveLength(0);
    expect(config.logLevel).toBe('info');
    expect(config.json).toBe(false);
    expect(config.helpWidth).toBe(60);
  });
});

describe('Config Loading', () => {
  let project: TestProject;

  beforeEach(() => {
    project = TestProject.create();
  });

  afterEach(() => {
    project.destroy();
  });

  it('should use defaults when nothing is configured', async () => {
    const config = await loadConfig({ cwd: project.dir, env: {} });
    expect(config.logLevel).toBe('info');
    expect(config.json).toBe(false);
    expect(config.helpWidth).toBe(60);
  });

  it('should read .argsiftrc', async () => {
    project.writeJson('.argsiftrc', { helpWidth: 80 });
    const config = await loadConfig({ cwd: project.dir, env: {} });
    expect(config.helpWidth).toBe(80);
  });

  it('should read argsift.config.mjs', async () => {
    project.writeFile('argsift.config.mjs', 'export default { helpWidth: 40 };\n');
    const config = await loadConfig({ cwd: project.dir, env: {} });
    expect(config.helpWidth).toBe(40);
  });

  it('should read the argsift key of package.json', async () => {
    project.writeJson('package.json', { name: 'demo', argsift: { logLevel: 'error' } });
    const config = await loadConfig({ cwd: project.dir, env: {} });
    expect(config.logLevel).toBe('error');
  });

  it('should prefer an explicit config path', async () => {
    project.writeJson('.argsiftrc', { helpWidth: 80 });
    project.writeJson('custom.json', { helpWidth: 100 });
    const config = await loadConfig({ cwd: project.dir, configPath: 'custom.json', env: {} });
    expect(config.helpWidth).toBe(100);
  });

  it('should let env vars override the config file', async () => {
    project.writeJson('.argsiftrc', { helpWidth: 80, json: false });
    const config = await loadConfig({
      cwd: project.dir,
      env: { ARGSIFT_HELP_WIDTH: '100', ARGSIFT_JSON: '1' },
    });
    expect(config.helpWidth).toBe(100);
    expect(config.json).toBe(true);
  });

  it('should let CLI flags override env vars', async () => {
    const config = await loadConfig({
      cwd: project.dir,
      env: { ARGSIFT_LOG_LEVEL: 'warn' },
      cliFlags: { logLevel: 'debug' },
    });
    expect(config.logLevel).toBe('debug');
  });

  it('should turn color off for NO_COLOR', async () => {
    const config = await loadConfig({ cwd: project.dir, env: { NO_COLOR: '1' } });
    expect(config.color).toBe(false);
  });

  it('should reject invalid values from any source', async () => {
    project.writeJson('.argsiftrc', { helpWidth: 5 });
    await expect(loadConfig({ cwd: project.dir, env: {} })).rejects.toThrow(
      'Invalid configuration: helpWidth: Must be an integer between 20 and 200'
    );

    await expect(loadConfig({ cwd: project.dir, env: { ARGSIFT_JSON: 'yes' }, cliFlags: { helpWidth: 60 } })).rejects.toThrow(
      'Invalid configuration: json: Must be a boolean'
    );
  });

  it('should reject a config file that is not an object', async () => {
    project.writeJson('.argsiftrc', [1, 2]);
    await expect(loadConfig({ cwd: project.dir, env: {} })).rejects.toThrow('Config file must export an object');
  });

  it('should hold the loaded config globally', async () => {
    const config = await loadConfig({ cwd: project.dir, env: {} });
    setConfig(config);
    expect(getConfig()).toEqual(config);
  });
});
