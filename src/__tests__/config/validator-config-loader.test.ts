import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ValidatorConfigLoader } from '../../config/validator-config-loader.js';
import { DEFAULT_VALIDATOR_CONFIG, toGroupDefinitions } from '../../config/validator-config.js';
import { ConfigurationError } from '../../utils/errors.js';
import { createTempDir, cleanupTempDir } from '../setup.js';

describe('ValidatorConfigLoader', () => {
  let tempDir: string;
  let configFile: string;

  beforeEach(async () => {
    tempDir = await createTempDir('config-loader-test-');
    await fs.mkdir(path.join(tempDir, '.graph-validator'), { recursive: true });
    configFile = path.join(tempDir, '.graph-validator', 'config.yml');
    ValidatorConfigLoader.clearCache();
  });

  afterEach(async () => {
    ValidatorConfigLoader.clearCache();
    await cleanupTempDir(tempDir);
  });

  async function loadError(loader: ValidatorConfigLoader, configPath?: string): Promise<unknown> {
    try {
      await loader.load(configPath);
    } catch (error) {
      return error;
    }
    return undefined;
  }

  it('should return defaults when no config file exists', async () => {
    await fs.rm(path.join(tempDir, '.graph-validator'), { recursive: true });

    const config = await new ValidatorConfigLoader(tempDir).load();

    expect(config).toEqual({ logLevel: 'info', groups: [], sequences: {} });
    expect(config).toBe(DEFAULT_VALIDATOR_CONFIG);
  });

  it('should load groups and sequences from YAML', async () => {
    await fs.writeFile(configFile, [
      'logLevel: debug',
      'groups:',
      '  - Billing',
      '  - Shipping',
      'sequences:',
      '  Checkout: [Default, Billing, Shipping]',
    ].join('\n'));

    const config = await new ValidatorConfigLoader(tempDir).load();

    expect(config).toEqual({
      logLevel: 'debug',
      groups: ['Billing', 'Shipping'],
      sequences: { Checkout: ['Default', 'Billing', 'Shipping'] },
    });
  });

  it('should fill in defaults for missing fields', async () => {
    await fs.writeFile(configFile, 'groups: [Billing]\n');

    expect(await new ValidatorConfigLoader(tempDir).load()).toEqual({
      logLevel: 'info',
      groups: ['Billing'],
      sequences: {},
    });
  });

  it('should treat an empty file as defaults', async () => {
    await fs.writeFile(configFile, '');

    expect(await new ValidatorConfigLoader(tempDir).load()).toEqual(DEFAULT_VALIDATOR_CONFIG);
  });

  it('should load an explicit path relative to the repository', async () => {
    await fs.writeFile(path.join(tempDir, 'groups.yml'), 'groups: [Audit]\n');

    const config = await new ValidatorConfigLoader(tempDir).load('groups.yml');

    expect(config.groups).toEqual(['Audit']);
  });

  it('should fail when an explicit path does not exist', async () => {
    const error = await loadError(new ValidatorConfigLoader(tempDir), 'missing.yml');

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toHaveProperty('message', `Config file not found: ${path.join(tempDir, 'missing.yml')}`);
  });

  it('should report YAML syntax errors', async () => {
    await fs.writeFile(configFile, 'groups: [Billing\n');

    const error = await loadError(new ValidatorConfigLoader(tempDir));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof Error && error.message.startsWith(`Failed to parse ${configFile}: `)).toBe(true);
  });

  it('should list schema violations with their location', async () => {
    await fs.writeFile(configFile, [
      'groups:',
      '  - ""',
      'sequences:',
      '  Checkout: Default',
    ].join('\n'));

    const error = await loadError(new ValidatorConfigLoader(tempDir));

    expect(error).toBeInstanceOf(ConfigurationError);
    const lines = error instanceof Error ? error.message.split('\n') : [];
    expect(lines[0]).toBe(`Invalid configuration in ${configFile}:`);
    expect(lines).toContain('  - groups.0: must not be empty');
    expect(lines.some(line => line.startsWith('  - sequences.Checkout: '))).toBe(true);
  });

  it('should reject unknown fields at the root', async () => {
    await fs.writeFile(configFile, 'groups: [Billing]\ngrups: [Shipping]\n');

    const error = await loadError(new ValidatorConfigLoader(tempDir));

    expect(error instanceof Error && error.message.split('\n')[1].startsWith('  - (root): ')).toBe(true);
  });

  it('should cache loaded configs until the cache is cleared', async () => {
    await fs.writeFile(configFile, 'groups: [Billing]\n');
    const loader = new ValidatorConfigLoader(tempDir);

    const first = await loader.load();
    await fs.writeFile(configFile, 'groups: [Shipping]\n');

    expect(await loader.load()).toBe(first);

    ValidatorConfigLoader.clearCache();
    expect((await loader.load()).groups).toEqual(['Shipping']);
  });

  it('should convert a config into group definitions', async () => {
    await fs.writeFile(configFile, 'groups: [Billing]\nsequences:\n  Checkout: [Default, Billing]\n');

    const definitions = toGroupDefinitions(await new ValidatorConfigLoader(tempDir).load());

    expect(definitions.getGroupNames()).toEqual(['Default', 'Billing']);
    expect(definitions.getSequence('Checkout')).toEqual(['Default', 'Billing']);
  });
});
