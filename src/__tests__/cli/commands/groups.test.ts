import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { groupsCommand } from '../../../cli/commands/groups.js';
import { ValidatorConfigLoader } from '../../../config/validator-config-loader.js';
import { Logger, LogLevel } from '../../../utils/logger.js';
import { createTempDir, cleanupTempDir } from '../../setup.js';
import { consoleLines } from '../output.js';

describe('groupsCommand', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir('groups-command-test-');
    await fs.mkdir(path.join(tempDir, '.graph-validator'), { recursive: true });
    await fs.writeFile(path.join(tempDir, '.graph-validator', 'config.yml'), [
      'groups: [Billing, Shipping]',
      'sequences:',
      '  Checkout: [Default, Billing, Shipping]',
    ].join('\n'));
    ValidatorConfigLoader.clearCache();
  });

  afterEach(async () => {
    ValidatorConfigLoader.clearCache();
    await cleanupTempDir(tempDir);
  });

  it('should print the expanded chain of a sequence', async () => {
    await groupsCommand(tempDir, ['Checkout']);

    expect(consoleLines('log')).toEqual([
      '\nGroup chain for Checkout\n',
      '  1. Default  (sequence: Checkout)',
      '  2. Billing  (sequence: Checkout)',
      '  3. Shipping  (sequence: Checkout)',
      '',
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it('should print the Default group when no group is given', async () => {
    await groupsCommand(tempDir, []);

    expect(consoleLines('log')).toEqual(['\nGroup chain for Default\n', '  1. Default', '']);
  });

  it('should print plain groups before a sequence in request order', async () => {
    await groupsCommand(tempDir, ['Shipping', 'Checkout']);

    expect(consoleLines('log').slice(1, 3)).toEqual([
      '  1. Shipping',
      '  2. Default  (sequence: Checkout)',
    ]);
  });

  it('should report unknown groups and fail', async () => {
    await groupsCommand(tempDir, ['Nope']);

    expect(consoleLines('error')).toEqual([
      '❌ Unable to resolve group "Nope"',
      '   Declare "Nope" under "groups" or "sequences" in .graph-validator/config.yml, and make sure no sequence contains itself.',
    ]);
    expect(process.exitCode).toBe(1);
  });

  it('should read an explicit config file', async () => {
    await fs.writeFile(path.join(tempDir, 'audit.yml'), 'groups: [Audit]\nsequences:\n  Review: [Audit, Default]\n');

    await groupsCommand(tempDir, ['Review'], { config: 'audit.yml' });

    expect(consoleLines('log').slice(1, 3)).toEqual([
      '  1. Audit  (sequence: Review)',
      '  2. Default  (sequence: Review)',
    ]);
  });

  it('should switch to debug logging when verbose', async () => {
    await groupsCommand(tempDir, ['Default'], { verbose: true });

    expect(Logger.getLevel()).toBe(LogLevel.DEBUG);
  });

  it('should apply the configured log level', async () => {
    await fs.writeFile(path.join(tempDir, '.graph-validator', 'config.yml'), 'logLevel: warn\n');

    await groupsCommand(tempDir, ['Default']);

    expect(Logger.getLevel()).toBe(LogLevel.WARN);
  });
});
