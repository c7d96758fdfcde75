import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { checkCommand } from '../../../cli/commands/check.js';
import { ValidatorConfigLoader } from '../../../config/validator-config-loader.js';
import { createTempDir, cleanupTempDir } from '../../setup.js';
import { consoleLines } from '../output.js';

describe('checkCommand', () => {
  let tempDir: string;

  async function writeConfig(lines: string[]): Promise<void> {
    await fs.writeFile(path.join(tempDir, '.graph-validator', 'config.yml'), lines.join('\n'));
  }

  beforeEach(async () => {
    tempDir = await createTempDir('check-command-test-');
    await fs.mkdir(path.join(tempDir, '.graph-validator'), { recursive: true });
    ValidatorConfigLoader.clearCache();
  });

  afterEach(async () => {
    ValidatorConfigLoader.clearCache();
    await cleanupTempDir(tempDir);
  });

  it('should list definitions and pass for a consistent config', async () => {
    await writeConfig([
      'groups: [Billing, Shipping]',
      'sequences:',
      '  Checkout: [Default, Billing, Shipping]',
    ]);

    await checkCommand(tempDir);

    expect(consoleLines('log')).toEqual([
      '\nChecking group definitions\n',
      '  Groups:    Default, Billing, Shipping',
      '  Sequences: Checkout\n',
      '\n✅ Group definitions are valid\n',
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it('should pass with the defaults when there is no config file', async () => {
    await checkCommand(tempDir);

    expect(consoleLines('log')).toEqual([
      '\nChecking group definitions\n',
      '  Groups:    Default',
      '  Sequences: none\n',
      '\n✅ Group definitions are valid\n',
    ]);
  });

  it('should report cycles and empty sequences and fail', async () => {
    await writeConfig([
      'sequences:',
      '  Loop: [Default, Loop]',
      '  Empty: []',
    ]);

    await checkCommand(tempDir);

    expect(consoleLines('log').slice(3)).toEqual([
      '  ⚠️  Sequence "Empty" has no members',
      '  ❌ Cyclic group sequence detected: Loop -> Loop',
      '\n❌ Group definitions have errors\n',
    ]);
    expect(process.exitCode).toBe(1);
  });

  it('should report configuration errors and fail', async () => {
    await checkCommand(tempDir, { config: 'missing.yml' });

    expect(consoleLines('error')[0]).toBe(`❌ Config file not found: ${path.join(tempDir, 'missing.yml')}`);
    expect(process.exitCode).toBe(1);
  });
});
