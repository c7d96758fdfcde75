import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { createProgram, CommanderError } from '../../cli/program.js';
import { ValidatorConfigLoader } from '../../config/validator-config-loader.js';
import { createTempDir, cleanupTempDir } from '../setup.js';
import { consoleLines } from './output.js';

describe('createProgram', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir('program-test-');
    await fs.writeFile(
      path.join(tempDir, 'audit.yml'),
      'groups: [Audit]\nsequences:\n  Review: [Audit, Default]\n'
    );
    ValidatorConfigLoader.clearCache();
  });

  afterEach(async () => {
    ValidatorConfigLoader.clearCache();
    await cleanupTempDir(tempDir);
  });

  it('should register the groups and check commands', async () => {
    const program = await createProgram(tempDir);

    expect(program.name()).toBe('graph-validator');
    expect(program.commands.map(command => command.name())).toEqual(['groups', 'check']);
  });

  it('should pass the global config option to commands', async () => {
    const program = await createProgram(tempDir);

    await program.parseAsync(['--config', 'audit.yml', 'groups', 'Review'], { from: 'user' });

    expect(consoleLines('log')).toEqual([
      '\nGroup chain for Review\n',
      '  1. Audit  (sequence: Review)',
      '  2. Default  (sequence: Review)',
      '',
    ]);
  });

  it('should run the check command', async () => {
    const program = await createProgram(tempDir);

    await program.parseAsync(['-c', 'audit.yml', 'check'], { from: 'user' });

    expect(consoleLines('log')[3]).toBe('\n✅ Group definitions are valid\n');
    expect(process.exitCode).toBeUndefined();
  });

  it('should throw a CommanderError for unknown commands', async () => {
    const program = await createProgram(tempDir);
    program.configureOutput({ writeErr: () => undefined });

    await expect(program.parseAsync(['nope'], { from: 'user' })).rejects.toBeInstanceOf(CommanderError);
  });
});
