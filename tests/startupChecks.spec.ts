import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { runStartupChecks } from '../src/bootstrap/startupChecks';
import { resolveConfig } from '../src/config';
import { StructuredLogger } from '../src/logging/StructuredLogger';
import type { CommandRunner } from '../src/services/process/runCommand';

describe('runStartupChecks', () => {
  it('reports missing helpers as warnings instead of failing', async () => {
    const logDir = await fs.mkdtemp(path.join(os.tmpdir(), 'keymend-checks-'));
    const logger = await StructuredLogger.create(logDir, 'error');
    const config = {
      ...resolveConfig({}),
      cyrillicDictionaryPath: path.join(logDir, 'absent.txt'),
      inputSourceBin: 'missing-helper'
    };
    const runner: CommandRunner = async (command) => {
      if (command === 'missing-helper') {
        throw new Error('spawn missing-helper ENOENT');
      }
      return { stdout: '', stderr: '', durationMs: 0 };
    };

    const results = await runStartupChecks(config, logger, runner);

    expect(results.map((result) => [result.name, result.ok])).toEqual([
      ['Latin word list', true],
      ['Cyrillic word list', false],
      ['osascript', true],
      ['Clipboard (pbpaste)', true],
      ['Input source helper', false]
    ]);
    expect(results[4].detail).toBe('spawn missing-helper ENOENT');

    await logger.flush();
    await fs.rm(logDir, { recursive: true, force: true });
  });
});
