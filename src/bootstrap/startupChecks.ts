import fs from 'node:fs';
import { constants as fsConstants } from 'node:fs';
import path from 'node:path';
import { StructuredLogger } from '../logging/StructuredLogger';
import { CommandRunner, runCommand } from '../services/process/runCommand';
import { AppConfig } from '../types';

export interface StartupCheckResult {
  name: string;
  ok: boolean;
  detail?: string;
}

const checkReadableFile = (absolutePath: string, name: string): StartupCheckResult => {
  try {
    fs.accessSync(absolutePath, fsConstants.R_OK);
    return { name, ok: true };
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return { name, ok: false, detail: `${absolutePath}: ${detail}` };
  }
};

const checkCommand = async (
  runner: CommandRunner,
  name: string,
  command: string,
  args: string[],
  timeoutMs: number
): Promise<StartupCheckResult> => {
  try {
    await runner(command, args, { timeoutMs });
    return { name, ok: true };
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return { name, ok: false, detail };
  }
};

/**
 * Probes the word lists and host helpers. Nothing here is fatal: a missing
 * word list disables analysis for that language and a missing helper only
 * degrades the feature that uses it.
 */
export const runStartupChecks = async (
  config: AppConfig,
  logger: StructuredLogger,
  runner: CommandRunner = runCommand
): Promise<StartupCheckResult[]> => {
  logger.info('Running startup checks');

  const results: StartupCheckResult[] = [
    checkReadableFile(path.resolve(config.latinDictionaryPath), 'Latin word list'),
    checkReadableFile(path.resolve(config.cyrillicDictionaryPath), 'Cyrillic word list'),
    await checkCommand(runner, 'osascript', 'osascript', ['-e', 'return "ok"'], config.commandTimeoutMs),
    await checkCommand(runner, 'Clipboard (pbpaste)', 'pbpaste', [], config.commandTimeoutMs),
    await checkCommand(runner, 'Input source helper', config.inputSourceBin, [], config.commandTimeoutMs)
  ];

  for (const result of results) {
    if (!result.ok) {
      logger.warn(`${result.name} unavailable`, { detail: result.detail });
    }
  }

  const failed = results.filter((result) => !result.ok).length;
  logger.info('Startup checks completed', { passed: results.length - failed, failed });

  return results;
};
