import os from 'node:os';
import path from 'node:path';
import type { AppConfig, LogLevelName } from './types';

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return value.toLowerCase() === 'true';
};

const resolveLogLevel = (value: string | undefined): LogLevelName => {
  if (value === 'debug' || value === 'warn' || value === 'error' || value === 'info') {
    return value;
  }

  return 'info';
};

export const resolveConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const rootDir = path.resolve(__dirname, '..');
  const dictionaryDir = path.join(rootDir, 'dictionaries');

  return {
    selectionHotkey: env.KEYMEND_SELECTION_HOTKEY ?? 'Option',
    autoReplace: parseBoolOrDefault(env.KEYMEND_AUTO_REPLACE, true),
    latinDictionaryPath: env.KEYMEND_LATIN_DICTIONARY ?? path.join(dictionaryDir, 'latin.txt'),
    cyrillicDictionaryPath:
      env.KEYMEND_CYRILLIC_DICTIONARY ?? path.join(dictionaryDir, 'cyrillic.txt'),
    maxTokenLength: parseIntOrDefault(env.KEYMEND_MAX_TOKEN_LENGTH, 100),
    focusGraceMs: parseIntOrDefault(env.KEYMEND_FOCUS_GRACE_MS, 300),
    copyDelayMs: parseIntOrDefault(env.KEYMEND_COPY_DELAY_MS, 100),
    pasteDelayMs: parseIntOrDefault(env.KEYMEND_PASTE_DELAY_MS, 50),
    contextPollMs: parseIntOrDefault(env.KEYMEND_CONTEXT_POLL_MS, 250),
    commandTimeoutMs: parseIntOrDefault(env.KEYMEND_COMMAND_TIMEOUT_MS, 3000),
    inputSourceBin: env.KEYMEND_INPUT_SOURCE_BIN ?? 'macism',
    logDir: env.KEYMEND_LOG_DIR ?? path.join(os.homedir(), '.keymend', 'logs'),
    logLevel: resolveLogLevel(env.KEYMEND_LOG_LEVEL)
  };
};

export const validateConfig = (config: AppConfig): string[] => {
  const errors: string[] = [];

  if (!config.selectionHotkey.trim()) {
    errors.push('KEYMEND_SELECTION_HOTKEY must not be empty.');
  }

  if (!config.latinDictionaryPath.trim()) {
    errors.push('KEYMEND_LATIN_DICTIONARY must not be empty.');
  }

  if (!config.cyrillicDictionaryPath.trim()) {
    errors.push('KEYMEND_CYRILLIC_DICTIONARY must not be empty.');
  }

  if (config.maxTokenLength < 3 || config.maxTokenLength > 1000) {
    errors.push('KEYMEND_MAX_TOKEN_LENGTH must be between 3 and 1000.');
  }

  if (config.focusGraceMs < 0 || config.focusGraceMs > 5000) {
    errors.push('KEYMEND_FOCUS_GRACE_MS must be between 0 and 5000 milliseconds.');
  }

  if (config.copyDelayMs < 0 || config.copyDelayMs > 2000) {
    errors.push('KEYMEND_COPY_DELAY_MS must be between 0 and 2000 milliseconds.');
  }

  if (config.pasteDelayMs < 0 || config.pasteDelayMs > 2000) {
    errors.push('KEYMEND_PASTE_DELAY_MS must be between 0 and 2000 milliseconds.');
  }

  if (config.contextPollMs < 50 || config.contextPollMs > 10000) {
    errors.push('KEYMEND_CONTEXT_POLL_MS must be between 50 and 10000 milliseconds.');
  }

  if (config.commandTimeoutMs < 100 || config.commandTimeoutMs > 30000) {
    errors.push('KEYMEND_COMMAND_TIMEOUT_MS must be between 100 and 30000 milliseconds.');
  }

  if (!config.inputSourceBin.trim()) {
    errors.push('KEYMEND_INPUT_SOURCE_BIN must not be empty.');
  }

  if (!config.logDir.trim()) {
    errors.push('KEYMEND_LOG_DIR must not be empty.');
  }

  return errors;
};
