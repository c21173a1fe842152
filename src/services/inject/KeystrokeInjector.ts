import type { KeystrokeSynthesizer } from '../../core/ReplacementExecutor';
import type { EditShortcuts } from '../../core/SelectionConverter';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { CommandRunner, runCommand } from '../process/runCommand';

interface KeystrokeInjectorOptions {
  timeoutMs: number;
  commandRunner?: CommandRunner;
  logger?: StructuredLogger;
}

const BACKSPACE_KEY_CODE = 51;

const osascriptArgsForBackspaces = (count: number): string[] => [
  '-e',
  'on run argv',
  '-e',
  'set deleteCount to (item 1 of argv) as integer',
  '-e',
  'tell application "System Events"',
  '-e',
  'repeat deleteCount times',
  '-e',
  `key code ${BACKSPACE_KEY_CODE}`,
  '-e',
  'end repeat',
  '-e',
  'end tell',
  '-e',
  'end run',
  '--',
  String(count)
];

const osascriptArgsForDirectInput = (text: string): string[] => [
  '-e',
  'on run argv',
  '-e',
  'set targetText to item 1 of argv',
  '-e',
  'tell application "System Events"',
  '-e',
  'keystroke targetText',
  '-e',
  'end tell',
  '-e',
  'end run',
  '--',
  text
];

const osascriptArgsForShortcut = (key: 'c' | 'v'): string[] => [
  '-e',
  `tell application "System Events" to keystroke "${key}" using command down`
];

/** Synthesizes backspaces, text and edit shortcuts through System Events. */
export class KeystrokeInjector implements KeystrokeSynthesizer, EditShortcuts {
  private readonly timeoutMs: number;
  private readonly commandRunner: CommandRunner;
  private readonly logger?: StructuredLogger;

  public constructor(options: KeystrokeInjectorOptions) {
    this.timeoutMs = options.timeoutMs;
    this.commandRunner = options.commandRunner ?? runCommand;
    this.logger = options.logger;
  }

  public async deleteBackward(count: number): Promise<void> {
    if (count <= 0) {
      return;
    }

    const result = await this.commandRunner('osascript', osascriptArgsForBackspaces(count), {
      timeoutMs: this.timeoutMs
    });
    this.logger?.debug('Backspaces sent', { count, durationMs: result.durationMs });
  }

  public async typeText(text: string): Promise<void> {
    if (!text) {
      return;
    }

    const result = await this.commandRunner('osascript', osascriptArgsForDirectInput(text), {
      timeoutMs: this.timeoutMs
    });
    this.logger?.debug('Text typed', { length: text.length, durationMs: result.durationMs });
  }

  public async copy(): Promise<void> {
    await this.commandRunner('osascript', osascriptArgsForShortcut('c'), { timeoutMs: this.timeoutMs });
  }

  public async paste(): Promise<void> {
    await this.commandRunner('osascript', osascriptArgsForShortcut('v'), { timeoutMs: this.timeoutMs });
  }
}
