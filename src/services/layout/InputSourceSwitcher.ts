import type { LayoutSwitcher } from '../../core/ReplacementExecutor';
import { StructuredLogger } from '../../logging/StructuredLogger';
import type { KeyboardLayout } from '../../types';
import { CommandRunner, runCommand } from '../process/runCommand';

interface InputSourceSwitcherOptions {
  binary: string;
  timeoutMs: number;
  commandRunner?: CommandRunner;
  logger?: StructuredLogger;
}

/** Candidate input sources per layout, most common first. */
export const INPUT_SOURCE_IDS: Record<KeyboardLayout, string[]> = {
  latin: ['com.apple.keylayout.ABC', 'com.apple.keylayout.US'],
  cyrillic: ['com.apple.keylayout.Russian', 'com.apple.keylayout.Russian-Phonetic']
};

export const layoutForInputSource = (sourceId: string): KeyboardLayout | undefined => {
  const id = sourceId.trim();
  for (const [layout, candidates] of Object.entries(INPUT_SOURCE_IDS)) {
    if (candidates.includes(id)) {
      return layout === 'cyrillic' ? 'cyrillic' : 'latin';
    }
  }

  return /russian/i.test(id) ? 'cyrillic' : undefined;
};

/**
 * Drives a select-input-source helper (macism by default): no arguments
 * prints the current source id, one argument selects it.
 */
export class InputSourceSwitcher implements LayoutSwitcher {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly commandRunner: CommandRunner;
  private readonly logger?: StructuredLogger;

  public constructor(options: InputSourceSwitcherOptions) {
    this.binary = options.binary;
    this.timeoutMs = options.timeoutMs;
    this.commandRunner = options.commandRunner ?? runCommand;
    this.logger = options.logger;
  }

  public async currentSourceId(): Promise<string> {
    const result = await this.commandRunner(this.binary, [], { timeoutMs: this.timeoutMs });
    return result.stdout.trim();
  }

  public async currentLayout(): Promise<KeyboardLayout | undefined> {
    return layoutForInputSource(await this.currentSourceId());
  }

  public async switchTo(layout: KeyboardLayout): Promise<boolean> {
    const failures: string[] = [];

    for (const sourceId of INPUT_SOURCE_IDS[layout]) {
      try {
        await this.commandRunner(this.binary, [sourceId], { timeoutMs: this.timeoutMs });
        const active = await this.currentSourceId();
        if (active === sourceId) {
          this.logger?.debug('Input source switched', { layout, sourceId });
          return true;
        }

        failures.push(`${sourceId}: still on ${active || 'unknown'}`);
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        failures.push(`${sourceId}: ${detail}`);
      }
    }

    this.logger?.warn('No input source could be selected for layout', { layout, failures });
    return false;
  }
}
