import type { ClipboardAdapter, ClipboardBackup, ClipboardPayload } from '../../core/SelectionConverter';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { CommandRunner, runCommand } from '../process/runCommand';

interface MacClipboardOptions {
  timeoutMs: number;
  commandRunner?: CommandRunner;
  logger?: StructuredLogger;
}

/**
 * Plain-text pasteboard access via pbcopy/pbpaste. A clipboard holding only
 * non-text data is recorded as opaque and left alone on restore, since
 * writing its empty text form back would erase it.
 */
export class MacClipboard implements ClipboardAdapter {
  private readonly timeoutMs: number;
  private readonly commandRunner: CommandRunner;
  private readonly logger?: StructuredLogger;

  public constructor(options: MacClipboardOptions) {
    this.timeoutMs = options.timeoutMs;
    this.commandRunner = options.commandRunner ?? runCommand;
    this.logger = options.logger;
  }

  public async readText(): Promise<string> {
    const result = await this.commandRunner('pbpaste', [], { timeoutMs: this.timeoutMs });
    return result.stdout;
  }

  public async writeText(text: string): Promise<void> {
    await this.commandRunner('pbcopy', [], { stdin: text, timeoutMs: this.timeoutMs });
  }

  public async backup(): Promise<ClipboardBackup> {
    const text = await this.readText();
    const payload: ClipboardPayload = text ? 'text' : await this.classifyWithoutText();

    return { text, payload, capturedAt: Date.now() };
  }

  public async restore(backup: ClipboardBackup): Promise<void> {
    if (backup.payload === 'opaque') {
      this.logger?.warn('Clipboard held non-text data; it was replaced and cannot be restored', {
        capturedAt: backup.capturedAt
      });
      return;
    }

    await this.writeText(backup.text);
  }

  private async classifyWithoutText(): Promise<ClipboardPayload> {
    try {
      const result = await this.commandRunner('osascript', ['-e', 'clipboard info'], {
        timeoutMs: this.timeoutMs
      });
      return result.stdout.trim() ? 'opaque' : 'empty';
    } catch (error) {
      this.logger?.warn('Clipboard info query failed; treating the clipboard as non-text', {
        detail: error instanceof Error ? error.message : String(error)
      });
      return 'opaque';
    }
  }
}
