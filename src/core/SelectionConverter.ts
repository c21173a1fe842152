import type { StructuredLogger } from '../logging/StructuredLogger';
import type { AppCategory, KeyboardLayout } from '../types';
import { validateSelectionContent } from './contentRules';
import type { LayoutConverter } from './LayoutConverter';
import type { CaptureControl, LayoutSwitcher } from './ReplacementExecutor';

/** `opaque`: the clipboard held data with no plain-text form (an image, a file). */
export type ClipboardPayload = 'text' | 'empty' | 'opaque';

export interface ClipboardBackup {
  text: string;
  payload: ClipboardPayload;
  capturedAt: number;
}

export interface ClipboardAdapter {
  readText(): Promise<string>;
  writeText(text: string): Promise<void>;
  backup(): Promise<ClipboardBackup>;
  restore(backup: ClipboardBackup): Promise<void>;
}

/** Copy and paste as the frontmost app sees them (Cmd+C / Cmd+V). */
export interface EditShortcuts {
  copy(): Promise<void>;
  paste(): Promise<void>;
}

export type SelectionConversionResult =
  | { status: 'converted'; original: string; converted: string; from: KeyboardLayout; to: KeyboardLayout; layoutSwitched: boolean }
  | { status: 'cancelled'; reason: 'busy' | 'no-selection' | 'content-rejected'; detail?: string }
  | { status: 'failed'; reason: 'clipboard-failed' | 'copy-failed' | 'no-text' | 'paste-failed'; detail?: string };

export interface SelectionConverterOptions {
  converter: LayoutConverter;
  clipboard: ClipboardAdapter;
  shortcuts: EditShortcuts;
  layoutSwitcher: LayoutSwitcher;
  capture?: CaptureControl;
  appCategory?: () => AppCategory;
  copyDelayMs?: number;
  pasteDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: StructuredLogger;
}

const sleep = async (ms: number): Promise<void> => {
  if (ms <= 0) {
    return;
  }

  await new Promise((resolve) => setTimeout(resolve, ms));
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Converts the current selection to the opposite layout through the
 * clipboard. The user's clipboard text is restored on every path that
 * touched it.
 */
export class SelectionConverter {
  private running = false;
  private readonly converter: LayoutConverter;
  private readonly clipboard: ClipboardAdapter;
  private readonly shortcuts: EditShortcuts;
  private readonly layoutSwitcher: LayoutSwitcher;
  private readonly capture?: CaptureControl;
  private readonly appCategory: () => AppCategory;
  private readonly copyDelayMs: number;
  private readonly pasteDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger?: StructuredLogger;

  public constructor(options: SelectionConverterOptions) {
    this.converter = options.converter;
    this.clipboard = options.clipboard;
    this.shortcuts = options.shortcuts;
    this.layoutSwitcher = options.layoutSwitcher;
    this.capture = options.capture;
    this.appCategory = options.appCategory ?? (() => 'desktop');
    this.copyDelayMs = options.copyDelayMs ?? 100;
    this.pasteDelayMs = options.pasteDelayMs ?? 50;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger;
  }

  public isRunning(): boolean {
    return this.running;
  }

  public async convertSelection(): Promise<SelectionConversionResult> {
    if (this.running) {
      return { status: 'cancelled', reason: 'busy' };
    }

    this.running = true;
    this.capture?.suspend();

    try {
      return await this.runConversion();
    } finally {
      this.running = false;
      this.capture?.resume();
    }
  }

  private async runConversion(): Promise<SelectionConversionResult> {
    let backup: ClipboardBackup;
    try {
      backup = await this.clipboard.backup();
    } catch (error) {
      this.logger?.error('Clipboard backup failed; selection left untouched', {
        detail: describeError(error)
      });
      return { status: 'failed', reason: 'clipboard-failed', detail: describeError(error) };
    }

    if (backup.payload === 'opaque') {
      this.logger?.warn('Clipboard holds non-text data that will not be restored after conversion');
    }

    const abort = async (result: SelectionConversionResult): Promise<SelectionConversionResult> => {
      await this.restoreClipboard(backup);
      return result;
    };

    try {
      await this.shortcuts.copy();
    } catch (error) {
      this.logger?.error('Copy shortcut failed', { detail: describeError(error) });
      return abort({ status: 'failed', reason: 'copy-failed', detail: describeError(error) });
    }

    await this.sleep(this.copyDelayMs);

    let copied: string;
    try {
      copied = await this.clipboard.readText();
    } catch (error) {
      this.logger?.error('Clipboard read failed after copy', { detail: describeError(error) });
      return abort({ status: 'failed', reason: 'clipboard-failed', detail: describeError(error) });
    }

    if (!copied) {
      this.logger?.warn('Clipboard empty after copy');
      return abort({ status: 'failed', reason: 'no-text' });
    }

    if (copied === backup.text) {
      this.logger?.info('Clipboard unchanged after copy; nothing selected');
      return abort({ status: 'cancelled', reason: 'no-selection' });
    }

    const verdict = validateSelectionContent(copied, this.appCategory());
    if (!verdict.allowed) {
      this.logger?.info('Selection rejected for this app', { detail: verdict.reason });
      return abort({ status: 'cancelled', reason: 'content-rejected', detail: verdict.reason });
    }

    const conversion = this.converter.convertToOpposite(copied);

    try {
      await this.clipboard.writeText(conversion.text);
      await this.shortcuts.paste();
    } catch (error) {
      this.logger?.error('Pasting converted selection failed', { detail: describeError(error) });
      return abort({ status: 'failed', reason: 'paste-failed', detail: describeError(error) });
    }

    await this.sleep(this.pasteDelayMs);
    await this.restoreClipboard(backup);

    const layoutSwitched = await this.switchLayout(conversion.to);
    this.logger?.info('Selection converted', {
      from: conversion.from,
      to: conversion.to,
      length: copied.length,
      layoutSwitched
    });

    return {
      status: 'converted',
      original: copied,
      converted: conversion.text,
      from: conversion.from,
      to: conversion.to,
      layoutSwitched
    };
  }

  private async restoreClipboard(backup: ClipboardBackup): Promise<void> {
    try {
      await this.clipboard.restore(backup);
    } catch (error) {
      this.logger?.error('Clipboard restore failed; previous clipboard text is lost', {
        detail: describeError(error),
        backupLength: backup.text.length
      });
    }
  }

  private async switchLayout(layout: KeyboardLayout): Promise<boolean> {
    try {
      const switched = await this.layoutSwitcher.switchTo(layout);
      if (!switched) {
        this.logger?.warn('Input source switch refused after selection conversion', { layout });
      }

      return switched;
    } catch (error) {
      this.logger?.warn('Input source switch failed after selection conversion', {
        layout,
        detail: describeError(error)
      });
      return false;
    }
  }
}
