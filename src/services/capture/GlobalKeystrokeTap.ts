import {
  GlobalKeyboardListener,
  IGlobalKeyDownMap,
  IGlobalKeyEvent,
  IGlobalKeyListener
} from 'node-global-key-listener';
import type { CaptureControl } from '../../core/ReplacementExecutor';
import { StructuredLogger } from '../../logging/StructuredLogger';
import type { KeyModifiers, KeyStroke } from '../../types';

/** Returns true to swallow the event before it reaches the focused app. */
export type KeyStrokeHandler = (stroke: KeyStroke) => boolean;

export const modifiersFromDownMap = (down: IGlobalKeyDownMap): KeyModifiers => ({
  command: Boolean(down['LEFT META'] || down['RIGHT META']),
  control: Boolean(down['LEFT CTRL'] || down['RIGHT CTRL']),
  option: Boolean(down['LEFT ALT'] || down['RIGHT ALT']),
  shift: Boolean(down['LEFT SHIFT'] || down['RIGHT SHIFT'])
});

/**
 * System-wide key listener. While suspended, events pass through unobserved,
 * which keeps our own synthesized keystrokes out of the token buffer.
 */
export class GlobalKeystrokeTap implements CaptureControl {
  private readonly listener = new GlobalKeyboardListener();
  private readonly handler: IGlobalKeyListener;
  private listening = false;
  private suspendDepth = 0;

  public constructor(
    private readonly onStroke: KeyStrokeHandler,
    private readonly logger?: StructuredLogger
  ) {
    this.handler = (event, down) => {
      return this.onKeyEvent(event, down);
    };
  }

  public async start(): Promise<void> {
    if (this.listening) {
      return;
    }

    await this.listener.addListener(this.handler);
    this.listening = true;
    this.logger?.info('Keystroke tap started');
  }

  public stop(): void {
    if (this.listening) {
      this.listener.removeListener(this.handler);
    }

    this.listener.kill();
    this.listening = false;
    this.suspendDepth = 0;

    this.logger?.info('Keystroke tap stopped');
  }

  public suspend(): void {
    this.suspendDepth += 1;
  }

  public resume(): void {
    this.suspendDepth = Math.max(0, this.suspendDepth - 1);
  }

  public isSuspended(): boolean {
    return this.suspendDepth > 0;
  }

  private onKeyEvent(event: IGlobalKeyEvent, down: IGlobalKeyDownMap): boolean {
    if (this.suspendDepth > 0) {
      return false;
    }

    const keyName = event.name;
    if (!keyName) {
      return false;
    }

    try {
      return this.onStroke({ key: keyName, state: event.state, modifiers: modifiersFromDownMap(down) });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.error('Keystroke handler failed', { key: keyName, detail });
      return false;
    }
  }
}
