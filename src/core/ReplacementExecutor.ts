import type { StructuredLogger } from '../logging/StructuredLogger';
import type { LatencyTracker } from '../perf/LatencyTracker';
import type { KeyboardLayout, ReplacementRequest } from '../types';
import type { ReplacementRunner, ReplacementRunResult } from './AutoReplacer';

export interface KeystrokeSynthesizer {
  deleteBackward(count: number): Promise<void>;
  typeText(text: string): Promise<void>;
}

export interface LayoutSwitcher {
  /** Resolves false when the OS refused or the source was not found. */
  switchTo(layout: KeyboardLayout): Promise<boolean>;
}

/** Pauses keystroke capture so synthesized input is not observed as user typing. */
export interface CaptureControl {
  suspend(): void;
  resume(): void;
}

export type ReplacementFailureReason = 'in-flight' | 'invalid-request' | 'delete-failed' | 'type-failed';

export interface ReplacementExecution extends ReplacementRunResult {
  reason?: ReplacementFailureReason;
}

export interface ReplacementExecutorOptions {
  synthesizer: KeystrokeSynthesizer;
  layoutSwitcher: LayoutSwitcher;
  capture?: CaptureControl;
  latency?: LatencyTracker;
  logger?: StructuredLogger;
}

export class ReplacementExecutor implements ReplacementRunner {
  private activeRun: number | undefined;
  private runCounter = 0;
  private readonly synthesizer: KeystrokeSynthesizer;
  private readonly layoutSwitcher: LayoutSwitcher;
  private readonly capture?: CaptureControl;
  private readonly latency?: LatencyTracker;
  private readonly logger?: StructuredLogger;

  public constructor(options: ReplacementExecutorOptions) {
    this.synthesizer = options.synthesizer;
    this.layoutSwitcher = options.layoutSwitcher;
    this.capture = options.capture;
    this.latency = options.latency;
    this.logger = options.logger;
  }

  public isExecuting(): boolean {
    return this.activeRun !== undefined;
  }

  /**
   * Deletes `deleteCount` characters, types the replacement and switches the
   * input source. Never rejects; a failed layout switch is reported but does
   * not fail the replacement.
   */
  public async executeReplacement(request: ReplacementRequest): Promise<ReplacementExecution> {
    if (this.activeRun !== undefined) {
      this.logger?.warn('Replacement rejected; another one is running', {
        deleteCount: request.deleteCount
      });
      return { success: false, reason: 'in-flight' };
    }

    if (!Number.isInteger(request.deleteCount) || request.deleteCount <= 0 || !request.replacementText) {
      this.logger?.warn('Replacement rejected; invalid request', {
        deleteCount: request.deleteCount,
        length: request.replacementText.length
      });
      return { success: false, reason: 'invalid-request' };
    }

    this.runCounter += 1;
    const runId = this.runCounter;
    this.activeRun = runId;
    this.capture?.suspend();

    const startedAt = Date.now();

    try {
      try {
        await this.synthesizer.deleteBackward(request.deleteCount);
      } catch (error) {
        this.logger?.error('Backspace synthesis failed', {
          deleteCount: request.deleteCount,
          detail: error instanceof Error ? error.message : String(error)
        });
        return { success: false, reason: 'delete-failed' };
      }
      const deletedAt = Date.now();

      try {
        await this.synthesizer.typeText(request.replacementText);
      } catch (error) {
        this.logger?.error('Replacement typing failed', {
          length: request.replacementText.length,
          detail: error instanceof Error ? error.message : String(error)
        });
        return { success: false, reason: 'type-failed' };
      }
      const typedAt = Date.now();

      const layoutSwitched = await this.switchLayout(request.targetLayout);
      const finishedAt = Date.now();

      this.latency?.push({
        deleteMs: deletedAt - startedAt,
        typeMs: typedAt - deletedAt,
        switchMs: finishedAt - typedAt,
        totalMs: finishedAt - startedAt
      });

      return { success: true, layoutSwitched };
    } finally {
      this.finishRun(runId);
    }
  }

  /**
   * Forces the executor back to idle and resumes capture. A keystroke
   * sequence already handed to the OS still runs to completion.
   */
  public cancel(): void {
    if (this.activeRun === undefined) {
      return;
    }

    this.logger?.warn('Replacement cancelled while running');
    this.activeRun = undefined;
    this.capture?.resume();
  }

  private async switchLayout(layout: KeyboardLayout): Promise<boolean> {
    try {
      const switched = await this.layoutSwitcher.switchTo(layout);
      if (!switched) {
        this.logger?.warn('Input source switch refused; text was replaced anyway', { layout });
      }

      return switched;
    } catch (error) {
      this.logger?.warn('Input source switch failed; text was replaced anyway', {
        layout,
        detail: error instanceof Error ? error.message : String(error)
      });
      return false;
    }
  }

  private finishRun(runId: number): void {
    if (this.activeRun !== runId) {
      return;
    }

    this.activeRun = undefined;
    this.capture?.resume();
  }
}
