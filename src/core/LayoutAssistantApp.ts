import { EventEmitter } from 'node:events';
import { StructuredLogger } from '../logging/StructuredLogger';
import { LatencyTracker, type LatencySummary } from '../perf/LatencyTracker';
import { SelectionHotkey } from '../services/hotkey/SelectionHotkey';
import type { AssistantState, KeyboardLayout, KeyStroke, PhysicalKey, ReplacementOutcome } from '../types';
import { AutoReplacer } from './AutoReplacer';
import type { DictionaryIndex } from './DictionaryIndex';
import { LayoutConverter } from './LayoutConverter';
import {
  ReplacementExecutor,
  type CaptureControl,
  type KeystrokeSynthesizer,
  type LayoutSwitcher
} from './ReplacementExecutor';
import {
  SelectionConverter,
  type ClipboardAdapter,
  type EditShortcuts,
  type SelectionConversionResult
} from './SelectionConverter';
import { TokenTracker, type ContextOracle, type TokenUpdate } from './TokenTracker';

export interface LayoutAssistantOptions {
  autoReplace: boolean;
  selectionHotkey: string;
  maxTokenLength: number;
  focusGraceMs: number;
  copyDelayMs: number;
  pasteDelayMs: number;
  initialLayout: KeyboardLayout;
}

const DEFAULT_ASSISTANT_OPTIONS: LayoutAssistantOptions = {
  autoReplace: true,
  selectionHotkey: 'Option',
  maxTokenLength: 100,
  focusGraceMs: 300,
  copyDelayMs: 100,
  pasteDelayMs: 50,
  initialLayout: 'latin'
};

export interface LayoutAssistantDependencies {
  dictionary: DictionaryIndex;
  synthesizer: KeystrokeSynthesizer;
  shortcuts: EditShortcuts;
  clipboard: ClipboardAdapter;
  layoutSwitcher: LayoutSwitcher;
  context?: ContextOracle;
  capture?: CaptureControl;
  converter?: LayoutConverter;
  sleep?: (ms: number) => Promise<void>;
}

export interface ReplacementReport extends ReplacementOutcome {
  targetLayout: KeyboardLayout;
}

export declare interface LayoutAssistantApp {
  on(event: 'stateChanged', listener: (state: AssistantState) => void): this;
  on(event: 'replacementCompleted', listener: (report: ReplacementReport) => void): this;
  on(event: 'selectionConverted', listener: (result: SelectionConversionResult) => void): this;
}

/**
 * Wires keystrokes through the token tracker and auto-replacer, fires
 * planned replacements on key-up, and runs the selection conversion when the
 * hotkey commits. Async work is serialized on a single chain.
 */
export class LayoutAssistantApp extends EventEmitter {
  public readonly converter: LayoutConverter;
  public readonly tracker: TokenTracker;
  public readonly replacer: AutoReplacer;
  public readonly executor: ReplacementExecutor;
  public readonly selection: SelectionConverter;
  public readonly hotkey: SelectionHotkey;
  private state: AssistantState = { stage: 'idle' };
  private autoReplace: boolean;
  private processing = false;
  private fireOnKeyUp: PhysicalKey | undefined;
  private workChain: Promise<void> = Promise.resolve();
  private readonly latencyTracker = new LatencyTracker();

  public constructor(
    deps: LayoutAssistantDependencies,
    private readonly logger?: StructuredLogger,
    options: Partial<LayoutAssistantOptions> = {}
  ) {
    super();
    const resolved: LayoutAssistantOptions = { ...DEFAULT_ASSISTANT_OPTIONS, ...options };

    this.autoReplace = resolved.autoReplace;
    this.converter = deps.converter ?? new LayoutConverter();
    this.hotkey = new SelectionHotkey(resolved.selectionHotkey);
    this.tracker = new TokenTracker({
      converter: this.converter,
      context: deps.context,
      initialLayout: resolved.initialLayout,
      maxTokenLength: resolved.maxTokenLength,
      focusGraceMs: resolved.focusGraceMs,
      logger: logger?.child('tracker')
    });
    this.executor = new ReplacementExecutor({
      synthesizer: deps.synthesizer,
      layoutSwitcher: deps.layoutSwitcher,
      capture: deps.capture,
      latency: this.latencyTracker,
      logger: logger?.child('executor')
    });
    this.replacer = new AutoReplacer({
      dictionary: deps.dictionary,
      converter: this.converter,
      runner: this.executor,
      logger: logger?.child('replacer')
    });
    this.selection = new SelectionConverter({
      converter: this.converter,
      clipboard: deps.clipboard,
      shortcuts: deps.shortcuts,
      layoutSwitcher: deps.layoutSwitcher,
      capture: deps.capture,
      appCategory: () => deps.context?.snapshot().category ?? 'desktop',
      copyDelayMs: resolved.copyDelayMs,
      pasteDelayMs: resolved.pasteDelayMs,
      sleep: deps.sleep,
      logger: logger?.child('selection')
    });
  }

  public getState(): AssistantState {
    return this.state;
  }

  public isAutoReplaceEnabled(): boolean {
    return this.autoReplace;
  }

  public setAutoReplace(enabled: boolean): void {
    this.autoReplace = enabled;
    if (!enabled) {
      this.replacer.cancel();
      this.fireOnKeyUp = undefined;
    }

    this.logger?.info('Auto-replace toggled', { enabled });
  }

  public setActiveLayout(layout: KeyboardLayout): void {
    this.tracker.setActiveLayout(layout);
  }

  public getLatencySummary(): LatencySummary {
    return this.latencyTracker.summarize();
  }

  /** Resolves once every queued replacement or conversion has finished. */
  public async whenIdle(): Promise<void> {
    await this.workChain;
  }

  /** Entry point for the keystroke tap. Returns true to swallow the key. */
  public handleKeyStroke(stroke: KeyStroke): boolean {
    const verdict = this.hotkey.handle(stroke);
    if (verdict.fire) {
      this.enqueue(async () => {
        await this.convertSelection();
      });
    }

    if (verdict.swallow) {
      return true;
    }

    if (stroke.state === 'UP') {
      this.handleKeyUp(stroke.key);
      return false;
    }

    const update = this.tracker.handleKeyDown(stroke, this.processing);
    this.applyTokenUpdate(update, stroke.key);
    return false;
  }

  public async convertSelection(): Promise<SelectionConversionResult> {
    if (this.processing) {
      this.logger?.info('Selection conversion skipped; a replacement is running');
      return { status: 'cancelled', reason: 'busy' };
    }

    this.processing = true;
    this.fireOnKeyUp = undefined;
    this.replacer.cancel();
    this.setState({ stage: 'converting', detail: 'Converting selection' });

    try {
      const result = await this.selection.convertSelection();
      this.tracker.forceReset();

      if (result.status === 'converted' && result.layoutSwitched) {
        this.tracker.setActiveLayout(result.to);
      } else if (result.status === 'failed') {
        this.logger?.warn('Selection conversion failed', { reason: result.reason, detail: result.detail });
      }

      this.emit('selectionConverted', result);
      return result;
    } finally {
      this.processing = false;
      this.setState({ stage: 'idle' });
    }
  }

  public async shutdown(): Promise<void> {
    this.fireOnKeyUp = undefined;
    this.replacer.cancel();
    this.executor.cancel();
    await this.whenIdle();

    this.logger?.info('Replacement latency summary', { ...this.latencyTracker.summarize() });
    this.setState({ stage: 'stopped' });
  }

  private applyTokenUpdate(update: TokenUpdate, key: PhysicalKey): void {
    switch (update.kind) {
      case 'accumulated': {
        if (!this.autoReplace || !this.tracker.canAnalyze()) {
          return;
        }

        const plan = this.replacer.analyzeTokenForPlanning(update.token);
        this.fireOnKeyUp = plan ? key : undefined;
        return;
      }
      case 'pending-space': {
        const plan = this.autoReplace ? this.replacer.analyzeShortTokenWithSpace(update.token) : undefined;
        if (plan) {
          this.fireOnKeyUp = key;
          return;
        }

        this.fireOnKeyUp = undefined;
        this.tracker.completeShortTokenAnalysis(false);
        return;
      }
      case 'completed':
      case 'reset':
        this.fireOnKeyUp = undefined;
        this.replacer.reset();
        return;
      case 'ignored':
        return;
    }
  }

  private handleKeyUp(key: PhysicalKey): void {
    if (this.fireOnKeyUp !== key) {
      return;
    }

    this.fireOnKeyUp = undefined;
    this.processing = true;
    this.enqueue(async () => {
      await this.firePlannedReplacement();
    });
  }

  private async firePlannedReplacement(): Promise<void> {
    const plan = this.replacer.getPlannedExecution();
    if (!plan) {
      this.processing = false;
      this.tracker.completeShortTokenAnalysis(false);
      return;
    }

    this.setState({ stage: 'replacing', detail: `${plan.sourceToken} -> ${plan.replacementText.trim()}` });

    try {
      const outcome = await this.replacer.executePlannedReplacement();
      if (!outcome) {
        return;
      }

      if (plan.includesTrailingSpace) {
        this.tracker.completeShortTokenAnalysis(outcome.success);
      } else if (outcome.success) {
        this.tracker.updateTokenAfterReplacement(outcome.replacementText, outcome.sourceToken);
      }

      // A refused switch leaves the OS, and so the tracker, on the old layout.
      if (outcome.success && outcome.layoutSwitched) {
        this.tracker.setActiveLayout(plan.targetLayout);
      }

      this.emit('replacementCompleted', { ...outcome, targetLayout: plan.targetLayout });
    } finally {
      this.processing = false;
      this.setState({ stage: 'idle' });
    }
  }

  private enqueue(task: () => Promise<void>): void {
    this.workChain = this.workChain.then(task).catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      this.processing = false;
      this.logger?.error('Assistant task failed', { detail });
      this.setState({ stage: 'error', detail });
    });
  }

  private setState(next: AssistantState): void {
    this.state = next;
    this.emit('stateChanged', next);
  }
}
