import { EventEmitter } from 'node:events';
import type { StructuredLogger } from '../logging/StructuredLogger';
import type { ContextSnapshot, KeyboardLayout, KeyStroke, PhysicalKey } from '../types';
import type { LayoutConverter } from './LayoutConverter';

export const DEFAULT_MAX_TOKEN_LENGTH = 100;
export const DEFAULT_FOCUS_GRACE_MS = 300;
const LONG_TOKEN_LENGTH = 3;

const INTERRUPTION_KEYS: ReadonlySet<PhysicalKey> = new Set([
  'LEFT ARROW',
  'RIGHT ARROW',
  'UP ARROW',
  'DOWN ARROW',
  'HOME',
  'END',
  'PAGE UP',
  'PAGE DOWN',
  'BACKSPACE',
  'DELETE',
  'TAB',
  'RETURN',
  'NUMPAD RETURN',
  'ESCAPE'
]);

export interface ContextOracle {
  snapshot(): ContextSnapshot;
}

export type TokenResetReason =
  | 'interruption'
  | 'focus-change'
  | 'layout-change'
  | 'forced'
  | 'short-token-closed';

export type TokenCompletionReason = 'space' | 'boundary' | 'overflow';

export type TokenUpdate =
  | { kind: 'ignored'; reason: 'processing' | 'modifier' | 'context' | 'no-character' | 'empty-boundary' }
  | { kind: 'reset'; reason: TokenResetReason; discarded: string }
  | { kind: 'accumulated'; token: string }
  | { kind: 'completed'; token: string; reason: TokenCompletionReason }
  | { kind: 'pending-space'; token: string };

export interface TokenTrackerOptions {
  converter: LayoutConverter;
  context?: ContextOracle;
  initialLayout?: KeyboardLayout;
  maxTokenLength?: number;
  focusGraceMs?: number;
  now?: () => number;
  logger?: StructuredLogger;
}

export declare interface TokenTracker {
  on(event: 'tokenCompleted', listener: (token: string, reason: TokenCompletionReason) => void): this;
  on(event: 'tokenReset', listener: (reason: TokenResetReason, discarded: string) => void): this;
}

/**
 * Accumulates the word currently being typed from physical key-downs.
 *
 * Key-ups are not consumed here; the orchestrator uses them as the point at
 * which a planned replacement is fired.
 */
export class TokenTracker extends EventEmitter {
  private currentToken = '';
  private activeLayout: KeyboardLayout;
  private pendingSpaceAnalysis = false;
  private postReplacement = false;
  private lastBundleId: string | undefined;
  private lastReportedLayout: KeyboardLayout | undefined;
  private focusChangedAtMs: number | undefined;
  private readonly converter: LayoutConverter;
  private readonly context?: ContextOracle;
  private readonly maxTokenLength: number;
  private readonly focusGraceMs: number;
  private readonly now: () => number;
  private readonly logger?: StructuredLogger;

  public constructor(options: TokenTrackerOptions) {
    super();
    this.converter = options.converter;
    this.context = options.context;
    this.activeLayout = options.initialLayout ?? 'latin';
    this.maxTokenLength = options.maxTokenLength ?? DEFAULT_MAX_TOKEN_LENGTH;
    this.focusGraceMs = options.focusGraceMs ?? DEFAULT_FOCUS_GRACE_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  public getCurrentToken(): string {
    return this.currentToken;
  }

  public getActiveLayout(): KeyboardLayout {
    return this.activeLayout;
  }

  public setActiveLayout(layout: KeyboardLayout): void {
    this.activeLayout = layout;
  }

  public isPendingSpaceAnalysis(): boolean {
    return this.pendingSpaceAnalysis;
  }

  public isPostReplacement(): boolean {
    return this.postReplacement;
  }

  /** False while the buffer holds our own output or awaits short-token analysis. */
  public canAnalyze(): boolean {
    return !this.postReplacement && !this.pendingSpaceAnalysis;
  }

  public handleKeyDown(stroke: KeyStroke, isProcessing = false): TokenUpdate {
    if (isProcessing) {
      return { kind: 'ignored', reason: 'processing' };
    }

    if (this.pendingSpaceAnalysis) {
      // The consumer never closed the short-token window; the next key does.
      this.clear('short-token-closed');
    }

    if (INTERRUPTION_KEYS.has(stroke.key)) {
      return this.clear('interruption');
    }

    const snapshot = this.context?.snapshot();
    this.trackFocus(snapshot);
    this.trackInputSource(snapshot);

    const { command, control, option } = stroke.modifiers;
    if (command || control || option) {
      return { kind: 'ignored', reason: 'modifier' };
    }

    if (stroke.key === 'SPACE') {
      return this.handleSpace();
    }

    const character = this.converter.extractCharacterFromKeycode(
      stroke.key,
      this.activeLayout,
      stroke.modifiers.shift
    );
    if (character === undefined) {
      return { kind: 'ignored', reason: 'no-character' };
    }

    if (!this.isValidContext(snapshot)) {
      return { kind: 'ignored', reason: 'context' };
    }

    if (!this.converter.isWordCharacter(character)) {
      return this.currentToken
        ? this.complete('boundary')
        : { kind: 'ignored', reason: 'empty-boundary' };
    }

    if (this.currentToken.length >= this.maxTokenLength) {
      this.logger?.debug('Token length limit reached', { length: this.currentToken.length });
      return this.complete('overflow');
    }

    this.currentToken += character;
    return { kind: 'accumulated', token: this.currentToken };
  }

  /** Closes the pending short-token window opened by a space after a 1-2 character word. */
  public completeShortTokenAnalysis(replaced: boolean): void {
    if (!this.pendingSpaceAnalysis) {
      return;
    }

    this.logger?.debug('Short token analysis closed', { token: this.currentToken, replaced });
    this.clear('short-token-closed');
  }

  public updateTokenAfterReplacement(newText: string, originalToken: string): void {
    this.logger?.debug('Token re-seeded after replacement', { originalToken, newText });
    this.currentToken = newText;
    this.pendingSpaceAnalysis = false;
    this.postReplacement = true;
  }

  public forceReset(): void {
    if (this.currentToken || this.pendingSpaceAnalysis || this.postReplacement) {
      this.logger?.debug('Force reset', { discarded: this.currentToken });
    }

    this.clear('forced');
  }

  private handleSpace(): TokenUpdate {
    if (!this.currentToken) {
      return { kind: 'ignored', reason: 'empty-boundary' };
    }

    if (this.postReplacement || this.currentToken.length >= LONG_TOKEN_LENGTH) {
      return this.complete('space');
    }

    this.pendingSpaceAnalysis = true;
    return { kind: 'pending-space', token: this.currentToken };
  }

  private trackFocus(snapshot: ContextSnapshot | undefined): void {
    if (!snapshot) {
      return;
    }

    const changed = this.lastBundleId !== undefined && snapshot.bundleId !== this.lastBundleId;
    this.lastBundleId = snapshot.bundleId;

    if (changed) {
      this.focusChangedAtMs = this.now();
      this.clear('focus-change');
    }
  }

  /**
   * Follows input source switches made outside the assistant. Only a change in
   * the reported value counts: a report that lags behind our own switch is
   * not a new switch.
   */
  private trackInputSource(snapshot: ContextSnapshot | undefined): void {
    const reported = snapshot?.layout;
    if (reported === undefined || reported === this.lastReportedLayout) {
      return;
    }

    this.lastReportedLayout = reported;
    if (reported === this.activeLayout) {
      return;
    }

    this.logger?.debug('Input source changed outside the assistant', {
      from: this.activeLayout,
      to: reported
    });
    this.activeLayout = reported;
    this.clear('layout-change');
  }

  private isValidContext(snapshot: ContextSnapshot | undefined): boolean {
    if (!snapshot) {
      return true;
    }

    if (snapshot.blocked || snapshot.category === 'canvas') {
      return false;
    }

    if (!snapshot.secureField) {
      return true;
    }

    // Secure-field reports right after a focus change are not trusted yet.
    const inGrace =
      this.focusChangedAtMs !== undefined && this.now() - this.focusChangedAtMs < this.focusGraceMs;
    return inGrace;
  }

  private complete(reason: TokenCompletionReason): TokenUpdate {
    const token = this.currentToken;
    this.currentToken = '';
    this.pendingSpaceAnalysis = false;
    this.postReplacement = false;
    this.emit('tokenCompleted', token, reason);

    return { kind: 'completed', token, reason };
  }

  private clear(reason: TokenResetReason): TokenUpdate {
    const discarded = this.currentToken;
    this.currentToken = '';
    this.pendingSpaceAnalysis = false;
    this.postReplacement = false;
    this.emit('tokenReset', reason, discarded);

    return { kind: 'reset', reason, discarded };
  }
}
