import type { StructuredLogger } from '../logging/StructuredLogger';
import type {
  ExecutionPlan,
  KeyboardLayout,
  PrefixAnalysis,
  ReplacementDecision,
  ReplacementOutcome,
  ReplacementRequest,
  ReplacementState
} from '../types';
import { MIN_LIVE_ANALYSIS_LENGTH, type DictionaryIndex } from './DictionaryIndex';
import type { LayoutConverter } from './LayoutConverter';

export interface ReplacementRunResult {
  success: boolean;
  reason?: string;
  /** False when the text was replaced but the OS kept its input source. */
  layoutSwitched?: boolean;
}

/** Non-owning handle on whatever performs the delete/retype sequence. */
export interface ReplacementRunner {
  executeReplacement(request: ReplacementRequest): Promise<ReplacementRunResult>;
}

export interface AutoReplacerOptions {
  dictionary: DictionaryIndex;
  converter: LayoutConverter;
  runner?: ReplacementRunner;
  logger?: StructuredLogger;
}

const NO_ACTION: ReplacementDecision = { kind: 'no-action' };
const WAIT_FOR_MORE: ReplacementDecision = { kind: 'wait-for-more' };

const layoutForAnalysis = (analysis: PrefixAnalysis): KeyboardLayout | undefined => {
  if (analysis === 'only-latin') {
    return 'latin';
  }

  if (analysis === 'only-cyrillic') {
    return 'cyrillic';
  }

  return undefined;
};

export class AutoReplacer {
  private state: ReplacementState = { stage: 'idle' };
  private plannedExecution: ExecutionPlan | undefined;
  private runner?: ReplacementRunner;
  private readonly dictionary: DictionaryIndex;
  private readonly converter: LayoutConverter;
  private readonly logger?: StructuredLogger;

  public constructor(options: AutoReplacerOptions) {
    this.dictionary = options.dictionary;
    this.converter = options.converter;
    this.runner = options.runner;
    this.logger = options.logger;
  }

  public setRunner(runner: ReplacementRunner): void {
    this.runner = runner;
  }

  public getState(): ReplacementState {
    return this.state;
  }

  public getPlannedExecution(): ExecutionPlan | undefined {
    return this.plannedExecution;
  }

  /**
   * Classifies a live token (3+ characters). Moves Idle -> Analyzing and then
   * to Ambiguous on wait-for-more, Idle otherwise. Dropped while replacing.
   */
  public decide(token: string): ReplacementDecision {
    if (this.state.stage === 'replacing' || token.length < MIN_LIVE_ANALYSIS_LENGTH) {
      return NO_ACTION;
    }

    this.state = { stage: 'analyzing' };
    const decision = this.decideLiveToken(token, this.dictionary.analyzePrefix(token));
    this.state =
      decision.kind === 'wait-for-more' ? { stage: 'ambiguous', pendingToken: token } : { stage: 'idle' };

    return decision;
  }

  /** Short (1-2 character) token closed by a space, judged as a complete word. */
  public decideShortToken(token: string): ReplacementDecision {
    if (
      this.state.stage === 'replacing' ||
      token.length === 0 ||
      token.length >= MIN_LIVE_ANALYSIS_LENGTH
    ) {
      return NO_ACTION;
    }

    this.state = { stage: 'analyzing' };
    const decision = this.decideCompletedShortToken(token);
    this.state = { stage: 'idle' };

    return decision;
  }

  public analyzeTokenForPlanning(token: string): ExecutionPlan | undefined {
    const decision = this.decide(token);
    this.plannedExecution =
      decision.kind === 'replace' ? this.createExecutionPlan(decision, false) : undefined;

    if (this.plannedExecution) {
      this.logger?.debug('Replacement planned', {
        token,
        deleteCount: this.plannedExecution.deleteCount,
        replacementText: this.plannedExecution.replacementText
      });
    }

    return this.plannedExecution;
  }

  /** The trailing space that triggered analysis is deleted and retyped too. */
  public analyzeShortTokenWithSpace(token: string): ExecutionPlan | undefined {
    const decision = this.decideShortToken(token);
    this.plannedExecution =
      decision.kind === 'replace' ? this.createExecutionPlan(decision, true) : undefined;

    if (this.plannedExecution) {
      this.logger?.debug('Short token replacement planned', {
        token,
        deleteCount: this.plannedExecution.deleteCount,
        replacementText: this.plannedExecution.replacementText
      });
    }

    return this.plannedExecution;
  }

  /**
   * Fires the stored plan once. Resolves undefined when nothing was planned;
   * a call made while a replacement is in flight is rejected without touching it.
   */
  public async executePlannedReplacement(): Promise<ReplacementOutcome | undefined> {
    if (this.state.stage === 'replacing') {
      this.logger?.warn('Replacement already in flight; request dropped');
      return {
        success: false,
        sourceToken: this.plannedExecution?.sourceToken ?? '',
        replacementText: this.plannedExecution?.replacementText ?? '',
        reason: 'in-flight'
      };
    }

    const plan = this.plannedExecution;
    if (!plan) {
      return undefined;
    }

    this.plannedExecution = undefined;

    if (!this.runner) {
      this.logger?.warn('No replacement executor attached; plan discarded', {
        sourceToken: plan.sourceToken
      });
      return {
        success: false,
        sourceToken: plan.sourceToken,
        replacementText: plan.replacementText,
        reason: 'no-executor'
      };
    }

    this.state = { stage: 'replacing' };

    try {
      const result = await this.runner.executeReplacement({
        deleteCount: plan.deleteCount,
        replacementText: plan.replacementText,
        targetLayout: plan.targetLayout
      });

      this.logger?.info(result.success ? 'Replacement completed' : 'Replacement failed', {
        sourceToken: plan.sourceToken,
        replacementText: plan.replacementText,
        targetLayout: plan.targetLayout,
        layoutSwitched: result.layoutSwitched,
        reason: result.reason
      });

      return {
        success: result.success,
        sourceToken: plan.sourceToken,
        replacementText: plan.replacementText,
        layoutSwitched: result.layoutSwitched,
        reason: result.reason
      };
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.error('Replacement executor threw', { sourceToken: plan.sourceToken, detail });

      return {
        success: false,
        sourceToken: plan.sourceToken,
        replacementText: plan.replacementText,
        reason: detail
      };
    } finally {
      this.state = { stage: 'idle' };
    }
  }

  public reset(): void {
    if (this.state.stage === 'ambiguous') {
      this.logger?.debug('Ambiguous token discarded', { pendingToken: this.state.pendingToken });
    }

    if (this.state.stage !== 'replacing') {
      this.state = { stage: 'idle' };
    }
    this.plannedExecution = undefined;
  }

  public cancel(): void {
    this.logger?.debug('Auto-replacer cancelled', { stage: this.state.stage });
    this.state = { stage: 'idle' };
    this.plannedExecution = undefined;
  }

  private decideLiveToken(token: string, analysis: PrefixAnalysis): ReplacementDecision {
    switch (analysis) {
      case 'too-short':
        return NO_ACTION;
      case 'only-latin':
      case 'only-cyrillic':
        // Heuristic: a valid prefix here still loses to a finished word in the other layout.
        return this.replaceWithCompleteWord(token);
      case 'ambiguous':
        this.logger?.debug('Token is a prefix in both languages; waiting', { token });
        return WAIT_FOR_MORE;
      case 'none':
        return this.replaceWithConvertedPrefix(token);
    }
  }

  private replaceWithCompleteWord(token: string): ReplacementDecision {
    const converted = this.converter.convertToOppositeLayout(token);
    const targetLayout = layoutForAnalysis(this.dictionary.analyzeCompleteWord(converted));
    if (!targetLayout) {
      return NO_ACTION;
    }

    this.logger?.debug('Prefix in current layout, complete word in the other', { token, converted });
    return { kind: 'replace', from: token, to: converted, targetLayout };
  }

  private replaceWithConvertedPrefix(token: string): ReplacementDecision {
    const converted = this.converter.convertToOppositeLayout(token);
    const analysis = this.dictionary.analyzePrefix(converted);

    if (analysis === 'ambiguous') {
      this.logger?.debug('Converted token is ambiguous; waiting', { token, converted });
      return WAIT_FOR_MORE;
    }

    const targetLayout = layoutForAnalysis(analysis);
    if (!targetLayout) {
      return NO_ACTION;
    }

    return { kind: 'replace', from: token, to: converted, targetLayout };
  }

  private decideCompletedShortToken(token: string): ReplacementDecision {
    const analysis = this.dictionary.analyzeCompleteWord(token);
    if (analysis === 'too-short' || analysis === 'ambiguous') {
      return NO_ACTION;
    }

    // Already a word where it was typed, whether or not the other reading is one too.
    if (analysis !== 'none') {
      return NO_ACTION;
    }

    const converted = this.converter.convertToOppositeLayout(token);
    const targetLayout = layoutForAnalysis(this.dictionary.analyzeCompleteWord(converted));
    if (!targetLayout) {
      return NO_ACTION;
    }

    return { kind: 'replace', from: token, to: converted, targetLayout };
  }

  private createExecutionPlan(
    decision: Extract<ReplacementDecision, { kind: 'replace' }>,
    includeTrailingSpace: boolean
  ): ExecutionPlan {
    return {
      sourceToken: decision.from,
      deleteCount: decision.from.length + (includeTrailingSpace ? 1 : 0),
      replacementText: `${decision.to}${includeTrailingSpace ? ' ' : ''}`,
      targetLayout: decision.targetLayout,
      includesTrailingSpace: includeTrailingSpace
    };
  }
}
