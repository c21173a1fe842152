export type KeyboardLayout = 'latin' | 'cyrillic';
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';
export type AppCategory = 'browser' | 'canvas' | 'desktop';

/** Physical key name as reported by the global key listener ("A", "SEMICOLON", "LEFT ARROW"). */
export type PhysicalKey = string;

export interface KeyModifiers {
  command: boolean;
  control: boolean;
  option: boolean;
  shift: boolean;
}

export interface KeyStroke {
  key: PhysicalKey;
  state: 'DOWN' | 'UP';
  modifiers: KeyModifiers;
}

export type PrefixAnalysis = 'too-short' | 'only-latin' | 'only-cyrillic' | 'ambiguous' | 'none';

export type ReplacementState =
  | { stage: 'idle' }
  | { stage: 'analyzing' }
  | { stage: 'ambiguous'; pendingToken: string }
  | { stage: 'replacing' };

export type ReplacementDecision =
  | { kind: 'no-action' }
  | { kind: 'wait-for-more' }
  | { kind: 'replace'; from: string; to: string; targetLayout: KeyboardLayout };

export interface ExecutionPlan {
  sourceToken: string;
  deleteCount: number;
  replacementText: string;
  targetLayout: KeyboardLayout;
  includesTrailingSpace: boolean;
}

export interface ReplacementRequest {
  deleteCount: number;
  replacementText: string;
  targetLayout: KeyboardLayout;
}

export interface ReplacementOutcome {
  success: boolean;
  sourceToken: string;
  replacementText: string;
  layoutSwitched?: boolean;
  reason?: string;
}

export interface ContextSnapshot {
  bundleId?: string;
  category: AppCategory;
  blocked: boolean;
  secureField: boolean;
  /** Input source the OS reports; absent when it could not be read. */
  layout?: KeyboardLayout;
}

export interface AppConfig {
  selectionHotkey: string;
  autoReplace: boolean;
  latinDictionaryPath: string;
  cyrillicDictionaryPath: string;
  maxTokenLength: number;
  focusGraceMs: number;
  copyDelayMs: number;
  pasteDelayMs: number;
  contextPollMs: number;
  commandTimeoutMs: number;
  inputSourceBin: string;
  logDir: string;
  logLevel: LogLevelName;
}

export interface AssistantState {
  stage: 'idle' | 'replacing' | 'converting' | 'stopped' | 'error';
  detail?: string;
}
