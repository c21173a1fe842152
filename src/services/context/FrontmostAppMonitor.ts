import { classifyApplication } from '../../core/contentRules';
import type { ContextOracle } from '../../core/TokenTracker';
import { StructuredLogger } from '../../logging/StructuredLogger';
import type { ContextSnapshot, KeyboardLayout } from '../../types';
import { CommandRunner, runCommand } from '../process/runCommand';

export interface InputSourceReader {
  currentLayout(): Promise<KeyboardLayout | undefined>;
}

interface FrontmostAppMonitorOptions {
  pollMs: number;
  timeoutMs: number;
  inputSource?: InputSourceReader;
  commandRunner?: CommandRunner;
  logger?: StructuredLogger;
}

const SECURE_SUBROLE = 'AXSecureTextField';

const FRONTMOST_APP_SCRIPT = [
  '-e',
  'tell application "System Events"',
  '-e',
  'set frontApp to first application process whose frontmost is true',
  '-e',
  'set bundleId to bundle identifier of frontApp',
  '-e',
  'set roleName to ""',
  '-e',
  'try',
  '-e',
  'set roleName to value of attribute "AXSubrole" of (value of attribute "AXFocusedUIElement" of frontApp)',
  '-e',
  'end try',
  '-e',
  'return bundleId & linefeed & roleName',
  '-e',
  'end tell'
];

export const parseFrontmostAppOutput = (stdout: string): ContextSnapshot => {
  const [bundleLine = '', subroleLine = ''] = stdout.split(/\r?\n/);
  const bundleId = bundleLine.trim() || undefined;

  return {
    bundleId,
    ...classifyApplication(bundleId),
    secureField: subroleLine.trim() === SECURE_SUBROLE
  };
};

/**
 * Polls the frontmost application, the focused-element subrole and the
 * active input source so keystroke handling can read them synchronously.
 */
export class FrontmostAppMonitor implements ContextOracle {
  private current: ContextSnapshot = { category: 'desktop', blocked: false, secureField: false };
  private timer: NodeJS.Timeout | undefined;
  private running = false;
  private readonly pollMs: number;
  private readonly timeoutMs: number;
  private readonly inputSource?: InputSourceReader;
  private readonly commandRunner: CommandRunner;
  private readonly logger?: StructuredLogger;

  public constructor(options: FrontmostAppMonitorOptions) {
    this.pollMs = options.pollMs;
    this.timeoutMs = options.timeoutMs;
    this.inputSource = options.inputSource;
    this.commandRunner = options.commandRunner ?? runCommand;
    this.logger = options.logger;
  }

  public snapshot(): ContextSnapshot {
    return this.current;
  }

  public start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    this.schedule(0);
    this.logger?.info('Frontmost app monitor started', { pollMs: this.pollMs });
  }

  public stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  public async refresh(): Promise<ContextSnapshot> {
    const app = await this.queryFrontmostApp();
    const layout = await this.queryLayout();

    this.current = { ...app, layout };
    return this.current;
  }

  private async queryFrontmostApp(): Promise<ContextSnapshot> {
    try {
      const result = await this.commandRunner('osascript', FRONTMOST_APP_SCRIPT, {
        timeoutMs: this.timeoutMs
      });
      const next = parseFrontmostAppOutput(result.stdout);

      if (next.bundleId !== this.current.bundleId) {
        this.logger?.debug('Frontmost app changed', {
          bundleId: next.bundleId,
          category: next.category,
          blocked: next.blocked
        });
      }

      return next;
    } catch (error) {
      this.logger?.debug('Frontmost app query failed; keeping previous context', {
        detail: error instanceof Error ? error.message : String(error)
      });
      return this.current;
    }
  }

  private async queryLayout(): Promise<KeyboardLayout | undefined> {
    if (!this.inputSource) {
      return undefined;
    }

    try {
      return (await this.inputSource.currentLayout()) ?? this.current.layout;
    } catch (error) {
      this.logger?.debug('Input source query failed; keeping previous layout', {
        detail: error instanceof Error ? error.message : String(error)
      });
      return this.current.layout;
    }
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      void this.refresh().then(() => {
        if (this.running) {
          this.schedule(this.pollMs);
        }
      });
    }, delayMs);
  }
}
