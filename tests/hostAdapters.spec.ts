import { describe, it, expect } from 'vitest';
import { MacClipboard } from '../src/services/clipboard/MacClipboard';
import { FrontmostAppMonitor, parseFrontmostAppOutput } from '../src/services/context/FrontmostAppMonitor';
import { KeystrokeInjector } from '../src/services/inject/KeystrokeInjector';
import { InputSourceSwitcher, layoutForInputSource } from '../src/services/layout/InputSourceSwitcher';
import type { CommandResult, CommandRunner, RunCommandOptions } from '../src/services/process/runCommand';
import type { KeyboardLayout } from '../src/types';

interface RecordedCommand {
  command: string;
  args: string[];
  options?: RunCommandOptions;
}

const fakeRunner = (respond: (call: RecordedCommand) => string | Error = () => '') => {
  const calls: RecordedCommand[] = [];
  const runner: CommandRunner = async (command, args, options) => {
    const call = { command, args, options };
    calls.push(call);
    const response = respond(call);
    if (response instanceof Error) {
      throw response;
    }

    const result: CommandResult = { stdout: response, stderr: '', durationMs: 1 };
    return result;
  };
  return { calls, runner };
};

describe('KeystrokeInjector', () => {
  it('sends backspaces as a repeated key code', async () => {
    const { calls, runner } = fakeRunner();
    const injector = new KeystrokeInjector({ timeoutMs: 1500, commandRunner: runner });

    await injector.deleteBackward(4);

    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe('osascript');
    expect(calls[0].args).toContain('key code 51');
    expect(calls[0].args.slice(-2)).toEqual(['--', '4']);
    expect(calls[0].options).toEqual({ timeoutMs: 1500 });
  });

  it('passes typed text as a script argument', async () => {
    const { calls, runner } = fakeRunner();
    const injector = new KeystrokeInjector({ timeoutMs: 1500, commandRunner: runner });

    await injector.typeText('привет "мир"');

    expect(calls[0].args.slice(-2)).toEqual(['--', 'привет "мир"']);
    expect(calls[0].args).toContain('keystroke targetText');
  });

  it('skips empty work and sends edit shortcuts', async () => {
    const { calls, runner } = fakeRunner();
    const injector = new KeystrokeInjector({ timeoutMs: 1500, commandRunner: runner });

    await injector.deleteBackward(0);
    await injector.typeText('');
    await injector.copy();
    await injector.paste();

    expect(calls.map((call) => call.args[1])).toEqual([
      'tell application "System Events" to keystroke "c" using command down',
      'tell application "System Events" to keystroke "v" using command down'
    ]);
  });
});

describe('MacClipboard', () => {
  it('reads with pbpaste and writes through pbcopy stdin', async () => {
    const { calls, runner } = fakeRunner((call) => (call.command === 'pbpaste' ? 'saved text' : ''));
    const clipboard = new MacClipboard({ timeoutMs: 800, commandRunner: runner });

    const backup = await clipboard.backup();
    await clipboard.writeText('temporary');
    await clipboard.restore(backup);

    expect(backup.text).toBe('saved text');
    expect(calls.map((call) => [call.command, call.options?.stdin])).toEqual([
      ['pbpaste', undefined],
      ['pbcopy', 'temporary'],
      ['pbcopy', 'saved text']
    ]);
  });

  it('does not write back a clipboard that held only non-text data', async () => {
    const { calls, runner } = fakeRunner((call) => (call.command === 'osascript' ? '«class PNGf», 2048\n' : ''));
    const clipboard = new MacClipboard({ timeoutMs: 800, commandRunner: runner });

    const backup = await clipboard.backup();
    await clipboard.writeText('temporary');
    await clipboard.restore(backup);

    expect(backup).toMatchObject({ text: '', payload: 'opaque' });
    expect(calls.map((call) => [call.command, call.options?.stdin])).toEqual([
      ['pbpaste', undefined],
      ['osascript', undefined],
      ['pbcopy', 'temporary']
    ]);
    expect(calls[1].args).toEqual(['-e', 'clipboard info']);
  });

  it('restores an empty clipboard as empty text', async () => {
    const { calls, runner } = fakeRunner(() => '');
    const clipboard = new MacClipboard({ timeoutMs: 800, commandRunner: runner });

    const backup = await clipboard.backup();
    await clipboard.restore(backup);

    expect(backup).toMatchObject({ text: '', payload: 'empty' });
    expect(calls.map((call) => [call.command, call.options?.stdin])).toEqual([
      ['pbpaste', undefined],
      ['osascript', undefined],
      ['pbcopy', '']
    ]);
  });

  it('treats the clipboard as non-text when its contents cannot be described', async () => {
    const { runner } = fakeRunner((call) => (call.command === 'osascript' ? new Error('timed out') : ''));
    const clipboard = new MacClipboard({ timeoutMs: 800, commandRunner: runner });

    expect(await clipboard.backup()).toMatchObject({ text: '', payload: 'opaque' });
  });
});

describe('InputSourceSwitcher', () => {
  it('maps input source ids to layouts', () => {
    expect(layoutForInputSource('com.apple.keylayout.ABC')).toBe('latin');
    expect(layoutForInputSource('com.apple.keylayout.Russian-Phonetic\n')).toBe('cyrillic');
    expect(layoutForInputSource('com.apple.keylayout.RussianWin')).toBe('cyrillic');
    expect(layoutForInputSource('com.apple.keylayout.German')).toBeUndefined();
  });

  it('falls back to the next source id when the first does not stick', async () => {
    let active = 'com.apple.keylayout.ABC';
    const { calls, runner } = fakeRunner((call) => {
      const [target] = call.args;
      if (target === 'com.apple.keylayout.Russian') {
        return new Error('Command failed (1): macism');
      }
      if (target) {
        active = target;
      }
      return active;
    });
    const switcher = new InputSourceSwitcher({ binary: 'macism', timeoutMs: 500, commandRunner: runner });

    expect(await switcher.switchTo('cyrillic')).toBe(true);
    expect(calls.map((call) => call.args)).toEqual([
      ['com.apple.keylayout.Russian'],
      ['com.apple.keylayout.Russian-Phonetic'],
      []
    ]);
    expect(await switcher.currentLayout()).toBe('cyrillic');
  });

  it('reports failure when no source can be selected', async () => {
    const { runner } = fakeRunner(() => new Error('macism: command not found'));
    const switcher = new InputSourceSwitcher({ binary: 'macism', timeoutMs: 500, commandRunner: runner });

    expect(await switcher.switchTo('latin')).toBe(false);
  });
});

describe('FrontmostAppMonitor', () => {
  it('parses the bundle id and secure subrole', () => {
    expect(parseFrontmostAppOutput('com.apple.Safari\nAXSecureTextField\n')).toEqual({
      bundleId: 'com.apple.Safari',
      category: 'browser',
      blocked: false,
      secureField: true
    });
    expect(parseFrontmostAppOutput('\n')).toEqual({ bundleId: undefined, category: 'desktop', blocked: false, secureField: false });
  });

  it('keeps the previous snapshot when the query fails', async () => {
    let fail = false;
    const { runner } = fakeRunner(() => (fail ? new Error('timed out') : 'com.figma.Desktop\nAXTextArea'));
    const monitor = new FrontmostAppMonitor({ pollMs: 250, timeoutMs: 500, commandRunner: runner });

    await monitor.refresh();
    fail = true;
    const snapshot = await monitor.refresh();

    expect(snapshot).toEqual({ bundleId: 'com.figma.Desktop', category: 'canvas', blocked: false, secureField: false });
    expect(monitor.snapshot()).toBe(snapshot);
  });

  it('reports the active input source and keeps the last one when it cannot be read', async () => {
    const { runner } = fakeRunner(() => 'com.apple.TextEdit\nAXTextArea');
    let reading: () => Promise<KeyboardLayout | undefined> = async () => 'cyrillic';
    const monitor = new FrontmostAppMonitor({
      pollMs: 250,
      timeoutMs: 500,
      commandRunner: runner,
      inputSource: { currentLayout: () => reading() }
    });

    expect((await monitor.refresh()).layout).toBe('cyrillic');

    reading = async () => {
      throw new Error('macism: command not found');
    };
    expect((await monitor.refresh()).layout).toBe('cyrillic');

    reading = async () => undefined;
    expect((await monitor.refresh()).layout).toBe('cyrillic');

    reading = async () => 'latin';
    expect(await monitor.refresh()).toEqual({
      bundleId: 'com.apple.TextEdit',
      category: 'desktop',
      blocked: false,
      secureField: false,
      layout: 'latin'
    });
  });
});
