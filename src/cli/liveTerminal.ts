import readline from 'node:readline';
import { resolveConfig, validateConfig } from '../config';
import { DictionaryIndex } from '../core/DictionaryIndex';
import { LayoutAssistantApp } from '../core/LayoutAssistantApp';
import type { KeystrokeSynthesizer, LayoutSwitcher } from '../core/ReplacementExecutor';
import type { ClipboardAdapter, ClipboardBackup, EditShortcuts } from '../core/SelectionConverter';
import { FileWordListSource } from '../services/dictionary/FileWordListSource';
import type { KeyboardLayout, KeyModifiers, KeyStroke } from '../types';

const NO_MODIFIERS: KeyModifiers = { command: false, control: false, option: false, shift: false };

class MemoryClipboard implements ClipboardAdapter {
  public text = '';

  public async readText(): Promise<string> {
    return this.text;
  }

  public async writeText(text: string): Promise<void> {
    this.text = text;
  }

  public async backup(): Promise<ClipboardBackup> {
    return { text: this.text, payload: this.text ? 'text' : 'empty', capturedAt: Date.now() };
  }

  public async restore(backup: ClipboardBackup): Promise<void> {
    this.text = backup.text;
  }
}

class TerminalLayoutSwitcher implements LayoutSwitcher {
  public constructor(public current: KeyboardLayout) {}

  public async switchTo(layout: KeyboardLayout): Promise<boolean> {
    this.current = layout;
    process.stdout.write(`[layout] ${layout}\n`);
    return true;
  }
}

/** Stand-in for a focused text field: a line buffer with an optional selected tail. */
class TerminalEditor implements KeystrokeSynthesizer, EditShortcuts {
  public text = '';
  public selection = '';

  public constructor(private readonly clipboard: MemoryClipboard) {}

  public async deleteBackward(count: number): Promise<void> {
    this.text = Array.from(this.text).slice(0, -count).join('');
  }

  public async typeText(text: string): Promise<void> {
    this.text += text;
  }

  public async copy(): Promise<void> {
    if (this.selection) {
      this.clipboard.text = this.selection;
    }
  }

  public async paste(): Promise<void> {
    this.text = `${this.text.slice(0, this.text.length - this.selection.length)}${this.clipboard.text}`;
    this.selection = '';
  }
}

const printHelp = (): void => {
  process.stdout.write('\n');
  process.stdout.write('Commands:\n');
  process.stdout.write('  <text>              Type text into the simulated field\n');
  process.stdout.write('  /type <text>        Same as plain text; use it for text starting with /\n');
  process.stdout.write('  /select <text>      Append text as a selection and convert it\n');
  process.stdout.write('  /convert <text>     Convert text to the opposite layout\n');
  process.stdout.write('  /layout <text>      Detect the predominant layout\n');
  process.stdout.write('  /analyze <token>    Show dictionary analysis and decision\n');
  process.stdout.write('  /auto on|off        Toggle auto-replacement\n');
  process.stdout.write('  /clear              Clear the simulated field\n');
  process.stdout.write('  /status             Print current state\n');
  process.stdout.write('  /quit               Exit\n');
  process.stdout.write('\n');
};

const main = async (): Promise<void> => {
  const config = resolveConfig();
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n- ${errors.join('\n- ')}`);
  }

  const clipboard = new MemoryClipboard();
  const editor = new TerminalEditor(clipboard);
  const layoutSwitcher = new TerminalLayoutSwitcher('latin');
  const dictionary = new DictionaryIndex();

  const app = new LayoutAssistantApp(
    {
      dictionary,
      synthesizer: editor,
      shortcuts: editor,
      clipboard,
      layoutSwitcher,
      sleep: async () => undefined
    },
    undefined,
    {
      autoReplace: config.autoReplace,
      selectionHotkey: config.selectionHotkey,
      maxTokenLength: config.maxTokenLength,
      focusGraceMs: config.focusGraceMs
    }
  );

  let shuttingDown = false;
  let commandChain = Promise.resolve();

  const queue = (fn: () => Promise<void>): void => {
    commandChain = commandChain
      .then(fn)
      .catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        process.stderr.write(`\n[error] ${detail}\n`);
      });
  };

  app.on('replacementCompleted', (report) => {
    const status = report.success ? 'replaced' : `failed (${report.reason ?? 'unknown'})`;
    process.stdout.write(`[${status}] ${report.sourceToken} -> ${report.replacementText}\n`);
  });

  app.on('selectionConverted', (result) => {
    if (result.status === 'converted') {
      process.stdout.write(`[selection] ${result.original} -> ${result.converted}\n`);
      return;
    }

    process.stdout.write(`[selection:${result.status}] ${result.reason}\n`);
  });

  process.stdout.write('Loading dictionaries...\n');
  const report = await dictionary.load([
    new FileWordListSource('latin', config.latinDictionaryPath),
    new FileWordListSource('cyrillic', config.cyrillicDictionaryPath)
  ]);
  process.stdout.write(`Ready. latin=${report.words.latin} cyrillic=${report.words.cyrillic}\n`);
  for (const failure of report.failures) {
    process.stdout.write(`[warn] ${failure.language} word list unavailable: ${failure.detail}\n`);
  }
  printHelp();

  const sendKey = async (stroke: Omit<KeyStroke, 'state'>): Promise<void> => {
    app.handleKeyStroke({ ...stroke, state: 'DOWN' });
    app.handleKeyStroke({ ...stroke, state: 'UP' });
    await app.whenIdle();
  };

  const typeLine = async (line: string): Promise<void> => {
    const startLayout = app.converter.detectPredominantLayout(line);
    layoutSwitcher.current = startLayout;
    app.setActiveLayout(startLayout);

    for (const character of line) {
      if (character === ' ') {
        editor.text += ' ';
        await sendKey({ key: 'SPACE', modifiers: NO_MODIFIERS });
        continue;
      }

      const press = app.converter.keyPressFor(character, layoutSwitcher.current);
      if (!press) {
        editor.text += character;
        continue;
      }

      // The field receives what the key produces under the layout active right now.
      editor.text +=
        app.converter.extractCharacterFromKeycode(press.key, layoutSwitcher.current, press.shift) ?? '';
      await sendKey({ key: press.key, modifiers: { ...NO_MODIFIERS, shift: press.shift } });
    }

    process.stdout.write(`[field] ${editor.text}\n`);
  };

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: true
  });

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    await app.shutdown();
    rl.close();
    process.stdout.write('\nBye.\n');
    process.exit(0);
  };

  process.on('SIGINT', () => {
    queue(shutdown);
  });

  rl.on('line', (line) => {
    const input = line.trim();

    if (input === '/quit') {
      queue(shutdown);
      return;
    }

    if (input === '/help') {
      printHelp();
      return;
    }

    if (input === '/status') {
      const state = app.getState();
      const latency = app.getLatencySummary();
      process.stdout.write(
        `[status] stage=${state.stage} layout=${app.tracker.getActiveLayout()} token=${app.tracker.getCurrentToken() || '-'} auto=${app.isAutoReplaceEnabled()} replacements=${latency.replacements}\n`
      );
      return;
    }

    if (input === '/clear') {
      editor.text = '';
      app.tracker.forceReset();
      process.stdout.write('[field] \n');
      return;
    }

    if (input.startsWith('/auto ')) {
      const value = input.slice('/auto '.length).trim();
      if (value !== 'on' && value !== 'off') {
        process.stdout.write('Use: /auto on | /auto off\n');
        return;
      }
      app.setAutoReplace(value === 'on');
      return;
    }

    if (input.startsWith('/convert ')) {
      const conversion = app.converter.convertToOpposite(input.slice('/convert '.length));
      process.stdout.write(`[${conversion.from} -> ${conversion.to}] ${conversion.text}\n`);
      return;
    }

    if (input.startsWith('/layout ')) {
      process.stdout.write(`[layout] ${app.converter.detectPredominantLayout(input.slice('/layout '.length))}\n`);
      return;
    }

    if (input.startsWith('/analyze ')) {
      const token = input.slice('/analyze '.length).trim();
      const decision = token.length < 3 ? app.replacer.decideShortToken(token) : app.replacer.decide(token);
      const converted = app.converter.convertToOppositeLayout(token);
      process.stdout.write(
        `[analyze] prefix=${dictionary.analyzePrefix(token)} word=${dictionary.analyzeCompleteWord(token)} converted=${converted} decision=${decision.kind}\n`
      );
      app.replacer.reset();
      return;
    }

    if (input.startsWith('/select ')) {
      const selected = input.slice('/select '.length);
      queue(async () => {
        editor.text += selected;
        editor.selection = selected;
        await app.convertSelection();
        process.stdout.write(`[field] ${editor.text}\n`);
      });
      return;
    }

    if (input.startsWith('/type ')) {
      const typed = line.slice(line.indexOf('/type ') + '/type '.length);
      queue(async () => {
        await typeLine(typed);
      });
      return;
    }

    if (input.startsWith('/')) {
      process.stdout.write('Unknown command. Use /help.\n');
      return;
    }

    queue(async () => {
      await typeLine(line);
    });
  });
};

main().catch((error) => {
  const detail = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${detail}\n`);
  process.exit(1);
});
