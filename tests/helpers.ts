import { DictionaryIndex, type WordListSource } from '../src/core/DictionaryIndex';
import type { KeystrokeSynthesizer, LayoutSwitcher } from '../src/core/ReplacementExecutor';
import type { ClipboardAdapter, ClipboardBackup, EditShortcuts } from '../src/core/SelectionConverter';
import type { ContextOracle } from '../src/core/TokenTracker';
import type { ContextSnapshot, KeyboardLayout, KeyModifiers, KeyStroke } from '../src/types';

export const NO_MODIFIERS: KeyModifiers = { command: false, control: false, option: false, shift: false };

export const keyDown = (key: string, modifiers: Partial<KeyModifiers> = {}): KeyStroke => ({
  key,
  state: 'DOWN',
  modifiers: { ...NO_MODIFIERS, ...modifiers }
});

export const keyUp = (key: string, modifiers: Partial<KeyModifiers> = {}): KeyStroke => ({
  key,
  state: 'UP',
  modifiers: { ...NO_MODIFIERS, ...modifiers }
});

export class StaticWordList implements WordListSource {
  public constructor(
    public readonly language: KeyboardLayout,
    private readonly words: string[]
  ) {}

  public describe(): string {
    return `static:${this.language}`;
  }

  public async read(): Promise<string> {
    return this.words.join('\n');
  }
}

export class FailingWordList implements WordListSource {
  public constructor(public readonly language: KeyboardLayout) {}

  public describe(): string {
    return `missing:${this.language}`;
  }

  public async read(): Promise<string> {
    throw new Error('ENOENT: word list missing');
  }
}

export const loadedDictionary = async (latin: string[], cyrillic: string[]): Promise<DictionaryIndex> => {
  const dictionary = new DictionaryIndex();
  await dictionary.load([new StaticWordList('latin', latin), new StaticWordList('cyrillic', cyrillic)]);
  return dictionary;
};

export class MutableContext implements ContextOracle {
  public current: ContextSnapshot = { bundleId: 'com.example.notes', category: 'desktop', blocked: false, secureField: false };

  public snapshot(): ContextSnapshot {
    return this.current;
  }
}

/** Records synthesized input against an in-memory text field. */
export class FakeField implements KeystrokeSynthesizer, EditShortcuts {
  public text = '';
  public selection = '';
  public calls: string[] = [];
  public failOn: 'delete' | 'type' | 'copy' | 'paste' | undefined;

  public constructor(private readonly clipboard?: FakeClipboard) {}

  public async deleteBackward(count: number): Promise<void> {
    this.calls.push(`delete:${count}`);
    if (this.failOn === 'delete') {
      throw new Error('delete refused');
    }
    this.text = this.text.slice(0, this.text.length - count);
  }

  public async typeText(text: string): Promise<void> {
    this.calls.push(`type:${text}`);
    if (this.failOn === 'type') {
      throw new Error('typing refused');
    }
    this.text += text;
  }

  public async copy(): Promise<void> {
    this.calls.push('copy');
    if (this.failOn === 'copy') {
      throw new Error('copy refused');
    }
    if (this.clipboard && this.selection) {
      this.clipboard.text = this.selection;
    }
  }

  public async paste(): Promise<void> {
    this.calls.push('paste');
    if (this.failOn === 'paste') {
      throw new Error('paste refused');
    }
    if (this.clipboard) {
      this.text = `${this.text.slice(0, this.text.length - this.selection.length)}${this.clipboard.text}`;
      this.selection = '';
    }
  }
}

export class FakeClipboard implements ClipboardAdapter {
  public text = '';
  public restored: ClipboardBackup[] = [];
  public events: string[] = [];

  public async readText(): Promise<string> {
    this.events.push('read');
    return this.text;
  }

  public async writeText(text: string): Promise<void> {
    this.events.push(`write:${text}`);
    this.text = text;
  }

  public async backup(): Promise<ClipboardBackup> {
    this.events.push('backup');
    return { text: this.text, payload: this.text ? 'text' : 'empty', capturedAt: 0 };
  }

  public async restore(backup: ClipboardBackup): Promise<void> {
    this.events.push(`restore:${backup.text}`);
    this.restored.push(backup);
    this.text = backup.text;
  }
}

export class FakeLayoutSwitcher implements LayoutSwitcher {
  public switches: KeyboardLayout[] = [];
  public result = true;
  /** Context whose reported input source follows accepted switches. */
  public mirrorTo: MutableContext | undefined;

  public async switchTo(layout: KeyboardLayout): Promise<boolean> {
    this.switches.push(layout);
    if (this.result && this.mirrorTo) {
      this.mirrorTo.current = { ...this.mirrorTo.current, layout };
    }
    return this.result;
  }
}

export class CountingCapture {
  public suspended = 0;
  public resumed = 0;

  public suspend(): void {
    this.suspended += 1;
  }

  public resume(): void {
    this.resumed += 1;
  }
}
