import type { StructuredLogger } from '../logging/StructuredLogger';
import type { KeyboardLayout, PrefixAnalysis } from '../types';
import { isLetter } from './LayoutConverter';
import { createTrie, hasPrefix, insertWord, isCompleteWord, type Trie } from './trie';

export const MIN_PREFIX_QUERY_LENGTH = 2;
export const MIN_LIVE_ANALYSIS_LENGTH = 3;

export interface WordListSource {
  language: KeyboardLayout;
  describe(): string;
  read(): Promise<string>;
}

export interface DictionaryLoadReport {
  words: Record<KeyboardLayout, number>;
  failures: Array<{ language: KeyboardLayout; source: string; detail: string }>;
  elapsedMs: number;
}

/** Trimmed, lower-cased lines; anything with a non-letter character is dropped. */
export const parseWordList = (content: string): string[] =>
  content
    .split(/\r?\n/)
    .map((line) => line.trim().toLowerCase())
    .filter((word) => word.length > 0 && Array.from(word).every(isLetter));

export const classifyPresence = (inLatin: boolean, inCyrillic: boolean): PrefixAnalysis => {
  if (inLatin && inCyrillic) {
    return 'ambiguous';
  }

  if (inLatin) {
    return 'only-latin';
  }

  if (inCyrillic) {
    return 'only-cyrillic';
  }

  return 'none';
};

export class DictionaryIndex {
  private tries: Record<KeyboardLayout, Trie> = {
    latin: createTrie(),
    cyrillic: createTrie()
  };
  private loaded = false;

  public constructor(private readonly logger?: StructuredLogger) {}

  public isLoaded(): boolean {
    return this.loaded;
  }

  public wordCount(language: KeyboardLayout): number {
    return this.tries[language].size;
  }

  /**
   * Builds both tries concurrently. A source that fails to read leaves its
   * trie empty; the index is marked loaded once every source has settled.
   */
  public async load(sources: WordListSource[]): Promise<DictionaryLoadReport> {
    const startedAt = Date.now();
    const next: Record<KeyboardLayout, Trie> = {
      latin: createTrie(),
      cyrillic: createTrie()
    };
    const failures: DictionaryLoadReport['failures'] = [];

    const results = await Promise.allSettled(
      sources.map(async (source) => {
        const words = parseWordList(await source.read());
        const trie = createTrie();
        for (const word of words) {
          insertWord(trie, word);
        }

        return { source, trie };
      })
    );

    results.forEach((result, index) => {
      const source = sources[index];
      if (result.status === 'fulfilled') {
        next[source.language] = result.value.trie;
        this.logger?.info('Word list loaded', {
          language: source.language,
          source: source.describe(),
          words: result.value.trie.size
        });
        return;
      }

      const detail = result.reason instanceof Error ? result.reason.message : String(result.reason);
      failures.push({ language: source.language, source: source.describe(), detail });
      this.logger?.warn('Word list unavailable; lookups for this language will report not found', {
        language: source.language,
        source: source.describe(),
        detail
      });
    });

    this.tries = next;
    this.loaded = true;

    const report: DictionaryLoadReport = {
      words: { latin: next.latin.size, cyrillic: next.cyrillic.size },
      failures,
      elapsedMs: Date.now() - startedAt
    };
    this.logger?.info('Dictionaries ready', { ...report.words, elapsedMs: report.elapsedMs });

    return report;
  }

  public hasPrefix(prefix: string, language: KeyboardLayout): boolean {
    if (!this.loaded || prefix.length < MIN_PREFIX_QUERY_LENGTH) {
      return false;
    }

    return hasPrefix(this.tries[language], prefix);
  }

  public isCompleteWord(word: string, language: KeyboardLayout): boolean {
    if (!this.loaded || word.length === 0) {
      return false;
    }

    return isCompleteWord(this.tries[language], word);
  }

  public analyzePrefix(prefix: string): PrefixAnalysis {
    if (!this.loaded) {
      this.logger?.debug('Dictionaries not ready; prefix analysis skipped', { prefix });
      return 'too-short';
    }

    if (prefix.length < MIN_LIVE_ANALYSIS_LENGTH) {
      return 'too-short';
    }

    return classifyPresence(this.hasPrefix(prefix, 'latin'), this.hasPrefix(prefix, 'cyrillic'));
  }

  public analyzeCompleteWord(word: string): PrefixAnalysis {
    if (!this.loaded) {
      this.logger?.debug('Dictionaries not ready; word analysis skipped', { word });
      return 'too-short';
    }

    if (word.length === 0) {
      return 'too-short';
    }

    return classifyPresence(
      this.isCompleteWord(word, 'latin'),
      this.isCompleteWord(word, 'cyrillic')
    );
  }
}
