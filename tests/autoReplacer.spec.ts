import { describe, it, expect } from 'vitest';
import { AutoReplacer, type ReplacementRunner, type ReplacementRunResult } from '../src/core/AutoReplacer';
import { DictionaryIndex } from '../src/core/DictionaryIndex';
import { LayoutConverter } from '../src/core/LayoutConverter';
import type { ReplacementRequest } from '../src/types';
import { loadedDictionary } from './helpers';

const converter = new LayoutConverter();

class RecordingRunner implements ReplacementRunner {
  public requests: ReplacementRequest[] = [];
  public result: ReplacementRunResult = { success: true };
  public onRun: () => void = () => undefined;

  public async executeReplacement(request: ReplacementRequest): Promise<ReplacementRunResult> {
    this.requests.push(request);
    this.onRun();
    return this.result;
  }
}

describe('AutoReplacer decisions', () => {
  it('replaces a token whose conversion starts a word in the other language', async () => {
    const replacer = new AutoReplacer({ dictionary: await loadedDictionary(['hello'], ['привет']), converter });

    expect(replacer.decide('руд')).toEqual({ kind: 'replace', from: 'руд', to: 'hel', targetLayout: 'latin' });
    expect(replacer.getState()).toEqual({ stage: 'idle' });
  });

  it('waits when the token is a prefix in both languages', async () => {
    const replacer = new AutoReplacer({ dictionary: await loadedDictionary(['abcde'], ['abcxy']), converter });

    expect(replacer.decide('abc')).toEqual({ kind: 'wait-for-more' });
    expect(replacer.getState()).toEqual({ stage: 'ambiguous', pendingToken: 'abc' });

    replacer.reset();
    expect(replacer.getState()).toEqual({ stage: 'idle' });
  });

  it('leaves unknown tokens alone', async () => {
    const replacer = new AutoReplacer({ dictionary: await loadedDictionary(['hello'], ['привет']), converter });

    expect(replacer.decide('zzz')).toEqual({ kind: 'no-action' });
    expect(replacer.decide('he')).toEqual({ kind: 'no-action' });
  });

  it('prefers a complete word in the other layout over a prefix in this one', async () => {
    const replacer = new AutoReplacer({ dictionary: await loadedDictionary(['vbhzz'], ['мир']), converter });

    expect(replacer.decide('vbh')).toEqual({ kind: 'replace', from: 'vbh', to: 'мир', targetLayout: 'cyrillic' });
  });

  it('keeps a valid prefix when the other reading is only a prefix too', async () => {
    const replacer = new AutoReplacer({ dictionary: await loadedDictionary(['vbhzz'], ['мира']), converter });

    expect(replacer.decide('vbh')).toEqual({ kind: 'no-action' });
  });

  it('does nothing before the dictionaries load', () => {
    const replacer = new AutoReplacer({ dictionary: new DictionaryIndex(), converter });

    expect(replacer.decide('руддщ')).toEqual({ kind: 'no-action' });
  });

  describe('short tokens', () => {
    it('keeps a short token that is a word in both readings', async () => {
      const replacer = new AutoReplacer({ dictionary: await loadedDictionary(['ye'], ['ну']), converter });

      expect(replacer.decideShortToken('ye')).toEqual({ kind: 'no-action' });
    });

    it('replaces a short token that is only a word after conversion, including the space', async () => {
      const replacer = new AutoReplacer({ dictionary: await loadedDictionary(['hello'], ['ну']), converter });

      expect(replacer.analyzeShortTokenWithSpace('ye')).toEqual({
        sourceToken: 'ye',
        deleteCount: 3,
        replacementText: 'ну ',
        targetLayout: 'cyrillic',
        includesTrailingSpace: true
      });
    });

    it('ignores ambiguous and long tokens', async () => {
      const replacer = new AutoReplacer({ dictionary: await loadedDictionary(['ab', 'abc'], ['ab']), converter });

      expect(replacer.decideShortToken('ab')).toEqual({ kind: 'no-action' });
      expect(replacer.decideShortToken('abc')).toEqual({ kind: 'no-action' });
      expect(replacer.decideShortToken('')).toEqual({ kind: 'no-action' });
    });
  });
});

describe('AutoReplacer execution', () => {
  it('plans and executes a replacement once', async () => {
    const runner = new RecordingRunner();
    const replacer = new AutoReplacer({ dictionary: await loadedDictionary(['hello'], ['привет']), converter, runner });
    const stages: string[] = [];
    runner.onRun = () => stages.push(replacer.getState().stage);

    expect(replacer.analyzeTokenForPlanning('руддщ')).toEqual({
      sourceToken: 'руддщ',
      deleteCount: 5,
      replacementText: 'hello',
      targetLayout: 'latin',
      includesTrailingSpace: false
    });

    const outcome = await replacer.executePlannedReplacement();

    expect(outcome).toEqual({ success: true, sourceToken: 'руддщ', replacementText: 'hello' });
    expect(runner.requests).toEqual([{ deleteCount: 5, replacementText: 'hello', targetLayout: 'latin' }]);
    expect(stages).toEqual(['replacing']);
    expect(replacer.getState()).toEqual({ stage: 'idle' });
    expect(replacer.getPlannedExecution()).toBeUndefined();
    expect(await replacer.executePlannedReplacement()).toBeUndefined();
  });

  it('reports whether the executor managed to switch the layout', async () => {
    const runner = new RecordingRunner();
    runner.result = { success: true, layoutSwitched: false };
    const replacer = new AutoReplacer({ dictionary: await loadedDictionary(['hello'], ['привет']), converter, runner });
    replacer.analyzeTokenForPlanning('руддщ');

    expect(await replacer.executePlannedReplacement()).toEqual({
      success: true,
      sourceToken: 'руддщ',
      replacementText: 'hello',
      layoutSwitched: false
    });
  });

  it('rejects a second execution while one is in flight', async () => {
    let release: (result: ReplacementRunResult) => void = () => undefined;
    const runner: ReplacementRunner = {
      executeReplacement: () =>
        new Promise((resolve) => {
          release = resolve;
        })
    };
    const replacer = new AutoReplacer({ dictionary: await loadedDictionary(['hello'], ['привет']), converter, runner });
    replacer.analyzeTokenForPlanning('руддщ');

    const first = replacer.executePlannedReplacement();
    expect(replacer.getState()).toEqual({ stage: 'replacing' });
    expect(replacer.decide('руддщ')).toEqual({ kind: 'no-action' });

    const second = await replacer.executePlannedReplacement();
    expect(second).toEqual({ success: false, sourceToken: '', replacementText: '', reason: 'in-flight' });

    release({ success: true });
    expect(await first).toEqual({ success: true, sourceToken: 'руддщ', replacementText: 'hello' });
    expect(replacer.getState()).toEqual({ stage: 'idle' });
  });

  it('reports a missing executor', async () => {
    const replacer = new AutoReplacer({ dictionary: await loadedDictionary(['hello'], []), converter });
    replacer.analyzeTokenForPlanning('руддщ');

    expect(await replacer.executePlannedReplacement()).toEqual({
      success: false,
      sourceToken: 'руддщ',
      replacementText: 'hello',
      reason: 'no-executor'
    });
  });

  it('turns a throwing executor into a failed outcome', async () => {
    const runner: ReplacementRunner = {
      executeReplacement: async () => {
        throw new Error('accessibility denied');
      }
    };
    const replacer = new AutoReplacer({ dictionary: await loadedDictionary(['hello'], []), converter, runner });
    replacer.analyzeTokenForPlanning('руддщ');

    expect(await replacer.executePlannedReplacement()).toEqual({
      success: false,
      sourceToken: 'руддщ',
      replacementText: 'hello',
      reason: 'accessibility denied'
    });
    expect(replacer.getState()).toEqual({ stage: 'idle' });
  });

  it('cancel drops the plan', async () => {
    const runner = new RecordingRunner();
    const replacer = new AutoReplacer({ dictionary: await loadedDictionary(['hello'], []), converter, runner });
    replacer.analyzeTokenForPlanning('руддщ');

    replacer.cancel();

    expect(replacer.getPlannedExecution()).toBeUndefined();
    expect(await replacer.executePlannedReplacement()).toBeUndefined();
    expect(runner.requests).toEqual([]);
  });
});
