import { describe, it, expect } from 'vitest';
import { parseHotkey, SelectionHotkey } from '../src/services/hotkey/SelectionHotkey';
import { keyDown, keyUp } from './helpers';

describe('parseHotkey', () => {
  it('parses a lone modifier', () => {
    expect(parseHotkey('Option')).toEqual({
      source: 'Option',
      triggerKey: undefined,
      requiredModifierGroups: [['option']]
    });
  });

  it('parses a modifier combo', () => {
    expect(parseHotkey('CmdOrCtrl+Shift+l')).toEqual({
      source: 'CmdOrCtrl+Shift+l',
      triggerKey: 'L',
      requiredModifierGroups: [['command', 'control'], ['shift']]
    });
  });

  it('rejects malformed bindings', () => {
    expect(() => parseHotkey('')).toThrow('Selection hotkey is empty');
    expect(() => parseHotkey('L')).toThrow(/at least one modifier/);
    expect(() => parseHotkey('Option+A+B')).toThrow(/at most one non-modifier/);
    expect(() => parseHotkey('CmdOrCtrl')).toThrow(/exactly one modifier/);
    expect(() => parseHotkey('Option+Hyper')).toThrow(/Unsupported hotkey token 'Hyper'/);
  });
});

describe('SelectionHotkey', () => {
  describe('modifier tap', () => {
    it('fires when the modifier is released without other keys', () => {
      const hotkey = new SelectionHotkey('Option');

      expect(hotkey.handle(keyDown('LEFT ALT', { option: true }))).toEqual({ fire: false, swallow: false });
      expect(hotkey.handle(keyUp('LEFT ALT'))).toEqual({ fire: true, swallow: false });
      expect(hotkey.handle(keyUp('LEFT ALT'))).toEqual({ fire: false, swallow: false });
    });

    it('is cancelled by any key pressed while the modifier is held', () => {
      const hotkey = new SelectionHotkey('Option');

      hotkey.handle(keyDown('RIGHT ALT', { option: true }));
      hotkey.handle(keyDown('A', { option: true }));
      hotkey.handle(keyUp('A', { option: true }));

      expect(hotkey.handle(keyUp('RIGHT ALT'))).toEqual({ fire: false, swallow: false });
    });

    it('does not arm while another modifier is held', () => {
      const hotkey = new SelectionHotkey('Option');

      hotkey.handle(keyDown('LEFT ALT', { option: true, command: true }));

      expect(hotkey.handle(keyUp('LEFT ALT', { command: true }))).toEqual({ fire: false, swallow: false });
    });
  });

  describe('combo', () => {
    it('fires once on the trigger and swallows it', () => {
      const hotkey = new SelectionHotkey('Cmd+Shift+K');

      expect(hotkey.handle(keyDown('K', { command: true, shift: true }))).toEqual({ fire: true, swallow: true });
      expect(hotkey.handle(keyDown('K', { command: true, shift: true }))).toEqual({ fire: false, swallow: true });
      expect(hotkey.handle(keyUp('K', { command: true, shift: true }))).toEqual({ fire: false, swallow: true });
    });

    it('ignores the trigger without its modifiers', () => {
      const hotkey = new SelectionHotkey('Cmd+Shift+K');

      expect(hotkey.handle(keyDown('K', { command: true }))).toEqual({ fire: false, swallow: false });
      expect(hotkey.handle(keyUp('K', { command: true }))).toEqual({ fire: false, swallow: false });
    });
  });
});
