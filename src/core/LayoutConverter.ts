/**
 * Positional conversion between US QWERTY and Russian JCUKEN.
 *
 * Characters are matched by physical key position, so "ghbdtn" typed with the
 * wrong layout active becomes "привет". Every operation is total: characters
 * outside the tables pass through unchanged.
 */
import layoutTables from './layouts/qwerty-jcuken.json';
import type { KeyboardLayout, PhysicalKey } from '../types';

export type CasingStyle = 'lower' | 'upper' | 'title' | 'mixed';

interface LayoutTables {
  latinToCyrillic: Record<string, string>;
  shiftedSymbols: Record<string, string>;
  physicalKeys: Record<string, string[]>;
}

export interface LayoutConverterOptions {
  latinToCyrillic?: Record<string, string>;
  /** Reverse entries forced on top of the computed inverse. */
  reverseOverrides?: Record<string, string>;
}

export interface KeyPress {
  key: PhysicalKey;
  shift: boolean;
  layout: KeyboardLayout;
}

export interface OppositeConversion {
  text: string;
  from: KeyboardLayout;
  to: KeyboardLayout;
}

const tables: LayoutTables = layoutTables;

const LETTER_PATTERN = /\p{L}/u;

const SHIFTED_SYMBOLS = new Map<string, string>(Object.entries(tables.shiftedSymbols));

const PHYSICAL_KEYS = new Map<PhysicalKey, [string, string]>(
  Object.entries(tables.physicalKeys)
    .filter(([, chars]) => chars.length === 2)
    .map(([key, chars]): [PhysicalKey, [string, string]] => [key, [chars[0], chars[1]]])
);

export const isLetter = (character: string): boolean => LETTER_PATTERN.test(character);

export const containsLetters = (text: string): boolean => LETTER_PATTERN.test(text);

export const oppositeLayout = (layout: KeyboardLayout): KeyboardLayout =>
  layout === 'latin' ? 'cyrillic' : 'latin';

export const detectCasingStyle = (token: string): CasingStyle => {
  if (!token) {
    return 'lower';
  }

  if (token === token.toUpperCase()) {
    return 'upper';
  }

  if (token === token.toLowerCase()) {
    return 'lower';
  }

  const [first = '', ...rest] = Array.from(token);
  const tail = rest.join('');
  if (first === first.toUpperCase() && tail === tail.toLowerCase()) {
    return 'title';
  }

  return 'mixed';
};

export const applyCasingStyle = (style: CasingStyle, lowerMapped: string): string => {
  switch (style) {
    case 'upper':
      return lowerMapped.toUpperCase();
    case 'title': {
      const [first, ...rest] = Array.from(lowerMapped);
      return first === undefined ? lowerMapped : `${first.toUpperCase()}${rest.join('')}`;
    }
    // Mixed casing has no positional equivalent; lower case keeps the letters intact.
    case 'mixed':
    case 'lower':
      return lowerMapped;
  }
};

const buildInverse = (
  forward: Map<string, string>,
  overrides: Record<string, string>
): Map<string, string> => {
  const inverse = new Map<string, string>();

  for (const [source, target] of forward) {
    const existing = inverse.get(target);
    if (existing !== undefined) {
      throw new Error(
        `Layout table maps both '${existing}' and '${source}' to '${target}'; the reverse table would be ambiguous.`
      );
    }

    inverse.set(target, source);
  }

  for (const [target, source] of Object.entries(overrides)) {
    inverse.set(target, source);
  }

  return inverse;
};

const assertRoundTrip = (forward: Map<string, string>, inverse: Map<string, string>): void => {
  for (const [target, source] of inverse) {
    if (forward.get(source) !== target) {
      throw new Error(
        `Layout table is asymmetric: '${target}' reverses to '${source}', which maps forward to '${forward.get(source) ?? source}'.`
      );
    }
  }
};

export class LayoutConverter {
  private readonly latinToCyrillic: Map<string, string>;
  private readonly cyrillicToLatin: Map<string, string>;

  public constructor(options: LayoutConverterOptions = {}) {
    this.latinToCyrillic = new Map(Object.entries(options.latinToCyrillic ?? tables.latinToCyrillic));
    this.cyrillicToLatin = buildInverse(this.latinToCyrillic, options.reverseOverrides ?? {});
    assertRoundTrip(this.latinToCyrillic, this.cyrillicToLatin);
  }

  public convertToken(token: string, from: KeyboardLayout, to: KeyboardLayout): string {
    if (from === to) {
      return token;
    }

    const style = detectCasingStyle(token);
    const mappedLower = this.mapText(token.toLowerCase(), from, to);

    // Pure punctuation keeps its mapped form; "]" must not escalate to "Ъ".
    if (!containsLetters(token)) {
      return mappedLower;
    }

    if (style === 'upper') {
      const characters = Array.from(mappedLower);
      const shifted = characters.length === 1 ? SHIFTED_SYMBOLS.get(characters[0]) : undefined;
      if (shifted) {
        return shifted;
      }
    }

    return applyCasingStyle(style, mappedLower);
  }

  public convertTextPreservingNonLetters(
    text: string,
    from: KeyboardLayout,
    to: KeyboardLayout
  ): string {
    if (from === to) {
      return text;
    }

    let result = '';
    let word = '';

    for (const character of text) {
      if (isLetter(character)) {
        word += character;
        continue;
      }

      if (word) {
        result += this.convertToken(word, from, to);
        word = '';
      }

      result += this.mapCharacter(character, from, to);
    }

    if (word) {
      result += this.convertToken(word, from, to);
    }

    return result;
  }

  /** Ties resolve to Cyrillic. */
  public detectPredominantLayout(text: string): KeyboardLayout {
    let latinCount = 0;
    let cyrillicCount = 0;

    for (const character of text) {
      if (isLetter(character)) {
        const lower = character.toLowerCase();
        if (this.latinToCyrillic.has(lower)) {
          latinCount += 1;
        } else if (this.cyrillicToLatin.has(lower)) {
          cyrillicCount += 1;
        }
        continue;
      }

      const onLatinKey = this.latinToCyrillic.has(character);
      const onCyrillicKey = this.cyrillicToLatin.has(character);
      if (onLatinKey && !onCyrillicKey) {
        latinCount += 1;
      } else if (onCyrillicKey && !onLatinKey) {
        cyrillicCount += 1;
      }
    }

    return latinCount > cyrillicCount ? 'latin' : 'cyrillic';
  }

  public convertToOppositeLayout(text: string): string {
    return this.convertToOpposite(text).text;
  }

  public convertToOpposite(text: string): OppositeConversion {
    const from = this.detectPredominantLayout(text);
    const to = oppositeLayout(from);

    return {
      text: this.convertTextPreservingNonLetters(text, from, to),
      from,
      to
    };
  }

  /**
   * Character produced by a physical key under `layout`, independent of the
   * layout the OS currently has active. Non-character keys yield undefined.
   */
  public extractCharacterFromKeycode(
    key: PhysicalKey,
    layout: KeyboardLayout,
    shift = false
  ): string | undefined {
    const characters = PHYSICAL_KEYS.get(key);
    if (!characters) {
      return undefined;
    }

    const latinCharacter = shift ? characters[1] : characters[0];
    if (layout === 'latin') {
      return latinCharacter;
    }

    return this.convertTextPreservingNonLetters(latinCharacter, 'latin', 'cyrillic');
  }

  /** Physical key and shift state producing `character`, trying `preferred` first. */
  public keyPressFor(character: string, preferred: KeyboardLayout = 'latin'): KeyPress | undefined {
    for (const layout of [preferred, oppositeLayout(preferred)]) {
      for (const key of PHYSICAL_KEYS.keys()) {
        for (const shift of [false, true]) {
          if (this.extractCharacterFromKeycode(key, layout, shift) === character) {
            return { key, shift, layout };
          }
        }
      }
    }

    return undefined;
  }

  /** True when the character is a letter in either layout (";" is "ж"). */
  public isWordCharacter(character: string): boolean {
    if (isLetter(character)) {
      return true;
    }

    const counterpart =
      this.latinToCyrillic.get(character) ?? this.cyrillicToLatin.get(character);
    return counterpart !== undefined && isLetter(counterpart);
  }

  public mappedCharacters(layout: KeyboardLayout): string[] {
    return [...(layout === 'latin' ? this.latinToCyrillic : this.cyrillicToLatin).keys()];
  }

  private mapText(text: string, from: KeyboardLayout, to: KeyboardLayout): string {
    let mapped = '';
    for (const character of text) {
      mapped += this.mapCharacter(character, from, to);
    }

    return mapped;
  }

  private mapCharacter(character: string, from: KeyboardLayout, to: KeyboardLayout): string {
    if (from === to) {
      return character;
    }

    const table = from === 'latin' ? this.latinToCyrillic : this.cyrillicToLatin;
    return table.get(character) ?? character;
  }
}
