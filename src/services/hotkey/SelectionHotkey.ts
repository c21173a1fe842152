import type { KeyModifiers, KeyStroke, PhysicalKey } from '../../types';

type ModifierName = keyof KeyModifiers;

interface ParsedHotkey {
  source: string;
  requiredModifierGroups: ModifierName[][];
  /** Absent for a lone-modifier tap such as "Option". */
  triggerKey?: PhysicalKey;
}

export interface HotkeyVerdict {
  fire: boolean;
  swallow: boolean;
}

const MODIFIER_ALIASES: Record<string, ModifierName[]> = {
  command: ['command'],
  cmd: ['command'],
  meta: ['command'],
  control: ['control'],
  ctrl: ['control'],
  shift: ['shift'],
  alt: ['option'],
  option: ['option'],
  commandorcontrol: ['command', 'control'],
  cmdorctrl: ['command', 'control']
};

const MODIFIER_KEYS: Record<ModifierName, PhysicalKey[]> = {
  command: ['LEFT META', 'RIGHT META'],
  control: ['LEFT CTRL', 'RIGHT CTRL'],
  option: ['LEFT ALT', 'RIGHT ALT'],
  shift: ['LEFT SHIFT', 'RIGHT SHIFT']
};

const SPECIAL_KEY_ALIASES: Record<string, PhysicalKey> = {
  space: 'SPACE',
  enter: 'RETURN',
  return: 'RETURN',
  tab: 'TAB',
  escape: 'ESCAPE',
  esc: 'ESCAPE'
};

const MODIFIER_NAMES: ModifierName[] = ['command', 'control', 'option', 'shift'];

const normalizeMainKeyToken = (token: string): PhysicalKey | undefined => {
  const trimmed = token.trim();
  if (/^[a-z]$/i.test(trimmed)) {
    return trimmed.toUpperCase();
  }

  if (/^[0-9]$/.test(trimmed)) {
    return trimmed;
  }

  if (/^f([1-9]|1[0-9]|2[0-4])$/i.test(trimmed)) {
    return trimmed.toUpperCase();
  }

  return undefined;
};

export const parseHotkey = (accelerator: string): ParsedHotkey => {
  const tokens = accelerator
    .split('+')
    .map((token) => token.trim())
    .filter(Boolean);

  if (tokens.length === 0) {
    throw new Error('Selection hotkey is empty');
  }

  const modifierGroups: ModifierName[][] = [];
  let trigger: PhysicalKey | undefined;

  for (const token of tokens) {
    const normalized = token.toLowerCase();
    const modifierGroup = MODIFIER_ALIASES[normalized];
    if (modifierGroup) {
      modifierGroups.push(modifierGroup);
      continue;
    }

    const candidate = SPECIAL_KEY_ALIASES[normalized] ?? normalizeMainKeyToken(token);
    if (!candidate) {
      throw new Error(`Unsupported hotkey token '${token}' in ${accelerator}`);
    }

    if (trigger) {
      throw new Error(`Hotkey must define at most one non-modifier key: ${accelerator}`);
    }

    trigger = candidate;
  }

  if (modifierGroups.length === 0) {
    throw new Error(`Hotkey must include at least one modifier key: ${accelerator}`);
  }

  if (!trigger && (modifierGroups.length > 1 || modifierGroups[0].length > 1)) {
    throw new Error(`A modifier-only hotkey must name exactly one modifier: ${accelerator}`);
  }

  return {
    source: accelerator,
    triggerKey: trigger,
    requiredModifierGroups: modifierGroups
  };
};

/**
 * Recognizes the selection-conversion hotkey in the keystroke stream.
 *
 * A lone-modifier binding commits in two phases: pressing the modifier alone
 * makes it a candidate, any other key cancels it, and the release fires it.
 * A combo binding fires on the trigger key-down and swallows that key.
 */
export class SelectionHotkey {
  private readonly parsedHotkey: ParsedHotkey;
  private tapCandidate = false;
  private comboActive = false;

  public constructor(accelerator: string) {
    this.parsedHotkey = parseHotkey(accelerator);
  }

  public describeBinding(): string {
    return this.parsedHotkey.source;
  }

  public handle(stroke: KeyStroke): HotkeyVerdict {
    return this.parsedHotkey.triggerKey === undefined
      ? this.handleTap(stroke, this.parsedHotkey.requiredModifierGroups[0][0])
      : this.handleCombo(stroke, this.parsedHotkey.triggerKey);
  }

  public reset(): void {
    this.tapCandidate = false;
    this.comboActive = false;
  }

  private handleTap(stroke: KeyStroke, modifier: ModifierName): HotkeyVerdict {
    const isModifierKey = MODIFIER_KEYS[modifier].includes(stroke.key);

    if (stroke.state === 'DOWN') {
      const othersHeld = MODIFIER_NAMES.some((name) => name !== modifier && stroke.modifiers[name]);
      this.tapCandidate = isModifierKey && !othersHeld;
      return { fire: false, swallow: false };
    }

    if (isModifierKey && this.tapCandidate) {
      this.tapCandidate = false;
      return { fire: true, swallow: false };
    }

    return { fire: false, swallow: false };
  }

  private handleCombo(stroke: KeyStroke, triggerKey: PhysicalKey): HotkeyVerdict {
    if (stroke.key !== triggerKey) {
      return { fire: false, swallow: false };
    }

    if (stroke.state === 'UP') {
      const swallow = this.comboActive;
      this.comboActive = false;
      return { fire: false, swallow };
    }

    const modifiersHeld = this.parsedHotkey.requiredModifierGroups.every((group) =>
      group.some((name) => stroke.modifiers[name])
    );
    if (!modifiersHeld) {
      return { fire: false, swallow: false };
    }

    // Auto-repeat while held fires once.
    const fire = !this.comboActive;
    this.comboActive = true;
    return { fire, swallow: true };
  }
}
