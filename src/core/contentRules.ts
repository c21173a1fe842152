import type { AppCategory } from '../types';

export interface ContentRule {
  label: string;
  maxLength: number;
  allowMultiline: boolean;
}

export interface ContentVerdict {
  allowed: boolean;
  reason?: string;
}

export interface AppClassification {
  category: AppCategory;
  blocked: boolean;
}

const BROWSER_BUNDLE_IDS: ReadonlySet<string> = new Set([
  'com.google.Chrome',
  'com.apple.Safari',
  'org.mozilla.firefox',
  'com.microsoft.edgemac',
  'com.operasoftware.Opera',
  'com.brave.Browser',
  'com.github.atom',
  'com.microsoft.VSCode',
  'com.discord.Discord',
  'com.tinyspeck.slackmacgap',
  'com.spotify.client'
]);

const CANVAS_BUNDLE_IDS: ReadonlySet<string> = new Set([
  'com.figma.Desktop',
  'com.adobe.illustrator',
  'com.adobe.Photoshop',
  'com.bohemiancoding.sketch3',
  'com.adobe.AfterEffects',
  'com.adobe.InDesign'
]);

// Apps where synthesized backspaces have destroyed artwork rather than text.
const BLOCKED_BUNDLE_IDS: ReadonlySet<string> = new Set(['com.adobe.illustrator']);

export const CONTENT_RULES: Record<AppCategory, ContentRule> = {
  canvas: { label: 'canvas app', maxLength: 50, allowMultiline: false },
  browser: { label: 'browser app', maxLength: 100, allowMultiline: true },
  desktop: { label: 'desktop app', maxLength: Number.POSITIVE_INFINITY, allowMultiline: true }
};

export const classifyApplication = (bundleId: string | undefined): AppClassification => {
  if (!bundleId) {
    return { category: 'desktop', blocked: false };
  }

  const blocked = BLOCKED_BUNDLE_IDS.has(bundleId);
  if (CANVAS_BUNDLE_IDS.has(bundleId)) {
    return { category: 'canvas', blocked };
  }

  if (BROWSER_BUNDLE_IDS.has(bundleId)) {
    return { category: 'browser', blocked };
  }

  return { category: 'desktop', blocked };
};

/** Selection-size guard for the one-shot conversion, by frontmost app category. */
export const validateSelectionContent = (text: string, category: AppCategory): ContentVerdict => {
  const rule = CONTENT_RULES[category];
  const length = text.trim().length;

  if (length > rule.maxLength) {
    return {
      allowed: false,
      reason: `Selection of ${length} characters exceeds the ${rule.maxLength} allowed in a ${rule.label}`
    };
  }

  if (!rule.allowMultiline && /[\r\n]/.test(text)) {
    return { allowed: false, reason: `Multi-line selections are not converted in a ${rule.label}` };
  }

  return { allowed: true };
};
