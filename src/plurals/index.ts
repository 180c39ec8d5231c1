import { z } from 'zod';

import pluralData from './cldr-plurals.json';

export const PLURAL_KEYWORDS = ['zero', 'one', 'two', 'few', 'many', 'other'] as const;

export type PluralKeyword = (typeof PLURAL_KEYWORDS)[number];

export function isPluralKeyword(value: string): value is PluralKeyword {
  return PLURAL_KEYWORDS.some((keyword) => keyword === value);
}

/** Sorts keywords into CLDR order, which is also the order of the gettext plural slots. */
export function sortPluralKeywords(keywords: Iterable<PluralKeyword>): PluralKeyword[] {
  return [...keywords].sort((a, b) => PLURAL_KEYWORDS.indexOf(a) - PLURAL_KEYWORDS.indexOf(b));
}

export interface PluralRule {
  language: string;
  /** Keywords the language distinguishes, in gettext slot order. */
  keywords: PluralKeyword[];
  nplurals: number;
  /** C expression selecting the slot for an integer `n`. */
  expression: string;
  /** Value of the `Plural-Forms` header. */
  pluralForms: string;
}

const pluralTableSchema = z.object({
  aliases: z.record(z.string()),
  languages: z.record(
    z
      .object({
        keywords: z.array(z.enum(PLURAL_KEYWORDS)).nonempty(),
        expression: z.string().min(1),
      })
      .refine((entry) => sortPluralKeywords(entry.keywords).join() === entry.keywords.join(), {
        message: 'Plural keywords must be listed in CLDR order',
      })
  ),
});

const pluralTable = pluralTableSchema.parse(pluralData);

const DEFAULT_KEYWORDS: PluralKeyword[] = ['one', 'other'];
const DEFAULT_EXPRESSION = '(n != 1)';

function makeRule(language: string, keywords: PluralKeyword[], expression: string): PluralRule {
  return {
    language,
    keywords,
    nplurals: keywords.length,
    expression,
    pluralForms: `nplurals=${keywords.length}; plural=${expression};`,
  };
}

/**
 * Normalizes a language code to the `xx` / `xx_YY` form. Accepts `pt-BR`, `pt_br` and Android's `pt-rBR`.
 */
export function normalizeLanguageCode(code: string): string {
  const [language, region] = code.replace(/-r(?=[A-Za-z]{2}$)/, '_').split(/[-_]/);
  return region ? `${language.toLowerCase()}_${region.toUpperCase()}` : language.toLowerCase();
}

function lookupEntry(code: string) {
  const normalized = normalizeLanguageCode(code);
  const base = normalized.split('_')[0];
  const candidates = [normalized, pluralTable.aliases[normalized], base, pluralTable.aliases[base]];

  for (const candidate of candidates) {
    if (candidate && pluralTable.languages[candidate]) {
      return pluralTable.languages[candidate];
    }
  }
  return undefined;
}

export function hasPluralRule(code: string): boolean {
  return lookupEntry(code) !== undefined;
}

/**
 * Returns the plural rule of a language. Languages missing from the table get the two-form one/other rule.
 */
export function getPluralRule(code: string): PluralRule {
  const entry = lookupEntry(code);
  const language = normalizeLanguageCode(code);
  if (!entry) {
    return makeRule(language, DEFAULT_KEYWORDS, DEFAULT_EXPRESSION);
  }
  return makeRule(language, entry.keywords, entry.expression);
}

export interface PluralFormsHeader {
  nplurals: number;
  expression: string;
}

export function parsePluralForms(header: string | undefined): PluralFormsHeader | undefined {
  const match = header?.match(/nplurals\s*=\s*(\d+)\s*;\s*plural\s*=\s*(.+?)\s*;?\s*$/);
  if (!match) {
    return undefined;
  }
  return { nplurals: Number(match[1]), expression: match[2] };
}

export { reconcilePlurals, distributePlurals } from './reconcile.js';
export type { ReconciledPlural, DistributedPlural } from './reconcile.js';
