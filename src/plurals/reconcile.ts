import { IncompletePluralError } from '../errors.js';
import type { PluralKeyword, PluralRule } from './index.js';

export interface ReconciledPlural {
  /** One text per gettext slot of the language. */
  texts: string[];
  /** Keywords present in the resource that the language does not use. */
  ignored: PluralKeyword[];
}

export interface DistributedPlural {
  forms: Map<PluralKeyword, string>;
  /** Number of slots beyond what the language uses; they are dropped. */
  extra: number;
  /** Keywords left without a slot because the catalog has too few. */
  missing: PluralKeyword[];
}

/**
 * Orders the quantity texts of an Android `<plurals>` element into the language's gettext slots.
 *
 * @throws IncompletePluralError when a quantity the language requires is absent
 */
export function reconcilePlurals(
  rule: PluralRule,
  forms: ReadonlyMap<PluralKeyword, string>,
  resourceName: string
): ReconciledPlural {
  const missing = rule.keywords.filter((keyword) => !forms.has(keyword));
  if (missing.length > 0) {
    throw new IncompletePluralError(resourceName, rule.language, missing);
  }

  const texts = rule.keywords.map((keyword) => forms.get(keyword) ?? '');
  const ignored = [...forms.keys()].filter((keyword) => !rule.keywords.includes(keyword));

  return { texts, ignored };
}

/** Maps gettext slot texts back onto quantity keywords. Keywords without a slot are left out of `forms`. */
export function distributePlurals(rule: PluralRule, texts: readonly string[]): DistributedPlural {
  const forms = new Map<PluralKeyword, string>();
  rule.keywords.slice(0, texts.length).forEach((keyword, index) => {
    forms.set(keyword, texts[index]);
  });

  return {
    forms,
    extra: Math.max(0, texts.length - rule.nplurals),
    missing: rule.keywords.slice(texts.length),
  };
}
