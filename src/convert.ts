import { catalogHeaders } from './formats/gettext.js';
import { Catalog, CatalogMessage, isTranslated, PluralsResource, Resource, ResourceTree } from './formats/index.js';
import { Logger, SilentLogger } from './logger.js';
import { distributePlurals, getPluralRule, parsePluralForms, PluralRule, reconcilePlurals } from './plurals/index.js';

/** Returns true for resource names that should not be converted. */
export type NameFilter = (name: string) => boolean;

/**
 * Builds a filter from `--ignore` patterns. A pattern wrapped in slashes is a regular expression that may match
 * anywhere in the name; any other pattern has to equal the name.
 */
export function buildIgnoreFilter(patterns: readonly string[]): NameFilter | undefined {
  if (patterns.length === 0) {
    return undefined;
  }

  const matchers = patterns.map((pattern): NameFilter => {
    const regex = /^\/(.*)\/$/.exec(pattern);
    if (regex) {
      const compiled = new RegExp(regex[1]);
      return (name) => compiled.test(name);
    }
    return (name) => name === pattern;
  });

  return (name) => matchers.some((matcher) => matcher(name));
}

export interface XmlToCatalogOptions {
  /** Target language; leave out to build a template. */
  language?: string;
  /** Translated resources to fill the catalog with. */
  translations?: ResourceTree;
  /** Language of the default resources, which decides how source plurals become msgid/msgid_plural. */
  sourceLanguage?: string;
  ignore?: NameFilter;
  logger?: Logger;
}

export interface XmlToCatalogResult {
  catalog: Catalog;
  /** Names present in the translations but not in the default resources. */
  unmatched: string[];
}

function reconcileWithWarnings(rule: PluralRule, resource: PluralsResource, logger: Logger): string[] {
  const { texts, ignored } = reconcilePlurals(rule, resource.forms, resource.name);
  for (const keyword of ignored) {
    logger.warn(
      `Plural "${resource.name}" uses quantity "${keyword}", which is not supported by language "${rule.language}"; ` +
        'ignoring it'
    );
  }
  return texts;
}

function warnKindMismatch(resource: Resource, translation: Resource, logger: Logger) {
  logger.warn(
    `"${resource.name}" is a ${resource.kind} in the reference file, but a ${translation.kind} in the translation; ` +
      'ignoring the translation'
  );
}

/**
 * Turns the default resources, and optionally the matching translations, into a catalog. Strings become one message
 * each, string-array items one message per item with a `name:index` context, and plurals a single plural message.
 *
 * @throws IncompletePluralError when a plural lacks a quantity its language requires
 */
export function xmlToCatalog(source: ResourceTree, options: XmlToCatalogOptions = {}): XmlToCatalogResult {
  const logger = options.logger ?? new SilentLogger();
  const sourceRule = getPluralRule(options.sourceLanguage ?? 'en');
  const targetRule = options.language ? getPluralRule(options.language) : undefined;
  const remaining = new Map(options.translations ?? []);
  const messages: CatalogMessage[] = [];

  const addMessage = (message: CatalogMessage) => {
    if (message.id === '') {
      logger.warn(`Skipping "${message.context}": its text in the default language is empty`);
      return;
    }
    messages.push(message);
  };

  for (const resource of source.values()) {
    const translation = remaining.get(resource.name);
    remaining.delete(resource.name);

    if (options.ignore?.(resource.name)) {
      logger.debug(`Ignoring "${resource.name}"`);
      continue;
    }

    if (translation && translation.kind !== resource.kind) {
      warnKindMismatch(resource, translation, logger);
    }

    switch (resource.kind) {
      case 'string': {
        const text = translation?.kind === 'string' ? translation.text : '';
        addMessage({
          context: resource.name,
          id: resource.text,
          strings: [text],
          comment: resource.comment,
          fuzzy: false,
        });
        break;
      }

      case 'string-array': {
        if (resource.items.length === 0) {
          logger.warn(`string-array "${resource.name}" is empty`);
          break;
        }
        const translatedItems = translation?.kind === 'string-array' ? translation.items : [];
        resource.items.forEach((item, index) => {
          if (item === undefined) {
            return;
          }
          addMessage({
            context: `${resource.name}:${index}`,
            id: item,
            strings: [translatedItems[index] ?? ''],
            comment: resource.comment,
            fuzzy: false,
          });
        });
        break;
      }

      case 'plurals': {
        const texts = reconcileWithWarnings(sourceRule, resource, logger);
        let strings: string[];
        if (!targetRule) {
          strings = ['', ''];
        } else if (translation?.kind === 'plurals') {
          strings = reconcileWithWarnings(targetRule, translation, logger);
        } else {
          strings = new Array<string>(targetRule.nplurals).fill('');
        }
        addMessage({
          context: resource.name,
          id: texts[0],
          idPlural: texts[texts.length - 1],
          strings,
          comment: resource.comment,
          fuzzy: false,
        });
        break;
      }
    }
  }

  const unmatched = [...remaining.keys()].filter((name) => !options.ignore?.(name));

  return {
    catalog: { language: options.language, headers: catalogHeaders(options.language), messages },
    unmatched,
  };
}

export interface CatalogToXmlOptions {
  /** Defaults to the catalog's `Language` header. */
  language?: string;
  /** Write the source text for strings that have no translation. */
  withUntranslated?: boolean;
  ignore?: NameFilter;
  logger?: Logger;
}

function arrayItemContext(context: string): { name: string; index: number } | undefined {
  const match = /^(.+):(\d+)$/.exec(context);
  return match ? { name: match[1], index: Number(match[2]) } : undefined;
}

/**
 * Turns a translated catalog back into resources. Fuzzy messages count as untranslated. Messages the catalog
 * cannot place (no context, a context used twice) are reported as errors and skipped.
 */
export function catalogToXml(catalog: Catalog, options: CatalogToXmlOptions = {}): ResourceTree {
  const logger = options.logger ?? new SilentLogger();
  const rule = getPluralRule(options.language ?? catalog.language ?? 'en');
  const tree: ResourceTree = new Map();

  const declared = parsePluralForms(catalog.headers['Plural-Forms']);
  if (declared && declared.nplurals !== rule.nplurals) {
    logger.warn(
      `Catalog declares ${declared.nplurals} plural forms, but language "${rule.language}" uses ${rule.nplurals}`
    );
  }

  for (const message of catalog.messages) {
    if (!message.context) {
      logger.error(`Ignoring message "${message.id}": it has no context, so it was not written by this tool`);
      continue;
    }

    const translated = isTranslated(message) && !message.fuzzy;
    const item = arrayItemContext(message.context);
    const name = item ? item.name : message.context;

    if (options.ignore?.(name)) {
      continue;
    }

    if (item) {
      let resource = tree.get(name);
      if (!resource) {
        resource = { kind: 'string-array', name, items: [] };
        tree.set(name, resource);
      }
      if (resource.kind !== 'string-array') {
        logger.error(`"${name}" is both a ${resource.kind} and a string-array; ignoring "${message.context}"`);
        continue;
      }
      if (resource.items[item.index] !== undefined) {
        logger.error(`Duplicate index ${item.index} in string-array "${name}"; ignoring it`);
        continue;
      }
      while (resource.items.length <= item.index) {
        resource.items.push(undefined);
      }
      resource.items[item.index] = translated ? message.strings[0] : message.id;
      continue;
    }

    if (tree.has(name)) {
      logger.error(`Duplicate message "${name}"; ignoring it`);
      continue;
    }

    if (message.idPlural !== undefined) {
      if (!translated) {
        logger.debug(`Skipping untranslated plural "${name}"`);
        continue;
      }
      const { forms, extra, missing } = distributePlurals(rule, message.strings);
      const counts =
        `Plural "${name}" has ${message.strings.length} forms, but language "${rule.language}" uses ${rule.nplurals}`;
      if (extra > 0) {
        logger.warn(`${counts}; ignoring the extra ones`);
      }
      if (missing.length > 0) {
        logger.warn(`${counts}; leaving out quantity ${missing.map((keyword) => `"${keyword}"`).join(', ')}`);
      }
      tree.set(name, { kind: 'plurals', name, forms });
      continue;
    }

    if (translated) {
      tree.set(name, { kind: 'string', name, text: message.strings[0] });
    } else if (options.withUntranslated) {
      tree.set(name, { kind: 'string', name, text: message.id });
    }
  }

  return tree;
}

function resizeStrings(strings: readonly string[], size: number): string[] {
  return Array.from({ length: size }, (_, index) => strings[index] ?? '');
}

function samePluralForms(header: string | undefined, rule: PluralRule): boolean {
  const parsed = parsePluralForms(header);
  return (
    parsed !== undefined &&
    parsed.nplurals === rule.nplurals &&
    parsed.expression.replace(/\s+/g, '') === rule.expression.replace(/\s+/g, '')
  );
}

export interface MergeOptions {
  language: string;
  logger?: Logger;
}

/**
 * Updates an existing translation catalog from a fresh template. Translations and translator comments are matched by
 * context; a translation whose source text changed is kept but marked fuzzy. Messages that are no longer in the
 * template are dropped.
 */
export function mergeCatalog(existing: Catalog, template: Catalog, options: MergeOptions): Catalog {
  const logger = options.logger ?? new SilentLogger();
  const rule = getPluralRule(options.language);

  const previousByContext = new Map<string, CatalogMessage>();
  for (const message of existing.messages) {
    if (message.context === undefined) {
      logger.debug(`Dropping message "${message.id}" without context`);
    } else {
      previousByContext.set(message.context, message);
    }
  }

  const messages = template.messages.map((message): CatalogMessage => {
    const slots = message.idPlural !== undefined ? rule.nplurals : 1;
    const previous = message.context !== undefined ? previousByContext.get(message.context) : undefined;
    if (message.context !== undefined) {
      previousByContext.delete(message.context);
    }

    if (!previous) {
      return { ...message, strings: resizeStrings([], slots), fuzzy: false };
    }

    const strings = resizeStrings(previous.strings, slots);
    const changed = previous.id !== message.id || previous.idPlural !== message.idPlural;
    const fuzzy = (previous.fuzzy || changed) && isTranslated({ ...message, strings });
    const merged: CatalogMessage = { ...message, strings, fuzzy };
    if (previous.translatorComment) {
      merged.translatorComment = previous.translatorComment;
    }
    return merged;
  });

  for (const obsolete of previousByContext.values()) {
    logger.debug(`Removing obsolete message "${obsolete.context}"`);
  }

  const oldPluralForms = existing.headers['Plural-Forms'];
  if (oldPluralForms && !samePluralForms(oldPluralForms, rule)) {
    logger.warn(`Replacing the Plural-Forms header "${oldPluralForms}" with "${rule.pluralForms}"`);
  }

  return {
    language: options.language,
    headers: { ...existing.headers, Language: options.language, 'Plural-Forms': rule.pluralForms },
    messages,
  };
}
