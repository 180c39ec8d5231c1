import { type GetTextTranslation, type GetTextTranslations, po } from 'gettext-parser';

import { InvalidCatalogError } from '../errors.js';
import { getPluralRule } from '../plurals/index.js';
import { Catalog, CatalogMessage } from './index.js';

export function catalogHeaders(language?: string): Record<string, string> {
  const headers: Record<string, string> = {
    'MIME-Version': '1.0',
    'Content-Type': 'text/plain; charset=UTF-8',
    'Content-Transfer-Encoding': '8bit',
  };
  if (language) {
    headers['Language'] = language;
    headers['Plural-Forms'] = getPluralRule(language).pluralForms;
  }
  return headers;
}

function hasFlag(flags: string | undefined, flag: string): boolean {
  return (flags ?? '')
    .split(',')
    .map((value) => value.trim())
    .includes(flag);
}

/**
 * Parses a .po or .pot file. The header entry goes into `headers`; everything else becomes a message, in file order.
 * Files without a charset in their `Content-Type` header are read as UTF-8.
 *
 * @throws InvalidCatalogError when the content is not a valid catalog
 */
export function parseCatalog(content: string | Buffer, language?: string): Catalog {
  let table: GetTextTranslations;
  try {
    table = po.parse(content, 'utf-8');
  } catch (error) {
    throw new InvalidCatalogError(error instanceof Error ? error.message : String(error));
  }

  const messages: CatalogMessage[] = [];
  for (const [context, entries] of Object.entries(table.translations)) {
    for (const entry of Object.values(entries)) {
      if (context === '' && entry.msgid === '') {
        continue;
      }

      const msgctxt = entry.msgctxt ?? context;
      const message: CatalogMessage = {
        id: entry.msgid,
        strings: entry.msgstr.length > 0 ? entry.msgstr : [''],
        fuzzy: hasFlag(entry.comments?.flag, 'fuzzy'),
      };
      if (msgctxt !== '') {
        message.context = msgctxt;
      }
      if (typeof entry.msgid_plural === 'string') {
        message.idPlural = entry.msgid_plural;
      }
      if (entry.comments?.extracted) {
        message.comment = entry.comments.extracted;
      }
      if (entry.comments?.translator) {
        message.translatorComment = entry.comments.translator;
      }
      messages.push(message);
    }
  }

  return {
    language: language ?? (table.headers['Language'] || undefined),
    headers: table.headers,
    messages,
  };
}

function toTranslation(message: CatalogMessage): GetTextTranslation {
  const translation: GetTextTranslation = {
    msgid: message.id,
    msgstr: message.strings,
  };
  if (message.context !== undefined) {
    translation.msgctxt = message.context;
  }
  if (message.idPlural !== undefined) {
    translation.msgid_plural = message.idPlural;
  }
  if (message.comment || message.translatorComment || message.fuzzy) {
    translation.comments = {
      translator: message.translatorComment ?? '',
      reference: '',
      extracted: message.comment ?? '',
      flag: message.fuzzy ? 'fuzzy' : '',
      previous: '',
    };
  }
  return translation;
}

export function compileCatalog(catalog: Catalog): string {
  const headers = { ...catalogHeaders(catalog.language), ...catalog.headers };
  if (catalog.language) {
    headers['Language'] = catalog.language;
  }

  const table: GetTextTranslations = {
    charset: 'utf-8',
    headers,
    translations: { '': { '': { msgid: '', msgstr: [''] } } },
  };

  for (const message of catalog.messages) {
    const context = message.context ?? '';
    const entries = (table.translations[context] ??= {});
    entries[message.id] = toTranslation(message);
  }

  return po.compile(table).toString('utf-8');
}
