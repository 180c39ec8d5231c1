import type { PluralKeyword } from '../plurals/index.js';

interface ResourceBase {
  name: string;
  /** The XML comment directly preceding the element. */
  comment?: string;
}

export interface StringResource extends ResourceBase {
  kind: 'string';
  text: string;
}

export interface StringArrayResource extends ResourceBase {
  kind: 'string-array';
  /** Holes are items a catalog did not provide. */
  items: (string | undefined)[];
}

export interface PluralsResource extends ResourceBase {
  kind: 'plurals';
  forms: Map<PluralKeyword, string>;
}

export type Resource = StringResource | StringArrayResource | PluralsResource;

/** The resources of one strings.xml file, in document order and keyed by name. */
export type ResourceTree = Map<string, Resource>;

export interface CatalogMessage {
  /** Resource name, or `name:index` for an item of a string-array. */
  context?: string;
  id: string;
  idPlural?: string;
  /** A single translation, or one per plural slot. Empty strings are untranslated. */
  strings: string[];
  /** Extracted comment, taken from the XML. */
  comment?: string;
  /** Notes a translator left in the .po file. */
  translatorComment?: string;
  fuzzy: boolean;
}

export interface Catalog {
  /** Undefined for the template. */
  language?: string;
  headers: Record<string, string>;
  messages: CatalogMessage[];
}

export function isTranslated(message: CatalogMessage): boolean {
  return message.strings.some((text) => text !== '');
}
