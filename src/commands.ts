import { existsSync } from 'fs';
import { mkdir } from 'fs/promises';
import { basename, join } from 'path';

import { ResolvedConfig } from './config.js';
import { buildIgnoreFilter, catalogToXml, mergeCatalog, NameFilter, xmlToCatalog } from './convert.js';
import { Environment, resourceFileForLanguage } from './environment.js';
import {
  ensureResourceFile,
  readCatalogFile,
  readResourceFile,
  writeCatalogFile,
  writeResourceFile,
} from './file-io.js';
import { Catalog, isTranslated, ResourceTree } from './formats/index.js';
import { Logger, PrefixedLogger } from './logger.js';
import { normalizeLanguageCode } from './plurals/index.js';

export interface CommandContext {
  config: ResolvedConfig;
  env: Environment;
  logger: Logger;
}

export interface ExportOptions {
  /** Create .po files that do not exist yet. */
  initial?: boolean;
  /** Regenerate every .po file from the XML, discarding what the catalogs contain. */
  overwrite?: boolean;
}

export interface ImportOptions {
  withUntranslated?: boolean;
}

export function catalogFile(env: Environment, code: string): string {
  return join(env.gettextDir, `${code}.po`);
}

function templateFile(context: CommandContext): string | undefined {
  const { config, env } = context;
  return config.template === false ? undefined : join(env.gettextDir, config.template);
}

function summarize(catalog: Catalog): string {
  const translated = catalog.messages.filter(isTranslated).length;
  return `${catalog.messages.length} strings processed, ${translated} translated`;
}

interface Template {
  source: ResourceTree;
  catalog: Catalog;
  ignore?: NameFilter;
}

async function buildTemplate(context: CommandContext): Promise<Template> {
  const { config, env, logger } = context;
  const ignore = buildIgnoreFilter(config.ignore);

  const source = await readResourceFile(env.defaultFile, logger);
  const { catalog } = xmlToCatalog(source, { sourceLanguage: config.sourceLanguage, ignore, logger });

  const file = templateFile(context);
  if (file) {
    await writeCatalogFile(file, catalog);
    logger.info(`Generated ${basename(file)}: ${catalog.messages.length} strings`);
  }

  return { source, catalog, ignore };
}

async function generateCatalog(context: CommandContext, template: Template, code: string): Promise<void> {
  const { config, env, logger } = context;
  const languageLogger = new PrefixedLogger(logger, code);
  const xmlFile = env.languages.get(code) ?? resourceFileForLanguage(env.resourceDir, code);
  const poFile = catalogFile(env, code);

  const translations: ResourceTree = existsSync(xmlFile) ? await readResourceFile(xmlFile, languageLogger) : new Map();
  const { catalog, unmatched } = xmlToCatalog(template.source, {
    language: code,
    translations,
    sourceLanguage: config.sourceLanguage,
    ignore: template.ignore,
    logger: languageLogger,
  });

  if (unmatched.length > 0) {
    languageLogger.warn(`${basename(xmlFile)} contains strings missing from the default file: ${unmatched.join(', ')}`);
  }

  await writeCatalogFile(poFile, catalog);
  languageLogger.info(`Generated ${basename(poFile)}: ${summarize(catalog)}`);
}

async function ensureGettextDir(context: CommandContext): Promise<void> {
  const { env, logger } = context;
  if (!existsSync(env.gettextDir)) {
    await mkdir(env.gettextDir, { recursive: true });
    logger.info(`Created directory ${env.gettextDir}`);
  }
}

/**
 * Sets up translation catalogs. With no languages given, every language that has a strings.xml but no .po file yet
 * gets one; a language without a strings.xml gets an empty one first.
 */
export async function initCommand(context: CommandContext, languages: string[] = []): Promise<void> {
  const { env, logger } = context;
  await ensureGettextDir(context);
  const template = await buildTemplate(context);

  const codes = languages.length > 0 ? languages.map(normalizeLanguageCode) : [...env.languages.keys()];
  for (const code of codes) {
    if (!env.languages.has(code)) {
      const xmlFile = resourceFileForLanguage(env.resourceDir, code);
      if (await ensureResourceFile(xmlFile)) {
        logger.info(`Created ${xmlFile}`);
      }
      env.languages.set(code, xmlFile);
    }

    if (existsSync(catalogFile(env, code))) {
      logger.info(`${code}.po exists, skipping.`);
      continue;
    }
    await generateCatalog(context, template, code);
  }
}

/** Writes the template and brings the language catalogs up to date with the default strings.xml. */
export async function exportCommand(context: CommandContext, options: ExportOptions = {}): Promise<void> {
  const { env, logger } = context;
  await ensureGettextDir(context);
  const template = await buildTemplate(context);

  for (const code of env.languages.keys()) {
    const poFile = catalogFile(env, code);
    const exists = existsSync(poFile);

    if (options.overwrite || (options.initial && !exists)) {
      await generateCatalog(context, template, code);
      continue;
    }
    if (!exists) {
      logger.warn(`Skipping ${code}, ${code}.po doesn't exist; use init or export --initial to create it`);
      continue;
    }

    const languageLogger = new PrefixedLogger(logger, code);
    const existing = await readCatalogFile(poFile, code);
    const merged = mergeCatalog(existing, template.catalog, { language: code, logger: languageLogger });
    await writeCatalogFile(poFile, merged);
    languageLogger.info(`Updated ${basename(poFile)}: ${summarize(merged)}`);
  }
}

/** Writes every language's strings.xml from its .po file. */
export async function importCommand(context: CommandContext, options: ImportOptions = {}): Promise<void> {
  const { config, env, logger } = context;
  const ignore = buildIgnoreFilter(config.ignore);

  for (const [code, xmlFile] of env.languages) {
    const poFile = catalogFile(env, code);
    if (!existsSync(poFile)) {
      logger.warn(`Skipping ${code}, .po file doesn't exist`);
      continue;
    }

    const languageLogger = new PrefixedLogger(logger, code);
    const catalog = await readCatalogFile(poFile, code);
    const tree = catalogToXml(catalog, {
      language: code,
      withUntranslated: options.withUntranslated,
      ignore,
      logger: languageLogger,
    });
    await writeResourceFile(xmlFile, tree, languageLogger);
    languageLogger.info(`Wrote ${xmlFile}: ${tree.size} resources`);
  }
}
