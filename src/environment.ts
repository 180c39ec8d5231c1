import { existsSync, statSync } from 'fs';
import { readdir } from 'fs/promises';
import { dirname, join } from 'path';

import { CommandError } from './errors.js';
import { Logger } from './logger.js';

export const CONFIG_FILE_NAME = '.strings-po.json';
export const MANIFEST_FILE_NAME = 'AndroidManifest.xml';
export const RESOURCE_FILE_NAME = 'strings.xml';

const LANGUAGE_DIRECTORY = /^values(?:-([a-z]{2})(?:-r([A-Z]{2}))?)?$/;

export interface ProjectLocation {
  /** Directory holding AndroidManifest.xml. */
  projectDir?: string;
  configFile?: string;
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

/**
 * Walks up from `startDir` until a directory holds a config file or an Android manifest. The search stops at the
 * first directory that has either.
 */
export function findProjectDirAndConfig(startDir: string): ProjectLocation {
  let current = startDir;
  for (;;) {
    const configFile = join(current, CONFIG_FILE_NAME);
    const manifest = join(current, MANIFEST_FILE_NAME);
    const hasConfig = isFile(configFile);
    const hasManifest = isFile(manifest);
    if (hasConfig || hasManifest) {
      return {
        projectDir: hasManifest ? current : undefined,
        configFile: hasConfig ? configFile : undefined,
      };
    }

    const parent = dirname(current);
    if (parent === current) {
      return {};
    }
    current = parent;
  }
}

/** Parses a `values[-xx[-rYY]]` directory name into `''` (default), `xx` or `xx_YY`. */
export function languageFromDirectory(directory: string): string | undefined {
  const match = LANGUAGE_DIRECTORY.exec(directory);
  if (!match) {
    return undefined;
  }
  const [, language, region] = match;
  if (!language) {
    return '';
  }
  return region ? `${language}_${region}` : language;
}

export function directoryForLanguage(code: string): string {
  const [language, region] = code.split('_');
  return region ? `values-${language}-r${region}` : `values-${language}`;
}

export function resourceFileForLanguage(resourceDir: string, code: string): string {
  return join(resourceDir, directoryForLanguage(code), RESOURCE_FILE_NAME);
}

export interface Environment {
  resourceDir: string;
  gettextDir: string;
  defaultFile: string;
  /** Language code to strings.xml, in code order. */
  languages: Map<string, string>;
}

export interface LanguageFiles {
  defaultFile?: string;
  languages: Map<string, string>;
}

export async function collectLanguages(resourceDir: string): Promise<LanguageFiles> {
  if (!existsSync(resourceDir)) {
    return { languages: new Map() };
  }

  let defaultFile: string | undefined;
  const found: [string, string][] = [];

  const entries = await readdir(resourceDir, { withFileTypes: true });
  for (const entry of entries) {
    if (!entry.isDirectory()) {
      continue;
    }
    const code = languageFromDirectory(entry.name);
    const file = join(resourceDir, entry.name, RESOURCE_FILE_NAME);
    if (code === undefined || !isFile(file)) {
      continue;
    }
    if (code === '') {
      defaultFile = file;
    } else {
      found.push([code, file]);
    }
  }

  found.sort(([a], [b]) => a.localeCompare(b));
  return { defaultFile, languages: new Map(found) };
}

export async function loadEnvironment(resourceDir: string, gettextDir: string, logger: Logger): Promise<Environment> {
  if (!existsSync(resourceDir)) {
    throw new CommandError(`Android resource directory '${resourceDir}' doesn't exist`);
  }

  const { defaultFile, languages } = await collectLanguages(resourceDir);
  if (!defaultFile) {
    throw new CommandError(`Default language was not found: ${join(resourceDir, 'values', RESOURCE_FILE_NAME)}`);
  }

  logger.debug(`Android resources: ${resourceDir}`);
  logger.debug(`gettext catalogs: ${gettextDir}`);
  logger.info(`Found ${languages.size} language(s): ${[...languages.keys()].join(', ') || '(none)'}`);

  return { resourceDir, gettextDir, defaultFile, languages };
}
