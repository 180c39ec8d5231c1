import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';

import { InvalidCatalogError, InvalidResourceError } from './errors.js';
import { readResources, writeResources } from './formats/android-xml.js';
import { compileCatalog, parseCatalog } from './formats/gettext.js';
import { Catalog, ResourceTree } from './formats/index.js';
import { Logger } from './logger.js';

export async function readResourceFile(filePath: string, logger: Logger): Promise<ResourceTree> {
  const content = await readFile(filePath, 'utf-8');
  try {
    return readResources(content, logger);
  } catch (error) {
    if (error instanceof InvalidResourceError) {
      throw new InvalidResourceError(`Failed parsing ${filePath}: ${error.message}`);
    }
    throw error;
  }
}

export async function writeResourceFile(filePath: string, tree: ResourceTree, logger: Logger): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, writeResources(tree, logger), 'utf-8');
}

export async function readCatalogFile(filePath: string, language?: string): Promise<Catalog> {
  const content = await readFile(filePath);
  try {
    return parseCatalog(content, language);
  } catch (error) {
    if (error instanceof InvalidCatalogError) {
      throw new InvalidCatalogError(`Failed parsing ${filePath}: ${error.message}`);
    }
    throw error;
  }
}

export async function writeCatalogFile(filePath: string, catalog: Catalog): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, compileCatalog(catalog), 'utf-8');
}

/** Creates an empty strings.xml unless the file already exists. Returns whether it was created. */
export async function ensureResourceFile(filePath: string): Promise<boolean> {
  if (existsSync(filePath)) {
    return false;
  }
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, writeResources(new Map()), 'utf-8');
  return true;
}
