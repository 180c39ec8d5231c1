import { readFile } from 'fs/promises';
import { dirname, isAbsolute, join, resolve } from 'path';
import { z } from 'zod';

import { CONFIG_FILE_NAME, findProjectDirAndConfig } from './environment.js';
import { CommandError, ConfigError } from './errors.js';
import { Logger, renderErrorMessage } from './logger.js';
import { normalizeLanguageCode } from './plurals/index.js';

/** Options that can come from the command line. */
export interface CliOptions {
  config?: string;
  android?: string;
  gettext?: string;
  ignore?: string[];
  /** False when templates are disabled with `--no-template`. */
  template?: string | false;
  sourceLanguage?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export const configFileSchema = z
  .object({
    android: z.string().min(1).optional(),
    gettext: z.string().min(1).optional(),
    ignore: z.array(z.string().min(1)).optional(),
    template: z.union([z.string().min(1), z.literal(false)]).optional(),
    sourceLanguage: z.string().min(2).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface ResolvedConfig {
  resourceDir: string;
  gettextDir: string;
  ignore: string[];
  /** File name of the template inside the gettext directory, or false for none. */
  template: string | false;
  sourceLanguage: string;
}

export const DEFAULT_TEMPLATE = 'template.pot';

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Reads a JSON config file. Relative directories in it are resolved against the file's own directory. */
export async function readConfigFile(filePath: string): Promise<ConfigFile> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(renderErrorMessage(`Error reading config file ${filePath}`, error));
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${filePath}: ${formatIssues(parsed.error)}`);
  }

  const baseDir = dirname(filePath);
  const config = parsed.data;
  return {
    ...config,
    android: config.android !== undefined ? resolve(baseDir, config.android) : undefined,
    gettext: config.gettext !== undefined ? resolve(baseDir, config.gettext) : undefined,
  };
}

export function validateConfig(config: ResolvedConfig) {
  if (config.template !== false && (config.template.includes('/') || config.template.includes('\\'))) {
    throw new ConfigError(`Template name must be a file name, not a path: ${config.template}`);
  }

  if (!/^[a-zA-Z]{2,3}(?:[-_](?:r)?[a-zA-Z]{2})?$/.test(config.sourceLanguage)) {
    throw new ConfigError(`Invalid source language: ${config.sourceLanguage}`);
  }

  for (const pattern of config.ignore) {
    const regex = /^\/(.*)\/$/.exec(pattern);
    if (regex) {
      try {
        new RegExp(regex[1]);
      } catch (error) {
        throw new ConfigError(renderErrorMessage(`Invalid ignore pattern ${pattern}`, error));
      }
    }
  }
}

/**
 * Combines command-line options, the config file and the project layout. Command-line options win over the file;
 * directories neither of them names default to `res/` and `locale/` beside AndroidManifest.xml.
 */
export async function resolveConfig(options: CliOptions, cwd: string, logger: Logger): Promise<ResolvedConfig> {
  const location = findProjectDirAndConfig(cwd);

  let configPath: string | undefined;
  if (options.config) {
    configPath = isAbsolute(options.config) ? options.config : resolve(cwd, options.config);
  } else if (location.configFile) {
    configPath = location.configFile;
    logger.debug(`Using auto-detected config file: ${configPath}`);
  }
  const fileConfig: ConfigFile = configPath ? await readConfigFile(configPath) : {};

  let resourceDir = options.android ? resolve(cwd, options.android) : fileConfig.android;
  let gettextDir = options.gettext ? resolve(cwd, options.gettext) : fileConfig.gettext;

  if (!resourceDir || !gettextDir) {
    const { projectDir } = location;
    if (!projectDir) {
      throw new CommandError(
        `Could not find ${CONFIG_FILE_NAME} or an Android project (AndroidManifest.xml) here or in a parent ` +
          'directory; use --android and --gettext to give the directories explicitly'
      );
    }
    logger.debug(`Assuming default directory structure in ${projectDir}`);
    resourceDir ??= join(projectDir, 'res');
    gettextDir ??= join(projectDir, 'locale');
  }

  const template = options.template ?? fileConfig.template ?? DEFAULT_TEMPLATE;
  const config: ResolvedConfig = {
    resourceDir,
    gettextDir,
    ignore: [...(fileConfig.ignore ?? []), ...(options.ignore ?? [])],
    template: template === false ? false : template.replace(/%s/g, 'strings'),
    sourceLanguage: normalizeLanguageCode(options.sourceLanguage ?? fileConfig.sourceLanguage ?? 'en'),
  };

  validateConfig(config);
  return config;
}
