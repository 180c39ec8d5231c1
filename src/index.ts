import { exportCommand, ExportOptions, importCommand, ImportOptions, initCommand } from './commands.js';
import { CliOptions, resolveConfig } from './config.js';
import { loadEnvironment } from './environment.js';
import { ConsoleLogger, CountingLogger, Logger } from './logger.js';

// Re-export useful types for library users
export { CliOptions, ConfigFile, ResolvedConfig, readConfigFile, resolveConfig } from './config.js';
export { buildIgnoreFilter, catalogToXml, mergeCatalog, NameFilter, xmlToCatalog } from './convert.js';
export { readResources, writeResources } from './formats/android-xml.js';
export { decodeAndroidText, encodeAndroidText } from './formats/android-text.js';
export { compileCatalog, parseCatalog } from './formats/gettext.js';
export { Catalog, CatalogMessage, Resource, ResourceTree } from './formats/index.js';
export * from './errors.js';
export { Logger, ConsoleLogger, SilentLogger, PrefixedLogger, CountingLogger } from './logger.js';
export {
  distributePlurals,
  getPluralRule,
  hasPluralRule,
  PluralKeyword,
  PluralRule,
  reconcilePlurals,
} from './plurals/index.js';

export type CommandRequest =
  | { command: 'init'; options: CliOptions; languages?: string[] }
  | { command: 'export'; options: CliOptions & ExportOptions }
  | { command: 'import'; options: CliOptions & ImportOptions };

/**
 * Runs a command from start to finish. Fatal problems are thrown; problems that only affect single messages are
 * logged as errors, and make the result false once the command has written its output.
 */
export async function runCommand(request: CommandRequest, baseLogger?: Logger, cwd = process.cwd()): Promise<boolean> {
  const { options } = request;
  const logger = new CountingLogger(baseLogger ?? new ConsoleLogger(options.verbose, options.quiet));

  const config = await resolveConfig(options, cwd, logger);
  const env = await loadEnvironment(config.resourceDir, config.gettextDir, logger);
  const context = { config, env, logger };

  switch (request.command) {
    case 'init':
      await initCommand(context, request.languages);
      break;
    case 'export':
      await exportCommand(context, request.options);
      break;
    case 'import':
      await importCommand(context, request.options);
      break;
  }

  return logger.errorCount === 0;
}
