#!/usr/bin/env node
import { Command, Option } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';

import { CliOptions } from './config.js';
import { CommandRequest, runCommand } from './index.js';
import { renderErrorMessage } from './logger.js';

const { version } = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')));

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function addCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Configuration file to use instead of the auto-detected one')
    .option('--android <dir>', 'Android resource directory ($PROJECT/res by default)')
    .option('--gettext <dir>', 'Directory containing the .po files ($PROJECT/locale by default)')
    .option('--ignore <pattern>', 'Resource name to skip, or a /regular expression/; may be repeated', collect, [])
    .option('--template <name>', 'File name of the .pot template; %s is replaced by "strings"')
    .option('--no-template', 'Do not write a .pot template')
    .option('--source-language <code>', 'Language of the default strings.xml (en by default)')
    .option('-v, --verbose', 'Show details about what is being done')
    .addOption(new Option('-q, --quiet', 'Only show warnings and errors').conflicts('verbose'));
}

function parseCommandLine(): Promise<CommandRequest> {
  return new Promise((resolve) => {
    const program = new Command();

    program
      .name('strings-po')
      .description('Converts Android strings.xml resources to gettext .po catalogs and back')
      .version(version);

    addCommonOptions(program.command('init'))
      .description('Create .po files for new languages, or for every language that has none yet')
      .argument('[languages...]', 'Language codes such as de or pt_BR')
      .action((languages: string[], options: CliOptions) => {
        resolve({ command: 'init', options, languages });
      });

    addCommonOptions(program.command('export'))
      .description('Update the template and the .po files from the default strings.xml')
      .option('--initial', 'Create .po files for languages that have none')
      .addOption(new Option('--overwrite', 'Regenerate all .po files from the XML files').conflicts('initial'))
      .action((options: CliOptions & { initial?: boolean; overwrite?: boolean }) => {
        resolve({ command: 'export', options });
      });

    addCommonOptions(program.command('import'))
      .description('Write the strings.xml of every language from its .po file')
      .option('--with-untranslated', 'Write the default text for untranslated strings')
      .action((options: CliOptions & { withUntranslated?: boolean }) => {
        resolve({ command: 'import', options });
      });

    program.parse();
  });
}

async function main() {
  const request = await parseCommandLine();
  const ok = await runCommand(request);
  process.exitCode = ok ? 0 : 1;
}

main().catch((error) => {
  console.error(renderErrorMessage('Error', error));
  process.exit(1);
});
