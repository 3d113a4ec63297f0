/**
 * Program definition and top-level error handling for the attack-workbook CLI.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { Command, CommanderError } from 'commander';

import { registerSeedCommand } from './commands/seed.js';
import { registerLayerCommand } from './commands/layer.js';
import { printError } from './options.js';

const pkg: { version: string } = JSON.parse(
  readFileSync(fileURLToPath(new URL('../../package.json', import.meta.url)), 'utf-8'),
);

export function createProgram(): Command {
  const program = new Command();

  // exitOverride must come before the subcommands are added so they inherit it
  program
    .name('attack-workbook')
    .description(
      'Seed an Excel workbook with MITRE ATT&CK techniques, and build ATT&CK Navigator layers from annotated worksheets',
    )
    .version(pkg.version)
    .exitOverride();

  registerSeedCommand(program);
  registerLayerCommand(program);

  return program;
}

/**
 * Parse `argv` (in `process.argv` form) and run the selected command.
 * Exits the process with 1 on any failure, and with commander's own code
 * after help or version output.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  if (argv.length <= 2) {
    program.outputHelp({ error: true });
    process.exit(1);
  }

  try {
    await program.parseAsync(argv);
  } catch (err) {
    // Commander has already printed its own message (or the help/version text)
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }

    printError(
      err instanceof Error ? err.message : String(err),
      'Run "attack-workbook --help" for usage information.',
    );
    process.exit(1);
  }
}
