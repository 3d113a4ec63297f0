/**
 * Seed command — populate a workbook with ATT&CK techniques.
 *
 * Downloads (or reads) the STIX bundle of the selected domain, filters out
 * revoked techniques, subtechniques when disabled, and techniques outside
 * the platform filter, then writes the techniques, technique-to-data-source
 * and data-source sheets to a new .xlsx workbook.
 */

import { resolve } from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { loadConfig } from '../../config/env.js';
import { resolvePlatformFilter } from '../../knowledge/mitre-attack/platforms.js';
import {
  FileTechniqueSource,
  RemoteTechniqueSource,
  type TechniqueSource,
} from '../../knowledge/mitre-attack/technique-source.js';
import { seed, writeWorkbook, type SeedResult } from '../../workbook/seeder.js';
import {
  addDomainOption,
  addPlatformFilterOptions,
  addVerboseOption,
  applyLogLevel,
  parseDomain,
  printBanner,
  printInfo,
  printSuccess,
  printWarning,
  resolveInputPath,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SeedOptions {
  domain: string;
  subtechniques: boolean;
  platformfilterin?: string[];
  platformfilterout?: string[];
  stixFile?: string;
  verbose?: boolean;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerSeedCommand(program: Command): void {
  const cmd = program
    .command('seed')
    .description('Create a workbook of ATT&CK techniques and their data sources')
    .argument('<outfile>', 'path of the Excel workbook to create');

  addDomainOption(cmd, 'ATT&CK domain to download');
  cmd.option('--no-subtechniques', 'leave subtechniques out of the workbook');
  addPlatformFilterOptions(cmd);
  cmd.option('--stix-file <path>', 'read techniques from a local STIX bundle instead of downloading');
  addVerboseOption(cmd);

  cmd.action(async (outfile: string, options: SeedOptions) => {
    await runSeed(outfile, options);
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

export async function runSeed(
  outfile: string,
  options: SeedOptions,
  techniqueSource?: TechniqueSource,
): Promise<SeedResult> {
  const config = loadConfig();
  applyLogLevel(config, options.verbose);

  printBanner('Workbook Seeder');

  const domain = parseDomain(options.domain);
  const platformFilter = resolvePlatformFilter(
    domain,
    options.platformfilterin,
    options.platformfilterout,
  );
  const outputPath = resolve(outfile);

  const source =
    techniqueSource ??
    (options.stixFile
      ? new FileTechniqueSource(resolveInputPath(options.stixFile))
      : new RemoteTechniqueSource(config.source));

  printInfo(`Domain:        ${domain}`);
  printInfo(`Source:        ${source.description}`);
  printInfo(`Subtechniques: ${options.subtechniques ? 'included' : 'excluded'}`);
  printInfo(`Platforms:     ${[...platformFilter].join(', ')}`);
  printInfo(`Output:        ${outputPath}`);
  console.log('');

  // --- Fetch and filter ---
  const fetchSpinner = ora(`Fetching ${domain} techniques...`).start();
  let result: SeedResult;
  try {
    result = await seed(domain, options.subtechniques, platformFilter, source);
    fetchSpinner.succeed(
      `Kept ${result.techniqueCount} techniques (${result.skipped.length} skipped)`,
    );
  } catch (err) {
    fetchSpinner.fail('Failed to fetch techniques');
    throw err;
  }

  if (result.techniqueCount === 0) {
    printWarning('No techniques matched; the workbook will only contain headers.');
  }

  // --- Write workbook ---
  const writeSpinner = ora('Writing workbook...').start();
  try {
    await writeWorkbook(result, outputPath);
    writeSpinner.succeed('Workbook written');
  } catch (err) {
    writeSpinner.fail('Failed to write workbook');
    throw err;
  }

  console.log('');
  printSuccess(
    `Excel workbook created at '${outputPath}' with ${result.techniqueCount} techniques.`,
  );
  printInfo(`${chalk.bold(String(result.dataSourceCount))} unique data sources`);
  console.log('');

  return result;
}
