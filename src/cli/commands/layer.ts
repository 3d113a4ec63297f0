/**
 * Layer command — turn an annotated worksheet into an ATT&CK Navigator layer.
 *
 * Reads the techniqueID, color, enabled, score and comment columns of a
 * worksheet and writes a layer JSON file that can be opened in the
 * ATT&CK Navigator.
 */

import { resolve } from 'path';
import type { Command } from 'commander';
import ora from 'ora';

import { loadConfig } from '../../config/env.js';
import { resolvePlatformFilter } from '../../knowledge/mitre-attack/platforms.js';
import { buildLayer, DEFAULT_LAYER_NAME, writeLayer } from '../../layer/builder.js';
import { mapRows } from '../../layer/column-mapper.js';
import type { LayerDocument } from '../../types/layer.js';
import { readWorksheet } from '../../workbook/reader.js';
import {
  addDomainOption,
  addPlatformFilterOptions,
  addVerboseOption,
  applyLogLevel,
  parseDomain,
  printBanner,
  printInfo,
  printSuccess,
  resolveInputPath,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LayerCommandOptions {
  worksheet: string;
  domain: string;
  name: string;
  description: string;
  platformfilterin?: string[];
  platformfilterout?: string[];
  verbose?: boolean;
}

export const DEFAULT_WORKSHEET = 'techniques';

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerLayerCommand(program: Command): void {
  const cmd = program
    .command('layer')
    .description('Create an ATT&CK Navigator layer from an annotated worksheet')
    .argument('<infile>', 'path of the Excel workbook to read')
    .argument('<outfile>', 'path of the layer JSON file to create')
    .option('--worksheet <name>', 'worksheet holding the techniques', DEFAULT_WORKSHEET);

  addDomainOption(cmd, 'ATT&CK domain of the layer');
  cmd
    .option('--name <name>', 'name of the layer', DEFAULT_LAYER_NAME)
    .option('--description <text>', 'description of the layer', '');
  addPlatformFilterOptions(cmd);
  addVerboseOption(cmd);

  cmd.action(async (infile: string, outfile: string, options: LayerCommandOptions) => {
    await runLayer(infile, outfile, options);
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

export async function runLayer(
  infile: string,
  outfile: string,
  options: LayerCommandOptions,
): Promise<LayerDocument> {
  const config = loadConfig();
  applyLogLevel(config, options.verbose);

  printBanner('Navigator Layer Builder');

  const domain = parseDomain(options.domain);
  const platformFilter = resolvePlatformFilter(
    domain,
    options.platformfilterin,
    options.platformfilterout,
  );
  const inputPath = resolveInputPath(infile);
  const outputPath = resolve(outfile);

  printInfo(`Input:     ${inputPath} [${options.worksheet}]`);
  printInfo(`Output:    ${outputPath}`);
  printInfo(`Domain:    ${domain}`);
  printInfo(`Platforms: ${[...platformFilter].join(', ')}`);
  console.log('');

  // --- Read worksheet ---
  const readSpinner = ora(`Reading worksheet "${options.worksheet}"...`).start();
  let layer: LayerDocument;
  try {
    const sheet = await readWorksheet(inputPath, options.worksheet);
    const techniques = mapRows(sheet.headers, sheet.rows, sheet.sheetName);
    layer = buildLayer(techniques, {
      name: options.name,
      domain,
      description: options.description,
      platformFilter,
    });
    readSpinner.succeed(`Read ${techniques.length} technique rows`);
  } catch (err) {
    readSpinner.fail('Failed to read worksheet');
    throw err;
  }

  // --- Write layer ---
  const writeSpinner = ora('Writing layer...').start();
  try {
    await writeLayer(layer, outputPath);
    writeSpinner.succeed('Layer written');
  } catch (err) {
    writeSpinner.fail('Failed to write layer');
    throw err;
  }

  console.log('');
  printSuccess(
    `ATT&CK Navigator layer file written to '${outputPath}' with ${layer.techniques.length} techniques`,
  );
  printInfo('Open this file at https://mitre-attack.github.io/attack-navigator/');
  console.log('');

  return layer;
}
