/**
 * Shared CLI option helpers for attack-workbook commands.
 *
 * Provides reusable option registration functions, path resolution
 * utilities, and console printers used by both commands.
 */

import { existsSync } from 'fs';
import { resolve } from 'path';
import { Option } from 'commander';
import type { Command } from 'commander';
import chalk from 'chalk';

import { ValidationError } from '../errors.js';
import { ALL_PLATFORMS } from '../knowledge/mitre-attack/platforms.js';
import { ATTACK_DOMAINS, isAttackDomain } from '../types/mitre-attack.js';
import type { AttackDomain } from '../types/mitre-attack.js';
import type { AttackWorkbookConfig } from '../types/config.js';
import { setLogLevel } from '../utils/logger.js';

// ---------------------------------------------------------------------------
// Option registration helpers
// ---------------------------------------------------------------------------

export const DEFAULT_DOMAIN: AttackDomain = 'enterprise-attack';

/**
 * Add the --domain option, restricted to the three ATT&CK matrices.
 */
export function addDomainOption(cmd: Command, description: string): Command {
  return cmd.addOption(
    new Option('--domain <domain>', description)
      .choices(ATTACK_DOMAINS)
      .default(DEFAULT_DOMAIN),
  );
}

/**
 * Add the mutually exclusive --platformfilterin / --platformfilterout options.
 * Values are checked against every domain's platforms here; the per-domain
 * check happens once the domain is known.
 */
export function addPlatformFilterOptions(cmd: Command): Command {
  return cmd
    .addOption(
      new Option('--platformfilterin <platforms...>', 'only include these platforms')
        .choices(ALL_PLATFORMS)
        .conflicts('platformfilterout'),
    )
    .addOption(
      new Option('--platformfilterout <platforms...>', "exclude these platforms from the domain's set")
        .choices(ALL_PLATFORMS)
        .conflicts('platformfilterin'),
    );
}

/**
 * Add the --verbose flag to a command.
 */
export function addVerboseOption(cmd: Command): Command {
  return cmd.option('--verbose', 'Verbose output');
}

// ---------------------------------------------------------------------------
// Option parsing
// ---------------------------------------------------------------------------

export function parseDomain(value: string): AttackDomain {
  if (!isAttackDomain(value)) {
    throw new ValidationError(
      `Unknown domain "${value}". Valid domains: ${ATTACK_DOMAINS.join(', ')}`,
    );
  }
  return value;
}

/**
 * Apply the configured log level, or debug when --verbose is set.
 */
export function applyLogLevel(config: AttackWorkbookConfig, verbose?: boolean): void {
  setLogLevel(verbose ? 'debug' : config.logging.level);
}

// ---------------------------------------------------------------------------
// Path resolution utilities
// ---------------------------------------------------------------------------

/**
 * Resolve and validate that an input file exists.
 * Prints a chalk-colored error and exits if not found.
 */
export function resolveInputPath(input: string): string {
  const resolved = resolve(input);

  if (!existsSync(resolved)) {
    console.error(
      chalk.red(`Error: Input path does not exist: ${resolved}`),
    );
    process.exit(1);
  }

  return resolved;
}

// ---------------------------------------------------------------------------
// Console output
// ---------------------------------------------------------------------------

export function printBanner(title: string): void {
  console.log('');
  console.log(chalk.bold.cyan(`  attack-workbook — ${title}`));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');
}

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

export function printInfo(message: string): void {
  console.log(chalk.cyan(`  ${message}`));
}

export function printSuccess(message: string): void {
  console.log(chalk.green(`  ${message}`));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ${message}`));
}
