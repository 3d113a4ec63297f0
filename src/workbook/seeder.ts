/**
 * Seeder — builds the technique workbook from a technique source.
 *
 * Produces three sheets in a relational layout:
 *   techniques              (techniqueID, name, isSubtechnique, platforms, description)
 *   techniquesToDataSources (techniqueID, dataSourceName)
 *   dataSources             (dataSourceName)
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import * as XLSX from 'xlsx';

import { matchesPlatformFilter } from '../knowledge/mitre-attack/platforms.js';
import type { TechniqueSource } from '../knowledge/mitre-attack/technique-source.js';
import type { AttackDomain, AttackTechnique, PlatformFilter } from '../types/mitre-attack.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('seeder');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const SHEET_HEADERS = {
  techniques: ['techniqueID', 'name', 'isSubtechnique', 'platforms', 'description'],
  techniquesToDataSources: ['techniqueID', 'dataSourceName'],
  dataSources: ['dataSourceName'],
} as const;

export type SheetName = keyof typeof SHEET_HEADERS;

/** Sheet order in the written workbook. */
export const SHEET_NAMES: readonly SheetName[] = [
  'techniques',
  'techniquesToDataSources',
  'dataSources',
];

export type SheetRow = string[];

export type SkipReason = 'revoked' | 'deprecated' | 'subtechnique' | 'platform';

export interface SkippedTechnique {
  id: string;
  reason: SkipReason;
}

export interface SeedResult {
  /** Rows per sheet, header row first. */
  sheets: Record<SheetName, SheetRow[]>;
  /** Techniques written to the techniques sheet. */
  techniqueCount: number;
  dataSourceCount: number;
  skipped: SkippedTechnique[];
}

// ---------------------------------------------------------------------------
// Record filter
// ---------------------------------------------------------------------------

/**
 * Decide whether a technique is written. Returns the reason when it is not.
 */
export function skipReason(
  technique: AttackTechnique,
  includeSubtechniques: boolean,
  platformFilter: PlatformFilter,
): SkipReason | null {
  if (technique.revoked) return 'revoked';
  if (technique.deprecated) return 'deprecated';
  if (technique.isSubtechnique && !includeSubtechniques) return 'subtechnique';
  if (!matchesPlatformFilter(technique.platforms, platformFilter)) return 'platform';
  return null;
}

// ---------------------------------------------------------------------------
// Seed
// ---------------------------------------------------------------------------

/**
 * Fetch the domain's techniques and lay them out as sheet rows.
 */
export async function seed(
  domain: AttackDomain,
  includeSubtechniques: boolean,
  platformFilter: PlatformFilter,
  source: TechniqueSource,
): Promise<SeedResult> {
  const techniques = await source.getTechniques(domain);
  if (techniques.length === 0) {
    logger.warn(`Technique source returned no techniques for ${domain}`);
  }
  return buildSheets(techniques, includeSubtechniques, platformFilter);
}

/**
 * Filter techniques and build the three sheets, preserving source order.
 */
export function buildSheets(
  techniques: readonly AttackTechnique[],
  includeSubtechniques: boolean,
  platformFilter: PlatformFilter,
): SeedResult {
  const techniqueRows: SheetRow[] = [[...SHEET_HEADERS.techniques]];
  const joinRows: SheetRow[] = [[...SHEET_HEADERS.techniquesToDataSources]];
  const dataSources = new Set<string>();
  const skipped: SkippedTechnique[] = [];

  for (const technique of techniques) {
    const reason = skipReason(technique, includeSubtechniques, platformFilter);
    if (reason) {
      logger.debug(`Skipping ${technique.id} (${reason})`);
      skipped.push({ id: technique.id, reason });
      continue;
    }

    techniqueRows.push([
      technique.id,
      technique.name,
      String(technique.isSubtechnique),
      technique.platforms.join(', '),
      technique.description ?? '',
    ]);

    for (const dataSource of technique.dataSources) {
      joinRows.push([technique.id, dataSource]);
      dataSources.add(dataSource);
    }
  }

  const dataSourceRows: SheetRow[] = [
    [...SHEET_HEADERS.dataSources],
    ...[...dataSources].map((name) => [name]),
  ];

  return {
    sheets: {
      techniques: techniqueRows,
      techniquesToDataSources: joinRows,
      dataSources: dataSourceRows,
    },
    techniqueCount: techniqueRows.length - 1,
    dataSourceCount: dataSources.size,
    skipped,
  };
}

// ---------------------------------------------------------------------------
// Workbook writer
// ---------------------------------------------------------------------------

export function toWorkbook(result: SeedResult): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  for (const name of SHEET_NAMES) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(result.sheets[name]), name);
  }
  return workbook;
}

/**
 * Write the seed result as an .xlsx workbook, creating parent directories.
 */
export async function writeWorkbook(result: SeedResult, outfile: string): Promise<void> {
  const data: Buffer = XLSX.write(toWorkbook(result), { type: 'buffer', bookType: 'xlsx' });
  await mkdir(dirname(outfile), { recursive: true });
  await writeFile(outfile, data);
  logger.debug(`Wrote ${data.length} bytes to ${outfile}`);
}
