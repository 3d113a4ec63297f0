/**
 * Unit tests for the seed command.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Command } from 'commander';
import * as XLSX from 'xlsx';

import { registerSeedCommand, runSeed, type SeedOptions } from '@/cli/commands/seed.js';
import { StaticTechniqueSource } from '@/knowledge/mitre-attack/technique-source.js';
import { ValidationError } from '@/errors.js';
import { makeTechnique } from '../../../fixtures/techniques.js';

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

vi.mock('chalk', () => {
  const identity = (s: string) => s;
  return {
    default: {
      red: identity,
      green: identity,
      yellow: identity,
      cyan: identity,
      gray: identity,
      bold: Object.assign((s: string) => s, { cyan: identity }),
    },
  };
});

vi.mock('ora', () => ({
  default: () => ({
    start: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    info: vi.fn().mockReturnThis(),
  }),
}));

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function createSource(): StaticTechniqueSource {
  return new StaticTechniqueSource({
    'enterprise-attack': [
      makeTechnique('T1003', {
        platforms: ['Windows', 'Linux'],
        dataSources: ['Process: OS API Execution'],
      }),
      makeTechnique('T1086', { platforms: ['Windows'], revoked: true }),
      makeTechnique('T1548', { platforms: ['Linux'] }),
      makeTechnique('T1003.001', { platforms: ['Windows'] }),
    ],
  });
}

function options(overrides: Partial<SeedOptions> = {}): SeedOptions {
  return { domain: 'enterprise-attack', subtechniques: true, ...overrides };
}

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'attack-workbook-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('registerSeedCommand', () => {
  it('registers the seed command with its options', () => {
    const program = new Command();
    registerSeedCommand(program);

    const seedCmd = program.commands.find((c) => c.name() === 'seed');
    expect(seedCmd).toBeDefined();

    const optionNames = seedCmd?.options.map((o) => o.long);
    expect(optionNames).toEqual([
      '--domain',
      '--no-subtechniques',
      '--platformfilterin',
      '--platformfilterout',
      '--stix-file',
      '--verbose',
    ]);
  });
});

describe('runSeed', () => {
  it('writes only the Windows technique that is not revoked', async () => {
    const outfile = join(dir, 'techniques.xlsx');

    const result = await runSeed(
      outfile,
      options({ platformfilterin: ['Windows'], subtechniques: false }),
      createSource(),
    );

    expect(result.techniqueCount).toBe(1);
    expect(existsSync(outfile)).toBe(true);

    const workbook = XLSX.read(readFileSync(outfile), { type: 'buffer' });
    const rows = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets.techniques, { header: 1 });
    expect(rows).toHaveLength(2);
    expect(rows[1][0]).toBe('T1003');
  });

  it('includes subtechniques unless disabled', async () => {
    const result = await runSeed(join(dir, 'all.xlsx'), options(), createSource());
    expect(result.sheets.techniques.slice(1).map((row) => row[0])).toEqual([
      'T1003',
      'T1548',
      'T1003.001',
    ]);
  });

  it('reports the written technique count', async () => {
    const outfile = join(dir, 'count.xlsx');
    await runSeed(outfile, options({ subtechniques: false }), createSource());

    expect(console.log).toHaveBeenCalledWith(
      `  Excel workbook created at '${outfile}' with 2 techniques.`,
    );
  });

  it('rejects a platform from another domain before fetching', async () => {
    const source = createSource();
    const spy = vi.spyOn(source, 'getTechniques');
    const outfile = join(dir, 'never.xlsx');

    await expect(runSeed(outfile, options({ platformfilterin: ['iOS'] }), source)).rejects.toThrow(
      ValidationError,
    );
    expect(spy).not.toHaveBeenCalled();
    expect(existsSync(outfile)).toBe(false);
  });

  it('writes a header-only workbook when the source has no techniques', async () => {
    const outfile = join(dir, 'empty.xlsx');
    const result = await runSeed(outfile, options({ domain: 'ics-attack' }), createSource());

    expect(result.techniqueCount).toBe(0);
    const workbook = XLSX.read(readFileSync(outfile), { type: 'buffer' });
    expect(workbook.SheetNames).toEqual(['techniques', 'techniquesToDataSources', 'dataSources']);
  });
});
