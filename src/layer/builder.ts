/**
 * ATT&CK Navigator layer assembly.
 *
 * Every call starts from a fresh template so that layers built in the same
 * process never share nested objects.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { AttackDomain, PlatformFilter } from '../types/mitre-attack.js';
import type { LayerDocument, LayerTechnique } from '../types/layer.js';

/** ATT&CK Navigator format versions the template targets. */
export const NAVIGATOR_VERSIONS = {
  attack: '8',
  navigator: '4.2',
  layer: '4.1',
} as const;

export const DEFAULT_LAYER_NAME = 'attack-workbook Layer';

export const DEFAULT_GRADIENT_COLORS = ['#ff6666', '#ffe766', '#8ec843'] as const;

export interface LayerOptions {
  name: string;
  domain: AttackDomain;
  description: string;
  platformFilter: PlatformFilter;
}

/**
 * Navigator layer defaults. Key order here is the key order of the written
 * file.
 */
export function createLayerTemplate(): LayerDocument {
  return {
    versions: { ...NAVIGATOR_VERSIONS },
    domain: 'enterprise-attack',
    description: '',
    name: DEFAULT_LAYER_NAME,
    filters: { platforms: [] },
    sorting: 0,
    layout: {
      layout: 'side',
      showID: 'false',
      showName: 'true',
    },
    hideDisabled: 'false',
    gradient: {
      colors: [...DEFAULT_GRADIENT_COLORS],
      minValue: 0,
      maxValue: 100,
    },
    legendItems: [],
    metadata: [],
    showTacticRowBackground: 'false',
    tacticRowBackground: '#dddddd',
    selectTechniquesAcrossTactics: 'true',
    selectSubtechniquesWithParent: 'false',
    techniques: [],
  };
}

export function buildLayer(
  techniques: readonly LayerTechnique[],
  options: LayerOptions,
): LayerDocument {
  const layer = createLayerTemplate();
  layer.name = options.name;
  layer.domain = options.domain;
  layer.description = options.description;
  layer.filters.platforms = [...options.platformFilter];
  layer.techniques = techniques.map((t) => ({ ...t }));
  return layer;
}

export function serializeLayer(layer: LayerDocument): string {
  return `${JSON.stringify(layer, null, 2)}\n`;
}

/**
 * Write a layer file, creating parent directories.
 */
export async function writeLayer(layer: LayerDocument, outfile: string): Promise<void> {
  await mkdir(dirname(outfile), { recursive: true });
  await writeFile(outfile, serializeLayer(layer), 'utf-8');
}
