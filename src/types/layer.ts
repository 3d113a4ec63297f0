/**
 * ATT&CK Navigator layer types.
 */

import type { AttackDomain } from './mitre-attack.js';

/** Header names recognized in an annotated worksheet, in output order. */
export const LAYER_COLUMNS = ['techniqueID', 'color', 'enabled', 'score', 'comment'] as const;

export type LayerColumn = (typeof LAYER_COLUMNS)[number];

/** A worksheet cell value as read from the workbook. */
export type CellValue = string | number | boolean | null;

/**
 * One technique entry of a layer. Optional keys are present exactly when the
 * matching header exists in the source sheet.
 */
export interface LayerTechnique {
  techniqueID: CellValue;
  color?: CellValue;
  enabled?: CellValue;
  score?: CellValue;
  comment?: CellValue;
}

/** Navigator serializes these flags as strings, not JSON booleans. */
export type StringBoolean = 'true' | 'false';

export interface LayerDocument {
  versions: { attack: string; navigator: string; layer: string };
  domain: AttackDomain;
  description: string;
  name: string;
  filters: { platforms: string[] };
  sorting: number;
  layout: { layout: 'side' | 'flat' | 'mini'; showID: StringBoolean; showName: StringBoolean };
  hideDisabled: StringBoolean;
  gradient: { colors: string[]; minValue: number; maxValue: number };
  legendItems: Array<{ label: string; color: string }>;
  metadata: Array<{ name: string; value: string }>;
  showTacticRowBackground: StringBoolean;
  tacticRowBackground: string;
  selectTechniquesAcrossTactics: StringBoolean;
  selectSubtechniquesWithParent: StringBoolean;
  techniques: LayerTechnique[];
}
