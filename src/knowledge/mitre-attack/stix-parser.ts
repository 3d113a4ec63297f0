/**
 * Parse a MITRE ATT&CK STIX 2.x bundle into technique records.
 *
 * Only `attack-pattern` objects carrying a `mitre-attack` external id are
 * kept. Revoked and deprecated techniques are returned with their flags set;
 * filtering them is the seeder's job.
 */

import { z } from 'zod';

import { SourceError } from '../../errors.js';
import type { AttackTechnique } from '../../types/mitre-attack.js';

// ---------------------------------------------------------------------------
// Bundle schema (lenient: only the fields we read are checked)
// ---------------------------------------------------------------------------

const ExternalReferenceSchema = z
  .object({
    source_name: z.string().optional(),
    external_id: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

const StixObjectSchema = z
  .object({
    type: z.string(),
    id: z.string(),
    name: z.string().optional(),
    description: z.string().optional(),
    external_references: z.array(ExternalReferenceSchema).optional(),
    x_mitre_platforms: z.array(z.string()).optional(),
    x_mitre_data_sources: z.array(z.string()).optional(),
    x_mitre_is_subtechnique: z.boolean().optional(),
    x_mitre_deprecated: z.boolean().optional(),
    revoked: z.boolean().optional(),
  })
  .passthrough();

export const StixBundleSchema = z.object({
  type: z.literal('bundle'),
  id: z.string(),
  objects: z.array(StixObjectSchema),
});

export type StixObject = z.infer<typeof StixObjectSchema>;
export type StixBundle = z.infer<typeof StixBundleSchema>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function getAttackId(obj: StixObject): string | undefined {
  return obj.external_references?.find(
    (ref) => ref.source_name === 'mitre-attack',
  )?.external_id;
}

/**
 * Validate raw JSON as a STIX bundle.
 */
export function parseStixBundle(raw: unknown): StixBundle {
  const result = StixBundleSchema.safeParse(raw);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'unknown';
    throw new SourceError(`Malformed STIX bundle (${where})`);
  }
  return result.data;
}

/**
 * Extract techniques from a bundle, in bundle order.
 */
export function extractTechniques(bundle: StixBundle): AttackTechnique[] {
  const techniques: AttackTechnique[] = [];

  for (const obj of bundle.objects) {
    if (obj.type !== 'attack-pattern') continue;

    const attackId = getAttackId(obj);
    if (!attackId) continue;

    techniques.push({
      id: attackId,
      name: obj.name ?? '',
      ...(obj.description !== undefined ? { description: obj.description } : {}),
      isSubtechnique: obj.x_mitre_is_subtechnique === true,
      platforms: obj.x_mitre_platforms ?? [],
      dataSources: obj.x_mitre_data_sources ?? [],
      revoked: obj.revoked === true,
      deprecated: obj.x_mitre_deprecated === true,
    });
  }

  return techniques;
}
