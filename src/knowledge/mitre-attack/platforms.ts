/**
 * Valid ATT&CK platforms per domain, and the platform filter shared by the
 * seed and layer commands.
 */

import { ValidationError } from '../../errors.js';
import type { AttackDomain, PlatformFilter } from '../../types/mitre-attack.js';

// ---------------------------------------------------------------------------
// Platform sets
// ---------------------------------------------------------------------------

/**
 * Current platform names come first; the names older ATT&CK releases used
 * follow, so annotated sheets and filters written against them still work.
 */
export const DOMAIN_PLATFORMS: Readonly<Record<AttackDomain, readonly string[]>> = {
  'enterprise-attack': [
    'Linux',
    'macOS',
    'Windows',
    'Office Suite',
    'Identity Provider',
    'SaaS',
    'IaaS',
    'Network Devices',
    'Containers',
    'ESXi',
    // Legacy names
    'Office 365',
    'Azure AD',
    'Google Workspace',
    'Network',
    'PRE',
  ],
  'mobile-attack': ['Android', 'iOS'],
  'ics-attack': [
    'None',
    'Windows',
    // Legacy names
    'Control Server',
    'Data Historian',
    'Engineering Workstation',
    'Field Controller/RTU/PLC/IED',
    'Human-Machine Interface',
    'Input/Output Server',
    'Safety Instrumented System/Protection Relay',
  ],
};

/** Every platform of every domain, deduplicated, in declaration order. */
export const ALL_PLATFORMS: readonly string[] = [
  ...new Set(Object.values(DOMAIN_PLATFORMS).flat()),
];

export function getDomainPlatforms(domain: AttackDomain): ReadonlySet<string> {
  return new Set(DOMAIN_PLATFORMS[domain]);
}

// ---------------------------------------------------------------------------
// Filter computation
// ---------------------------------------------------------------------------

/**
 * Compute the allowed-platform set.
 *
 * An include list is taken as-is; an exclude list is subtracted from the
 * domain's platforms; with neither, the domain's full set is used.
 */
export function computePlatformFilter(
  domain: AttackDomain,
  include?: readonly string[],
  exclude?: readonly string[],
): PlatformFilter {
  if (include) {
    return new Set(include);
  }

  const platforms = getDomainPlatforms(domain);
  if (exclude) {
    const excluded = new Set(exclude);
    return new Set([...platforms].filter((p) => !excluded.has(p)));
  }

  return platforms;
}

/**
 * Check that every requested platform belongs to the domain. Throws on the
 * first invalid entry.
 */
export function validatePlatformFilter(
  domain: AttackDomain,
  include?: readonly string[],
  exclude?: readonly string[],
): void {
  if (include && exclude) {
    throw new ValidationError('Platform include and exclude filters cannot be combined');
  }

  const requested = include ?? exclude ?? [];
  const valid = getDomainPlatforms(domain);

  for (const platform of requested) {
    if (!valid.has(platform)) {
      throw new ValidationError(
        `"${platform}" is not a valid platform for ${domain}. Valid platforms: ${[...valid].join(', ')}`,
      );
    }
  }
}

/** Validate, then compute. */
export function resolvePlatformFilter(
  domain: AttackDomain,
  include?: readonly string[],
  exclude?: readonly string[],
): PlatformFilter {
  validatePlatformFilter(domain, include, exclude);
  return computePlatformFilter(domain, include, exclude);
}

/** True when the technique shares at least one platform with the filter. */
export function matchesPlatformFilter(
  platforms: readonly string[],
  filter: PlatformFilter,
): boolean {
  return platforms.some((p) => filter.has(p));
}
