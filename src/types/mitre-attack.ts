/**
 * MITRE ATT&CK types for technique and data-source records.
 */

export const ATTACK_DOMAINS = ['enterprise-attack', 'mobile-attack', 'ics-attack'] as const;

export type AttackDomain = (typeof ATTACK_DOMAINS)[number];

export interface AttackTechnique {
  readonly id: string;                    // e.g., "T1059.001"
  readonly name: string;                  // e.g., "PowerShell"
  readonly description?: string;
  readonly isSubtechnique: boolean;
  readonly platforms: readonly string[];  // e.g., ["Windows"]
  readonly dataSources: readonly string[]; // e.g., ["Process: Process Creation"]
  readonly revoked: boolean;
  readonly deprecated: boolean;
}

/** Allowed-platform set computed once per invocation. */
export type PlatformFilter = ReadonlySet<string>;

const DOMAIN_NAMES: readonly string[] = ATTACK_DOMAINS;

export function isAttackDomain(value: string): value is AttackDomain {
  return DOMAIN_NAMES.includes(value);
}
