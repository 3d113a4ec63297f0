import { describe, it, expect } from 'vitest';

import {
  ALL_PLATFORMS,
  DOMAIN_PLATFORMS,
  computePlatformFilter,
  matchesPlatformFilter,
  resolvePlatformFilter,
  validatePlatformFilter,
} from '@/knowledge/mitre-attack/platforms.js';
import { ValidationError } from '@/errors.js';
import { ATTACK_DOMAINS } from '@/types/mitre-attack.js';

const sorted = (set: ReadonlySet<string>): string[] => [...set].sort();

describe('computePlatformFilter', () => {
  it.each(ATTACK_DOMAINS)('defaults to the full platform set for %s', (domain) => {
    const filter = computePlatformFilter(domain);
    expect(sorted(filter)).toEqual([...DOMAIN_PLATFORMS[domain]].sort());
  });

  it.each(ATTACK_DOMAINS)('gives the same set for complementary include/exclude lists on %s', (domain) => {
    const all = DOMAIN_PLATFORMS[domain];
    const include = all.slice(0, 1);
    const exclude = all.filter((p) => !include.includes(p));

    expect(sorted(computePlatformFilter(domain, include))).toEqual(
      sorted(computePlatformFilter(domain, undefined, exclude)),
    );
  });

  it('takes the include list as-is', () => {
    expect(sorted(computePlatformFilter('enterprise-attack', ['Windows', 'Linux', 'Windows']))).toEqual([
      'Linux',
      'Windows',
    ]);
  });

  it('subtracts the exclude list from the domain set', () => {
    expect([...computePlatformFilter('enterprise-attack', undefined, ['PRE'])]).toEqual([
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
      'Office 365',
      'Azure AD',
      'Google Workspace',
      'Network',
    ]);
  });

  it('returns an empty set when every platform is excluded', () => {
    expect(computePlatformFilter('mobile-attack', undefined, ['Android', 'iOS']).size).toBe(0);
  });
});

describe('validatePlatformFilter', () => {
  it('rejects iOS for enterprise-attack', () => {
    expect(() => validatePlatformFilter('enterprise-attack', ['iOS'])).toThrow(ValidationError);
    expect(() => validatePlatformFilter('enterprise-attack', ['iOS'])).toThrow(
      '"iOS" is not a valid platform for enterprise-attack',
    );
  });

  it('rejects Linux for mobile-attack in an exclude list', () => {
    expect(() => validatePlatformFilter('mobile-attack', undefined, ['Linux'])).toThrow(
      '"Linux" is not a valid platform for mobile-attack',
    );
  });

  it('rejects PRE for ics-attack', () => {
    expect(() => validatePlatformFilter('ics-attack', ['Windows', 'PRE'])).toThrow(
      '"PRE" is not a valid platform for ics-attack',
    );
  });

  it('reports the first invalid entry', () => {
    expect(() => validatePlatformFilter('mobile-attack', ['Android', 'Windows', 'Linux'])).toThrow(
      '"Windows" is not a valid platform',
    );
  });

  it('accepts valid lists and no lists', () => {
    expect(() => validatePlatformFilter('ics-attack', ['Windows', 'Data Historian'])).not.toThrow();
    expect(() => validatePlatformFilter('enterprise-attack')).not.toThrow();
  });

  it('rejects include and exclude together', () => {
    expect(() => validatePlatformFilter('enterprise-attack', ['Windows'], ['Linux'])).toThrow(
      'cannot be combined',
    );
  });
});

describe('resolvePlatformFilter', () => {
  it('validates before computing', () => {
    expect(() => resolvePlatformFilter('mobile-attack', ['Windows'])).toThrow(ValidationError);
    expect(sorted(resolvePlatformFilter('mobile-attack', ['iOS']))).toEqual(['iOS']);
  });
});

describe('ALL_PLATFORMS', () => {
  it('lists each platform once across domains', () => {
    expect(ALL_PLATFORMS.filter((p) => p === 'Windows')).toHaveLength(1);
    expect(ALL_PLATFORMS).toHaveLength(25);
    expect(ALL_PLATFORMS).toContain('iOS');
    expect(ALL_PLATFORMS).toContain('Data Historian');
    expect(ALL_PLATFORMS).toContain('None');
  });
});

describe('matchesPlatformFilter', () => {
  it('matches when any platform is in the filter', () => {
    const filter = new Set(['Windows']);
    expect(matchesPlatformFilter(['Linux', 'Windows'], filter)).toBe(true);
    expect(matchesPlatformFilter(['Linux', 'macOS'], filter)).toBe(false);
    expect(matchesPlatformFilter([], filter)).toBe(false);
  });
});
