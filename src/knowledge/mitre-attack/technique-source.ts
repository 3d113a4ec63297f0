/**
 * Technique sources for the seed command.
 *
 * A source returns the full, unfiltered technique list of a domain. The
 * remote source downloads the published STIX bundle; the file source reads
 * a bundle already on disk.
 */

import { readFile } from 'node:fs/promises';

import { SourceError } from '../../errors.js';
import type { AttackDomain, AttackTechnique } from '../../types/mitre-attack.js';
import type { SourceConfig } from '../../types/config.js';
import { createLogger } from '../../utils/logger.js';
import { extractTechniques, parseStixBundle } from './stix-parser.js';

const logger = createLogger('technique-source');

export interface TechniqueSource {
  /** Human-readable origin, for console output. */
  readonly description: string;
  getTechniques(domain: AttackDomain): Promise<AttackTechnique[]>;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

// ---------------------------------------------------------------------------
// Remote source
// ---------------------------------------------------------------------------

/**
 * Run a request and read its body within one time budget. When the budget
 * runs out the request is aborted and the call rejects with a
 * `TimeoutError`, even if the body is still streaming.
 */
export async function fetchWithTimeout<T>(
  url: string,
  fetchFn: FetchFn,
  timeoutMs: number,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      const error = new Error(`Request to ${url} timed out after ${timeoutMs}ms`);
      error.name = 'TimeoutError';
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      fetchFn(url, { signal: controller.signal }).then(read),
      timeout,
    ]);
  } finally {
    clearTimeout(timeoutId);
  }
}

async function readBundleJson(url: string, response: Response): Promise<unknown> {
  if (!response.ok) {
    throw new SourceError(
      `Failed to download ${url}: ${response.status} ${response.statusText}`,
      response.status,
    );
  }

  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new SourceError(
      `Response from ${url} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

export class RemoteTechniqueSource implements TechniqueSource {
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly config: SourceConfig,
    fetchFn?: FetchFn,
  ) {
    this.fetchFn = fetchFn ?? ((input, init) => fetch(input, init));
  }

  get description(): string {
    return this.config.stixBaseUrl;
  }

  bundleUrl(domain: AttackDomain): string {
    return `${this.config.stixBaseUrl}/${domain}/${domain}.json`;
  }

  async getTechniques(domain: AttackDomain): Promise<AttackTechnique[]> {
    const url = this.bundleUrl(domain);
    logger.debug(`Downloading ${url}`);

    let raw: unknown;
    try {
      raw = await fetchWithTimeout(url, this.fetchFn, this.config.fetchTimeoutMs, (response) =>
        readBundleJson(url, response),
      );
    } catch (err) {
      if (err instanceof SourceError) {
        throw err;
      }
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
        throw new SourceError(
          `Timed out after ${this.config.fetchTimeoutMs}ms downloading ${url}`,
        );
      }
      throw new SourceError(
        `Failed to download ${url}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const techniques = extractTechniques(parseStixBundle(raw));
    logger.debug(`Parsed ${techniques.length} techniques for ${domain}`);
    return techniques;
  }
}

// ---------------------------------------------------------------------------
// File source
// ---------------------------------------------------------------------------

/**
 * Reads a local STIX bundle. The bundle is assumed to belong to the
 * requested domain; nothing in a bundle names its domain reliably.
 */
export class FileTechniqueSource implements TechniqueSource {
  constructor(private readonly bundlePath: string) {}

  get description(): string {
    return this.bundlePath;
  }

  async getTechniques(domain: AttackDomain): Promise<AttackTechnique[]> {
    const text = await readFile(this.bundlePath, 'utf-8');

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new SourceError(
        `${this.bundlePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const techniques = extractTechniques(parseStixBundle(raw));
    logger.debug(`Parsed ${techniques.length} techniques for ${domain} from ${this.bundlePath}`);
    return techniques;
  }
}

// ---------------------------------------------------------------------------
// In-memory source
// ---------------------------------------------------------------------------

/**
 * Serves techniques already in memory, keyed by domain. Domains without an
 * entry yield an empty list.
 */
export class StaticTechniqueSource implements TechniqueSource {
  readonly description = 'in-memory';

  constructor(private readonly techniques: Partial<Record<AttackDomain, AttackTechnique[]>>) {}

  async getTechniques(domain: AttackDomain): Promise<AttackTechnique[]> {
    return [...(this.techniques[domain] ?? [])];
  }
}
