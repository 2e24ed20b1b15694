/**
 * Core type definitions for the offline capture toolkit
 */

/**
 * Coarse content category of a captured resource
 */
export type AssetKind = 'html' | 'css' | 'js' | 'image' | 'other';

export const ASSET_KINDS: readonly AssetKind[] = ['html', 'css', 'js', 'image', 'other'];

/**
 * Kinds whose bytes are scanned for embedded URLs
 */
export const TEXT_KINDS: readonly AssetKind[] = ['html', 'css', 'js'];

/**
 * One object of a manifest file as it appears on disk
 */
export interface ManifestFileEntry {
  url: string;
  /** Local path hint, relative to the output root */
  path?: string;
  /** Kind name or MIME type */
  type?: string;
  /** Outcome of the last run, written into rewritten manifests */
  status?: FetchStatus;
}

/**
 * A resource to capture, with its final local identity
 */
export interface ManifestEntry {
  /** Normalized remote URL (fragment removed) */
  url: string;
  /** Path relative to the output root, forward slashes */
  localPath: string;
  kind: AssetKind;
}

export type FetchStatus = 'ok' | 'skipped-tracker' | 'failed';

/**
 * Outcome of capturing a single entry
 */
export interface FetchResult {
  entry: ManifestEntry;
  status: FetchStatus;
  /** Response body, present for entries fetched over the network */
  bytes?: Buffer;
  httpStatus?: number;
  /** Where an ok entry's bytes came from */
  source?: 'network' | 'existing';
  /** Number of requests issued */
  attempts: number;
  error?: Error;
}

/**
 * Remote URL to local path, read-only once fetching completes
 */
export type RewriteMap = ReadonlyMap<string, string>;

/**
 * Counters reported at the end of a run
 */
export interface RunSummary {
  downloaded: number;
  skippedTracker: number;
  skippedExisting: number;
  failed: number;
  rewritten: number;
}

/**
 * Log levels
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
