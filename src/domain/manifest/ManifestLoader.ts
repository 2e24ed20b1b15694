/**
 * Reads manifest files into capture entries and writes updated manifests back out
 */

import * as fs from 'fs';
import * as path from 'path';
import { URL } from 'url';
import { ManifestError } from '../errors';
import { determineAssetKind } from '../assets/AssetKinds';
import { URLClassifier } from '../assets/URLClassifier';
import { FetchResult, ManifestEntry, ManifestFileEntry } from '../models/types';

/**
 * Drop the fragment, which never reaches the server
 */
export function normalizeUrl(url: string): string {
  const parsed = new URL(url);
  parsed.hash = '';
  return parsed.href;
}

/**
 * Load a manifest file and assign every entry its local path
 * @throws ManifestError if the file is missing, unreadable or malformed
 */
export function loadManifest(manifestPath: string, classifier: URLClassifier): ManifestEntry[] {
  return buildEntries(readManifestFile(manifestPath), classifier);
}

/**
 * Read and validate a manifest file, keeping its on-disk shape
 */
export function readManifestFile(manifestPath: string): ManifestFileEntry[] {
  const raw = readManifestJson(manifestPath);
  try {
    return validateManifest(raw);
  } catch (error) {
    if (error instanceof ManifestError) {
      throw new ManifestError(error.message, manifestPath);
    }
    throw error;
  }
}

/**
 * Read and JSON-parse a manifest file without validating its entries
 */
export function readManifestJson(manifestPath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(manifestPath, 'utf-8');
  } catch (error) {
    const reason = (error as NodeJS.ErrnoException).code === 'ENOENT' ? 'file not found' : 'file is not readable';
    throw new ManifestError(reason, manifestPath, { cause: error });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ManifestError(`invalid JSON (${error instanceof Error ? error.message : String(error)})`, manifestPath, { cause: error });
  }
}

/**
 * Validate the on-disk shape of a manifest
 */
export function validateManifest(raw: unknown): ManifestFileEntry[] {
  if (!Array.isArray(raw)) {
    throw new ManifestError('top level must be a list of entries');
  }

  return raw.map((item: unknown, index): ManifestFileEntry => {
    if (!isRecord(item)) {
      throw new ManifestError(`entry ${index} is not an object`);
    }
    const { url, path: pathHint, type, status } = item;

    if (typeof url !== 'string' || url === '') {
      throw new ManifestError(`entry ${index} has no "url" string`);
    }
    if (!isHttpUrl(url)) {
      throw new ManifestError(`entry ${index} has an unsupported url: ${url}`);
    }
    if (pathHint !== undefined && typeof pathHint !== 'string') {
      throw new ManifestError(`entry ${index} has a non-string "path"`);
    }
    if (type !== undefined && typeof type !== 'string') {
      throw new ManifestError(`entry ${index} has a non-string "type"`);
    }

    const entry: ManifestFileEntry = { url };
    if (pathHint !== undefined) entry.path = pathHint;
    if (type !== undefined) entry.type = type;
    if (status === 'ok' || status === 'skipped-tracker' || status === 'failed') entry.status = status;
    return entry;
  });
}

/**
 * Turn a parsed manifest into entries, deduplicated by normalized URL.
 * Paths are allocated in manifest order, so they never depend on fetch timing.
 */
export function parseManifest(raw: unknown, classifier: URLClassifier): ManifestEntry[] {
  return buildEntries(validateManifest(raw), classifier);
}

function buildEntries(items: readonly ManifestFileEntry[], classifier: URLClassifier): ManifestEntry[] {
  const allocator = classifier.createAllocator();
  const seen = new Set<string>();
  const entries: ManifestEntry[] = [];

  for (const item of items) {
    const url = normalizeUrl(item.url);
    if (seen.has(url)) continue;
    seen.add(url);

    const hinted = item.path !== undefined ? classifier.normalizePath(item.path) : '';
    const candidate = hinted !== '' ? hinted : classifier.deriveLocalPath(url);

    // Trackers are never written, so they do not claim a path
    entries.push({
      url,
      localPath: classifier.isTracker(url) ? candidate : allocator.allocate(url, candidate),
      kind: determineAssetKind(url, item.type, candidate),
    });
  }

  return entries;
}

/**
 * Write a manifest reflecting final local paths (and outcomes, when known)
 */
export function writeManifest(
  outputPath: string,
  entries: readonly ManifestEntry[],
  results?: readonly FetchResult[]
): void {
  const resultByUrl = new Map(results?.map(result => [result.entry.url, result]));

  const manifest: ManifestFileEntry[] = entries.map(entry => {
    const result = resultByUrl.get(entry.url);
    // A fetched entry may have learned its kind from the response
    const item: ManifestFileEntry = { url: entry.url, path: entry.localPath, type: result?.entry.kind ?? entry.kind };
    if (result) item.status = result.status;
    return item;
  });

  writeManifestFile(outputPath, manifest);
}

export function writeManifestFile(outputPath: string, manifest: readonly ManifestFileEntry[]): void {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, JSON.stringify(manifest, null, 2) + '\n', 'utf-8');
}

/**
 * Default location of a rewritten manifest: `<name>_local.json` beside the source
 */
export function defaultRewrittenManifestPath(manifestPath: string): string {
  const parsed = path.parse(manifestPath);
  return path.join(parsed.dir, `${parsed.name}_local${parsed.ext || '.json'}`);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}
