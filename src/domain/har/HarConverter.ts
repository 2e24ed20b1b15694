/**
 * Merges the requests recorded in a HAR capture into a manifest
 */

import * as fs from 'fs';
import { HarError } from '../errors';
import { guessMimeType } from '../assets/AssetKinds';
import { isHttpUrl, isRecord, normalizeUrl, readManifestFile, writeManifestFile } from '../manifest/ManifestLoader';
import { ManifestFileEntry } from '../models/types';
import { LoggingService } from '../../services/LoggingService';

/**
 * What the converter keeps of one HAR entry
 */
export interface HarResource {
  url: string;
  /** Response status; 0 when the browser recorded none */
  status: number;
  contentType: string;
}

export interface MergeResult {
  manifest: ManifestFileEntry[];
  added: number;
  /** Resources left out because their response was an error */
  skipped: number;
}

export interface ConvertResult extends Omit<MergeResult, 'manifest'> {
  outputPath: string;
  total: number;
}

const FALLBACK_CONTENT_TYPE = 'application/octet-stream';

/**
 * Read a HAR file from disk
 * @throws HarError if the file is missing or not JSON
 */
export function readHar(harPath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(harPath, 'utf-8');
  } catch (error) {
    const reason = (error as NodeJS.ErrnoException).code === 'ENOENT' ? 'file not found' : 'file is not readable';
    throw new HarError(reason, harPath, { cause: error });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new HarError(`invalid JSON (${error instanceof Error ? error.message : String(error)})`, harPath, { cause: error });
  }
}

/**
 * Pull url, status and content type out of every http(s) request in a HAR log
 * @throws HarError if there is no `log.entries` list
 */
export function extractHarResources(har: unknown): HarResource[] {
  if (!isRecord(har) || !isRecord(har.log) || !Array.isArray(har.log.entries)) {
    throw new HarError('expected an object with a log.entries list');
  }

  const entries: unknown[] = har.log.entries;
  const resources: HarResource[] = [];
  for (const entry of entries) {
    if (!isRecord(entry) || !isRecord(entry.request)) continue;

    const url = entry.request.url;
    if (typeof url !== 'string' || !isHttpUrl(url)) continue;

    const response: Record<string, unknown> = isRecord(entry.response) ? entry.response : {};
    const status = typeof response.status === 'number' ? response.status : 0;
    const content: Record<string, unknown> = isRecord(response.content) ? response.content : {};
    const mimeType = typeof content.mimeType === 'string' ? content.mimeType.trim() : '';

    resources.push({
      url,
      status,
      contentType: mimeType || guessMimeType(url) || FALLBACK_CONTENT_TYPE,
    });
  }

  return resources;
}

/**
 * Append resources whose URL the manifest does not list yet.
 * Existing entries are kept as they are and in their order; resources whose
 * response was an error (status 0 or >= 400) are not added.
 */
export function mergeResources(manifest: readonly ManifestFileEntry[], resources: readonly HarResource[]): MergeResult {
  const known = new Set(manifest.map(entry => normalizeUrl(entry.url)));
  const merged = [...manifest];
  let added = 0;
  let skipped = 0;

  for (const resource of resources) {
    const url = normalizeUrl(resource.url);
    if (known.has(url)) continue;

    if (resource.status === 0 || resource.status >= 400) {
      skipped++;
      continue;
    }

    known.add(url);
    merged.push({ url: resource.url, type: resource.contentType });
    added++;
  }

  return { manifest: merged, added, skipped };
}

/**
 * Merge a HAR capture into a manifest file
 * @param outputPath - Defaults to overwriting the existing manifest
 * @throws ManifestError for a bad manifest, HarError for a bad capture
 */
export function convertHar(
  manifestPath: string,
  harPath: string,
  outputPath: string = manifestPath,
  logger?: LoggingService
): ConvertResult {
  const manifest = readManifestFile(manifestPath);

  let resources: HarResource[];
  try {
    resources = extractHarResources(readHar(harPath));
  } catch (error) {
    if (error instanceof HarError && error.harPath === undefined) {
      throw new HarError(error.message, harPath);
    }
    throw error;
  }
  logger?.debug(`Found ${resources.length} http(s) requests in ${harPath}`);

  const merged = mergeResources(manifest, resources);
  writeManifestFile(outputPath, merged.manifest);
  logger?.info(`Updated ${outputPath}: ${merged.added} added, ${merged.manifest.length} total`);

  return {
    outputPath,
    added: merged.added,
    skipped: merged.skipped,
    total: merged.manifest.length,
  };
}
