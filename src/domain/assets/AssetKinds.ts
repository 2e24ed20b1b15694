import mime from 'mime-types';
import { URL } from 'url';
import { ASSET_KINDS, AssetKind } from '../models/types';

/**
 * Resource type names browsers write into HAR captures
 */
const RESOURCE_TYPE_KINDS: Record<string, AssetKind> = {
  document: 'html',
  stylesheet: 'css',
  script: 'js',
  image: 'image',
};

/**
 * Map a MIME type (parameters allowed) to an asset kind
 */
export function kindFromMimeType(mimeType: string): AssetKind {
  const essence = mimeType.split(';')[0].trim().toLowerCase();

  if (essence === 'text/html' || essence === 'application/xhtml+xml') return 'html';
  if (essence === 'text/css') return 'css';
  if (essence.includes('javascript') || essence.includes('ecmascript')) return 'js';
  if (essence.startsWith('image/')) return 'image';
  return 'other';
}

/**
 * Guess a MIME type from the file extension of a URL's path
 */
export function guessMimeType(url: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return undefined;
  }
  const guessed = mime.lookup(pathname);
  return guessed === false ? undefined : guessed;
}

function isAssetKind(value: string): value is AssetKind {
  return (ASSET_KINDS as readonly string[]).includes(value);
}

/**
 * Determine the kind of a manifest entry from its declared type, falling back
 * to the URL's extension and then to the extension of its local path
 * @param url - Remote URL of the entry
 * @param type - Declared kind name, HAR resource type or MIME type
 * @param localPath - Local path the entry is stored under, if already derived
 * @returns 'other' when nothing identifies the content
 */
export function determineAssetKind(url: string, type?: string, localPath?: string): AssetKind {
  if (type) {
    const declared = type.trim().toLowerCase();
    if (isAssetKind(declared)) return declared;
    if (Object.hasOwn(RESOURCE_TYPE_KINDS, declared)) return RESOURCE_TYPE_KINDS[declared];
    if (declared.includes('/')) {
      const kind = kindFromMimeType(declared);
      if (kind !== 'other') return kind;
    }
  }

  const guessed = guessMimeType(url);
  if (guessed) return kindFromMimeType(guessed);

  // Site roots, directories and query pages are stored as .html
  const stored = localPath ? mime.lookup(localPath) : false;
  return stored ? kindFromMimeType(stored) : 'other';
}
