import * as crypto from 'crypto';
import * as path from 'path';
import { URL } from 'url';

/**
 * Analytics and tracking hosts left out of captures
 */
export const DEFAULT_TRACKER_PATTERNS: readonly string[] = [
  'googletagmanager.com',
  'google-analytics.com',
  'connect.facebook.net',
  'firebaseinstallations.googleapis.com',
  'firebase.googleapis.com',
  'storage.googleapis.com',
  'analytics.',
];

export interface ClassifierConfig {
  /** Substrings that mark a URL as tracking noise */
  trackerPatterns: readonly string[];
  /** File name used for directory-like paths */
  indexFilename: string;
  /** Length of hex tokens used in query and collision suffixes */
  hashLength: number;
  /** Store each host under its own top-level directory */
  hostDirectories: boolean;
}

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
  trackerPatterns: DEFAULT_TRACKER_PATTERNS,
  indexFilename: 'index.html',
  hashLength: 8,
  hostDirectories: false,
};

export type Classification =
  | { decision: 'keep'; localPath: string }
  | { decision: 'skip-tracker'; pattern: string };

/**
 * Decides which URLs to capture and where they live under the output root.
 * Every method is a pure function of its input and the configuration.
 */
export class URLClassifier {
  private readonly config: ClassifierConfig;

  constructor(config: Partial<ClassifierConfig> = {}) {
    this.config = { ...DEFAULT_CLASSIFIER_CONFIG, ...config };
  }

  /**
   * Find the first tracker pattern contained in the URL
   * @param url - Absolute URL to test
   * @returns The matching pattern, or undefined for URLs worth capturing
   */
  public matchTracker(url: string): string | undefined {
    return this.config.trackerPatterns.find(pattern => pattern !== '' && url.includes(pattern));
  }

  /**
   * Check whether a URL points at an analytics or tracking host
   * @param url - Absolute URL to test
   */
  public isTracker(url: string): boolean {
    return this.matchTracker(url) !== undefined;
  }

  /**
   * Decide whether to capture a URL and, if so, where it is stored
   * @param url - Absolute http(s) URL
   * @returns A skip decision naming the matched pattern, or the derived local path
   */
  public classify(url: string): Classification {
    const pattern = this.matchTracker(url);
    if (pattern !== undefined) {
      return { decision: 'skip-tracker', pattern };
    }
    return { decision: 'keep', localPath: this.deriveLocalPath(url) };
  }

  /**
   * Compute the local path of a URL, relative to the output root
   * @param url - Absolute http(s) URL
   * @returns A forward-slash path that never escapes the root
   */
  public deriveLocalPath(url: string): string {
    const parsed = new URL(url);
    const decoded = safeDecode(parsed.pathname);

    let localPath = this.normalizePath(decoded);
    if (localPath === '' || decoded.endsWith('/')) {
      localPath = localPath === '' ? this.config.indexFilename : `${localPath}/${this.config.indexFilename}`;
    }

    if (parsed.search.length > 1) {
      const token = this.hashToken(parsed.search.slice(1));
      const ext = path.posix.extname(localPath);
      const base = localPath.slice(0, localPath.length - ext.length);
      localPath = `${base}__q_${token}${ext || '.html'}`;
    }

    if (this.config.hostDirectories) {
      localPath = `${parsed.host}/${localPath}`;
    }

    return localPath;
  }

  /**
   * Collapse empty, `.` and `..` segments; the result never climbs above the root
   */
  public normalizePath(raw: string): string {
    const segments: string[] = [];
    for (const segment of raw.split('/')) {
      if (segment === '' || segment === '.') continue;
      if (segment === '..') {
        segments.pop();
        continue;
      }
      segments.push(segment);
    }
    return segments.join('/');
  }

  /**
   * Short hex token used in query and collision suffixes
   * @param value - Text to hash
   */
  public hashToken(value: string): string {
    return crypto.createHash('sha1').update(value, 'utf8').digest('hex').slice(0, this.config.hashLength);
  }

  /**
   * A fresh allocator sharing this classifier's hashing
   */
  public createAllocator(): PathAllocator {
    return new PathAllocator(value => this.hashToken(value));
  }
}

/**
 * Hands out local paths so that distinct URLs never share a file and no file
 * sits where another entry needs a directory. Allocation order decides which
 * URL keeps the plain path, so callers allocate in manifest order.
 */
export class PathAllocator {
  private readonly files = new Map<string, string>();
  private readonly directories = new Set<string>();

  constructor(private readonly hash: (value: string) => string) {}

  /**
   * Claim a local path for a URL
   * @param url - Normalized URL of the entry
   * @param candidate - Path the entry would like to use
   * @returns The candidate when free, otherwise a hash-suffixed alternative
   */
  public allocate(url: string, candidate: string): string {
    if (this.files.get(candidate) === url) {
      return candidate;
    }

    const token = this.hash(url);
    const options = [candidate, suffixBasename(candidate, token), `_collisions/${token}/${candidate}`];
    for (const option of options) {
      if (this.isFree(option)) {
        return this.claim(option, url);
      }
    }

    let attempt = 1;
    while (!this.isFree(`_collisions/${token}-${attempt}/${candidate}`)) {
      attempt++;
    }
    return this.claim(`_collisions/${token}-${attempt}/${candidate}`, url);
  }

  private isFree(localPath: string): boolean {
    if (this.files.has(localPath) || this.directories.has(localPath)) {
      return false;
    }
    return !ancestorsOf(localPath).some(dir => this.files.has(dir));
  }

  private claim(localPath: string, url: string): string {
    this.files.set(localPath, url);
    for (const dir of ancestorsOf(localPath)) {
      this.directories.add(dir);
    }
    return localPath;
  }
}

/**
 * Root-absolute reference to a local path, as written into rewritten assets
 */
export function toLocalReference(localPath: string): string {
  return '/' + localPath.split('/').map(encodeURIComponent).join('/');
}

function suffixBasename(localPath: string, token: string): string {
  const ext = path.posix.extname(localPath);
  return `${localPath.slice(0, localPath.length - ext.length)}__${token}${ext}`;
}

function ancestorsOf(localPath: string): string[] {
  const segments = localPath.split('/');
  const ancestors: string[] = [];
  for (let i = 1; i < segments.length; i++) {
    ancestors.push(segments.slice(0, i).join('/'));
  }
  return ancestors;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
