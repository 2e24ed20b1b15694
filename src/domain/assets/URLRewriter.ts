import * as fs from 'fs';
import * as path from 'path';
import { RewriteError } from '../errors';
import { FetchResult, RewriteMap, TEXT_KINDS } from '../models/types';
import { LoggingService } from '../../services/LoggingService';
import { ReferenceScanner } from './ReferenceScanner';
import { toLocalReference } from './URLClassifier';

export interface RewriteOutcome {
  localPath: string;
  /** Number of references replaced */
  replacements: number;
  /** Absolute references still pointing at the network */
  unresolved: string[];
  error?: RewriteError;
}

/**
 * Rewrites remote URLs inside captured text assets to their local paths.
 *
 * Each mapped URL is matched verbatim and in three encoded forms: with `&`
 * written as `&amp;`, with `/` escaped as `\/`, and protocol-relative. A
 * match must not run on into further URL characters, so `/app.js` never
 * rewrites part of `/app.json` and `/p?a=1` never part of `/p?a=1&b=2`.
 * Longer URLs take precedence.
 */
export class URLRewriter {
  private readonly lookup = new Map<string, string>();
  private readonly pattern: RegExp | null;
  private readonly scanner: ReferenceScanner;
  private readonly logger?: LoggingService;

  /**
   * @param rewriteMap - Sealed map of fetched URLs to local paths
   * @param logger - Logger for rewrite progress (optional)
   * @param scanner - Finds references left pointing at the network
   */
  constructor(rewriteMap: RewriteMap, logger?: LoggingService, scanner: ReferenceScanner = new ReferenceScanner()) {
    this.logger = logger;
    this.scanner = scanner;

    const protocolRelative = new Set<string>();
    for (const url of [...rewriteMap.keys()].sort()) {
      const localPath = rewriteMap.get(url);
      if (localPath === undefined) continue;
      const reference = toLocalReference(localPath);

      this.addVariant(url, reference);
      this.addVariant(url.replace(/&/g, '&amp;'), reference);
      this.addVariant(url.replace(/\//g, '\\/'), reference);
      if (/^https?:\/\/[^/?#]+\/$/.test(url)) {
        // Site roots are often written without their trailing slash
        this.addVariant(url.slice(0, -1), reference);
      }

      const relative = url.slice(url.indexOf('//'));
      if (this.addVariant(relative, reference)) {
        protocolRelative.add(relative);
      }
    }

    const alternatives = [...this.lookup.keys()]
      .sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0))
      .map(variant => {
        const escaped = escapeRegExp(variant);
        return protocolRelative.has(variant) ? `(?<![:\\w\\\\])${escaped}` : escaped;
      });

    // A match may not run on into more path characters, nor into another
    // query or matrix parameter (`&b=2`, `&amp;b=2`, `;jsessionid=1`)
    this.pattern =
      alternatives.length > 0
        ? new RegExp(
            `(?:${alternatives.join('|')})(?![\\w\\-.~%/+=:\\\\])(?![&;](?:amp;)?[\\w.\\-%]*=)`,
            'g'
          )
        : null;
  }

  /**
   * Replace every mapped URL in the text; unmapped URLs are left untouched
   * @param text - Decoded HTML, CSS or JS
   * @returns The rewritten text and the number of replacements made
   */
  public rewriteText(text: string): { text: string; replacements: number } {
    if (!this.pattern) {
      return { text, replacements: 0 };
    }

    let replacements = 0;
    const rewritten = text.replace(this.pattern, match => {
      const reference = this.lookup.get(match);
      if (reference === undefined) return match;
      replacements++;
      return reference;
    });

    return { text: rewritten, replacements };
  }

  /**
   * Rewrite the stored copy of a fetched text asset in place
   * @param result - Fetch result of the asset
   * @param outRoot - Directory holding the captured files
   * @returns undefined for entries that are not rewritten (failed, skipped, binary)
   * @throws RewriteError if the content is not valid UTF-8 or cannot be read or written
   */
  public async rewriteFile(result: FetchResult, outRoot: string): Promise<RewriteOutcome | undefined> {
    const { entry } = result;
    if (result.status !== 'ok' || !TEXT_KINDS.includes(entry.kind)) {
      return undefined;
    }

    const target = path.join(outRoot, ...entry.localPath.split('/'));

    let bytes: Buffer;
    try {
      bytes = result.bytes ?? (await fs.promises.readFile(target));
    } catch (error) {
      throw new RewriteError(`cannot read ${entry.localPath}`, entry.localPath, { cause: error });
    }

    let original: string;
    try {
      original = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
    } catch (error) {
      throw new RewriteError(`${entry.localPath} is not valid UTF-8 text`, entry.localPath, { cause: error });
    }

    const { text, replacements } = this.rewriteText(original);
    if (replacements > 0) {
      try {
        await fs.promises.writeFile(target, text, 'utf-8');
      } catch (error) {
        throw new RewriteError(`cannot write ${entry.localPath}`, entry.localPath, { cause: error });
      }
    }

    return {
      localPath: entry.localPath,
      replacements,
      unresolved: this.scanner.scan(text, entry.kind),
    };
  }

  /**
   * Rewrite every eligible result. A RewriteError is logged and recorded on
   * its outcome; the file keeps its fetched bytes.
   */
  public async rewriteAll(results: readonly FetchResult[], outRoot: string): Promise<RewriteOutcome[]> {
    const outcomes: RewriteOutcome[] = [];

    for (const result of results) {
      try {
        const outcome = await this.rewriteFile(result, outRoot);
        if (!outcome) continue;

        outcomes.push(outcome);
        if (outcome.replacements > 0) {
          this.logger?.debug(`Rewrote ${outcome.replacements} references in ${outcome.localPath}`);
        }
        if (outcome.unresolved.length > 0) {
          this.logger?.debug(`${outcome.localPath} still references ${outcome.unresolved.length} remote URLs`, {
            unresolved: outcome.unresolved.slice(0, 20),
          });
        }
      } catch (error) {
        if (!(error instanceof RewriteError)) throw error;
        this.logger?.warn(`Left ${error.localPath} as fetched: ${error.message}`);
        outcomes.push({ localPath: error.localPath, replacements: 0, unresolved: [], error });
      }
    }

    return outcomes;
  }

  /**
   * @returns true if the variant was new
   */
  private addVariant(variant: string, reference: string): boolean {
    if (this.lookup.has(variant)) return false;
    this.lookup.set(variant, reference);
    return true;
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}
