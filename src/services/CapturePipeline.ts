/**
 * Capture pipeline: load the manifest, drop trackers, fetch with a worker
 * pool, then (after every fetch has settled) rewrite text assets
 */

import { AxiosInstance } from 'axios';
import * as fs from 'fs';
import * as path from 'path';
import { RewriteMapAccumulator } from '../domain/assets/RewriteMapAccumulator';
import { ClassifierConfig, URLClassifier } from '../domain/assets/URLClassifier';
import { RewriteOutcome, URLRewriter } from '../domain/assets/URLRewriter';
import { loadManifest, writeManifest } from '../domain/manifest/ManifestLoader';
import { FetchResult, ManifestEntry, RewriteMap, RunSummary } from '../domain/models/types';
import { LoggingService } from './LoggingService';
import { DEFAULT_FETCHER_OPTIONS, ResourceFetcher } from './ResourceFetcher';

export interface CaptureOptions {
  manifestPath: string;
  outRoot: string;
  concurrency?: number;
  /** Rewrite references inside fetched HTML/CSS/JS (default: true) */
  rewrite?: boolean;
  skipExisting?: boolean;
  maxAttempts?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  classifier?: Partial<ClassifierConfig>;
  /** Where to write the manifest with final local paths, if anywhere */
  manifestOutPath?: string;
  /** Where to write the verification report, if anywhere */
  reportPath?: string;
  /** Stops new requests from being issued */
  signal?: AbortSignal;
}

export interface CaptureReport {
  summary: RunSummary;
  entries: ManifestEntry[];
  /** One result per entry, in manifest order */
  results: FetchResult[];
  rewriteMap: RewriteMap;
  rewrites: RewriteOutcome[];
  /** Local paths of ok entries whose file is absent after the run */
  missing: string[];
  /** 0 when no entry failed, 1 otherwise */
  exitCode: 0 | 1;
}

/**
 * Verification report written beside a run
 */
export interface VerifyReport {
  manifest: string;
  outRoot: string;
  entries: number;
  summary: RunSummary;
  downloadedBytes: number;
  failures: Array<{ url: string; httpStatus?: number; error?: string }>;
  skippedTrackers: string[];
  missing: string[];
  rewriteErrors: string[];
  rewrittenManifest?: string;
}

export class CapturePipeline {
  private options: CaptureOptions;
  private logger?: LoggingService;
  private client?: AxiosInstance;
  private classifier: URLClassifier;

  constructor(options: CaptureOptions, logger?: LoggingService, client?: AxiosInstance) {
    this.options = options;
    this.logger = logger;
    this.client = client;
    this.classifier = new URLClassifier(options.classifier);
  }

  /**
   * Run the whole capture. Entry-level failures are reported, not thrown.
   * @throws ManifestError before any request when the manifest is unusable
   */
  public async run(): Promise<CaptureReport> {
    const { outRoot } = this.options;

    const entries = loadManifest(this.options.manifestPath, this.classifier);
    this.logger?.info(`Loaded ${entries.length} entries from ${this.options.manifestPath}`);

    fs.mkdirSync(outRoot, { recursive: true });

    const trackerResults: FetchResult[] = [];
    const kept: ManifestEntry[] = [];
    for (const entry of entries) {
      const pattern = this.classifier.matchTracker(entry.url);
      if (pattern !== undefined) {
        this.logger?.debug(`Skipping tracker ${entry.url} (matched "${pattern}")`);
        trackerResults.push({ entry, status: 'skipped-tracker', attempts: 0 });
      } else {
        kept.push(entry);
      }
    }
    this.logger?.info(`Fetching ${kept.length} resources (${trackerResults.length} trackers skipped)`);

    const fetcher = new ResourceFetcher(
      {
        outRoot,
        concurrency: this.options.concurrency ?? DEFAULT_FETCHER_OPTIONS.concurrency,
        skipExisting: this.options.skipExisting ?? false,
        maxAttempts: this.options.maxAttempts ?? DEFAULT_FETCHER_OPTIONS.maxAttempts,
        retryDelayMs: this.options.retryDelayMs ?? DEFAULT_FETCHER_OPTIONS.retryDelayMs,
        timeoutMs: this.options.timeoutMs ?? DEFAULT_FETCHER_OPTIONS.timeoutMs,
      },
      this.logger?.child('fetch'),
      this.client
    );

    const accumulator = new RewriteMapAccumulator();
    const fetched = await fetcher.fetchAll(kept, accumulator, this.options.signal);
    const rewriteMap = accumulator.seal();

    let rewrites: RewriteOutcome[] = [];
    if (this.options.rewrite !== false) {
      const rewriter = new URLRewriter(rewriteMap, this.logger?.child('rewrite'));
      rewrites = await rewriter.rewriteAll(fetched, outRoot);
    }

    const byUrl = new Map([...trackerResults, ...fetched].map(result => [result.entry.url, result]));
    const results = entries.flatMap(entry => {
      const result = byUrl.get(entry.url);
      return result ? [result] : [];
    });

    const missing = results
      .filter(result => result.status === 'ok' && !fs.existsSync(fetcher.getTargetPath(result.entry)))
      .map(result => result.entry.localPath);

    const summary = summarize(results, rewrites);
    const report: CaptureReport = {
      summary,
      entries,
      results,
      rewriteMap,
      rewrites,
      missing,
      exitCode: summary.failed > 0 ? 1 : 0,
    };

    if (this.options.manifestOutPath) {
      writeManifest(this.options.manifestOutPath, entries, results);
      this.logger?.info(`Saved rewritten manifest to ${this.options.manifestOutPath}`);
    }
    if (this.options.reportPath) {
      this.writeReport(this.options.reportPath, report);
      this.logger?.info(`Wrote verify report to ${this.options.reportPath}`);
    }

    if (missing.length > 0) {
      this.logger?.warn(`${missing.length} captured files are missing from ${outRoot}`, { missing: missing.slice(0, 200) });
    }
    this.logger?.info(`Summary: ${formatSummary(summary)}`);

    return report;
  }

  private writeReport(reportPath: string, report: CaptureReport): void {
    const verify: VerifyReport = {
      manifest: path.resolve(this.options.manifestPath),
      outRoot: path.resolve(this.options.outRoot),
      entries: report.entries.length,
      summary: report.summary,
      downloadedBytes: report.results.reduce((total, result) => total + (result.bytes?.length ?? 0), 0),
      failures: report.results
        .filter(result => result.status === 'failed')
        .map(result => ({ url: result.entry.url, httpStatus: result.httpStatus, error: result.error?.message })),
      skippedTrackers: report.results
        .filter(result => result.status === 'skipped-tracker')
        .map(result => result.entry.url),
      missing: report.missing,
      rewriteErrors: report.rewrites.flatMap(outcome => (outcome.error ? [outcome.localPath] : [])),
      rewrittenManifest: this.options.manifestOutPath && path.resolve(this.options.manifestOutPath),
    };

    fs.mkdirSync(path.dirname(reportPath), { recursive: true });
    fs.writeFileSync(reportPath, JSON.stringify(verify, null, 2) + '\n', 'utf-8');
  }
}

/**
 * Count outcomes across a run
 */
export function summarize(results: readonly FetchResult[], rewrites: readonly RewriteOutcome[] = []): RunSummary {
  const summary: RunSummary = { downloaded: 0, skippedTracker: 0, skippedExisting: 0, failed: 0, rewritten: 0 };

  for (const result of results) {
    if (result.status === 'failed') summary.failed++;
    else if (result.status === 'skipped-tracker') summary.skippedTracker++;
    else if (result.source === 'existing') summary.skippedExisting++;
    else summary.downloaded++;
  }
  summary.rewritten = rewrites.filter(outcome => outcome.replacements > 0).length;

  return summary;
}

export function formatSummary(summary: RunSummary): string {
  return [
    `downloaded=${summary.downloaded}`,
    `skipped-tracker=${summary.skippedTracker}`,
    `skipped-existing=${summary.skippedExisting}`,
    `failed=${summary.failed}`,
    `rewritten=${summary.rewritten}`,
  ].join(' ');
}

