import axios, { AxiosInstance } from 'axios';
import * as fs from 'fs';
import * as path from 'path';
import { kindFromMimeType } from '../domain/assets/AssetKinds';
import { FetchError } from '../domain/errors';
import { RewriteMapAccumulator } from '../domain/assets/RewriteMapAccumulator';
import { FetchResult, ManifestEntry } from '../domain/models/types';
import { LoggingService } from './LoggingService';

export interface ResourceFetcherOptions {
  /** Directory that receives downloaded files */
  outRoot: string;
  /** Maximum requests in flight */
  concurrency: number;
  /** Total attempts per entry, first request included */
  maxAttempts: number;
  /** Backoff unit; attempt n waits n times this before retrying */
  retryDelayMs: number;
  /** Per-request timeout */
  timeoutMs: number;
  /** Treat an existing target file as already captured */
  skipExisting: boolean;
  userAgent: string;
}

export const DEFAULT_FETCHER_OPTIONS: Omit<ResourceFetcherOptions, 'outRoot'> = {
  concurrency: 8,
  maxAttempts: 3,
  retryDelayMs: 500,
  timeoutMs: 30000,
  skipExisting: false,
  userAgent: 'offline-capture/1.0 (+local mirror)',
};

type AttemptOutcome =
  | { ok: true; bytes: Buffer; httpStatus: number; attempts: number; contentType?: string }
  | { ok: false; error: FetchError };

/**
 * Downloads manifest entries with a bounded pool of workers.
 * Entries are independent: a failure is recorded on its result and never
 * stops the other workers.
 */
export class ResourceFetcher {
  private options: ResourceFetcherOptions;
  private client: AxiosInstance;
  private logger?: LoggingService;

  /**
   * Creates a new ResourceFetcher instance
   * @param options - Fetch settings; `outRoot` is required, the rest default
   * @param logger - Logger for per-entry progress (optional)
   * @param client - axios instance to use instead of a fresh one
   * @throws RangeError on a non-positive concurrency or attempt bound
   */
  constructor(
    options: Partial<ResourceFetcherOptions> & Pick<ResourceFetcherOptions, 'outRoot'>,
    logger?: LoggingService,
    client?: AxiosInstance
  ) {
    this.options = { ...DEFAULT_FETCHER_OPTIONS, ...options };
    if (!Number.isInteger(this.options.concurrency) || this.options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${this.options.concurrency}`);
    }
    if (!Number.isInteger(this.options.maxAttempts) || this.options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.options.maxAttempts}`);
    }

    this.logger = logger;
    this.client =
      client ??
      axios.create({
        timeout: this.options.timeoutMs,
        maxRedirects: 5,
        headers: {
          'User-Agent': this.options.userAgent,
        },
      });
  }

  /**
   * Fetch every entry, at most `concurrency` at a time.
   * Once the signal aborts, entries not yet started are recorded as cancelled
   * failures and requests already in flight run to completion.
   * @param entries - Entries to fetch
   * @param accumulator - Receives the local path of every stored entry
   * @param signal - Stops new requests and retries when aborted
   * @returns One result per entry, in entry order
   */
  public async fetchAll(
    entries: readonly ManifestEntry[],
    accumulator: RewriteMapAccumulator,
    signal?: AbortSignal
  ): Promise<FetchResult[]> {
    const results: FetchResult[] = new Array<FetchResult>(entries.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < entries.length) {
        const index = next++;
        const entry = entries[index];
        results[index] = signal?.aborted
          ? this.cancelled(entry, 0)
          : await this.fetchEntry(entry, accumulator, signal);
      }
    };

    const workerCount = Math.min(this.options.concurrency, entries.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return results;
  }

  /**
   * Fetch a single entry and write it under the output root. Never rejects.
   */
  public async fetchEntry(
    entry: ManifestEntry,
    accumulator: RewriteMapAccumulator,
    signal?: AbortSignal
  ): Promise<FetchResult> {
    const target = this.getTargetPath(entry);

    if (this.options.skipExisting && fs.existsSync(target)) {
      this.logger?.debug(`Skipping existing ${entry.localPath}`);
      accumulator.record(entry.url, entry.localPath);
      return { entry, status: 'ok', source: 'existing', attempts: 0 };
    }

    const outcome = await this.download(entry.url, signal);
    if (!outcome.ok) {
      const { error } = outcome;
      this.logger?.error(`Failed to fetch ${entry.url}: ${error.message}`, error);
      return {
        entry,
        status: 'failed',
        httpStatus: error.details.httpStatus,
        attempts: error.details.attempts,
        error,
      };
    }

    try {
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(target, outcome.bytes);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger?.error(`Failed to write ${entry.localPath}`, cause);
      return { entry, status: 'failed', httpStatus: outcome.httpStatus, attempts: outcome.attempts, error: cause };
    }

    accumulator.record(entry.url, entry.localPath);
    const fetched = this.refineKind(entry, outcome.contentType);
    this.logger?.info(`Fetched ${fetched.kind}: ${entry.url} (${outcome.bytes.length} bytes)`);

    return {
      entry: fetched,
      status: 'ok',
      source: 'network',
      bytes: outcome.bytes,
      httpStatus: outcome.httpStatus,
      attempts: outcome.attempts,
    };
  }

  /**
   * Absolute file path of an entry under the output root
   */
  public getTargetPath(entry: ManifestEntry): string {
    return path.join(this.options.outRoot, ...entry.localPath.split('/'));
  }

  /**
   * GET with retries: connection errors, timeouts and 5xx are retried with
   * linear backoff, any other status is final.
   */
  private async download(url: string, signal?: AbortSignal): Promise<AttemptOutcome> {
    let lastError: FetchError | undefined;

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      if (attempt > 1) {
        this.logger?.warn(`Retrying ${url} (attempt ${attempt}/${this.options.maxAttempts}): ${lastError?.message}`);
        await this.delay(this.options.retryDelayMs * (attempt - 1));
        // The signal may have fired while waiting
        if (signal?.aborted) {
          return { ok: false, error: this.cancelledError(url, attempt - 1) };
        }
      }

      try {
        const response = await this.client.get<ArrayBuffer>(url, {
          responseType: 'arraybuffer',
          validateStatus: () => true,
        });
        const httpStatus = response.status;

        if (httpStatus >= 200 && httpStatus < 300) {
          const contentType = response.headers['content-type'];
          return {
            ok: true,
            bytes: Buffer.from(response.data),
            httpStatus,
            attempts: attempt,
            contentType: typeof contentType === 'string' ? contentType : undefined,
          };
        }

        const transient = httpStatus >= 500;
        lastError = new FetchError(`HTTP ${httpStatus}`, url, { httpStatus, attempts: attempt, transient });
        if (!transient) {
          return { ok: false, error: lastError };
        }
      } catch (error) {
        const transient = this.isTransient(error);
        const reason = axios.isAxiosError(error)
          ? `${error.code ?? 'request error'}: ${error.message}`
          : error instanceof Error
            ? error.message
            : String(error);
        lastError = new FetchError(reason, url, { attempts: attempt, transient }, { cause: error });
        if (!transient) {
          return { ok: false, error: lastError };
        }
      }
    }

    return {
      ok: false,
      error: lastError ?? new FetchError('no attempt made', url, { attempts: 0, transient: false }),
    };
  }

  /**
   * Use the response Content-Type for entries whose kind the manifest left open
   * @param entry - The fetched entry
   * @param contentType - Content-Type header of the response, if any
   * @returns The entry, with its kind replaced when the header identifies one
   */
  private refineKind(entry: ManifestEntry, contentType?: string): ManifestEntry {
    if (entry.kind !== 'other' || !contentType) {
      return entry;
    }
    const kind = kindFromMimeType(contentType);
    return kind === 'other' ? entry : { ...entry, kind };
  }

  /**
   * Connection-level failures without an HTTP response are worth retrying
   */
  private isTransient(error: unknown): boolean {
    if (!axios.isAxiosError(error)) {
      return false;
    }
    if (error.response) {
      return error.response.status >= 500;
    }
    return error.code !== 'ERR_FR_TOO_MANY_REDIRECTS' && error.code !== 'ERR_INVALID_URL';
  }

  private cancelled(entry: ManifestEntry, attempts: number): FetchResult {
    const error = this.cancelledError(entry.url, attempts);
    this.logger?.warn(`Cancelled ${entry.url}`);
    return { entry, status: 'failed', attempts, error };
  }

  private cancelledError(url: string, attempts: number): FetchError {
    return new FetchError('cancelled before completion', url, { attempts, transient: false, cancelled: true });
  }

  private delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
