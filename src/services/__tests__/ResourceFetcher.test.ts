import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ResourceFetcher } from '../ResourceFetcher';
import { RewriteMapAccumulator } from '../../domain/assets/RewriteMapAccumulator';
import { FetchError } from '../../domain/errors';
import { ManifestEntry } from '../../domain/models/types';
import { Origin, closedPort, startOrigin } from './helpers/originServer';

describe('ResourceFetcher', () => {
  let origin: Origin;
  let outRoot: string;

  const entry = (urlPath: string, localPath: string, kind: ManifestEntry['kind'] = 'other'): ManifestEntry => ({
    url: `${origin.baseUrl}${urlPath}`,
    localPath,
    kind,
  });

  beforeEach(async () => {
    outRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'fetcher-'));
    origin = await startOrigin({
      '/index.html': { body: '<h1>home</h1>', contentType: 'text/html' },
      '/css/site.css': { body: 'body{}', contentType: 'text/css' },
      '/flaky.js': { status: [503, 200], body: 'ok()', contentType: 'application/javascript' },
      '/broken.js': { status: 500, body: 'boom' },
      '/gone.png': { status: 404 },
      '/about': { body: '<p>about</p>', contentType: 'text/html' },
      ...Object.fromEntries(
        Array.from({ length: 6 }, (_, i) => [`/slow/${i}.txt`, { body: `slow ${i}`, delayMs: 40 }] as const)
      ),
    });
  });

  afterEach(async () => {
    await origin.close();
    fs.rmSync(outRoot, { recursive: true, force: true });
  });

  const createFetcher = (overrides: { concurrency?: number; skipExisting?: boolean; retryDelayMs?: number } = {}) =>
    new ResourceFetcher({ outRoot, retryDelayMs: 1, timeoutMs: 5000, ...overrides });

  it('should write fetched bytes under the output root and record them', async () => {
    const accumulator = new RewriteMapAccumulator();
    const entries = [entry('/index.html', 'index.html', 'html'), entry('/css/site.css', 'css/site.css', 'css')];

    const results = await createFetcher().fetchAll(entries, accumulator);

    expect(results.map(result => [result.status, result.source, result.httpStatus])).toEqual([
      ['ok', 'network', 200],
      ['ok', 'network', 200],
    ]);
    expect(results[0].bytes?.toString()).toBe('<h1>home</h1>');
    expect(fs.readFileSync(path.join(outRoot, 'css', 'site.css'), 'utf-8')).toBe('body{}');
    expect(accumulator.seal()).toEqual(
      new Map([
        [`${origin.baseUrl}/index.html`, 'index.html'],
        [`${origin.baseUrl}/css/site.css`, 'css/site.css'],
      ])
    );
  });

  it('should never have more than the configured number of requests in flight', async () => {
    const entries = Array.from({ length: 6 }, (_, i) => entry(`/slow/${i}.txt`, `slow/${i}.txt`));

    const results = await createFetcher({ concurrency: 2 }).fetchAll(entries, new RewriteMapAccumulator());

    expect(results.every(result => result.status === 'ok')).toBe(true);
    expect(origin.maxInFlight()).toBeLessThanOrEqual(2);
  });

  it('should retry 5xx responses and succeed when the server recovers', async () => {
    const [result] = await createFetcher().fetchAll([entry('/flaky.js', 'flaky.js', 'js')], new RewriteMapAccumulator());

    expect(result.status).toBe('ok');
    expect(result.attempts).toBe(2);
    expect(origin.hits('/flaky.js')).toBe(2);
  });

  it('should give up after the retry bound and keep fetching the other entries', async () => {
    const accumulator = new RewriteMapAccumulator();
    const entries = [entry('/broken.js', 'broken.js', 'js'), entry('/index.html', 'index.html', 'html')];

    const [broken, page] = await createFetcher().fetchAll(entries, accumulator);

    expect(broken.status).toBe('failed');
    expect(broken.httpStatus).toBe(500);
    expect(broken.attempts).toBe(3);
    expect(broken.error).toBeInstanceOf(FetchError);
    expect(origin.hits('/broken.js')).toBe(3);
    expect(fs.existsSync(path.join(outRoot, 'broken.js'))).toBe(false);
    expect(page.status).toBe('ok');
    expect([...accumulator.seal().keys()]).toEqual([`${origin.baseUrl}/index.html`]);
  });

  it('should not retry 4xx responses', async () => {
    const [result] = await createFetcher().fetchAll([entry('/gone.png', 'gone.png', 'image')], new RewriteMapAccumulator());

    expect(result.status).toBe('failed');
    expect(result.httpStatus).toBe(404);
    expect(result.attempts).toBe(1);
    expect(origin.hits('/gone.png')).toBe(1);
  });

  it('should retry connection errors up to the bound', async () => {
    const port = await closedPort();
    const unreachable: ManifestEntry = { url: `http://127.0.0.1:${port}/x.js`, localPath: 'x.js', kind: 'js' };

    const [result] = await createFetcher().fetchAll([unreachable], new RewriteMapAccumulator());

    expect(result.status).toBe('failed');
    expect(result.attempts).toBe(3);
    expect(result.httpStatus).toBeUndefined();
    expect(result.error).toBeInstanceOf(FetchError);
  });

  it('should skip entries whose file already exists without a request', async () => {
    fs.writeFileSync(path.join(outRoot, 'index.html'), 'cached');
    const accumulator = new RewriteMapAccumulator();

    const [result] = await createFetcher({ skipExisting: true }).fetchAll(
      [entry('/index.html', 'index.html', 'html')],
      accumulator
    );

    expect(result).toMatchObject({ status: 'ok', source: 'existing', attempts: 0 });
    expect(origin.totalHits()).toBe(0);
    expect(fs.readFileSync(path.join(outRoot, 'index.html'), 'utf-8')).toBe('cached');
    expect(accumulator.size).toBe(1);
  });

  it('should issue no requests once the signal has aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const results = await createFetcher().fetchAll(
      [entry('/index.html', 'index.html', 'html'), entry('/css/site.css', 'css/site.css', 'css')],
      new RewriteMapAccumulator(),
      controller.signal
    );

    expect(results.map(result => result.status)).toEqual(['failed', 'failed']);
    expect(results[0].error).toBeInstanceOf(FetchError);
    expect(origin.totalHits()).toBe(0);
  });

  it('should stop retrying when the signal aborts during the backoff', async () => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), 100);

    const [result] = await createFetcher({ retryDelayMs: 300 }).fetchAll(
      [entry('/broken.js', 'broken.js', 'js')],
      new RewriteMapAccumulator(),
      controller.signal
    );
    clearTimeout(timer);

    expect(result.status).toBe('failed');
    expect(result.attempts).toBe(1);
    expect(result.error).toBeInstanceOf(FetchError);
    expect(result.error instanceof FetchError && result.error.details.cancelled).toBe(true);
    expect(origin.hits('/broken.js')).toBe(1);
  });

  it('should take the kind of an untyped entry from the response Content-Type', async () => {
    const [page, text] = await createFetcher().fetchAll(
      [entry('/about', 'about'), entry('/slow/0.txt', 'slow/0.txt')],
      new RewriteMapAccumulator()
    );

    expect(page.entry).toEqual({ url: `${origin.baseUrl}/about`, localPath: 'about', kind: 'html' });
    expect(text.entry.kind).toBe('other');
  });

  it('should keep a declared kind whatever the Content-Type says', async () => {
    const [result] = await createFetcher().fetchAll([entry('/about', 'about.txt', 'js')], new RewriteMapAccumulator());

    expect(result.entry.kind).toBe('js');
  });

  it('should reject a non-positive concurrency', () => {
    expect(() => new ResourceFetcher({ outRoot, concurrency: 0 })).toThrow(RangeError);
  });
});

describe('RewriteMapAccumulator', () => {
  it('should refuse new entries once sealed', () => {
    const accumulator = new RewriteMapAccumulator();
    accumulator.record('https://example.com/', 'index.html');

    const map = accumulator.seal();

    expect(map.get('https://example.com/')).toBe('index.html');
    expect(accumulator.isSealed()).toBe(true);
    expect(() => accumulator.record('https://example.com/a.js', 'a.js')).toThrow('Rewrite map is sealed');
  });
});
