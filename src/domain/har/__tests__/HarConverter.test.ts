import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { convertHar, extractHarResources, mergeResources } from '../HarConverter';
import { HarError, ManifestError } from '../../errors';

const harEntry = (url: string, status: number, mimeType?: string) => ({
  request: { method: 'GET', url },
  response: { status, content: mimeType === undefined ? { size: 0 } : { size: 0, mimeType } },
});

const sampleHar = {
  log: {
    version: '1.2',
    entries: [
      harEntry('https://example.com/', 200, 'text/html; charset=utf-8'),
      harEntry('data:image/png;base64,AAAA', 200, 'image/png'),
      harEntry('https://example.com/css/site.css', 200),
      harEntry('https://example.com/blob', 200, ''),
      harEntry('https://example.com/gone.js', 404, 'text/html'),
    ],
  },
};

describe('HarConverter', () => {
  describe('extractHarResources', () => {
    it('should keep http(s) requests with their status and content type', () => {
      expect(extractHarResources(sampleHar)).toEqual([
        { url: 'https://example.com/', status: 200, contentType: 'text/html; charset=utf-8' },
        { url: 'https://example.com/css/site.css', status: 200, contentType: 'text/css' },
        { url: 'https://example.com/blob', status: 200, contentType: 'application/octet-stream' },
        { url: 'https://example.com/gone.js', status: 404, contentType: 'text/html' },
      ]);
    });

    it('should skip entries without a request url', () => {
      const har = { log: { entries: [{ response: { status: 200 } }, 'junk', harEntry('https://example.com/a.js', 200)] } };

      expect(extractHarResources(har)).toEqual([
        { url: 'https://example.com/a.js', status: 200, contentType: 'application/javascript' },
      ]);
    });

    it('should reject documents without log.entries', () => {
      expect(() => extractHarResources({ log: {} })).toThrow(HarError);
      expect(() => extractHarResources([])).toThrow(HarError);
    });
  });

  describe('mergeResources', () => {
    it('should append only new, successful URLs after the existing entries', () => {
      const existing = [{ url: 'https://example.com/', type: 'html', path: 'home.html' }];

      const result = mergeResources(existing, [
        { url: 'https://example.com/', status: 200, contentType: 'text/html' },
        { url: 'https://example.com/app.js', status: 200, contentType: 'application/javascript' },
        { url: 'https://example.com/app.js#main', status: 200, contentType: 'application/javascript' },
        { url: 'https://example.com/gone.js', status: 404, contentType: 'text/html' },
        { url: 'https://example.com/blocked.js', status: 0, contentType: 'application/javascript' },
      ]);

      expect(result).toEqual({
        manifest: [
          { url: 'https://example.com/', type: 'html', path: 'home.html' },
          { url: 'https://example.com/app.js', type: 'application/javascript' },
        ],
        added: 1,
        skipped: 2,
      });
    });
  });

  describe('convertHar', () => {
    let tmpDir: string;
    let manifestPath: string;
    let harPath: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'har-'));
      manifestPath = path.join(tmpDir, 'capture.json');
      harPath = path.join(tmpDir, 'capture.har');
      fs.writeFileSync(manifestPath, JSON.stringify([{ url: 'https://example.com/' }]));
      fs.writeFileSync(harPath, JSON.stringify(sampleHar));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should write the merged manifest to the output path', () => {
      const outputPath = path.join(tmpDir, 'merged.json');

      const result = convertHar(manifestPath, harPath, outputPath);

      expect(result).toEqual({ outputPath, added: 2, skipped: 1, total: 3 });
      expect(JSON.parse(fs.readFileSync(outputPath, 'utf-8'))).toEqual([
        { url: 'https://example.com/' },
        { url: 'https://example.com/css/site.css', type: 'text/css' },
        { url: 'https://example.com/blob', type: 'application/octet-stream' },
      ]);
      expect(JSON.parse(fs.readFileSync(manifestPath, 'utf-8'))).toEqual([{ url: 'https://example.com/' }]);
    });

    it('should overwrite the existing manifest when no output is given', () => {
      convertHar(manifestPath, harPath);

      expect(JSON.parse(fs.readFileSync(manifestPath, 'utf-8'))).toHaveLength(3);
    });

    it('should report a missing HAR file', () => {
      const missing = path.join(tmpDir, 'missing.har');

      expect(() => convertHar(manifestPath, missing)).toThrow(new HarError('file not found', missing));
    });

    it('should report a malformed HAR with its path', () => {
      fs.writeFileSync(harPath, JSON.stringify({ entries: [] }));

      expect(() => convertHar(manifestPath, harPath)).toThrow(`${harPath}: expected an object with a log.entries list`);
    });

    it('should report a malformed manifest', () => {
      fs.writeFileSync(manifestPath, '{"not": "a list"}');

      expect(() => convertHar(manifestPath, harPath)).toThrow(ManifestError);
    });
  });
});
