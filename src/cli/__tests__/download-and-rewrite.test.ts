import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildProgram, main } from '../download-and-rewrite';
import { Origin, startOrigin } from '../../services/__tests__/helpers/originServer';

describe('download-and-rewrite CLI', () => {
  let origin: Origin;
  let workDir: string;
  let manifestPath: string;
  let outRoot: string;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-'));
    manifestPath = path.join(workDir, 'capture.json');
    outRoot = path.join(workDir, 'local_www');
    origin = await startOrigin({
      '/app.js': { body: 'app()', contentType: 'application/javascript' },
      '/broken.js': { status: 500 },
    });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await origin.close();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  const cli = (...args: string[]) =>
    main(['node', 'download-and-rewrite', '--out-root', outRoot, '--log-level', 'error', ...args]);

  it('should use the documented defaults', () => {
    const program = buildProgram();
    program.parse(['node', 'download-and-rewrite', '--manifest', 'capture.json']);

    expect(program.opts()).toMatchObject({
      manifest: 'capture.json',
      outRoot: './local_www',
      concurrency: 8,
      serve: false,
      port: 8000,
      rewrite: true,
      skipExisting: false,
    });
  });

  it('should exit 0 and write the rewritten manifest beside the input', async () => {
    fs.writeFileSync(manifestPath, JSON.stringify([{ url: `${origin.baseUrl}/app.js` }]));

    const code = await cli('--manifest', manifestPath);

    expect(code).toBe(0);
    expect(fs.readFileSync(path.join(outRoot, 'app.js'), 'utf-8')).toBe('app()');
    expect(JSON.parse(fs.readFileSync(path.join(workDir, 'capture_local.json'), 'utf-8'))).toEqual([
      { url: `${origin.baseUrl}/app.js`, path: 'app.js', type: 'js', status: 'ok' },
    ]);
  });

  it('should exit 1 when a resource fails', async () => {
    fs.writeFileSync(
      manifestPath,
      JSON.stringify([{ url: `${origin.baseUrl}/app.js` }, { url: `${origin.baseUrl}/broken.js` }])
    );

    const code = await cli('--manifest', manifestPath, '--retries', '1');

    expect(code).toBe(1);
    expect(origin.hits('/broken.js')).toBe(1);
    expect(fs.existsSync(path.join(outRoot, 'app.js'))).toBe(true);
  });

  it('should exit 2 when the manifest is missing', async () => {
    const code = await cli('--manifest', path.join(workDir, 'missing.json'));

    expect(code).toBe(2);
    expect(origin.totalHits()).toBe(0);
  });

  it('should exit 2 on an invalid option value', async () => {
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const code = await cli('--manifest', manifestPath, '--concurrency', 'zero');

    expect(code).toBe(2);
  });
});
