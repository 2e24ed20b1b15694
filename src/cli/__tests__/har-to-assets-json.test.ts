import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { main } from '../har-to-assets-json';

describe('har-to-assets-json CLI', () => {
  let workDir: string;
  let manifestPath: string;
  let harPath: string;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    process.env.OFFLINE_CAPTURE_LOG_LEVEL = 'error';
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'har-cli-'));
    manifestPath = path.join(workDir, 'capture.json');
    harPath = path.join(workDir, 'capture.har');
    fs.writeFileSync(manifestPath, JSON.stringify([]));
    fs.writeFileSync(
      harPath,
      JSON.stringify({
        log: {
          entries: [
            {
              request: { url: 'https://example.com/app.js' },
              response: { status: 200, content: { mimeType: 'application/javascript' } },
            },
          ],
        },
      })
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
    delete process.env.OFFLINE_CAPTURE_LOG_LEVEL;
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should merge into the output file and exit 0', async () => {
    const output = path.join(workDir, 'merged.json');

    const code = await main(['node', 'har-to-assets-json', manifestPath, harPath, output]);

    expect(code).toBe(0);
    expect(JSON.parse(fs.readFileSync(output, 'utf-8'))).toEqual([
      { url: 'https://example.com/app.js', type: 'application/javascript' },
    ]);
    expect(console.log).toHaveBeenCalledWith(`Updated ${output} with 1 new resources (1 total).`);
  });

  it('should exit 1 when the HAR file is missing', async () => {
    const code = await main(['node', 'har-to-assets-json', manifestPath, path.join(workDir, 'none.har')]);

    expect(code).toBe(1);
  });

  it('should exit 1 without the required arguments', async () => {
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const code = await main(['node', 'har-to-assets-json', manifestPath]);

    expect(code).toBe(1);
  });
});
