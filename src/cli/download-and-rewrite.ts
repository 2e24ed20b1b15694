#!/usr/bin/env node
/**
 * CLI: download the resources of a capture manifest, rewrite them for
 * offline use and optionally serve the result
 */

import { Command, CommanderError } from 'commander';
import * as path from 'path';
import { ManifestError, ServerError } from '../domain/errors';
import { defaultRewrittenManifestPath } from '../domain/manifest/ManifestLoader';
import { StaticServer } from '../server/StaticServer';
import { CapturePipeline, CaptureReport, formatSummary } from '../services/CapturePipeline';
import { createLogger, parseLogLevel } from '../services/LoggingService';
import { getEnvVar, loadTrackerPatterns } from '../utils/ConfigLoader';
import { EXIT_OK, EXIT_SERVER, EXIT_USAGE, positiveInt, waitForShutdownSignal } from './options';

interface DownloadCliOptions {
  manifest: string;
  outRoot: string;
  concurrency: number;
  serve: boolean;
  port: number;
  rewrite: boolean;
  skipExisting: boolean;
  timeout: number;
  retries: number;
  deadline?: number;
  trackers?: string;
  hostDirs: boolean;
  manifestOut?: string;
  report?: string;
  logLevel: string;
  logFile?: string;
}

export function buildProgram(): Command {
  return new Command()
    .name('download-and-rewrite')
    .description('Download the resources listed in a capture manifest and rewrite them to local paths')
    .requiredOption('--manifest <path>', 'Path to manifest JSON')
    .option('--out-root <dir>', 'Output root where resources are stored', './local_www')
    .option('--concurrency <n>', 'Concurrent downloads', positiveInt('--concurrency'), 8)
    .option('--serve', 'Serve the output root when the run is over', false)
    .option('--port <n>', 'Port for --serve', positiveInt('--port'), 8000)
    .option('--no-rewrite', 'Store files exactly as fetched')
    .option('--skip-existing', 'Do not download entries whose file already exists', false)
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', positiveInt('--timeout'), 30000)
    .option('--retries <n>', 'Attempts per resource before giving up', positiveInt('--retries'), 3)
    .option('--deadline <seconds>', 'Stop issuing requests after this many seconds', positiveInt('--deadline'))
    .option('--trackers <file>', 'JSON list of tracker patterns replacing the built-in table')
    .option('--host-dirs', 'Store each host under its own directory', false)
    .option('--manifest-out <path>', 'Where to write the manifest with local paths (default: <manifest>_local.json)')
    .option('--report <path>', 'Write a JSON verification report')
    .option('--log-level <level>', 'error, warn, info or debug', getEnvVar('OFFLINE_CAPTURE_LOG_LEVEL', 'info'))
    .option('--log-file <path>', 'Also write JSON logs to this file')
    .exitOverride();
}

/**
 * Run the CLI
 * @returns The process exit code
 */
export async function main(argv: string[]): Promise<number> {
  const program = buildProgram();
  try {
    program.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    throw error;
  }

  const options = program.opts<DownloadCliOptions>();
  const level = parseLogLevel(options.logLevel);
  if (!level) {
    console.error(`Error: unknown log level "${options.logLevel}"`);
    return EXIT_USAGE;
  }
  const logger = createLogger('capture', options.logFile, level);

  let trackerPatterns: string[] | undefined;
  if (options.trackers) {
    try {
      trackerPatterns = loadTrackerPatterns(options.trackers);
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      return EXIT_USAGE;
    }
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupted: no new requests will be issued');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);
  const deadline = options.deadline
    ? setTimeout(() => {
        logger.warn(`Deadline of ${options.deadline}s reached: no new requests will be issued`);
        controller.abort();
      }, options.deadline * 1000)
    : undefined;
  deadline?.unref();

  let report: CaptureReport;
  try {
    report = await new CapturePipeline(
      {
        manifestPath: options.manifest,
        outRoot: options.outRoot,
        concurrency: options.concurrency,
        rewrite: options.rewrite,
        skipExisting: options.skipExisting,
        maxAttempts: options.retries,
        timeoutMs: options.timeout,
        classifier: {
          hostDirectories: options.hostDirs,
          ...(trackerPatterns ? { trackerPatterns } : {}),
        },
        manifestOutPath: options.manifestOut ?? defaultRewrittenManifestPath(options.manifest),
        reportPath: options.report,
        signal: controller.signal,
      },
      logger
    ).run();
  } catch (error) {
    if (error instanceof ManifestError) {
      console.error(`Error: ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    clearTimeout(deadline);
  }

  console.log(`
Summary:
  - Downloaded: ${report.summary.downloaded}
  - Skipped (tracker): ${report.summary.skippedTracker}
  - Skipped (existing): ${report.summary.skippedExisting}
  - Failed: ${report.summary.failed}
  - Rewritten: ${report.summary.rewritten}
`);
  logger.debug(formatSummary(report.summary));

  if (options.serve) {
    const server = new StaticServer(path.resolve(options.outRoot), options.port, logger.child('serve'));
    try {
      await server.start();
    } catch (error) {
      if (error instanceof ServerError) {
        console.error(`Error: ${error.message}`);
        return EXIT_SERVER;
      }
      throw error;
    }
    console.log(`Serving ${options.outRoot} at ${server.getUrl()} (Ctrl-C to stop)`);
    await waitForShutdownSignal();
    await server.stop();
  }

  return report.exitCode;
}

if (require.main === module) {
  main(process.argv)
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Unexpected error:', error);
      process.exitCode = 1;
    });
}
