#!/usr/bin/env node
/**
 * CLI: add the requests of a HAR capture to a manifest
 */

import { Command, CommanderError } from 'commander';
import { HarError, ManifestError } from '../domain/errors';
import { convertHar } from '../domain/har/HarConverter';
import { createLogger, parseLogLevel } from '../services/LoggingService';
import { getEnvVar } from '../utils/ConfigLoader';
import { EXIT_FAILURES, EXIT_OK } from './options';

interface HarCliArgs {
  manifest: string;
  har: string;
  output?: string;
}

/**
 * Run the CLI
 * @returns The process exit code
 */
export async function main(argv: string[]): Promise<number> {
  const parsed: { args?: HarCliArgs } = {};

  const program = new Command()
    .name('har-to-assets-json')
    .description('Merge the requests recorded in a HAR file into a manifest')
    .argument('<existing-manifest>', 'Manifest JSON to extend')
    .argument('<capture-har>', 'HAR capture file')
    .argument('[output]', 'Where to write the merged manifest (default: overwrite the existing manifest)')
    .exitOverride()
    .action((manifest: string, har: string, output: string | undefined) => {
      parsed.args = { manifest, har, output };
    });

  try {
    program.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_FAILURES;
    }
    throw error;
  }
  const { args } = parsed;
  if (!args) {
    return EXIT_FAILURES;
  }

  const level = parseLogLevel(getEnvVar('OFFLINE_CAPTURE_LOG_LEVEL', 'info')) ?? 'info';
  const logger = createLogger('har', undefined, level);

  try {
    const result = convertHar(args.manifest, args.har, args.output, logger);
    console.log(`Updated ${result.outputPath} with ${result.added} new resources (${result.total} total).`);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ManifestError || error instanceof HarError) {
      console.error(`Error: ${error.message}`);
      return EXIT_FAILURES;
    }
    throw error;
  }
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
