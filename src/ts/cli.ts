/**
 * @fileoverview Command-line front end for the catalog pipeline
 * @module cli
 *
 * Parses flags, resolves the config and runs the pipeline. Returns an exit
 * code instead of exiting so it can be called from tests; bin.ts owns the
 * process.
 *
 * Exit codes:
 * - 0: report produced
 * - 1: LoadError, ConfigError or any unexpected failure
 * - 2: --strict and at least one article failed validation
 */

import { parseArgs } from 'util';
import {
  ConfigError,
  ReportFormatSchema,
  resolveCatalogConfig,
  type CatalogConfigOverrides,
} from './core/configSchema.js';
import { runCatalogPipeline } from './initialization/catalogOrchestrator.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_VALIDATION_FAILED = 2;

export const USAGE = `Usage: solid-catalog [options]

Loads SOLID principle articles, checks their required sections
(Definition, Rationale, ViolationExample, FixedExample) and prints an index.

Options:
  --input <dir>       Directory of principle articles (default: docs/principles)
  --output <file>     Write the report to a file instead of stdout
  --format <format>   markdown | text (default: markdown)
  --config <file>     YAML config file (default: ./solid-catalog.yaml if present)
  --strict            Exit with code 2 when any article fails validation
  --quiet             Suppress progress messages
  -h, --help          Show this help
`;

interface ParsedCommand {
  help: boolean;
  configFile?: string;
  overrides: CatalogConfigOverrides;
}

/**
 * Run the CLI with the given arguments (without node and script path).
 */
export function runCli(argv: string[], cwd: string = process.cwd()): number {
  try {
    const command = parseCommand(argv);

    if (command.help) {
      process.stdout.write(USAGE);
      return EXIT_OK;
    }

    const config = resolveCatalogConfig(command.overrides, {
      configFile: command.configFile,
      cwd,
    });
    const run = runCatalogPipeline(config);

    if (config.outputPath === null) {
      process.stdout.write(run.report);
    }

    if (config.strict && run.warnings.length > 0) {
      console.error(`❌ ${run.warnings.length} article(s) failed validation (--strict)`);
      return EXIT_VALIDATION_FAILED;
    }

    return EXIT_OK;
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_FAILURE;
  }
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        input: { type: 'string' },
        output: { type: 'string' },
        format: { type: 'string' },
        config: { type: 'string' },
        strict: { type: 'boolean' },
        quiet: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new ConfigError('command line', error instanceof Error ? error.message : String(error));
  }
}

function parseCommand(argv: string[]): ParsedCommand {
  const values = readFlags(argv);

  let format: CatalogConfigOverrides['format'];
  if (values.format !== undefined) {
    const parsed = ReportFormatSchema.safeParse(values.format);
    if (!parsed.success) {
      throw new ConfigError('command line', `--format must be markdown or text, got "${values.format}"`);
    }
    format = parsed.data;
  }

  return {
    help: values.help ?? false,
    configFile: values.config,
    overrides: {
      inputDir: values.input,
      outputPath: values.output,
      format,
      strict: values.strict,
      quiet: values.quiet,
    },
  };
}
