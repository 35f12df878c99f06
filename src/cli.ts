#!/usr/bin/env node
import { analyzeOutput } from './analyzer';
import { resolveConfig } from './config';
import { InputDecodeError, UsageError } from './errors';
import { renderOutput } from './report';
import type { AnalyzeOptions, OutputFormat, PackageCommand, Severity } from './types';
import {
  decodeUtf8,
  getToolVersion,
  isOutputFormat,
  isPackageCommand,
  isSeverity,
  readStream
} from './utils';

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE_ERROR: 2
} as const;

export interface CliOptions {
  format?: OutputFormat;
  severity?: Severity;
  verbose?: boolean;
  metrics?: boolean;
  command?: PackageCommand;
  target?: string;
  config?: string;
  help: boolean;
  version: boolean;
}

type InputStream = NodeJS.ReadableStream & { isTTY?: boolean };

function takeValue(args: string[], flag: string): string {
  const value = args.shift();
  if (value === undefined || value.startsWith('-')) {
    throw new UsageError(`Missing value for ${flag}`);
  }
  return value;
}

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { help: false, version: false };

  const args = [...argv];
  while (args.length) {
    const arg = args.shift();
    if (!arg) break;
    if (arg === '--format' || arg === '-f') {
      const value = takeValue(args, arg);
      if (!isOutputFormat(value)) throw new UsageError(`Unknown format: ${value}`);
      opts.format = value;
    } else if (arg === '--severity') {
      const value = takeValue(args, arg);
      if (!isSeverity(value)) throw new UsageError(`Unknown severity: ${value}`);
      opts.severity = value;
    } else if (arg === '--command') {
      const value = takeValue(args, arg);
      if (!isPackageCommand(value)) throw new UsageError(`Unknown command kind: ${value}`);
      opts.command = value;
    } else if (arg === '--target') opts.target = takeValue(args, arg);
    else if (arg === '--config') opts.config = takeValue(args, arg);
    else if (arg === '--verbose' || arg === '-v') opts.verbose = true;
    else if (arg === '--metrics') opts.metrics = true;
    else if (arg === '--help' || arg === '-h') opts.help = true;
    else if (arg === '--version') opts.version = true;
    else throw new UsageError(`Unknown option: ${arg}`);
  }

  return opts;
}

export function buildAnalyzeOptions(opts: CliOptions): AnalyzeOptions & { format: OutputFormat } {
  const config = resolveConfig(opts.config);
  return {
    format: opts.format ?? config.format,
    minSeverity: opts.severity ?? config.severity,
    metrics: opts.metrics ?? config.metrics,
    verbose: opts.verbose ?? config.verbose,
    command: opts.command,
    target: opts.target
  };
}

function printHelp(): void {
  console.log(`spm-lens [options]

Reads Swift Package Manager output on stdin and prints a structured analysis.

  swift package dump-package | spm-lens
  swift package show-dependencies | spm-lens --format summary

Options:
  -f, --format <fmt>     json, summary or detailed (default: json)
  --severity <level>     Minimum issue severity: info, warning, error, critical (default: info)
  -v, --verbose          Include the raw input in the result
  --metrics              Attach parse time and complexity estimates
  --command <kind>       Skip detection and parse as dump-package, show-dependencies,
                         resolve, describe or update
  --target <name>        Restrict a dump-package analysis to one target
  --config <path>        Config file (default: ./.spm-lens.yaml, then ~/.spm-lens.yaml)
  --version              Print the version
`);
}

export async function run(argv: string[], stdin: InputStream = process.stdin): Promise<number> {
  let opts: CliOptions;
  try {
    opts = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(err.message);
    return EXIT_CODES.USAGE_ERROR;
  }

  if (opts.help) {
    printHelp();
    return EXIT_CODES.SUCCESS;
  }
  if (opts.version) {
    console.log(getToolVersion());
    return EXIT_CODES.SUCCESS;
  }

  let analyzeOptions: ReturnType<typeof buildAnalyzeOptions>;
  try {
    analyzeOptions = buildAnalyzeOptions(opts);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(err.message);
    return EXIT_CODES.USAGE_ERROR;
  }

  if (stdin.isTTY) {
    console.error('spm-lens: No input detected. Pipe Swift Package Manager output to spm-lens.');
    console.error('Usage: swift package <command> | spm-lens');
    return EXIT_CODES.FAILURE;
  }

  let input: string;
  try {
    input = decodeUtf8(await readStream(stdin));
  } catch (err) {
    if (!(err instanceof InputDecodeError)) throw err;
    console.error(err.message);
    return EXIT_CODES.FAILURE;
  }

  if (!input) {
    console.log(JSON.stringify({ error: 'No input received' }));
    return EXIT_CODES.FAILURE;
  }

  const { format, ...options } = analyzeOptions;
  const result = analyzeOutput(input, options);
  console.log(renderOutput(result, format));
  // An analysis that found problems is still a successful run.
  return EXIT_CODES.SUCCESS;
}

/**
 * Process entry point. Sets `process.exitCode` and lets Node exit once stdout has drained.
 */
export async function main(argv: string[] = process.argv.slice(2), stdin: InputStream = process.stdin): Promise<void> {
  try {
    process.exitCode = await run(argv, stdin);
  } catch (err) {
    console.error('Failed to analyze input:', err);
    process.exit(EXIT_CODES.FAILURE);
  }
}

if (require.main === module) {
  void main();
}
