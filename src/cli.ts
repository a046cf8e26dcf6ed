import { parseArgs } from 'node:util';
import { LogFormatSchema, LogLevelSchema } from './config';
import type { LogLevel, LogFormat } from './reliability/types';

/**
 * Command-line overrides. Every field except `help` is undefined unless the
 * flag was given, so config-file values survive.
 */
export interface CliOptions {
  help: boolean;
  configPath?: string;
  outputFile?: string;
  headless?: boolean;
  maxScrolls?: number;
  logFormat?: LogFormat;
  logLevel?: LogLevel;
}

function parsePositiveInt(flag: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${flag}: ${raw} (expected a positive integer)`);
  }
  return value;
}

/**
 * Parses command-line arguments into CLI options.
 */
export function parseCliArgs(args: string[]): CliOptions {
  const { values } = parseArgs({
    args,
    options: {
      config: {
        type: 'string',
        short: 'c',
      },
      output: {
        type: 'string',
        short: 'o',
      },
      headless: {
        type: 'boolean',
      },
      'no-headless': {
        type: 'boolean',
      },
      'max-scrolls': {
        type: 'string',
      },
      'log-format': {
        type: 'string',
      },
      'log-level': {
        type: 'string',
      },
      help: {
        type: 'boolean',
        short: 'h',
        default: false,
      },
    },
    allowPositionals: false,
  });

  let headless: boolean | undefined;
  if (values['no-headless']) {
    headless = false;
  } else if (values.headless) {
    headless = true;
  }

  const rawFormat = values['log-format'];
  let logFormat: LogFormat | undefined;
  if (rawFormat !== undefined) {
    const parsed = LogFormatSchema.safeParse(rawFormat);
    if (!parsed.success) {
      throw new Error(`Invalid --log-format: ${rawFormat} (expected text or json)`);
    }
    logFormat = parsed.data;
  }

  const rawLevel = values['log-level'];
  let logLevel: LogLevel | undefined;
  if (rawLevel !== undefined) {
    const parsed = LogLevelSchema.safeParse(rawLevel);
    if (!parsed.success) {
      throw new Error(`Invalid --log-level: ${rawLevel} (expected debug, info, warn or error)`);
    }
    logLevel = parsed.data;
  }

  const rawScrolls = values['max-scrolls'];

  return {
    help: values.help ?? false,
    configPath: values.config,
    outputFile: values.output,
    headless,
    maxScrolls: rawScrolls === undefined ? undefined : parsePositiveInt('--max-scrolls', rawScrolls),
    logFormat,
    logLevel,
  };
}

/**
 * Prints usage information to the console.
 */
export function printUsage(): void {
  console.log(`
Usage: npm start -- [options]

Scrapes every Aldi storefront category and appends the products to a CSV file.
With no options the run uses the built-in defaults.

Options:
  --config, -c        Path to JSON config file
  --output, -o        CSV file to append to (default: aldi_products.csv)
  --headless          Run headless (default: true)
  --no-headless       Run with visible browser
  --max-scrolls <n>   Upper bound on lazy-load scrolls per page (default: 50)
  --log-format        Log format: text or json (default: text)
  --log-level         Log level: debug, info, warn, error (default: info)
  --help, -h          Show this help message

Examples:
  npm start
  npm start -- --output products.csv
  npm start -- --no-headless --log-level debug
  npm start -- --config config.json
`);
}
