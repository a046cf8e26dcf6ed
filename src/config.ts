import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import type { CliOptions } from './cli';
import type { LoggerOptions } from './reliability';
import { SITE_ORIGIN, STOREFRONT_URL } from './selectors';

export const LogFormatSchema = z.enum(['json', 'text']);
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const delayMs = z.number().int().nonnegative();

export const ConfigSchema = z
  .object({
    storefrontUrl: z.string().url().optional(),
    siteOrigin: z.string().url().optional(),
    outputFile: z.string().min(1).optional(),
    headless: z.boolean().optional(),
    browserChannel: z.string().min(1).optional(),
    logFormat: LogFormatSchema.optional(),
    logLevel: LogLevelSchema.optional(),
    navigationTimeoutMs: z.number().int().positive().optional(),
    storefrontSettleMs: delayMs.optional(),
    confirmSettleMs: delayMs.optional(),
    departmentSettleMs: delayMs.optional(),
    pageSettleMs: delayMs.optional(),
    scrollDelayMs: delayMs.optional(),
    maxScrolls: z.number().int().positive().optional(),
    categoryDelayMs: delayMs.optional(),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

export interface ScraperSettings extends LoggerOptions {
  storefrontUrl: string;
  siteOrigin: string;
  outputFile: string;
  headless: boolean;
  browserChannel?: string;
  navigationTimeoutMs: number;
  /** Wait after the storefront root loads. */
  storefrontSettleMs: number;
  /** Wait after the confirmation dialog is dismissed. */
  confirmSettleMs: number;
  /** Wait for sub-category links to render on a department page. */
  departmentSettleMs: number;
  /** Wait after a category page loads, before scrolling. */
  pageSettleMs: number;
  scrollDelayMs: number;
  maxScrolls: number;
  /** Minimum spacing between category navigations. */
  categoryDelayMs: number;
}

export const DEFAULT_SETTINGS: ScraperSettings = {
  storefrontUrl: STOREFRONT_URL,
  siteOrigin: SITE_ORIGIN,
  outputFile: 'aldi_products.csv',
  headless: true,
  logFormat: 'text',
  logLevel: 'info',
  navigationTimeoutMs: 60000,
  storefrontSettleMs: 5000,
  confirmSettleMs: 2000,
  departmentSettleMs: 3000,
  pageSettleMs: 2000,
  scrollDelayMs: 2000,
  maxScrolls: 50,
  categoryDelayMs: 1000,
};

export function loadConfig(path: string): Config {
  if (!existsSync(path)) {
    throw new Error(`Config file not found: ${path}`);
  }

  const content = readFileSync(path, 'utf-8');
  let parsed: unknown;

  try {
    parsed = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${path}`);
  }

  const result = ConfigSchema.safeParse(parsed);

  if (!result.success) {
    const firstIssue = result.error.issues[0];
    const field = firstIssue.path.join('.') || 'root';
    throw new Error(`Invalid config: ${field} - ${firstIssue.message}`);
  }

  return result.data;
}

/**
 * Layers built-in defaults, then the config file, then flags given on the command line.
 */
export function resolveSettings(cli: CliOptions, config: Config | undefined): ScraperSettings {
  const fromConfig: ScraperSettings = { ...DEFAULT_SETTINGS, ...config };

  return {
    ...fromConfig,
    outputFile: cli.outputFile ?? fromConfig.outputFile,
    headless: cli.headless ?? fromConfig.headless,
    maxScrolls: cli.maxScrolls ?? fromConfig.maxScrolls,
    logFormat: cli.logFormat ?? fromConfig.logFormat,
    logLevel: cli.logLevel ?? fromConfig.logLevel,
  };
}
