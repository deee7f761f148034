/**
 * Site configuration
 *
 * The configuration value is validated once at startup and passed into the
 * pipeline explicitly.
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, buildLog } from '@wikigarden/core';

/** Names skipped at every depth unless overridden */
export const DEFAULT_IGNORES = [
  '.DS_Store',
  'private',
  '.obsidian',
  '.github',
  '.git',
  '.gitignore',
];

export const SiteConfigSchema = z.object({
  /** Folder of .md files to publish */
  sourceDir: z.string().min(1),
  outputDir: z.string().min(1).default('output'),
  ignore: z.array(z.string().min(1)).default(DEFAULT_IGNORES),
  /** Number of recently updated pages on the index and in feeds */
  recent: z.number().int().positive().default(15),
  /** Take timestamps from git history instead of file mtime */
  useGitTimes: z.boolean().default(false),
  /** Directory names that each get their own feed */
  feeds: z.array(z.string().min(1)).default([]),
  duplicateTitles: z.enum(['first', 'error']).default('first'),
  siteTitle: z.string().min(1).default('Notes'),
  siteUrl: z.string().url().optional(),
});

export type SiteConfig = z.infer<typeof SiteConfigSchema>;
export type SiteConfigInput = z.input<typeof SiteConfigSchema>;

/** Expand a leading ~ to the home directory */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

/**
 * Validate a configuration value, filling defaults.
 * Throws ConfigError listing every invalid field.
 */
export function parseConfig(input: SiteConfigInput): SiteConfig {
  const result = SiteConfigSchema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues.map(i => `${i.path.join('.') || 'config'}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const config = result.data;
  return {
    ...config,
    sourceDir: path.normalize(expandHome(config.sourceDir)),
    outputDir: expandHome(config.outputDir),
  };
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

function parseFlag(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes'].includes(normalized)) return true;
  if (['0', 'false', 'no', ''].includes(normalized)) return false;
  throw new ConfigError(`${name} must be true or false, got "${value}"`);
}

function parseCount(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`);
  }
  return n;
}

/**
 * Build configuration from WIKIGARDEN_* environment variables. The first
 * positional argument, if any, overrides WIKIGARDEN_PATH.
 *
 *   WIKIGARDEN_PATH             source folder (required)
 *   WIKIGARDEN_OUTPUT           output folder (default: output)
 *   WIKIGARDEN_IGNORE           comma-separated names to skip
 *   WIKIGARDEN_RECENT           recent item count (default: 15)
 *   WIKIGARDEN_GIT_TIMES        true to use git history timestamps
 *   WIKIGARDEN_FEEDS            comma-separated directory names for scoped feeds
 *   WIKIGARDEN_DUPLICATE_TITLES first | error
 *   WIKIGARDEN_TITLE            site title
 *   WIKIGARDEN_URL              absolute site URL for feeds
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv, argv: string[] = []): SiteConfig {
  const positional = argv.find(arg => !arg.startsWith('-'));
  const sourceDir = positional ?? env.WIKIGARDEN_PATH;
  if (!sourceDir) {
    throw new ConfigError('No source folder: pass a path or set WIKIGARDEN_PATH');
  }

  const duplicateTitles = env.WIKIGARDEN_DUPLICATE_TITLES;
  if (duplicateTitles !== undefined && duplicateTitles !== 'first' && duplicateTitles !== 'error') {
    throw new ConfigError(`WIKIGARDEN_DUPLICATE_TITLES must be "first" or "error", got "${duplicateTitles}"`);
  }

  const config = parseConfig({
    sourceDir,
    outputDir: env.WIKIGARDEN_OUTPUT,
    ignore: splitList(env.WIKIGARDEN_IGNORE),
    recent: parseCount('WIKIGARDEN_RECENT', env.WIKIGARDEN_RECENT),
    useGitTimes: parseFlag('WIKIGARDEN_GIT_TIMES', env.WIKIGARDEN_GIT_TIMES),
    feeds: splitList(env.WIKIGARDEN_FEEDS),
    duplicateTitles,
    siteTitle: env.WIKIGARDEN_TITLE,
    siteUrl: env.WIKIGARDEN_URL,
  });

  buildLog('config', `Source ${config.sourceDir} -> ${config.outputDir} (git times: ${config.useGitTimes})`);
  return config;
}
