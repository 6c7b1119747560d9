import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';
import { LogLevel, logger } from './logger';

const log = logger.child('config');

/** Environment variable behind each setting, also used in error messages. */
const ENV_KEYS = [
  ['title', 'BLOG_TITLE'],
  ['description', 'BLOG_DESCRIPTION'],
  ['baseUrl', 'BLOG_BASE_URL'],
  ['language', 'BLOG_LANGUAGE'],
  ['postsDir', 'BLOG_POSTS_DIR'],
  ['publicDir', 'BLOG_PUBLIC_DIR'],
  ['outDir', 'BLOG_OUT_DIR'],
  ['feedLimit', 'BLOG_FEED_LIMIT'],
  ['defaultAuthor', 'BLOG_DEFAULT_AUTHOR'],
  ['logLevel', 'LOG_LEVEL'],
] as const;

type SettingKey = (typeof ENV_KEYS)[number][0];

function envNameFor(key: string | number | undefined): string {
  return ENV_KEYS.find(([setting]) => setting === key)?.[1] ?? String(key);
}

const SiteConfigSchema = z.object({
  title: z.string().trim().min(1, 'must not be empty').default('Dev Journal'),
  description: z.string().trim().default("Notes from a developer's learning journey."),
  baseUrl: z
    .string()
    .url('must be an absolute URL')
    .refine((url) => /^https?:\/\//i.test(url), 'must use http or https')
    .transform((url) => url.replace(/\/+$/, ''))
    .default('http://localhost:3000'),
  language: z.string().trim().min(1, 'must not be empty').default('en'),
  postsDir: z.string().min(1).default('content/posts'),
  publicDir: z.string().min(1).default('public'),
  outDir: z.string().min(1).default('out'),
  feedLimit: z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .int('must be a whole number')
    .positive('must be positive')
    .default(20),
  defaultAuthor: z.string().trim().min(1).optional(),
  logLevel: z.nativeEnum(LogLevel, { errorMap: () => ({ message: 'must be one of debug, info, warn, error' }) }).default(LogLevel.INFO),
});

export type SiteConfig = z.output<typeof SiteConfigSchema>;

/**
 * Loads `.env.local`, then `.env`, from `cwd` into `process.env`. Values
 * already in the environment win; the first file found is the only one read.
 */
export function loadEnvFiles(cwd: string = process.cwd()): string | undefined {
  for (const name of ['.env.local', '.env']) {
    const envPath = path.join(cwd, name);
    if (!fs.existsSync(envPath)) continue;
    const result = dotenv.config({ path: envPath });
    if (result.error) throw new ConfigError([`${name}: ${result.error.message}`]);
    log.debug('Loaded environment file', { path: envPath });
    return envPath;
  }
  return undefined;
}

/**
 * Builds the site configuration from environment variables. Empty values
 * count as unset. Directory settings resolve against `cwd`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): SiteConfig {
  const raw: Partial<Record<SettingKey, string>> = {};
  for (const [key, envName] of ENV_KEYS) {
    const value = env[envName];
    if (value !== undefined && value.trim() !== '') raw[key] = value;
  }

  const parsed = SiteConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${envNameFor(issue.path[0])} ${issue.message}`),
    );
  }

  const config = parsed.data;
  return {
    ...config,
    postsDir: path.resolve(cwd, config.postsDir),
    publicDir: path.resolve(cwd, config.publicDir),
    outDir: path.resolve(cwd, config.outDir),
  };
}
