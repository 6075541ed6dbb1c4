import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { z } from 'zod';

import { ConfigError } from './errors.js';
import type { AppConfig } from './types.js';

const filterLevel = z.preprocess(
  (v) => (typeof v === 'string' ? v.trim().toLowerCase() : v),
  z.enum(['none', 'low', 'mid', 'high'], {
    errorMap: () => ({ message: 'expected one of none, low, mid, high' }),
  })
);

const API_KEY_REQUIRED = 'OPENAI_API_KEY is required (set it in the environment or in .env)';

const AppConfigSchema = z.object({
  llm: z.object({
    apiKey: z.string({ required_error: API_KEY_REQUIRED }).min(1, API_KEY_REQUIRED),
    baseUrl: z.string().url().default('https://api.openai.com/v1'),
    model: z.string().min(1).default('gpt-3.5-turbo'),
    timeoutMs: z.number().int().min(1000).default(60_000),
    maxConcurrency: z.number().int().min(1).max(32).default(4),
    minIntervalMs: z.number().int().min(0).default(200),
  }),
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).max(10).default(5),
      baseDelayMs: z.number().int().min(0).default(1000),
      maxDelayMs: z.number().int().min(0).default(60_000),
      jitter: z.boolean().default(true),
    })
    .default({}),
  digest: z
    .object({
      category: z.string().min(1).default('eess.AS'),
      userInterest: z.string().default(''),
      filterLevel: filterLevel.default('none'),
      language: z.string().min(1).default('English'),
      translateTitles: z.boolean().default(true),
      maxPapersPerMessage: z.number().int().min(1).max(50).default(10),
    })
    .default({}),
  webhook: z
    .object({
      url: z.string().url().nullable().default(null),
      delayMsBetweenMessages: z.number().int().min(0).default(600),
    })
    .default({}),
});

/** Values from the command line; they win over the environment and config.yml. */
export interface ConfigOverrides {
  category?: string;
  userInterest?: string;
  filterLevel?: string;
  language?: string;
  maxPapersPerMessage?: number;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
  configFile?: string; // default: <repoRoot>/config.yml (optional)
  envFile?: string | null; // default: <repoRoot>/.env (optional); null skips it
}

type Raw = Record<string, unknown>;

function isRecord(x: unknown): x is Raw {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function section(raw: Raw, key: string): Raw {
  const v = raw[key];
  return isRecord(v) ? v : {};
}

// Empty strings mean "unset" (e.g. OPENAI_BASE_URL= copied from a template).
function nonEmpty(v: string | undefined): string | undefined {
  return v === undefined || v.trim() === '' ? undefined : v;
}

function defined(obj: Raw): Raw {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}

/** Variables from a dotenv file, or none when the file does not exist. */
export function readEnvFile(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) return {};
  return dotenv.parse(fs.readFileSync(filePath, 'utf8'));
}

export function loadYamlFile(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, 'utf8');
  return YAML.parse(raw);
}

export function formatZodError(err: z.ZodError): string {
  return err.issues
    .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}

export function loadConfig(repoRoot: string, opts: LoadConfigOptions = {}): AppConfig {
  const { env = process.env, overrides = {} } = opts;
  const configPath = opts.configFile ?? path.join(repoRoot, 'config.yml');

  // The process environment wins over .env.
  const fileEnv: Record<string, string> = opts.envFile === null ? {} : readEnvFile(opts.envFile ?? path.join(repoRoot, '.env'));
  const fromEnv = (key: string): string | undefined => nonEmpty(env[key]) ?? nonEmpty(fileEnv[key]);

  let fileRaw: Raw = {};
  if (fs.existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = loadYamlFile(configPath);
    } catch (e) {
      throw new ConfigError(`Could not parse ${configPath}: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (parsed !== null && parsed !== undefined && !isRecord(parsed)) {
      throw new ConfigError(`${configPath} must contain a mapping at the top level`);
    }
    fileRaw = parsed ?? {};
  } else if (opts.configFile) {
    throw new ConfigError(`Missing config file at ${configPath}`);
  }

  const merged: Raw = {
    ...fileRaw,
    llm: {
      ...section(fileRaw, 'llm'),
      ...defined({
        apiKey: fromEnv('OPENAI_API_KEY'),
        baseUrl: fromEnv('OPENAI_BASE_URL'),
        model: fromEnv('OPENAI_MODEL_NAME'),
      }),
    },
    digest: {
      ...section(fileRaw, 'digest'),
      ...defined({
        language: fromEnv('SUMMARY_LANGUAGE'),
        userInterest: fromEnv('USER_INTEREST'),
        filterLevel: fromEnv('FILTER_LEVEL'),
      }),
      ...defined({ ...overrides }),
    },
    webhook: {
      ...section(fileRaw, 'webhook'),
      ...defined({ url: fromEnv('WEBHOOK_URL') }),
    },
  };

  const result = AppConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodError(result.error)}`);
  }
  const config: AppConfig = result.data;
  return config;
}
