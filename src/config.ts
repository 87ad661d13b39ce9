import { z } from 'zod';
import { readFileSync } from 'node:fs';
import YAML from 'yaml';
import { log } from './logger.js';
import { ConfigError, errorMessage } from './errors.js';

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-GB', { timeZone });
    return true;
  } catch {
    return false;
  }
}

// YAML leaves a key with no value as null; treat it like an absent key.
const bound = z
  .number()
  .nonnegative()
  .nullish()
  .transform((v) => v ?? undefined);

const keywords = z
  .array(z.string())
  .nullish()
  .transform((v) => (v ?? []).map((k) => k.trim()).filter((k) => k.length > 0));

export const SourceSchema = z
  .object({
    name: z.string().min(1).optional(),
    url: z.string().url(),
    domainHint: z.string().min(1).optional(),
    linkPatterns: z
      .array(z.string().refine(isValidPattern, 'Invalid regular expression'))
      .min(1)
      .optional(),
  })
  .transform((s) => ({ ...s, name: s.name ?? new URL(s.url).hostname }));

export const FiltersSchema = z.object({
  minRooms: bound,
  maxRooms: bound,
  minSize: bound,
  maxSize: bound,
  minPrice: bound,
  maxPrice: bound,
  includeKeywords: keywords,
  excludeKeywords: keywords,
});

export const EmailSchema = z.object({
  fromName: z.string().min(1).default('Rental Digest'),
  fromEmail: z.string().email(),
  toEmails: z.array(z.string().email()).min(1, 'At least one recipient required'),
  transport: z.enum(['smtp', 'resend']).default('smtp'),
  smtp: z
    .object({
      host: z.string().min(1).default('smtp.gmail.com'),
      port: z.number().int().positive().default(587),
      secure: z.boolean().default(false),
    })
    .default({}),
  passwordEnv: z.string().min(1).default('GMAIL_APP_PASSWORD'),
  timezone: z.string().refine(isValidTimeZone, 'Unknown time zone').default('UTC'),
});

export const ConfigSchema = z.object({
  sources: z.array(SourceSchema).min(1, 'At least one source required'),
  filters: FiltersSchema.default({}),
  email: EmailSchema,
  store: z
    .object({
      path: z.string().min(1).default('seen_listings.sqlite3'),
    })
    .default({}),
  fetch: z
    .object({
      timeoutMs: z.number().int().positive().default(30_000),
      retries: z.number().int().nonnegative().default(2),
      retryDelayMs: z.number().int().nonnegative().default(3000),
      userAgent: z.string().min(1).default('Mozilla/5.0 (compatible; RentalDigestBot/1.0)'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type FilterCriteria = z.infer<typeof FiltersSchema>;
export type EmailSettings = z.infer<typeof EmailSchema>;
export type FetchSettings = Config['fetch'];

export function parseConfig(parsed: unknown): Config {
  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config: ${details}`);
  }
  return result.data;
}

export function loadConfig(path: string): Config {
  log.info(`Loading config from ${path}`);

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch {
    throw new ConfigError(`Config file not found: ${path}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err: unknown) {
    throw new ConfigError(`Config file is not valid YAML: ${errorMessage(err)}`, { cause: err });
  }
  return parseConfig(parsed);
}
