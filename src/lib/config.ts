/**
 * Herald — Configuration
 *
 * Loads `.env` and validates the environment once. Adapter credentials are
 * optional here; adapters call `requireSetting` when they are constructed.
 */

import 'dotenv/config';
import { z } from 'zod';
import { ValidationError } from './errors';

// ============================================================
// DEFAULTS
// ============================================================

export const DEFAULT_CHAT_NOISE_PATTERNS = [
  '^\\+1$',
  '^(thanks|thank you|thx|ty)[!. ]*$',
  '^(lol|ok|okay|nice|cool)[!. ]*$',
  '^[^\\p{L}\\p{N}]+$',
];

export const DEFAULT_CHAT_KEYWORDS = [
  'new member',
  'welcome',
  'release',
  'update',
  'announcement',
  'important',
  'breaking',
  'feature',
  'bug fix',
  'milestone',
  'version',
  'launch',
  'deployed',
];

export const DEFAULT_TRACKED_METRICS = ['total_pages', 'total_domains', 'pages_crawled_today'];

// ============================================================
// SCHEMA
// ============================================================

const list = (fallback: string[]) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined
        ? fallback
        : value
            .split(',')
            .map((s) => s.trim())
            .filter(Boolean)
    );

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const EnvSchema = z.object({
  TIMEZONE: z.string().default('UTC'),

  // Scheduling
  MIN_POST_INTERVAL_HOURS: z.coerce.number().nonnegative().default(1),
  MAX_DAILY_POSTS: z.coerce.number().int().nonnegative().default(10),
  DAILY_LOOKBACK_HOURS: z.coerce.number().positive().default(24),
  WEEKLY_MIN_INTERVAL_HOURS: z.coerce.number().nonnegative().default(144),
  WEEKLY_LOOKBACK_DAYS: z.coerce.number().int().positive().default(7),

  // Publishing
  PUBLISH_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  PUBLISH_BACKOFF_BASE_MS: z.coerce.number().int().nonnegative().default(1000),
  PUBLISH_BACKOFF_FACTOR: z.coerce.number().min(1).default(4),

  // Content filter
  CHAT_MIN_LENGTH: z.coerce.number().int().nonnegative().default(20),
  CHAT_NOISE_PATTERNS: list(DEFAULT_CHAT_NOISE_PATTERNS),
  CHAT_KEYWORDS: list(DEFAULT_CHAT_KEYWORDS),
  CHAT_TRUSTED_SENDERS: list([]),
  STATS_CHANGE_THRESHOLD: z.coerce.number().nonnegative().default(0.1),
  STATS_TRACKED_METRICS: list(DEFAULT_TRACKED_METRICS),

  // Formatting
  PROJECT_NAME: z.string().default('Project'),
  PROJECT_HASHTAGS: list(['#opensource']),
  MICROBLOG_A_LIMIT: z.coerce.number().int().positive().default(500),
  MICROBLOG_B_LIMIT: z.coerce.number().int().positive().default(280),

  // Store
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,

  // Sources
  MATRIX_HOMESERVER: z.string().url().default('https://matrix.org'),
  MATRIX_ACCESS_TOKEN: optionalString,
  MATRIX_ROOM_ID: optionalString,
  GITHUB_TOKEN: optionalString,
  GITHUB_ORG: optionalString,
  STATS_URL: optionalString,

  // Destinations
  MASTODON_INSTANCE_URL: optionalString,
  MASTODON_ACCESS_TOKEN: optionalString,
  X_ACCESS_TOKEN: optionalString,
  BLOG_REPO: optionalString,
  BLOG_BRANCH: z.string().default('main'),
  BLOG_POSTS_DIR: z.string().default('content/posts'),
  BLOG_AUTHOR_NAME: z.string().default('Herald Bot'),
  BLOG_AUTHOR_EMAIL: z.string().email().default('bot@example.org'),

  // Summarizer
  ANTHROPIC_API_KEY: optionalString,
  SUMMARY_MODEL: z.string().default('claude-3-5-sonnet-latest'),
});

type Env = z.infer<typeof EnvSchema>;

// ============================================================
// APP CONFIG
// ============================================================

export interface ScheduleConfig {
  timezone: string;
  minPostIntervalHours: number;
  maxDailyPosts: number;
  /** Daily cycles only pick activities observed this recently */
  dailyLookbackHours: number;
  weeklyMinIntervalHours: number;
  weeklyLookbackDays: number;
}

export interface RetryConfig {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffFactor: number;
}

export interface FilterConfig {
  chatMinLength: number;
  chatNoisePatterns: RegExp[];
  chatKeywords: string[];
  chatTrustedSenders: string[];
  statsChangeThreshold: number;
  statsTrackedMetrics: string[];
}

export interface FormatConfig {
  projectName: string;
  hashtags: string[];
  limits: {
    microblog_a: number;
    microblog_b: number;
  };
}

export interface AppConfig {
  schedule: ScheduleConfig;
  retry: RetryConfig;
  filter: FilterConfig;
  format: FormatConfig;
  env: Env;
}

function compilePatterns(patterns: string[]): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(pattern, 'iu');
    } catch (error) {
      throw new ValidationError(`Invalid CHAT_NOISE_PATTERNS entry: ${pattern}`, { cause: error });
    }
  });
}

/**
 * Validate an environment and build the application config.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid configuration: ${issues}`);
  }

  const env = parsed.data;

  try {
    localeCheck(env.TIMEZONE);
  } catch (error) {
    throw new ValidationError(`Invalid TIMEZONE: ${env.TIMEZONE}`, { cause: error });
  }

  return {
    schedule: {
      timezone: env.TIMEZONE,
      minPostIntervalHours: env.MIN_POST_INTERVAL_HOURS,
      maxDailyPosts: env.MAX_DAILY_POSTS,
      dailyLookbackHours: env.DAILY_LOOKBACK_HOURS,
      weeklyMinIntervalHours: env.WEEKLY_MIN_INTERVAL_HOURS,
      weeklyLookbackDays: env.WEEKLY_LOOKBACK_DAYS,
    },
    retry: {
      maxAttempts: env.PUBLISH_MAX_ATTEMPTS,
      backoffBaseMs: env.PUBLISH_BACKOFF_BASE_MS,
      backoffFactor: env.PUBLISH_BACKOFF_FACTOR,
    },
    filter: {
      chatMinLength: env.CHAT_MIN_LENGTH,
      chatNoisePatterns: compilePatterns(env.CHAT_NOISE_PATTERNS),
      chatKeywords: env.CHAT_KEYWORDS.map((k) => k.toLowerCase()),
      chatTrustedSenders: env.CHAT_TRUSTED_SENDERS,
      statsChangeThreshold: env.STATS_CHANGE_THRESHOLD,
      statsTrackedMetrics: env.STATS_TRACKED_METRICS,
    },
    format: {
      projectName: env.PROJECT_NAME,
      hashtags: env.PROJECT_HASHTAGS,
      limits: {
        microblog_a: env.MICROBLOG_A_LIMIT,
        microblog_b: env.MICROBLOG_B_LIMIT,
      },
    },
    env,
  };
}

function localeCheck(timeZone: string): void {
  // Throws RangeError for unknown zones
  new Intl.DateTimeFormat('en-CA', { timeZone });
}

type OptionalSetting = {
  [K in keyof Env]-?: undefined extends Env[K] ? K : never;
}[keyof Env];

/**
 * Read a credential an adapter cannot work without.
 */
export function requireSetting(config: AppConfig, key: OptionalSetting): string {
  const value = config.env[key];
  if (!value) {
    throw new ValidationError(`${key} environment variable is required`);
  }
  return value;
}
