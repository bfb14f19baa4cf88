import { resolve } from 'path';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { ConfigError } from './utils/errors.js';
import { minutesApart } from './utils/time.js';
import { SURFACE_TARGETS, type SurfaceKey } from './types.js';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const flag = (fallback: 'true' | 'false') =>
  z.string().transform(v => v.trim().toLowerCase() === 'true').default(fallback);

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM (24h)');

const timezone = z.string().refine((tz) => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}, 'unknown IANA timezone');

const logLevel = z.enum(['debug', 'info', 'warn', 'error']).default('info');
const logFormat = z.enum(['text', 'json']).default('text');

const EnvSchema = z.object({
  // Meta Graph API
  META_ACCESS_TOKEN:             z.string().default(''),
  IG_ACCOUNT_ID:                 z.string().default(''),
  FB_PAGE_ID:                    z.string().default(''),
  META_API_VERSION:              z.string().regex(/^v\d+\.\d+$/).default('v21.0'),

  // Surface toggles
  IG_ENABLED:                    flag('true'),
  IG_POST_REEL:                  flag('true'),
  IG_POST_STORY:                 flag('true'),
  FB_ENABLED:                    flag('true'),
  FB_POST_REEL:                  flag('true'),
  FB_POST_FEED:                  flag('true'),

  // Video hosting (Supabase Storage)
  SUPABASE_URL:                  z.string().url().optional(),
  SUPABASE_SERVICE_KEY:          z.string().optional(),
  VIDEO_BUCKET:                  z.string().min(1).default('reels'),
  VIDEO_FOLDER_PREFIX:           z.string().default('reels'),
  SIGNED_URL_TTL_SECONDS:        z.coerce.number().int().positive().default(7 * 24 * 60 * 60),

  // Local storage
  INPUT_FOLDER:                  z.string().min(1).default('input'),
  PROCESSED_FOLDER:              z.string().min(1).default('processed'),
  DB_PATH:                       z.string().min(1).default('data/posting_service.db'),

  // Schedule
  SCHEDULE_TIME_1:               clockTime.default('18:00'),
  SCHEDULE_TIME_2:               clockTime.default('20:00'),
  SCHEDULE_TIMEZONE:             timezone.default('Asia/Kolkata'),
  TRIGGER_WINDOW_MINUTES:        z.coerce.number().int().positive().default(60),

  // What to do with folders that have no description
  EMPTY_DESCRIPTION_POLICY:      z.enum(['post', 'skip']).default('post'),

  // Instagram container polling
  CONTAINER_POLL_ATTEMPTS:       z.coerce.number().int().positive().default(30),
  CONTAINER_POLL_INTERVAL_MS:    z.coerce.number().int().nonnegative().default(10_000),

  // Notifications (optional)
  TELEGRAM_BOT_TOKEN:            z.string().optional(),
  TELEGRAM_CHAT_ID:              z.string().optional(),

  // Logging
  LOG_LEVEL:                     logLevel,
  LOG_FORMAT:                    logFormat,
}).superRefine((e, ctx) => {
  // a cooling-down window that reaches the other slot would swallow it
  if (e.SCHEDULE_TIME_1 === e.SCHEDULE_TIME_2) return;
  const gap = minutesApart(e.SCHEDULE_TIME_1, e.SCHEDULE_TIME_2);
  if (e.TRIGGER_WINDOW_MINUTES >= gap) {
    ctx.addIssue({
      code:    z.ZodIssueCode.custom,
      path:    ['TRIGGER_WINDOW_MINUTES'],
      message: `must be shorter than the ${gap} minutes between SCHEDULE_TIME_1 and SCHEDULE_TIME_2`,
    });
  }
});

export type Env = z.infer<typeof EnvSchema>;

/** Validates a raw environment. Empty strings count as unset. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, v]) => v !== undefined && v.trim() !== ''),
  );
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    );
  }
  return parsed.data;
}

let loaded: Env | null = null;

/** Parses process.env on first use. Throws ConfigError when it is invalid. */
export function loadEnv(): Env {
  if (!loaded) loaded = parseEnv(process.env);
  return loaded;
}

/**
 * Logging settings on their own, read at import. An invalid value falls back
 * to the default so that a ConfigError can still be logged.
 */
export const logEnv = z.object({
  LOG_LEVEL:  logLevel.catch('info'),
  LOG_FORMAT: logFormat.catch('text'),
}).parse(process.env);

// ── Settings ─────────────────────────────────────────────────────────────────

export type EmptyDescriptionPolicy = Env['EMPTY_DESCRIPTION_POLICY'];

export interface AppSettings {
  meta: {
    accessToken: string;
    instagramAccountId: string;
    facebookPageId: string;
    apiVersion: string;
  };
  surfaces: Record<SurfaceKey, boolean>;
  storage: {
    supabaseUrl: string | null;
    supabaseServiceKey: string | null;
    bucket: string;
    folderPrefix: string;
    signedUrlTtlSeconds: number;
  };
  paths: {
    inputDir: string;
    processedDir: string;
    dbPath: string;
  };
  schedule: {
    times: string[];
    timezone: string;
    windowMinutes: number;
  };
  content: {
    emptyDescription: EmptyDescriptionPolicy;
  };
  containerPoll: {
    maxAttempts: number;
    intervalMs: number;
  };
  telegram: { botToken: string; chatId: string } | null;
}

export function buildSettings(e: Env, baseDir: string = process.cwd()): AppSettings {
  return {
    meta: {
      accessToken:        e.META_ACCESS_TOKEN,
      instagramAccountId: e.IG_ACCOUNT_ID,
      facebookPageId:     e.FB_PAGE_ID,
      apiVersion:         e.META_API_VERSION,
    },
    surfaces: {
      ig_reel:  e.IG_ENABLED && e.IG_POST_REEL,
      ig_story: e.IG_ENABLED && e.IG_POST_STORY,
      fb_reel:  e.FB_ENABLED && e.FB_POST_REEL,
      fb_feed:  e.FB_ENABLED && e.FB_POST_FEED,
    },
    storage: {
      supabaseUrl:        e.SUPABASE_URL ?? null,
      supabaseServiceKey: e.SUPABASE_SERVICE_KEY ?? null,
      bucket:             e.VIDEO_BUCKET,
      folderPrefix:       e.VIDEO_FOLDER_PREFIX,
      signedUrlTtlSeconds: e.SIGNED_URL_TTL_SECONDS,
    },
    paths: {
      inputDir:     resolve(baseDir, e.INPUT_FOLDER),
      processedDir: resolve(baseDir, e.PROCESSED_FOLDER),
      dbPath:       e.DB_PATH === ':memory:' ? e.DB_PATH : resolve(baseDir, e.DB_PATH),
    },
    schedule: {
      times:         [...new Set([e.SCHEDULE_TIME_1, e.SCHEDULE_TIME_2])],
      timezone:      e.SCHEDULE_TIMEZONE,
      windowMinutes: e.TRIGGER_WINDOW_MINUTES,
    },
    content: {
      emptyDescription: e.EMPTY_DESCRIPTION_POLICY,
    },
    containerPoll: {
      maxAttempts: e.CONTAINER_POLL_ATTEMPTS,
      intervalMs:  e.CONTAINER_POLL_INTERVAL_MS,
    },
    telegram:
      e.TELEGRAM_BOT_TOKEN && e.TELEGRAM_CHAT_ID
        ? { botToken: e.TELEGRAM_BOT_TOKEN, chatId: e.TELEGRAM_CHAT_ID }
        : null,
  };
}

// ── Publish pre-flight ───────────────────────────────────────────────────────

const MIN_TOKEN_LENGTH = 50;

/** Lists what is missing before anything can be published. Empty = ready. */
export function publishReadinessIssues(s: AppSettings): string[] {
  const issues: string[] = [];
  const token = s.meta.accessToken;

  if (!SURFACE_TARGETS.some(t => s.surfaces[t.key])) {
    issues.push('every surface is disabled');
  }
  if (!token || token.length < MIN_TOKEN_LENGTH || token.toUpperCase().includes('YOUR_')) {
    issues.push('META_ACCESS_TOKEN is missing, too short or a placeholder');
  }
  if ((s.surfaces.ig_reel || s.surfaces.ig_story) && !s.meta.instagramAccountId) {
    issues.push('IG_ACCOUNT_ID is missing');
  }
  if ((s.surfaces.fb_reel || s.surfaces.fb_feed) && !s.meta.facebookPageId) {
    issues.push('FB_PAGE_ID is missing');
  }
  if (!s.storage.supabaseUrl || !s.storage.supabaseServiceKey) {
    issues.push('SUPABASE_URL and SUPABASE_SERVICE_KEY are required to host videos');
  }
  return issues;
}

export function assertPublishReady(s: AppSettings): void {
  const issues = publishReadinessIssues(s);
  if (issues.length > 0) throw new ConfigError(issues);
}
