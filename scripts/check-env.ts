#!/usr/bin/env tsx
/**
 * Pre-flight check for Daily Reel Poster.
 * Validates the environment, local folders, ffprobe, Supabase Storage, the
 * Meta token and (optionally) the Telegram bot.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0  all required checks pass
 *   1  one or more required checks failed
 */
import { existsSync } from 'fs';
import { dirname } from 'path';
import { createClient } from '@supabase/supabase-js';
import { ConfigError } from '../src/utils/errors.js';
import * as config from '../src/config.js';

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const note = (label: string) => console.log(`  ${YELLOW}○${RESET} ${label}`);

let anyRequiredFailed = false;

// ── Section: Environment ──────────────────────────────────────────────────────

console.log(`\n${BOLD}=== Daily Reel Poster: Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Environment schema${RESET}`);

let env: config.Env;
try {
  env = config.loadEnv();
  pass('.env parsed');
} catch (err) {
  if (err instanceof ConfigError) {
    for (const issue of err.issues) fail(issue);
  } else {
    fail('Could not load configuration', err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
}

const settings = config.buildSettings(env);

// ── Section: Publish credentials ──────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Publish credentials${RESET}`);

const issues = config.publishReadinessIssues(settings);
if (issues.length === 0) {
  const token = settings.meta.accessToken;
  pass('META_ACCESS_TOKEN', `${token.slice(0, 6)}…`);
  pass('Accounts', `IG ${settings.meta.instagramAccountId || '-'} / Page ${settings.meta.facebookPageId || '-'}`);
} else {
  for (const issue of issues) fail(issue, 'Set it in .env (dry runs work without it)');
  anyRequiredFailed = true;
}

// ── Section: Configuration ────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Configuration${RESET}`);

const enabled = Object.entries(settings.surfaces).filter(([, on]) => on).map(([k]) => k);
note(`Surfaces  ${enabled.join(', ') || '(none)'}`);
note(`Triggers  ${settings.schedule.times.join(', ')} ${settings.schedule.timezone}, window ${settings.schedule.windowMinutes} min`);
note(`Empty description policy  ${settings.content.emptyDescription}`);
note(`API version  ${settings.meta.apiVersion}`);

// ── Section: Folders & tools ──────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Folders and tools${RESET}`);

if (existsSync(settings.paths.inputDir)) {
  pass('Input folder', settings.paths.inputDir);
} else {
  fail('Input folder missing', `Create: mkdir -p "${settings.paths.inputDir}"`);
  anyRequiredFailed = true;
}
note(`Processed folder  ${settings.paths.processedDir}${existsSync(settings.paths.processedDir) ? '' : '  (created on first archive)'}`);
note(`Ledger  ${settings.paths.dbPath}${existsSync(dirname(settings.paths.dbPath)) ? '' : '  (directory created on start)'}`);

const { ffprobeAvailable } = await import('../src/media/ffprobe.js');
if (ffprobeAvailable()) {
  pass('ffprobe on PATH');
} else {
  note('ffprobe not found  (durations read as 0; duration limits not enforced)');
}

// ── Section: Supabase Storage ─────────────────────────────────────────────────

console.log(`\n${BOLD}[ 5 ] Supabase Storage${RESET}`);

const { supabaseUrl, supabaseServiceKey, bucket } = settings.storage;
if (supabaseUrl && supabaseServiceKey) {
  process.stdout.write(`  Looking up bucket "${bucket}"… `);
  const sb = createClient(supabaseUrl, supabaseServiceKey);
  const { error } = await sb.storage.getBucket(bucket);
  if (error) {
    console.log(`${RED}✗${RESET}`);
    fail('Bucket lookup failed', error.message);
    anyRequiredFailed = true;
  } else {
    console.log(`${GREEN}✓${RESET}  found`);
  }
} else {
  note('Supabase Storage  (skipped, credentials missing above)');
}

// ── Section: Meta token ───────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 6 ] Meta Graph API${RESET}`);

if (issues.length === 0) {
  const { GraphClient } = await import('../src/platforms/graph.js');
  const { errorMessage } = await import('../src/utils/errors.js');
  const graph = new GraphClient({ accessToken: settings.meta.accessToken, apiVersion: settings.meta.apiVersion });
  process.stdout.write('  Checking token… ');
  try {
    const me = await graph.request<{ id?: string; name?: string }>({
      method:   'GET',
      path:     'me',
      params:   { fields: 'id,name' },
      platform: 'facebook',
      surface:  null,
    });
    console.log(`${GREEN}✓${RESET}  ${me.name ?? me.id ?? 'valid'}`);
  } catch (err) {
    console.log(`${RED}✗${RESET}`);
    fail('Token rejected', errorMessage(err));
    anyRequiredFailed = true;
  }
} else {
  note('Token check  (skipped, credentials missing above)');
}

// ── Section: Telegram bot ─────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 7 ] Telegram bot (optional)${RESET}`);

if (settings.telegram) {
  process.stdout.write('  Sending Telegram test message… ');
  try {
    const res = await fetch(`https://api.telegram.org/bot${settings.telegram.botToken}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: settings.telegram.chatId, text: '[Daily Reel Poster] check-env: OK' }),
    });
    const json = await res.json() as { ok: boolean; description?: string };
    if (!json.ok) throw new Error(json.description ?? 'Telegram API returned ok: false');
    console.log(`${GREEN}✓${RESET}  message sent`);
  } catch (err) {
    console.log(`${RED}✗${RESET}`);
    fail('Telegram test message failed', err instanceof Error ? err.message : String(err));
  }
} else {
  note('Telegram  (not configured, alerts disabled)');
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED: one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED: all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm run dry-run${RESET}\n`);
}
