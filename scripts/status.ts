#!/usr/bin/env tsx
/**
 * Operational status for Daily Reel Poster.
 * Prints the ledger summary, run statistics, the next items in the queue and
 * the most recent publish attempts.
 * Run: npm run status
 */
import { existsSync } from 'fs';
import { loadEnv, buildSettings } from '../src/config.js';
import { openDatabase } from '../src/db/client.js';
import { Ledger } from '../src/db/ledger.js';
import { runDryRun } from '../src/pipeline/index.js';
import type { PostStatus } from '../src/types.js';

// ── ANSI helpers ──────────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN   = '\x1b[36m';
const BOLD   = '\x1b[1m';
const DIM    = '\x1b[2m';
const RESET  = '\x1b[0m';

function green(s: string)  { return `${GREEN}${s}${RESET}`; }
function red(s: string)    { return `${RED}${s}${RESET}`; }
function yellow(s: string) { return `${YELLOW}${s}${RESET}`; }
function cyan(s: string)   { return `${CYAN}${s}${RESET}`; }
function bold(s: string)   { return `${BOLD}${s}${RESET}`; }
function dim(s: string)    { return `${DIM}${s}${RESET}`; }

// ── Helpers ───────────────────────────────────────────────────────────────────

function timeAgo(dateStr: string): string {
  const diff = Date.now() - new Date(dateStr).getTime();
  const minutes = Math.floor(diff / 60_000);
  const hours   = Math.floor(diff / 3_600_000);
  const days    = Math.floor(diff / 86_400_000);
  if (days > 0)    return `${days}d ago`;
  if (hours > 0)   return `${hours}h ago`;
  if (minutes > 0) return `${minutes}m ago`;
  return 'just now';
}

function formatStatus(status: PostStatus): string {
  switch (status) {
    case 'posted':  return green('POSTED');
    case 'failed':  return red('FAILED');
    case 'pending': return yellow('PENDING');
    case 'skipped': return dim('SKIPPED');
  }
}

// ── Report ────────────────────────────────────────────────────────────────────

const settings = buildSettings(loadEnv());

console.log(`\n${bold('=== Daily Reel Poster: Status ===')}\n`);

if (!existsSync(settings.paths.dbPath)) {
  console.log(yellow(`No ledger at ${settings.paths.dbPath} yet. Nothing has been dispatched.`));
  process.exit(0);
}

const ledger = new Ledger(openDatabase(settings.paths.dbPath));

// Ledger summary
const counts = ledger.summary();
console.log(bold('Ledger'));
for (const status of ['posted', 'failed', 'pending', 'skipped'] as const) {
  console.log(`  ${formatStatus(status).padEnd(20)} ${counts[status]}`);
}

// Runs
const stats = ledger.getRunStats();
console.log(`\n${bold('Runs')}`);
console.log(`  Last run        ${stats.lastRunAt ? `${stats.lastRunAt} ${dim(`(${timeAgo(stats.lastRunAt)})`)}` : dim('never')}`);
console.log(`  Last folder     ${stats.lastFolderId ?? dim('-')}`);
console.log(`  Runs on ${stats.today ?? 'today'}  ${stats.runsToday} / ${settings.schedule.times.length}`);
console.log(`  Triggers        ${cyan(settings.schedule.times.join(', '))} ${dim(settings.schedule.timezone)}`);

// Queue
const queue = runDryRun({ settings, ledger });
console.log(`\n${bold('Queue')} ${dim(`(${settings.paths.inputDir})`)}`);
if (queue.length === 0) console.log(dim('  empty'));
for (const entry of queue.slice(0, 10)) {
  const open = entry.required.filter(k => entry.ledger[k] !== 'posted');
  const marker = !entry.ready ? yellow('not ready') : open.length > 0 ? cyan(`open: ${open.join(', ')}`) : green('done');
  console.log(`  ${entry.folderName.padEnd(32)} ${entry.durationSeconds.toFixed(1).padStart(6)}s  ${marker}`);
}
if (queue.length > 10) console.log(dim(`  … and ${queue.length - 10} more`));

// Recent attempts
console.log(`\n${bold('Recent attempts')}`);
const attempts = ledger.recentAttempts(10);
if (attempts.length === 0) console.log(dim('  none'));
for (const a of attempts) {
  const error = a.errorMessage ? `  ${dim(a.errorMessage.slice(0, 80))}` : '';
  console.log(`  ${dim(timeAgo(a.createdAt).padEnd(9))} ${a.folderId.padEnd(28)} ${a.platform}/${a.surface.padEnd(6)} ${formatStatus(a.status)}${error}`);
}
console.log('');
