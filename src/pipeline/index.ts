/**
 * Dispatch pipeline: scan → select → publish → record run → archive.
 *
 * `runDispatch` is what a scheduler trigger runs; `runDryRun` is the test
 * mode and writes nothing.
 */
import { logger } from '../utils/logger.js';
import { zonedClock } from '../utils/time.js';
import { knownSeconds, probeDuration, type DurationProbe } from '../media/ffprobe.js';
import { isReady, scanContent } from '../content/scanner.js';
import { archiveFolder } from './archive.js';
import { requiredTargets, type DispatchResult, type Publisher } from './publisher.js';
import { selectNextItem } from './scheduler.js';
import type { AppSettings } from '../config.js';
import type { Ledger } from '../db/ledger.js';
import type { Notifier } from '../monitoring/telegram.js';
import { SURFACE_TARGETS, type ContentItem, type PostStatus, type SurfaceKey } from '../types.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface PipelineDeps {
  settings: AppSettings;
  ledger: Ledger;
  publisher: Pick<Publisher, 'publish'>;
  notifier: Notifier;
  probe?: DurationProbe;
  now?: () => Date;
}

export interface DispatchReport {
  item: ContentItem | null;
  result: DispatchResult | null;
  archivedTo: string | null;
}

export interface DryRunEntry {
  folderId: string;
  folderName: string;
  title: string;
  durationSeconds: number;
  ready: boolean;
  required: SurfaceKey[];
  ledger: Partial<Record<SurfaceKey, PostStatus>>;
}

// ── Dispatch ──────────────────────────────────────────────────────────────────

export async function runDispatch(deps: PipelineDeps): Promise<DispatchReport> {
  const { settings, ledger, publisher, notifier } = deps;
  const probe = deps.probe ?? probeDuration;
  const now = deps.now ?? (() => new Date());

  const selected = selectNextItem(scanContent(settings.paths.inputDir, { probe }), ledger, settings);
  if (!selected) return { item: null, result: null, archivedTo: null };

  // ffprobe may have been unavailable during the scan
  let item = selected;
  if (item.durationSeconds === 0) {
    const duration = probe(item.videoPath);
    if (duration.status === 'unreadable') {
      logger.warn('Pipeline: video is unreadable, nothing dispatched', {
        folderId: item.folderId,
        reason: duration.reason,
      });
      return { item: null, result: null, archivedTo: null };
    }
    item = { ...item, durationSeconds: knownSeconds(duration) };
  }

  logger.info('Pipeline: dispatching', {
    folderId: item.folderId,
    title: item.title.slice(0, 50),
    durationSeconds: item.durationSeconds,
  });

  const result = await publisher.publish(item);

  const stats = ledger.recordRun(item.folderId, zonedClock(now(), settings.schedule.timezone).date);
  logger.info('Pipeline: run recorded', { runsToday: stats.runsToday, today: stats.today });

  const archivedTo = result.allRequiredPosted
    ? archiveFolder(item.folderPath, settings.paths.processedDir, now())
    : null;
  if (!result.allRequiredPosted) {
    logger.info('Pipeline: folder kept in input until every surface is posted', { folderId: item.folderId });
  }

  await notifier.sendDispatchSummary(item.folderName, result.outcomes, archivedTo !== null);

  return { item, result, archivedTo };
}

// ── Dry run ───────────────────────────────────────────────────────────────────

/** Scans and reports what a dispatch would pick from. Reads the ledger, never writes it. */
export function runDryRun(deps: Pick<PipelineDeps, 'settings' | 'ledger' | 'probe'>): DryRunEntry[] {
  const { settings, ledger } = deps;
  const entries: DryRunEntry[] = [];

  for (const item of scanContent(settings.paths.inputDir, { probe: deps.probe })) {
    const statuses: Partial<Record<SurfaceKey, PostStatus>> = {};
    for (const record of ledger.getRecords(item.folderId)) {
      const target = SURFACE_TARGETS.find(t => t.platform === record.platform && t.surface === record.surface);
      if (target) statuses[target.key] = record.status;
    }

    const entry: DryRunEntry = {
      folderId:        item.folderId,
      folderName:      item.folderName,
      title:           item.title,
      durationSeconds: item.durationSeconds,
      ready:           isReady(item, settings.content.emptyDescription),
      required:        requiredTargets(item, settings.surfaces).map(t => t.key),
      ledger:          statuses,
    };
    logger.info('Dry run: candidate', { ...entry });
    entries.push(entry);
  }

  logger.info('Dry run: scan complete', { candidates: entries.length });
  return entries;
}
