/**
 * State ledger: which (folder, platform, surface) combinations have gone out.
 *
 * `post_records` holds one row per key with the latest status; a row that
 * reached 'posted' is never overwritten. Every write is also appended to
 * `post_attempts`, which is never pruned.
 */
import type { Db } from './client.js';
import type { Platform, PostRecord, PostStatus, Surface } from '../types.js';

// ─── Types ────────────────────────────────────────────────────────────────────

interface PostRecordRow {
  folder_id: string;
  platform: Platform;
  surface: Surface;
  status: PostStatus;
  error_message: string | null;
  external_id: string | null;
  updated_at: string;
}

export interface PostAttempt {
  id: number;
  folderId: string;
  platform: Platform;
  surface: Surface;
  status: PostStatus;
  errorMessage: string | null;
  createdAt: string;
}

export interface RunStats {
  lastRunAt: string | null;
  lastFolderId: string | null;
  runsToday: number;
  today: string | null;
}

export interface RecordDetails {
  errorMessage?: string;
  externalId?: string;
}

const toRecord = (r: PostRecordRow): PostRecord => ({
  folderId:     r.folder_id,
  platform:     r.platform,
  surface:      r.surface,
  status:       r.status,
  errorMessage: r.error_message,
  externalId:   r.external_id,
  updatedAt:    r.updated_at,
});

// ─── Ledger ───────────────────────────────────────────────────────────────────

export class Ledger {
  constructor(
    private readonly db: Db,
    private readonly now: () => Date = () => new Date(),
  ) {}

  hasPosted(folderId: string, platform: Platform, surface: Surface): boolean {
    return this.getRecord(folderId, platform, surface)?.status === 'posted';
  }

  getRecord(folderId: string, platform: Platform, surface: Surface): PostRecord | null {
    const row = this.db
      .prepare('SELECT * FROM post_records WHERE folder_id = ? AND platform = ? AND surface = ?')
      .get(folderId, platform, surface) as PostRecordRow | undefined;
    return row ? toRecord(row) : null;
  }

  getRecords(folderId: string): PostRecord[] {
    const rows = this.db
      .prepare('SELECT * FROM post_records WHERE folder_id = ? ORDER BY platform, surface')
      .all(folderId) as PostRecordRow[];
    return rows.map(toRecord);
  }

  /**
   * Upserts the status for a key and appends the attempt to the history.
   * Returns the stored record, which stays 'posted' if it already was.
   */
  record(
    folderId: string,
    platform: Platform,
    surface: Surface,
    status: PostStatus,
    details: RecordDetails = {},
  ): PostRecord {
    const at = this.now().toISOString();
    const errorMessage = details.errorMessage ?? null;
    const externalId = details.externalId ?? null;

    const write = this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO post_attempts (folder_id, platform, surface, status, error_message, external_id, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(folderId, platform, surface, status, errorMessage, externalId, at);

      this.db
        .prepare(
          `INSERT INTO post_records (folder_id, platform, surface, status, error_message, external_id, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT (folder_id, platform, surface) DO UPDATE SET
             status        = excluded.status,
             error_message = excluded.error_message,
             external_id   = COALESCE(excluded.external_id, post_records.external_id),
             updated_at    = excluded.updated_at
           WHERE post_records.status <> 'posted'`,
        )
        .run(folderId, platform, surface, status, errorMessage, externalId, at);
    });
    write();

    const stored = this.getRecord(folderId, platform, surface);
    if (!stored) throw new Error(`Ledger write for ${folderId}/${platform}/${surface} was not stored`);
    return stored;
  }

  /** Row counts per status across the whole ledger. */
  summary(): Record<PostStatus, number> {
    const counts: Record<PostStatus, number> = { pending: 0, posted: 0, failed: 0, skipped: 0 };
    const rows = this.db
      .prepare('SELECT status, COUNT(*) AS cnt FROM post_records GROUP BY status')
      .all() as Array<{ status: PostStatus; cnt: number }>;
    for (const row of rows) counts[row.status] = row.cnt;
    return counts;
  }

  recentAttempts(limit = 20): PostAttempt[] {
    const rows = this.db
      .prepare('SELECT * FROM post_attempts ORDER BY id DESC LIMIT ?')
      .all(limit) as Array<{
        id: number;
        folder_id: string;
        platform: Platform;
        surface: Surface;
        status: PostStatus;
        error_message: string | null;
        created_at: string;
      }>;
    return rows.map(r => ({
      id:           r.id,
      folderId:     r.folder_id,
      platform:     r.platform,
      surface:      r.surface,
      status:       r.status,
      errorMessage: r.error_message,
      createdAt:    r.created_at,
    }));
  }

  // ─── Run stats ──────────────────────────────────────────────────────────────

  /** Counts a dispatch. `today` is the schedule-local date; a new date resets the counter. */
  recordRun(folderId: string, today: string): RunStats {
    this.db
      .prepare(
        `UPDATE run_stats SET
           last_run_at    = ?,
           last_folder_id = ?,
           runs_today     = CASE WHEN today = ? THEN runs_today + 1 ELSE 1 END,
           today          = ?
         WHERE id = 1`,
      )
      .run(this.now().toISOString(), folderId, today, today);
    return this.getRunStats();
  }

  getRunStats(): RunStats {
    const row = this.db
      .prepare('SELECT last_run_at, last_folder_id, runs_today, today FROM run_stats WHERE id = 1')
      .get() as
      | { last_run_at: string | null; last_folder_id: string | null; runs_today: number; today: string | null }
      | undefined;
    return {
      lastRunAt:    row?.last_run_at ?? null,
      lastFolderId: row?.last_folder_id ?? null,
      runsToday:    row?.runs_today ?? 0,
      today:        row?.today ?? null,
    };
  }
}
