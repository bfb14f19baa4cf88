/**
 * Content scanner: turns `input/<folder>/` directories into ContentItems.
 *
 * Each immediate subdirectory is one item. Scans are lazy and stateless: every
 * scheduler tick starts a fresh generator, there is no persistent cursor.
 */
import { existsSync, readdirSync, statSync } from 'fs';
import { join } from 'path';
import { logger } from '../utils/logger.js';
import { ScanError } from '../utils/errors.js';
import { knownSeconds, probeDuration, type DurationProbe } from '../media/ffprobe.js';
import { CONTENT_JSON, CONTENT_TXT, parseContentFolder } from './parser.js';
import type { ContentItem } from '../types.js';
import type { EmptyDescriptionPolicy } from '../config.js';

export interface ScanOptions {
  probe?: DurationProbe;
}

// ── Identity ──────────────────────────────────────────────────────────────────

/** Ledger key for a folder name. Case and Unicode form do not make a new item. */
export function normalizeFolderId(folderName: string): string {
  return folderName.normalize('NFC').trim().toLowerCase();
}

// ── Folder helpers ────────────────────────────────────────────────────────────

export function listContentFolders(inputDir: string): string[] {
  return readdirSync(inputDir, { withFileTypes: true })
    .filter(d => d.isDirectory() && !d.name.startsWith('.'))
    .map(d => d.name)
    .sort();
}

/** `final_video*.mp4` wins over any other `.mp4`; ties go to the first name. */
export function findVideoFile(folderPath: string): string | null {
  const videos = readdirSync(folderPath, { withFileTypes: true })
    .filter(d => d.isFile() && d.name.toLowerCase().endsWith('.mp4'))
    .map(d => d.name)
    .sort();
  const chosen = videos.find(n => n.startsWith('final_video')) ?? videos[0];
  return chosen ? join(folderPath, chosen) : null;
}

/**
 * Reads one folder. Returns null when there is no video at all; throws
 * ScanError when the video cannot be used or there is no content file.
 */
export function readContentFolder(
  inputDir: string,
  folderName: string,
  probe: DurationProbe = probeDuration,
): ContentItem | null {
  const folderPath = join(inputDir, folderName);
  const folderId = normalizeFolderId(folderName);
  if (!folderId) throw new ScanError(`Folder name "${folderName}" is blank`, folderName);

  let videoPath: string | null;
  try {
    videoPath = findVideoFile(folderPath);
  } catch (err) {
    throw new ScanError(`Cannot read folder ${folderName}`, folderId, err);
  }
  if (!videoPath) return null;

  let size: number;
  try {
    size = statSync(videoPath).size;
  } catch (err) {
    throw new ScanError(`Cannot stat video ${videoPath}`, folderId, err);
  }
  if (size === 0) throw new ScanError(`Video ${videoPath} is empty`, folderId);

  const content = parseContentFolder(folderPath);
  if (!content) {
    throw new ScanError(`No readable ${CONTENT_JSON} or ${CONTENT_TXT} in ${folderName}`, folderId);
  }

  const duration = probe(videoPath);
  if (duration.status === 'unreadable') {
    throw new ScanError(`Video ${videoPath} is unreadable: ${duration.reason}`, folderId);
  }

  return {
    ...content,
    folderId,
    folderName,
    folderPath,
    videoPath,
    durationSeconds: knownSeconds(duration),
  };
}

// ── Scan ──────────────────────────────────────────────────────────────────────

/**
 * Yields every usable item in folder-name order. Folders without a video or
 * a content file, unreadable videos and duplicate ids are logged and left out.
 */
export function* scanContent(inputDir: string, opts: ScanOptions = {}): Generator<ContentItem> {
  if (!existsSync(inputDir)) {
    logger.error('Scanner: input folder not found', { inputDir });
    return;
  }

  const seen = new Map<string, string>();

  for (const folderName of listContentFolders(inputDir)) {
    let item: ContentItem | null;
    try {
      item = readContentFolder(inputDir, folderName, opts.probe);
    } catch (err) {
      if (!(err instanceof ScanError)) throw err;
      logger.warn('Scanner: skipping folder', { folder: folderName, error: err.message });
      continue;
    }

    if (!item) {
      logger.debug('Scanner: no video in folder', { folder: folderName });
      continue;
    }

    const firstOwner = seen.get(item.folderId);
    if (firstOwner !== undefined) {
      const dup = new ScanError(
        `Folder "${folderName}" has the same id as "${firstOwner}"`,
        item.folderId,
      );
      logger.warn('Scanner: skipping folder', { folder: folderName, error: dup.message });
      continue;
    }
    seen.set(item.folderId, folderName);

    yield item;
  }
}

/** Whether the empty-description policy lets this item be posted. */
export function isReady(item: ContentItem, policy: EmptyDescriptionPolicy): boolean {
  return item.description.trim().length > 0 || policy === 'post';
}
