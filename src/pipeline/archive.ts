import { existsSync, mkdirSync, renameSync } from 'fs';
import { basename, join } from 'path';
import { logger } from '../utils/logger.js';

/** "2024-05-01T18:00:05.123Z" → "20240501_180005" */
function stamp(at: Date): string {
  return at.toISOString().replace(/\.\d+Z$/, '').replace(/-|:/g, '').replace('T', '_');
}

/**
 * Moves a fully posted folder into the processed directory. A name that is
 * already taken gets a timestamp suffix. Returns the new path, or null when
 * the move failed (logged, never thrown).
 */
export function archiveFolder(folderPath: string, processedDir: string, now: Date = new Date()): string | null {
  const name = basename(folderPath);
  try {
    mkdirSync(processedDir, { recursive: true });
    let dest = join(processedDir, name);
    if (existsSync(dest)) dest = join(processedDir, `${name}_${stamp(now)}`);
    renameSync(folderPath, dest);
    logger.info('Archive: folder moved to processed', { from: folderPath, to: dest });
    return dest;
  } catch (err) {
    logger.error('Archive: could not move folder', { folderPath, processedDir, error: String(err) });
    return null;
  }
}
