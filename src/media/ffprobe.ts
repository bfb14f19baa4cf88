/**
 * Video duration probing via the ffprobe binary.
 *
 * A missing ffprobe leaves the duration unknown and the caller decides what
 * that means. A file ffprobe cannot read is reported as unreadable.
 */
import { execFileSync } from 'child_process';
import { logger } from '../utils/logger.js';

export type ProbeResult =
  | { status: 'ok'; seconds: number }
  | { status: 'unavailable' }
  | { status: 'unreadable'; reason: string };

export type DurationProbe = (videoPath: string) => ProbeResult;

const PROBE_TIMEOUT_MS = 10_000;

function runFfprobe(args: string[], label: string): string {
  logger.debug(`FFprobe [${label}]`, { args });
  return execFileSync('ffprobe', args, {
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
    timeout: PROBE_TIMEOUT_MS,
  }).trim();
}

/** ffprobe prints the container duration in seconds, or "N/A". */
export function parseDurationOutput(out: string): ProbeResult {
  const seconds = Number.parseFloat(out);
  return Number.isFinite(seconds) && seconds > 0
    ? { status: 'ok', seconds }
    : { status: 'unreadable', reason: `no duration in ffprobe output "${out}"` };
}

/** ENOENT means the binary is not on PATH; anything else means it ran and failed. */
export function classifyProbeFailure(err: unknown): ProbeResult {
  if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
    return { status: 'unavailable' };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { status: 'unreadable', reason: message.trim().split('\n').slice(-1)[0] ?? message };
}

export const probeDuration: DurationProbe = (videoPath) => {
  let result: ProbeResult;
  try {
    result = parseDurationOutput(runFfprobe(
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', videoPath],
      'probeDuration',
    ));
  } catch (err) {
    result = classifyProbeFailure(err);
  }

  if (result.status === 'unavailable') {
    logger.warn('FFprobe: not on PATH, duration unknown', { videoPath });
  } else if (result.status === 'unreadable') {
    logger.warn('FFprobe: could not read video', { videoPath, reason: result.reason });
  }
  return result;
};

/** Seconds for a readable video, 0 when the duration is unknown. */
export function knownSeconds(result: ProbeResult): number {
  return result.status === 'ok' ? result.seconds : 0;
}

/** True when an ffprobe binary is on PATH. */
export function ffprobeAvailable(): boolean {
  try {
    runFfprobe(['-version'], 'version');
    return true;
  } catch {
    return false;
  }
}
