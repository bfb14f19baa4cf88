/**
 * Telegram notifications for dispatch outcomes and fatal errors.
 *
 * Sends are fire-and-forget: failures are logged, never thrown. Without a
 * bot token and chat id every call is a no-op.
 */
import { logger } from '../utils/logger.js';
import type { AppSettings } from '../config.js';
import type { FetchFn } from '../platforms/graph.js';
import type { SurfaceOutcome } from '../pipeline/publisher.js';

export type AlertLevel = 'info' | 'warning' | 'critical';

export interface Notifier {
  sendAlert(message: string, level?: AlertLevel): Promise<void>;
  sendDispatchSummary(folderName: string, outcomes: readonly SurfaceOutcome[], archived: boolean): Promise<void>;
}

const PREFIX: Record<AlertLevel, string> = {
  info:     'ℹ️',
  warning:  '⚠️',
  critical: '🚨',
};

const OUTCOME_ICON: Record<SurfaceOutcome['result'], string> = {
  posted:         '✅',
  failed:         '❌',
  skipped:        '⏭️',
  already_posted: '☑️',
  disabled:       '➖',
};

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function formatDispatchSummary(
  folderName: string,
  outcomes: readonly SurfaceOutcome[],
  archived: boolean,
): string {
  const lines = outcomes
    .filter(o => o.result !== 'disabled')
    .map(o => {
      const detail = o.result === 'failed' && o.error ? `: ${escapeHtml(o.error.slice(0, 200))}` : '';
      return `${OUTCOME_ICON[o.result]} ${o.label}${detail}`;
    });
  const footer = archived ? '📦 Moved to processed' : '⏳ Kept in input';
  return `🎬 <b>Dispatch</b> <code>${escapeHtml(folderName)}</code>\n\n${lines.join('\n')}\n\n${footer}`;
}

// ── Factory ───────────────────────────────────────────────────────────────────

export function createNotifier(
  telegram: AppSettings['telegram'],
  fetchFn: FetchFn = (input, init) => fetch(input, init),
): Notifier {
  async function send(text: string): Promise<void> {
    if (!telegram) return;
    try {
      const res = await fetchFn(`https://api.telegram.org/bot${telegram.botToken}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: telegram.chatId,
          text,
          parse_mode: 'HTML',
        }),
      });
      if (!res.ok) {
        logger.warn('Telegram: sendMessage failed', { status: res.status });
      }
    } catch (err) {
      logger.warn('Telegram: unreachable', { error: String(err) });
    }
  }

  return {
    async sendAlert(message, level = 'info') {
      await send(`${PREFIX[level]} <b>${level.toUpperCase()}</b>\n${escapeHtml(message)}`);
    },
    async sendDispatchSummary(folderName, outcomes, archived) {
      await send(formatDispatchSummary(folderName, outcomes, archived));
      logger.debug('Telegram: dispatch summary sent', { folderName });
    },
  };
}
