/**
 * Trigger scheduling.
 *
 * The scheduler state is a plain value threaded through `handleTrigger`:
 *
 *   idle ──trigger──▶ dispatching ──one attempt──▶ cooling_down ──window elapsed──▶ idle
 *
 * Triggers that arrive while dispatching or cooling down are logged and
 * dropped. node-cron fires the configured daily times in the schedule
 * timezone; `run-now` goes through the same function with a manual trigger.
 */
import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../utils/logger.js';
import { dailyCronExpression, zonedClock } from '../utils/time.js';
import { isReady } from '../content/scanner.js';
import { requiredTargets } from './publisher.js';
import type { AppSettings } from '../config.js';
import type { Ledger } from '../db/ledger.js';
import type { ContentItem } from '../types.js';

// ── State ─────────────────────────────────────────────────────────────────────

export type Trigger =
  | { kind: 'schedule'; time: string }
  | { kind: 'manual' };

export type SchedulerState =
  | { phase: 'idle' }
  | { phase: 'dispatching'; trigger: Trigger; windowKey: string; startedAt: Date }
  | { phase: 'cooling_down'; until: Date; windowKey: string };

export const initialState: SchedulerState = { phase: 'idle' };

export interface TriggerDeps {
  /** One dispatch attempt. Errors are caught and logged by the scheduler. */
  dispatch: () => Promise<unknown>;
  windowMinutes: number;
  timezone: string;
  /** Observes intermediate states, so a caller can expose `dispatching` while it runs. */
  onTransition?: (state: SchedulerState) => void;
}

/** Identifies the trigger window, e.g. "2024-05-01 18:00" in the schedule timezone. */
export function windowKeyFor(trigger: Trigger, now: Date, timezone: string): string {
  const { date, time } = zonedClock(now, timezone);
  return trigger.kind === 'schedule' ? `${date} ${trigger.time}` : `${date} ${time} manual`;
}

/**
 * Advances the state machine for one trigger. Returns the state after the
 * trigger has been handled: unchanged when it was ignored, cooling_down after
 * a dispatch attempt (whether it succeeded or not).
 */
export async function handleTrigger(
  state: SchedulerState,
  trigger: Trigger,
  now: Date,
  deps: TriggerDeps,
): Promise<SchedulerState> {
  const windowKey = windowKeyFor(trigger, now, deps.timezone);

  if (state.phase === 'dispatching') {
    logger.warn('Scheduler: dispatch in progress, trigger ignored', { windowKey, running: state.windowKey });
    return state;
  }
  if (state.phase === 'cooling_down' && now.getTime() < state.until.getTime()) {
    logger.info('Scheduler: cooling down, trigger ignored', {
      windowKey,
      sameWindow: windowKey === state.windowKey,
      until: state.until.toISOString(),
    });
    return state;
  }

  const dispatching: SchedulerState = { phase: 'dispatching', trigger, windowKey, startedAt: now };
  deps.onTransition?.(dispatching);
  logger.info('Scheduler: dispatching', { windowKey, trigger: trigger.kind });

  try {
    await deps.dispatch();
  } catch (err) {
    logger.error('Scheduler: dispatch failed', { windowKey, err });
  }

  const cooling: SchedulerState = {
    phase: 'cooling_down',
    until: new Date(now.getTime() + deps.windowMinutes * 60_000),
    windowKey,
  };
  deps.onTransition?.(cooling);
  return cooling;
}

// ── Selection ─────────────────────────────────────────────────────────────────

/**
 * First item in scan order that is ready and still has a required surface
 * without a posted row.
 */
export function selectNextItem(
  items: Iterable<ContentItem>,
  ledger: Pick<Ledger, 'hasPosted'>,
  settings: Pick<AppSettings, 'surfaces' | 'content'>,
): ContentItem | null {
  for (const item of items) {
    if (!isReady(item, settings.content.emptyDescription)) {
      logger.info('Scheduler: item has no description, skipped by policy', { folderId: item.folderId });
      continue;
    }
    const open = requiredTargets(item, settings.surfaces).filter(
      t => !ledger.hasPosted(item.folderId, t.platform, t.surface),
    );
    if (open.length > 0) {
      logger.info('Scheduler: selected item', { folderId: item.folderId, surfaces: open.map(t => t.key) });
      return item;
    }
  }
  logger.info('Scheduler: no unposted content, staying idle');
  return null;
}

// ── Cron ──────────────────────────────────────────────────────────────────────

export interface RunningScheduler {
  state(): SchedulerState;
  runNow(): Promise<SchedulerState>;
  stop(): void;
}

export function startScheduler(
  schedule: AppSettings['schedule'],
  dispatch: () => Promise<unknown>,
): RunningScheduler {
  let state: SchedulerState = initialState;

  const deps: TriggerDeps = {
    dispatch,
    windowMinutes: schedule.windowMinutes,
    timezone:      schedule.timezone,
    onTransition:  (next) => { state = next; },
  };

  const fire = async (trigger: Trigger): Promise<SchedulerState> => {
    state = await handleTrigger(state, trigger, new Date(), deps);
    return state;
  };

  const tasks: ScheduledTask[] = schedule.times.map((time) => {
    const task = cron.schedule(
      dailyCronExpression(time),
      async () => {
        logger.info('Cron: trigger fired', { time, timezone: schedule.timezone });
        await fire({ kind: 'schedule', time }).catch((err) => {
          logger.error('Cron: trigger error', { time, err });
        });
      },
      { timezone: schedule.timezone },
    );
    return task;
  });

  logger.info('Cron: schedules registered', { times: schedule.times, timezone: schedule.timezone });

  return {
    state: () => state,
    runNow: () => fire({ kind: 'manual' }),
    stop: () => { for (const t of tasks) t.stop(); },
  };
}
