#!/usr/bin/env node
/**
 * Daily Reel Poster: entry point.
 *
 * Modes:
 *   serve (default)        cron triggers at the configured daily times
 *   test | --test          dry run, scan only, nothing is posted or written
 *   run-now | --run-now    one immediate dispatch, then exit
 */
import { logger } from './utils/logger.js';
import { ConfigError, errorMessage } from './utils/errors.js';
import { loadEnv, buildSettings, assertPublishReady, type AppSettings } from './config.js';
import { openDatabase } from './db/client.js';
import { Ledger } from './db/ledger.js';
import { GraphClient } from './platforms/graph.js';
import { InstagramClient } from './platforms/instagram.js';
import { FacebookClient } from './platforms/facebook.js';
import { createVideoHost } from './storage/video-host.js';
import { createNotifier } from './monitoring/telegram.js';
import { Publisher } from './pipeline/publisher.js';
import { handleTrigger, initialState, startScheduler } from './pipeline/scheduler.js';
import { runDispatch, runDryRun, type DispatchReport, type PipelineDeps } from './pipeline/index.js';

type Mode = 'serve' | 'test' | 'run-now';

function parseMode(args: readonly string[]): Mode {
  if (args.includes('test') || args.includes('--test')) return 'test';
  if (args.includes('run-now') || args.includes('--run-now')) return 'run-now';
  return 'serve';
}

function folderOf(report: DispatchReport | null): string | null {
  return report?.item?.folderId ?? null;
}

// ── Wiring ────────────────────────────────────────────────────────────────────

async function buildPipeline(settings: AppSettings, ledger: Ledger): Promise<PipelineDeps> {
  const graph = new GraphClient({
    accessToken: settings.meta.accessToken,
    apiVersion:  settings.meta.apiVersion,
  });
  if (settings.surfaces.fb_reel || settings.surfaces.fb_feed) {
    await graph.resolvePageToken(settings.meta.facebookPageId);
  }

  const publisher = new Publisher({
    ledger,
    host: createVideoHost(settings),
    clients: {
      instagram: new InstagramClient(graph, settings.meta.instagramAccountId, settings.containerPoll),
      facebook:  new FacebookClient(graph, settings.meta.facebookPageId),
    },
    surfaces: settings.surfaces,
  });

  return { settings, ledger, publisher, notifier: createNotifier(settings.telegram) };
}

// ── CLI entrypoint ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const mode = parseMode(process.argv.slice(2));
  const settings = buildSettings(loadEnv());
  logger.info('Daily Reel Poster: starting', { mode, surfaces: settings.surfaces });

  const ledger = new Ledger(openDatabase(settings.paths.dbPath));

  switch (mode) {
    case 'test': {
      const entries = runDryRun({ settings, ledger });
      logger.info('Dry run finished', { candidates: entries.length, ready: entries.filter(e => e.ready).length });
      break;
    }

    case 'run-now': {
      assertPublishReady(settings);
      const deps = await buildPipeline(settings, ledger);
      let report: DispatchReport | null = null;
      await handleTrigger(initialState, { kind: 'manual' }, new Date(), {
        dispatch:      async () => { report = await runDispatch(deps); },
        windowMinutes: settings.schedule.windowMinutes,
        timezone:      settings.schedule.timezone,
      });
      logger.info('Run-now finished', { folderId: folderOf(report) });
      break;
    }

    case 'serve': {
      assertPublishReady(settings);
      const deps = await buildPipeline(settings, ledger);
      const scheduler = startScheduler(settings.schedule, () => runDispatch(deps));

      const shutdown = (signal: string) => {
        logger.info('Daily Reel Poster: shutting down', { signal });
        scheduler.stop();
        process.exit(0);
      };
      process.on('SIGINT', () => shutdown('SIGINT'));
      process.on('SIGTERM', () => shutdown('SIGTERM'));

      await deps.notifier.sendAlert(`Daily Reel Poster started. Triggers: ${settings.schedule.times.join(', ')} ${settings.schedule.timezone}`);
      logger.info('Daily Reel Poster: server mode running');
      break;
    }
  }
}

main().catch(async (err) => {
  if (err instanceof ConfigError) {
    logger.error('Configuration error', { issues: err.issues });
  } else {
    logger.error('Fatal error', { error: errorMessage(err) });
    await createNotifier(buildSettings(loadEnv()).telegram).sendAlert(`Fatal error: ${errorMessage(err)}`, 'critical');
  }
  process.exit(1);
});
