import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { buildSettings, parseEnv, type AppSettings } from '../config.js';
import { openDatabase, type Db } from '../db/client.js';
import { Ledger } from '../db/ledger.js';
import { PublishError } from '../utils/errors.js';
import { Publisher } from './publisher.js';
import { runDispatch, runDryRun, type PipelineDeps } from './index.js';
import type { Notifier } from '../monitoring/telegram.js';
import type { InstagramClient } from '../platforms/instagram.js';
import type { FacebookClient } from '../platforms/facebook.js';
import type { VideoHost } from '../storage/video-host.js';
import type { DurationProbe } from '../media/ffprobe.js';

const NOW = new Date('2024-05-01T12:30:00.000Z');

describe('dispatch pipeline', () => {
  let root: string;
  let settings: AppSettings;
  let db: Db;
  let ledger: Ledger;
  let notifier: {
    sendAlert: Mock<Notifier['sendAlert']>;
    sendDispatchSummary: Mock<Notifier['sendDispatchSummary']>;
  };
  let clients: {
    instagram: { postReel: Mock<InstagramClient['postReel']>; postStory: Mock<InstagramClient['postStory']> };
    facebook: { postReel: Mock<FacebookClient['postReel']>; postFeedVideo: Mock<FacebookClient['postFeedVideo']> };
  };
  let host: { upload: Mock<VideoHost['upload']> };

  const addFolder = (name: string, content: object = { instagram_facebook: { title: 'A', description: 'B' } }) => {
    const dir = join(settings.paths.inputDir, name);
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, 'final_video.mp4'), 'video-bytes');
    writeFileSync(join(dir, 'social_media_content.json'), JSON.stringify(content));
  };

  const pipeline = (overrides: Partial<PipelineDeps> = {}): PipelineDeps => ({
    settings,
    ledger,
    publisher: new Publisher({ ledger, host, clients, surfaces: settings.surfaces }),
    notifier,
    probe: () => ({ status: 'ok', seconds: 30 }),
    now: () => NOW,
    ...overrides,
  });

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'pipeline-'));
    settings = buildSettings(parseEnv({ DB_PATH: ':memory:' }), root);
    mkdirSync(settings.paths.inputDir);
    db = openDatabase(settings.paths.dbPath);
    ledger = new Ledger(db, () => NOW);
    notifier = {
      sendAlert: vi.fn<Notifier['sendAlert']>().mockResolvedValue(undefined),
      sendDispatchSummary: vi.fn<Notifier['sendDispatchSummary']>().mockResolvedValue(undefined),
    };
    clients = {
      instagram: {
        postReel:  vi.fn<InstagramClient['postReel']>().mockResolvedValue('ig-reel-1'),
        postStory: vi.fn<InstagramClient['postStory']>().mockResolvedValue('ig-story-1'),
      },
      facebook: {
        postReel:      vi.fn<FacebookClient['postReel']>().mockResolvedValue('fb-reel-1'),
        postFeedVideo: vi.fn<FacebookClient['postFeedVideo']>().mockResolvedValue('fb-feed-1'),
      },
    };
    host = { upload: vi.fn<VideoHost['upload']>().mockResolvedValue('https://storage.test/v.mp4') };
  });

  afterEach(() => {
    db.close();
    rmSync(root, { recursive: true, force: true });
  });

  describe('runDispatch', () => {
    it('publishes the first folder, records the run and archives it', async () => {
      addFolder('Day 01');
      addFolder('Day 02');

      const report = await runDispatch(pipeline());

      expect(report.item?.folderId).toBe('day 01');
      expect(report.archivedTo).toBe(join(settings.paths.processedDir, 'Day 01'));
      expect(existsSync(join(settings.paths.processedDir, 'Day 01', 'final_video.mp4'))).toBe(true);
      expect(existsSync(join(settings.paths.inputDir, 'Day 01'))).toBe(false);
      expect(ledger.getRunStats()).toEqual({
        lastRunAt: '2024-05-01T12:30:00.000Z',
        lastFolderId: 'day 01',
        runsToday: 1,
        today: '2024-05-01',
      });
      expect(notifier.sendDispatchSummary).toHaveBeenCalledWith('Day 01', report.result?.outcomes, true);
    });

    it('keeps a partly posted folder and finishes it on the next dispatch', async () => {
      addFolder('Day 01');
      clients.facebook.postFeedVideo.mockRejectedValueOnce(
        new PublishError('Graph POST /v21.0/page/videos failed: HTTP 500', 'facebook', 'feed'),
      );

      const first = await runDispatch(pipeline());
      expect(first.archivedTo).toBeNull();
      expect(existsSync(join(settings.paths.inputDir, 'Day 01'))).toBe(true);

      const second = await runDispatch(pipeline());
      expect(second.item?.folderId).toBe('day 01');
      expect(clients.instagram.postReel).toHaveBeenCalledTimes(1);
      expect(clients.facebook.postFeedVideo).toHaveBeenCalledTimes(2);
      expect(second.archivedTo).toBe(join(settings.paths.processedDir, 'Day 01'));
      expect(ledger.getRunStats().runsToday).toBe(2);
    });

    it('skips folders that are already fully posted', async () => {
      addFolder('a');
      addFolder('b');
      for (const [platform, surface] of [['instagram', 'reel'], ['instagram', 'story'], ['facebook', 'reel'], ['facebook', 'feed']] as const) {
        ledger.record('a', platform, surface, 'posted');
      }

      const report = await runDispatch(pipeline());

      expect(report.item?.folderId).toBe('b');
      expect(clients.instagram.postReel).toHaveBeenCalledTimes(1);
    });

    it('does nothing when there is no unposted content', async () => {
      const publish = vi.fn<Publisher['publish']>();

      const report = await runDispatch(pipeline({ publisher: { publish } }));

      expect(report).toEqual({ item: null, result: null, archivedTo: null });
      expect(publish).not.toHaveBeenCalled();
      expect(ledger.getRunStats().runsToday).toBe(0);
    });

    it('probes the duration again when the scan could not read it', async () => {
      addFolder('Day 01');
      const probe = vi.fn<DurationProbe>()
        .mockReturnValueOnce({ status: 'unavailable' })
        .mockReturnValueOnce({ status: 'ok', seconds: 45 });
      const publish = vi.fn<Publisher['publish']>().mockResolvedValue({
        folderId: 'day 01',
        outcomes: [],
        allRequiredPosted: false,
      });

      await runDispatch(pipeline({ probe, publisher: { publish } }));

      expect(probe).toHaveBeenCalledTimes(2);
      expect(publish.mock.calls[0]?.[0].durationSeconds).toBe(45);
    });

    it('dispatches nothing when the re-probe finds the video unreadable', async () => {
      addFolder('Day 01');
      const probe = vi.fn<DurationProbe>()
        .mockReturnValueOnce({ status: 'unavailable' })
        .mockReturnValueOnce({ status: 'unreadable', reason: 'Invalid data' });
      const publish = vi.fn<Publisher['publish']>();

      const report = await runDispatch(pipeline({ probe, publisher: { publish } }));

      expect(report).toEqual({ item: null, result: null, archivedTo: null });
      expect(publish).not.toHaveBeenCalled();
      expect(ledger.getRunStats().runsToday).toBe(0);
    });
  });

  describe('runDryRun', () => {
    it('lists candidates and writes nothing', () => {
      addFolder('Day 01');
      addFolder('Day 02', { instagram_facebook: { title: 'Long one', description: '' } });
      ledger.record('day 01', 'instagram', 'reel', 'posted');
      const before = ledger.recentAttempts().length;

      const entries = runDryRun({ settings, ledger, probe: () => ({ status: 'ok', seconds: 90 }) });

      expect(entries).toEqual([
        {
          folderId: 'day 01',
          folderName: 'Day 01',
          title: 'A',
          durationSeconds: 90,
          ready: true,
          required: ['ig_reel', 'fb_reel', 'fb_feed'],
          ledger: { ig_reel: 'posted' },
        },
        {
          folderId: 'day 02',
          folderName: 'Day 02',
          title: 'Long one',
          durationSeconds: 90,
          ready: true,
          required: ['ig_reel', 'fb_reel', 'fb_feed'],
          ledger: {},
        },
      ]);
      expect(ledger.recentAttempts()).toHaveLength(before);
      expect(ledger.getRecords('day 02')).toEqual([]);
      expect(ledger.getRunStats().runsToday).toBe(0);
      expect(clients.instagram.postReel).not.toHaveBeenCalled();
      expect(host.upload).not.toHaveBeenCalled();
    });
  });
});
