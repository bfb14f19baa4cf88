/**
 * Publisher: maps one ContentItem onto the enabled surfaces and records
 * every attempt in the ledger.
 *
 * The video is uploaded once per dispatch. Each surface is attempted on its
 * own; a failure is recorded and the next surface still runs. Nothing is
 * retried here: failed rows are picked up again on the next trigger.
 */
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { buildReelCaption, buildStoryReference } from '../content/caption.js';
import { SURFACE_TARGETS, type ContentItem, type SurfaceKey, type SurfaceTarget } from '../types.js';
import type { Ledger } from '../db/ledger.js';
import type { VideoHost } from '../storage/video-host.js';
import type { InstagramClient } from '../platforms/instagram.js';
import type { FacebookClient } from '../platforms/facebook.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface PlatformClients {
  instagram: Pick<InstagramClient, 'postReel' | 'postStory'>;
  facebook: Pick<FacebookClient, 'postReel' | 'postFeedVideo'>;
}

export type SurfaceResult = 'posted' | 'failed' | 'skipped' | 'already_posted' | 'disabled';

export interface SurfaceOutcome {
  key: SurfaceKey;
  label: string;
  result: SurfaceResult;
  externalId: string | null;
  error: string | null;
}

export interface DispatchResult {
  folderId: string;
  outcomes: SurfaceOutcome[];
  /** Every required surface has a posted row after this dispatch. */
  allRequiredPosted: boolean;
}

export interface PublisherDeps {
  ledger: Ledger;
  host: VideoHost;
  clients: PlatformClients;
  surfaces: Record<SurfaceKey, boolean>;
}

// ── Eligibility ───────────────────────────────────────────────────────────────

/** An unknown duration (0) is treated as eligible everywhere. */
export function isEligible(target: SurfaceTarget, durationSeconds: number): boolean {
  return target.maxDurationSeconds === null || durationSeconds <= target.maxDurationSeconds;
}

/** Enabled surfaces this item is eligible for, in publish order. */
export function requiredTargets(
  item: Pick<ContentItem, 'durationSeconds'>,
  surfaces: Record<SurfaceKey, boolean>,
): SurfaceTarget[] {
  return SURFACE_TARGETS.filter(t => surfaces[t.key] && isEligible(t, item.durationSeconds));
}

// ── Publisher ─────────────────────────────────────────────────────────────────

export class Publisher {
  constructor(private readonly deps: PublisherDeps) {}

  async publish(item: ContentItem): Promise<DispatchResult> {
    const { ledger, surfaces } = this.deps;
    const outcomes = new Map<SurfaceKey, SurfaceOutcome>();
    const pending: SurfaceTarget[] = [];

    const settle = (target: SurfaceTarget, result: SurfaceResult, extra: Partial<SurfaceOutcome> = {}) => {
      outcomes.set(target.key, {
        key: target.key,
        label: target.label,
        result,
        externalId: null,
        error: null,
        ...extra,
      });
    };

    for (const target of SURFACE_TARGETS) {
      if (!surfaces[target.key]) {
        settle(target, 'disabled');
      } else if (ledger.hasPosted(item.folderId, target.platform, target.surface)) {
        settle(target, 'already_posted');
      } else if (!isEligible(target, item.durationSeconds)) {
        const reason = `Video is ${item.durationSeconds.toFixed(1)}s, ${target.label} allows ${target.maxDurationSeconds}s`;
        ledger.record(item.folderId, target.platform, target.surface, 'skipped', { errorMessage: reason });
        logger.info('Publisher: surface skipped', { folderId: item.folderId, surface: target.key, reason });
        settle(target, 'skipped', { error: reason });
      } else {
        pending.push(target);
      }
    }

    if (pending.length > 0) {
      for (const target of pending) {
        ledger.record(item.folderId, target.platform, target.surface, 'pending');
      }
      await this.publishPending(item, pending, settle);
    } else {
      logger.info('Publisher: nothing left to publish', { folderId: item.folderId });
    }

    const required = requiredTargets(item, surfaces);

    return {
      folderId: item.folderId,
      outcomes: SURFACE_TARGETS.flatMap(t => outcomes.get(t.key) ?? []),
      allRequiredPosted:
        required.length > 0 && required.every(t => ledger.hasPosted(item.folderId, t.platform, t.surface)),
    };
  }

  private async publishPending(
    item: ContentItem,
    pending: SurfaceTarget[],
    settle: (target: SurfaceTarget, result: SurfaceResult, extra?: Partial<SurfaceOutcome>) => void,
  ): Promise<void> {
    const { ledger, host } = this.deps;

    let videoUrl: string;
    try {
      videoUrl = await host.upload(item);
    } catch (err) {
      const message = `Video upload failed: ${errorMessage(err)}`;
      logger.error('Publisher: upload failed', { folderId: item.folderId, error: message });
      for (const target of pending) {
        ledger.record(item.folderId, target.platform, target.surface, 'failed', { errorMessage: message });
        settle(target, 'failed', { error: message });
      }
      return;
    }

    for (const target of pending) {
      try {
        const externalId = await this.postTo(target.key, videoUrl, item);
        ledger.record(item.folderId, target.platform, target.surface, 'posted', { externalId });
        logger.info('Publisher: posted', { folderId: item.folderId, surface: target.key, externalId });
        settle(target, 'posted', { externalId });
      } catch (err) {
        const message = errorMessage(err);
        ledger.record(item.folderId, target.platform, target.surface, 'failed', { errorMessage: message });
        logger.error('Publisher: surface failed', { folderId: item.folderId, surface: target.key, error: message });
        settle(target, 'failed', { error: message });
      }
    }
  }

  private postTo(key: SurfaceKey, videoUrl: string, item: ContentItem): Promise<string> {
    const { instagram, facebook } = this.deps.clients;
    switch (key) {
      case 'ig_reel':  return instagram.postReel(videoUrl, buildReelCaption(item));
      case 'ig_story': return instagram.postStory(videoUrl, buildStoryReference(item));
      case 'fb_reel':  return facebook.postReel(videoUrl, buildReelCaption(item));
      case 'fb_feed':  return facebook.postFeedVideo(videoUrl, buildReelCaption(item));
    }
  }
}
