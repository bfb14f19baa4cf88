/**
 * Instagram Reels and Stories via the Graph API container flow:
 * create container → poll status_code until FINISHED → media_publish.
 */
import { logger } from '../utils/logger.js';
import { PublishError } from '../utils/errors.js';
import type { GraphClient } from './graph.js';
import type { Surface } from '../types.js';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface ContainerPollOptions {
  maxAttempts: number;
  intervalMs: number;
}

type ContainerStatus = 'EXPIRED' | 'ERROR' | 'FINISHED' | 'IN_PROGRESS' | 'PUBLISHED';

export class InstagramClient {
  constructor(
    private readonly graph: GraphClient,
    private readonly accountId: string,
    private readonly poll: ContainerPollOptions,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  /** Publishes a Reel and returns the Instagram media id. */
  async postReel(videoUrl: string, caption: string): Promise<string> {
    logger.info('Instagram: creating Reel container', { captionLength: caption.length });
    const containerId = await this.createContainer('reel', {
      media_type:        'REELS',
      video_url:         videoUrl,
      caption,
      share_to_feed:     'true',
    });
    await this.waitForContainer(containerId, 'reel');
    return this.publishContainer(containerId, 'reel');
  }

  /**
   * Publishes a Story. The Graph API takes no caption for Stories, so the
   * reference only goes to the log.
   */
  async postStory(videoUrl: string, reference: string): Promise<string> {
    logger.info('Instagram: creating Story container', { reference });
    const containerId = await this.createContainer('story', {
      media_type: 'STORIES',
      video_url:  videoUrl,
    });
    await this.waitForContainer(containerId, 'story');
    return this.publishContainer(containerId, 'story');
  }

  // ── Steps ───────────────────────────────────────────────────────────────────

  private async createContainer(surface: Surface, params: Record<string, string>): Promise<string> {
    const data = await this.graph.request<{ id?: string }>({
      method:   'POST',
      path:     `${this.accountId}/media`,
      params,
      platform: 'instagram',
      surface,
    });
    if (!data.id) {
      throw new PublishError('Instagram: container response had no id', 'instagram', surface, data);
    }
    return data.id;
  }

  private async waitForContainer(containerId: string, surface: Surface): Promise<void> {
    for (let attempt = 1; attempt <= this.poll.maxAttempts; attempt++) {
      let data: { status_code?: ContainerStatus; status?: string };
      try {
        data = await this.graph.request<{ status_code?: ContainerStatus; status?: string }>({
          method:   'GET',
          path:     containerId,
          params:   { fields: 'status_code,status' },
          platform: 'instagram',
          surface,
        });
      } catch (err) {
        if (!(err instanceof PublishError)) throw err;
        // a failed status check is not a failed container; keep polling
        logger.warn('Instagram: status check failed', { containerId, attempt, error: err.message });
        if (attempt < this.poll.maxAttempts) await this.sleep(this.poll.intervalMs);
        continue;
      }

      if (data.status_code === 'FINISHED') {
        logger.debug('Instagram: container ready', { containerId, attempt });
        return;
      }
      if (data.status_code === 'ERROR' || data.status_code === 'EXPIRED') {
        throw new PublishError(
          `Instagram: container ${containerId} processing failed`,
          'instagram',
          surface,
          data,
        );
      }

      logger.debug('Instagram: container processing', { containerId, attempt, status: data.status_code });
      if (attempt < this.poll.maxAttempts) await this.sleep(this.poll.intervalMs);
    }

    throw new PublishError(
      `Instagram: container ${containerId} not ready after ${this.poll.maxAttempts} checks`,
      'instagram',
      surface,
    );
  }

  private async publishContainer(containerId: string, surface: Surface): Promise<string> {
    const data = await this.graph.request<{ id?: string }>({
      method:   'POST',
      path:     `${this.accountId}/media_publish`,
      params:   { creation_id: containerId },
      platform: 'instagram',
      surface,
    });
    if (!data.id) {
      throw new PublishError('Instagram: media_publish response had no id', 'instagram', surface, data);
    }
    logger.info('Instagram: published', { surface, mediaId: data.id });
    return data.id;
  }
}
