/**
 * Facebook Page publishing: Reels through the three-phase video_reels upload,
 * feed videos through /{page}/videos with a hosted file_url.
 */
import { logger } from '../utils/logger.js';
import { PublishError } from '../utils/errors.js';
import type { GraphClient } from './graph.js';

const RUPLOAD_BASE = 'https://rupload.facebook.com/video-upload';

export class FacebookClient {
  constructor(
    private readonly graph: GraphClient,
    private readonly pageId: string,
  ) {}

  /** Publishes a Page Reel and returns the video id. */
  async postReel(videoUrl: string, description: string): Promise<string> {
    // 1. start
    const start = await this.graph.request<{ video_id?: string }>({
      method:   'POST',
      path:     `${this.pageId}/video_reels`,
      params:   { upload_phase: 'start' },
      platform: 'facebook',
      surface:  'reel',
    });
    const videoId = start.video_id;
    if (!videoId) {
      throw new PublishError('Facebook: Reel start response had no video_id', 'facebook', 'reel', start);
    }

    // 2. hosted upload: rupload pulls the file from file_url
    const upload = await this.graph.request<{ success?: boolean }>({
      method:    'POST',
      path:      `${RUPLOAD_BASE}/${this.graph.apiVersion}/${videoId}`,
      headers:   { Authorization: `OAuth ${this.graph.token}`, file_url: videoUrl },
      omitToken: true,
      platform:  'facebook',
      surface:   'reel',
    });
    if (upload.success === false) {
      throw new PublishError('Facebook: Reel upload was not accepted', 'facebook', 'reel', upload);
    }

    // 3. finish
    const finish = await this.graph.request<{ success?: boolean }>({
      method:   'POST',
      path:     `${this.pageId}/video_reels`,
      params:   {
        upload_phase: 'finish',
        video_id:     videoId,
        video_state:  'PUBLISHED',
        description,
      },
      platform: 'facebook',
      surface:  'reel',
    });
    if (finish.success === false) {
      throw new PublishError('Facebook: Reel finish was not accepted', 'facebook', 'reel', finish);
    }

    logger.info('Facebook: Reel published', { videoId });
    return videoId;
  }

  /** Posts the video to the Page feed and returns the video id. */
  async postFeedVideo(videoUrl: string, description: string): Promise<string> {
    const data = await this.graph.request<{ id?: string }>({
      method:   'POST',
      path:     `${this.pageId}/videos`,
      params:   { file_url: videoUrl, description },
      platform: 'facebook',
      surface:  'feed',
    });
    if (!data.id) {
      throw new PublishError('Facebook: feed video response had no id', 'facebook', 'feed', data);
    }
    logger.info('Facebook: feed video published', { videoId: data.id });
    return data.id;
  }
}
