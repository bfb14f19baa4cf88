import { describe, it, expect, vi } from 'vitest';
import { GraphClient, type FetchFn } from './graph.js';
import { FacebookClient } from './facebook.js';

const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

const VIDEO_URL = 'https://storage.test/reels/day-01/final_video.mp4?token=test-signature';

function setup(responses: Response[]) {
  const fetchFn = vi.fn<FetchFn>();
  for (const res of responses) fetchFn.mockResolvedValueOnce(res);
  const graph = new GraphClient({ accessToken: 'test-token', apiVersion: 'v21.0', fetchFn });
  return { fetchFn, facebook: new FacebookClient(graph, 'page-test') };
}

describe('FacebookClient.postReel', () => {
  it('runs start, hosted upload and finish', async () => {
    const { fetchFn, facebook } = setup([
      json({ video_id: 'vid-1', upload_url: 'https://rupload.facebook.com/video-upload/v21.0/vid-1' }),
      json({ success: true }),
      json({ success: true }),
    ]);

    await expect(facebook.postReel(VIDEO_URL, 'A\n\nB')).resolves.toBe('vid-1');

    const [startUrl, startInit] = fetchFn.mock.calls[0] ?? [];
    expect(startUrl).toBe('https://graph.facebook.com/v21.0/page-test/video_reels');
    expect(String(startInit?.body)).toBe('upload_phase=start&access_token=test-token');

    const [uploadUrl, uploadInit] = fetchFn.mock.calls[1] ?? [];
    expect(uploadUrl).toBe('https://rupload.facebook.com/video-upload/v21.0/vid-1');
    expect(uploadInit?.headers).toEqual({ Authorization: 'OAuth test-token', file_url: VIDEO_URL });
    expect(String(uploadInit?.body)).toBe('');

    const finish = new URLSearchParams(String(fetchFn.mock.calls[2]?.[1]?.body ?? ''));
    expect(finish.get('upload_phase')).toBe('finish');
    expect(finish.get('video_id')).toBe('vid-1');
    expect(finish.get('video_state')).toBe('PUBLISHED');
    expect(finish.get('description')).toBe('A\n\nB');
  });

  it('stops when the start phase returns no video id', async () => {
    const { fetchFn, facebook } = setup([json({})]);

    await expect(facebook.postReel(VIDEO_URL, 'A')).rejects.toThrow('Facebook: Reel start response had no video_id');
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('reports a rejected upload', async () => {
    const { facebook } = setup([json({ video_id: 'vid-1' }), json({ success: false })]);
    await expect(facebook.postReel(VIDEO_URL, 'A')).rejects.toThrow('Facebook: Reel upload was not accepted');
  });
});

describe('FacebookClient.postFeedVideo', () => {
  it('posts the hosted file to the Page feed', async () => {
    const { fetchFn, facebook } = setup([json({ id: 'vid-2' })]);

    await expect(facebook.postFeedVideo(VIDEO_URL, 'A\n\n#x')).resolves.toBe('vid-2');

    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('https://graph.facebook.com/v21.0/page-test/videos');
    const body = new URLSearchParams(String(init?.body));
    expect(body.get('file_url')).toBe(VIDEO_URL);
    expect(body.get('description')).toBe('A\n\n#x');
    expect(body.get('access_token')).toBe('test-token');
  });

  it('surfaces the Graph error for a failed post', async () => {
    const { facebook } = setup([json({ error: { message: 'Permissions error', code: 200 } }, 403)]);

    await expect(facebook.postFeedVideo(VIDEO_URL, 'A')).rejects.toMatchObject({
      platform: 'facebook',
      surface: 'feed',
      payload: { error: { message: 'Permissions error', code: 200 } },
    });
  });
});
