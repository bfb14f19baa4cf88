import { describe, it, expect, vi, type Mock } from 'vitest';
import { GraphClient, type FetchFn } from './graph.js';
import { InstagramClient, type Sleep } from './instagram.js';
import { PublishError } from '../utils/errors.js';

const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

const VIDEO_URL = 'https://storage.test/reels/day-01/final_video.mp4?token=test-signature';

function setup(responses: Response[], maxAttempts = 3) {
  const fetchFn = vi.fn<FetchFn>();
  for (const res of responses) fetchFn.mockResolvedValueOnce(res);
  const sleep = vi.fn<Sleep>().mockResolvedValue(undefined);
  const graph = new GraphClient({ accessToken: 'test-token', apiVersion: 'v21.0', fetchFn });
  const instagram = new InstagramClient(graph, 'ig-test', { maxAttempts, intervalMs: 5 }, sleep);
  return { fetchFn, sleep, instagram };
}

const bodyOf = (fetchFn: Mock<FetchFn>, call: number) =>
  new URLSearchParams(String(fetchFn.mock.calls[call]?.[1]?.body ?? ''));

describe('InstagramClient', () => {
  it('creates a Reel container, waits for it and publishes', async () => {
    const { fetchFn, sleep, instagram } = setup([
      json({ id: 'container-1' }),
      json({ status_code: 'IN_PROGRESS' }),
      json({ status_code: 'FINISHED' }),
      json({ id: 'media-1' }),
    ]);

    await expect(instagram.postReel(VIDEO_URL, 'A\n\nB\n\n#x #y')).resolves.toBe('media-1');

    const create = bodyOf(fetchFn, 0);
    expect(fetchFn.mock.calls[0]?.[0]).toBe('https://graph.facebook.com/v21.0/ig-test/media');
    expect(create.get('media_type')).toBe('REELS');
    expect(create.get('video_url')).toBe(VIDEO_URL);
    expect(create.get('caption')).toBe('A\n\nB\n\n#x #y');

    expect(fetchFn.mock.calls[1]?.[0]).toBe(
      'https://graph.facebook.com/v21.0/container-1?fields=status_code%2Cstatus&access_token=test-token',
    );
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(5);

    expect(fetchFn.mock.calls[3]?.[0]).toBe('https://graph.facebook.com/v21.0/ig-test/media_publish');
    expect(bodyOf(fetchFn, 3).get('creation_id')).toBe('container-1');
  });

  it('creates a Story container without a caption', async () => {
    const { fetchFn, instagram } = setup([
      json({ id: 'container-2' }),
      json({ status_code: 'FINISHED' }),
      json({ id: 'media-2' }),
    ]);

    await expect(instagram.postStory(VIDEO_URL, 'A')).resolves.toBe('media-2');

    const create = bodyOf(fetchFn, 0);
    expect(create.get('media_type')).toBe('STORIES');
    expect(create.get('caption')).toBeNull();
  });

  it('fails when the container reports ERROR', async () => {
    const { fetchFn, instagram } = setup([
      json({ id: 'container-3' }),
      json({ status_code: 'ERROR', status: 'Error: unsupported codec' }),
    ]);

    const err = await instagram.postReel(VIDEO_URL, 'A').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PublishError);
    expect(err).toMatchObject({
      message: 'Instagram: container container-3 processing failed',
      platform: 'instagram',
      surface: 'reel',
      payload: { status_code: 'ERROR', status: 'Error: unsupported codec' },
    });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured number of status checks', async () => {
    const { fetchFn, sleep, instagram } = setup(
      [json({ id: 'container-4' }), json({ status_code: 'IN_PROGRESS' }), json({ status_code: 'IN_PROGRESS' })],
      2,
    );

    await expect(instagram.postStory(VIDEO_URL, 'A')).rejects.toThrow(
      'Instagram: container container-4 not ready after 2 checks',
    );
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it('keeps polling after a failed status check', async () => {
    const { fetchFn, sleep, instagram } = setup([
      json({ id: 'container-5' }),
      json({ error: { message: 'temporarily unavailable' } }, 503),
      json({ status_code: 'FINISHED' }),
      json({ id: 'media-5' }),
    ]);

    await expect(instagram.postReel(VIDEO_URL, 'A')).resolves.toBe('media-5');
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(fetchFn).toHaveBeenCalledTimes(4);
  });

  it('gives up when every status check fails', async () => {
    const { fetchFn, instagram } = setup(
      [json({ id: 'container-6' }), json({}, 500), json({}, 500)],
      2,
    );

    await expect(instagram.postStory(VIDEO_URL, 'A')).rejects.toThrow(
      'Instagram: container container-6 not ready after 2 checks',
    );
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it('fails when the container response has no id', async () => {
    const { instagram } = setup([json({})]);
    await expect(instagram.postReel(VIDEO_URL, 'A')).rejects.toThrow('Instagram: container response had no id');
  });
});
