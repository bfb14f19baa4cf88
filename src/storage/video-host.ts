/**
 * Video hosting. The Graph API pulls videos from a URL, so each dispatch
 * uploads the local file once and hands the signed URL to every surface.
 */
import { createHash } from 'crypto';
import { readFileSync } from 'fs';
import { basename, extname } from 'path';
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { logger } from '../utils/logger.js';
import { PublishError } from '../utils/errors.js';
import type { AppSettings } from '../config.js';
import type { ContentItem } from '../types.js';

export interface VideoHost {
  /** Uploads the item's video and returns a URL the Graph API can fetch. */
  upload(item: Pick<ContentItem, 'folderId' | 'videoPath'>): Promise<string>;
}

// ── Object keys ───────────────────────────────────────────────────────────────

/** Storage rejects non-ASCII keys: accents are dropped, anything else becomes '-'. */
function asciiSegment(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^A-Za-z0-9._-]+/g, '-')
    .replace(/^[-.]+|-+$/g, '');
}

/** ASCII key for a folder id. The hash keeps ids that fold to the same slug apart. */
export function folderKey(folderId: string): string {
  const slug = asciiSegment(folderId);
  const hash = createHash('sha256').update(folderId).digest('hex').slice(0, 8);
  return slug ? `${slug}-${hash}` : hash;
}

export function storagePath(prefix: string, folderId: string, videoPath: string): string {
  const ext = extname(videoPath).toLowerCase();
  const fileName = `${asciiSegment(basename(videoPath, extname(videoPath))) || 'video'}${ext}`;
  const parts = [prefix.replace(/^\/+|\/+$/g, ''), folderKey(folderId), fileName];
  return parts.filter(p => p.length > 0).join('/');
}

export class SupabaseVideoHost implements VideoHost {
  constructor(
    private readonly client: SupabaseClient,
    private readonly bucket: string,
    private readonly prefix: string,
    private readonly ttlSeconds: number,
  ) {}

  async upload(item: Pick<ContentItem, 'folderId' | 'videoPath'>): Promise<string> {
    const path = storagePath(this.prefix, item.folderId, item.videoPath);

    let buffer: Buffer;
    try {
      buffer = readFileSync(item.videoPath);
    } catch (err) {
      throw new PublishError(`Cannot read video ${item.videoPath}`, 'host', null, undefined, err);
    }

    logger.info('VideoHost: uploading', { bucket: this.bucket, path, bytes: buffer.length });
    const { error } = await this.client.storage
      .from(this.bucket)
      .upload(path, buffer, { contentType: 'video/mp4', upsert: true });
    if (error) {
      throw new PublishError(`Upload to bucket "${this.bucket}" failed`, 'host', null, error.message, error);
    }

    const { data, error: signError } = await this.client.storage
      .from(this.bucket)
      .createSignedUrl(path, this.ttlSeconds);
    if (signError || !data?.signedUrl) {
      throw new PublishError(`Signing ${path} failed`, 'host', null, signError?.message, signError);
    }

    logger.info('VideoHost: upload complete', { path, ttlSeconds: this.ttlSeconds });
    return data.signedUrl;
  }
}

/** Builds the Supabase-backed host, or throws when storage is not configured. */
export function createVideoHost(settings: AppSettings): VideoHost {
  const { supabaseUrl, supabaseServiceKey, bucket, folderPrefix, signedUrlTtlSeconds } = settings.storage;
  if (!supabaseUrl || !supabaseServiceKey) {
    throw new PublishError('Supabase storage is not configured', 'host', null);
  }
  return new SupabaseVideoHost(
    createClient(supabaseUrl, supabaseServiceKey),
    bucket,
    folderPrefix,
    signedUrlTtlSeconds,
  );
}
