/**
 * Reads the per-folder text that goes with a video.
 *
 * `social_media_content.json` is preferred; `social_media_content.txt` is the
 * fallback. Only the Instagram/Facebook part of either file is used.
 */
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import type { ParsedContent } from '../types.js';

export const CONTENT_JSON = 'social_media_content.json';
export const CONTENT_TXT = 'social_media_content.txt';

// ── Hashtags ──────────────────────────────────────────────────────────────────

/** Trims, drops empties and guarantees a single leading '#'. */
export function normalizeHashtags(tags: readonly string[]): string[] {
  return tags
    .map(t => t.trim().replace(/^#+/, ''))
    .filter(t => t.length > 0)
    .map(t => `#${t}`);
}

// ── JSON ──────────────────────────────────────────────────────────────────────

const ContentFileSchema = z.object({
  instagram_facebook: z
    .object({
      title:       z.string().default(''),
      description: z.string().default(''),
      hashtags:    z.array(z.string()).default([]),
    })
    .default({}),
});

export function parseContentJson(raw: string): ParsedContent {
  const data = ContentFileSchema.parse(JSON.parse(raw));
  const section = data.instagram_facebook;
  return {
    title:       section.title.trim(),
    description: section.description.trim(),
    hashtags:    normalizeHashtags(section.hashtags),
    source:      'json',
  };
}

// ── TXT ───────────────────────────────────────────────────────────────────────

const SECTION_START = /INSTAGRAM|📱/;
const SECTION_END = /YOUTUBE|🎬|======/;

/** Cuts out the Instagram/Facebook block when the file has several platform blocks. */
function instagramSection(text: string): string {
  if (!text.includes('INSTAGRAM / FACEBOOK') && !text.includes('📱')) return text;

  const lines = text.split('\n');
  const start = lines.findIndex(l => SECTION_START.test(l));
  const body: string[] = [];
  for (const line of lines.slice(start + 1)) {
    if (SECTION_END.test(line)) break;
    body.push(line);
  }
  return body.join('\n');
}

export function parseContentTxt(raw: string): ParsedContent {
  const section = instagramSection(raw.replace(/\r\n/g, '\n'));

  const title = section.match(/Title:\s*(.+)/)?.[1]?.trim() ?? '';
  const description =
    section.match(/Description:\s*\n([\s\S]+?)(?=\nHashtags:|\n\n\n|$)/)?.[1]?.trim() ?? '';
  const hashtagBlock = section.match(/Hashtags:\s*\n([\s\S]+?)(?:\n\n|$)/)?.[1] ?? '';

  return {
    title,
    description,
    hashtags: normalizeHashtags(hashtagBlock.split(/[\s,]+/)),
    source:   'txt',
  };
}

// ── Folder ────────────────────────────────────────────────────────────────────

/** Content for a folder, or null when neither content file could be read. */
export function parseContentFolder(folderPath: string): ParsedContent | null {
  const jsonPath = join(folderPath, CONTENT_JSON);
  const txtPath = join(folderPath, CONTENT_TXT);

  if (existsSync(jsonPath)) {
    try {
      const content = parseContentJson(readFileSync(jsonPath, 'utf-8'));
      logger.debug('Parser: read JSON content', {
        folderPath,
        title: content.title.slice(0, 50),
        hashtags: content.hashtags.length,
      });
      return content;
    } catch (err) {
      logger.error('Parser: invalid content JSON, trying TXT fallback', { jsonPath, error: String(err) });
    }
  }

  if (existsSync(txtPath)) {
    try {
      const content = parseContentTxt(readFileSync(txtPath, 'utf-8'));
      logger.debug('Parser: read TXT content', { folderPath, title: content.title.slice(0, 50) });
      return content;
    } catch (err) {
      logger.error('Parser: could not read content TXT', { txtPath, error: String(err) });
    }
  }

  logger.debug('Parser: no readable content file', { folderPath });
  return null;
}
