import type { ContentItem } from '../types.js';

/** Instagram and Facebook both cut captions at this length. */
export const MAX_CAPTION_LENGTH = 2200;

/** Reel and Feed caption: title, description and hashtags as blank-line separated blocks. */
export function buildReelCaption(item: Pick<ContentItem, 'title' | 'description' | 'hashtags'>): string {
  const parts = [item.title.trim(), item.description.trim(), item.hashtags.join(' ')]
    .filter(p => p.length > 0);
  // by code point, so an emoji at the cut is never split in half
  return Array.from(parts.join('\n\n')).slice(0, MAX_CAPTION_LENGTH).join('');
}

/** Stories carry no caption; the title is the only reference kept for them. */
export function buildStoryReference(item: Pick<ContentItem, 'title'>): string {
  return item.title.trim();
}
