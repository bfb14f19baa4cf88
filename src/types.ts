// ── Platforms & surfaces ─────────────────────────────────────────────────────

export type Platform = 'instagram' | 'facebook';
export type Surface = 'reel' | 'story' | 'feed';

export type SurfaceKey = 'ig_reel' | 'ig_story' | 'fb_reel' | 'fb_feed';

export interface SurfaceTarget {
  key: SurfaceKey;
  platform: Platform;
  surface: Surface;
  label: string;
  /** Longest video the surface accepts, in seconds. null = no limit. */
  maxDurationSeconds: number | null;
}

/** Every surface the service knows about, in publish order. */
export const SURFACE_TARGETS: readonly SurfaceTarget[] = [
  { key: 'ig_reel',  platform: 'instagram', surface: 'reel',  label: 'Instagram Reel',  maxDurationSeconds: 180 },
  { key: 'ig_story', platform: 'instagram', surface: 'story', label: 'Instagram Story', maxDurationSeconds: 60 },
  { key: 'fb_reel',  platform: 'facebook',  surface: 'reel',  label: 'Facebook Reel',   maxDurationSeconds: 180 },
  { key: 'fb_feed',  platform: 'facebook',  surface: 'feed',  label: 'Facebook Feed',   maxDurationSeconds: null },
];

// ── Ledger ───────────────────────────────────────────────────────────────────

export type PostStatus = 'pending' | 'posted' | 'failed' | 'skipped';

export interface PostRecord {
  folderId: string;
  platform: Platform;
  surface: Surface;
  status: PostStatus;
  errorMessage: string | null;
  externalId: string | null;
  updatedAt: string;
}

// ── Content ──────────────────────────────────────────────────────────────────

export type ContentSource = 'json' | 'txt';

export interface ParsedContent {
  title: string;
  description: string;
  hashtags: string[];
  source: ContentSource;
}

export interface ContentItem extends ParsedContent {
  folderId: string;
  folderName: string;
  folderPath: string;
  videoPath: string;
  /** 0 when ffprobe was unavailable. */
  durationSeconds: number;
}
