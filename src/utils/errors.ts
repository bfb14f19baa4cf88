import type { Platform, Surface } from '../types.js';

/** A content folder could not be read as a postable item. The item is skipped. */
export class ScanError extends Error {
  constructor(
    message: string,
    public readonly folderId: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ScanError';
  }
}

/**
 * A platform or video-host call failed. `payload` holds whatever the remote
 * side returned (parsed JSON when possible) so it can be logged and stored.
 */
export class PublishError extends Error {
  constructor(
    message: string,
    public readonly platform: Platform | 'host',
    public readonly surface: Surface | null,
    public readonly payload?: unknown,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'PublishError';
  }
}

/** Invalid or missing configuration. Fatal at startup. */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof PublishError && err.payload !== undefined) {
    const payload = typeof err.payload === 'string' ? err.payload : JSON.stringify(err.payload);
    return `${err.message}: ${payload}`;
  }
  return err instanceof Error ? err.message : String(err);
}
