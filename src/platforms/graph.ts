/**
 * Minimal Meta Graph API client shared by the Instagram and Facebook adapters.
 *
 * Every failed call throws a PublishError carrying the Graph error payload so
 * the publisher can store it on the ledger row.
 */
import { logger } from '../utils/logger.js';
import { PublishError } from '../utils/errors.js';
import type { Platform, Surface } from '../types.js';

// ── Constants ─────────────────────────────────────────────────────────────────

const GRAPH_BASE = 'https://graph.facebook.com';

// ── Types ─────────────────────────────────────────────────────────────────────

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface GraphClientOptions {
  accessToken: string;
  apiVersion: string;
  fetchFn?: FetchFn;
}

export interface GraphRequest {
  method: 'GET' | 'POST';
  /** Path under the versioned Graph base, or an absolute URL. */
  path: string;
  params?: Record<string, string>;
  headers?: Record<string, string>;
  /** Defaults to the resolved Page token, then the user token. */
  token?: string;
  /** Leave out the access_token parameter (used when auth travels in a header). */
  omitToken?: boolean;
  platform: Platform;
  surface: Surface | null;
}

async function readPayload(res: Response): Promise<unknown> {
  const text = await res.text().catch(() => '');
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

// ── Client ────────────────────────────────────────────────────────────────────

export class GraphClient {
  readonly apiVersion: string;
  private readonly userToken: string;
  private readonly fetchFn: FetchFn;
  private pageToken: string | null = null;

  constructor(opts: GraphClientOptions) {
    this.userToken = opts.accessToken;
    this.apiVersion = opts.apiVersion;
    this.fetchFn = opts.fetchFn ?? ((input, init) => fetch(input, init));
  }

  /** Token used for publishing: the Page token once resolved, else the user token. */
  get token(): string {
    return this.pageToken ?? this.userToken;
  }

  async request<T>(req: GraphRequest): Promise<T> {
    const url = new URL(
      req.path.startsWith('https://') ? req.path : `${GRAPH_BASE}/${this.apiVersion}/${req.path.replace(/^\//, '')}`,
    );

    const params = new URLSearchParams(req.params);
    if (!req.omitToken) params.set('access_token', req.token ?? this.token);

    let body: URLSearchParams | undefined;
    if (req.method === 'GET') {
      params.forEach((v, k) => url.searchParams.set(k, v));
    } else {
      body = params;
    }

    let res: Response;
    try {
      res = await this.fetchFn(url.toString(), { method: req.method, headers: req.headers, body });
    } catch (err) {
      throw new PublishError(`Graph ${req.method} ${url.pathname} unreachable`, req.platform, req.surface, undefined, err);
    }

    const payload = await readPayload(res);
    if (!res.ok) {
      throw new PublishError(
        `Graph ${req.method} ${url.pathname} failed: HTTP ${res.status}`,
        req.platform,
        req.surface,
        payload,
      );
    }
    return payload as T;
  }

  /**
   * Swaps the user token for the Page's own token. Falls back to the user
   * token (with a warning) when the Page does not return one.
   */
  async resolvePageToken(pageId: string): Promise<void> {
    if (!pageId || !this.userToken) {
      logger.warn('Graph: missing access token or Page id, using user token');
      return;
    }

    try {
      const data = await this.request<{ access_token?: string }>({
        method:   'GET',
        path:     pageId,
        params:   { fields: 'access_token' },
        token:    this.userToken,
        platform: 'facebook',
        surface:  null,
      });
      if (data.access_token) {
        this.pageToken = data.access_token;
        logger.info('Graph: Page access token resolved');
      } else {
        logger.warn('Graph: no Page token in response, using user token');
      }
    } catch (err) {
      const payload = err instanceof PublishError ? err.payload : String(err);
      logger.error('Graph: Page token lookup failed, using user token', { payload });
    }
  }
}
