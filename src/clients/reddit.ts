import pLimit from 'p-limit';
import type { CacheClient } from '../cache/cache.js';
import { RedditApiError, RedditAuthError, RedditNotFoundError } from '../errors.js';
import type { ParentLookup, ParentResolution, RawItem } from '../types/index.js';
import { checksumFrom } from '../utils/hash.js';
import { parseListing, parseToken, type ParsedListing, type ParsedThing, type TokenPayload } from './schemas.js';

export interface RedditCredentials {
  clientId: string;
  clientSecret: string;
  username?: string | undefined;
  password?: string | undefined;
}

export interface RedditClientOptions {
  credentials?: RedditCredentials | undefined;
  userAgent?: string;
  cache?: CacheClient | undefined;
  namespace?: string;
  concurrency?: number;
  logger?: (message: string) => void;
}

export interface FetchCommentsOptions {
  limit: number;
  /** Epoch seconds; paging stops at the first older comment. */
  since?: number | undefined;
}

const OAUTH_BASE_URL = 'https://oauth.reddit.com';
const PUBLIC_BASE_URL = 'https://www.reddit.com';
const TOKEN_URL = 'https://www.reddit.com/api/v1/access_token';
const DEFAULT_USER_AGENT = 'reddit-character-definition/0.1.0';
const PAGE_SIZE = 100;
const INFO_BATCH_SIZE = 100;
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

interface AccessToken {
  value: string;
  expiresAt: number;
}

export class RedditClient {
  private readonly credentials: RedditCredentials | undefined;
  private readonly userAgent: string;
  private readonly cache: CacheClient | undefined;
  private readonly namespace: string;
  private readonly concurrency: number;
  private readonly logger: ((message: string) => void) | undefined;
  private token: AccessToken | null = null;
  private pendingToken: Promise<string> | null = null;

  constructor(options: RedditClientOptions = {}) {
    this.credentials = options.credentials;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.cache = options.cache;
    this.namespace = options.namespace ?? 'reddit-info';
    this.concurrency = options.concurrency ?? 2;
    this.logger = options.logger;
  }

  async fetchUserComments(username: string, options: FetchCommentsOptions): Promise<RawItem[]> {
    const comments: RawItem[] = [];
    let after: string | null = null;

    while (comments.length < options.limit) {
      const query = new URLSearchParams({
        sort: 'new',
        limit: String(Math.min(PAGE_SIZE, options.limit - comments.length)),
        raw_json: '1',
      });
      if (after) {
        query.set('after', after);
      }

      const path = `/user/${encodeURIComponent(username)}/comments`;
      let payload: unknown;
      try {
        payload = await this.getJson(path, query);
      } catch (error) {
        if (error instanceof RedditApiError && error.status === 404) {
          throw new RedditNotFoundError(username);
        }
        throw error;
      }

      const listing = this.parse(payload, path);
      const page = listing.things.filter((thing) => thing.kind === 't1').map(toRawItem);
      this.logger?.(`Fetched ${page.length} comments${after ? ` after ${after}` : ''}`);
      if (page.length === 0) {
        break;
      }

      for (const comment of page) {
        if (options.since !== undefined && comment.createdUtc < options.since) {
          return comments;
        }
        comments.push(comment);
        if (comments.length >= options.limit) {
          break;
        }
      }

      after = listing.after;
      if (!after) {
        break;
      }
    }

    return comments;
  }

  /**
   * Looks up every distinct parent of the given comments and returns a
   * synchronous lookup over the results. A batch that fails marks its ids as
   * failed instead of aborting the run; authentication failures still throw.
   */
  async resolveParents(comments: readonly RawItem[]): Promise<ParentLookup> {
    const ids = [...new Set(comments.map((comment) => comment.parentId).filter((id): id is string => Boolean(id)))];
    const found = new Map<string, RawItem>();
    const failed = new Map<string, string>();
    const limit = pLimit(this.concurrency);

    const batches: string[][] = [];
    for (let index = 0; index < ids.length; index += INFO_BATCH_SIZE) {
      batches.push(ids.slice(index, index + INFO_BATCH_SIZE));
    }

    await Promise.all(
      batches.map((batch) =>
        limit(async () => {
          try {
            for (const item of await this.fetchInfo(batch)) {
              found.set(item.id, item);
            }
          } catch (error) {
            if (error instanceof RedditAuthError) {
              throw error;
            }
            const reason = error instanceof Error ? error.message : String(error);
            this.logger?.(`Parent lookup failed for ${batch.length} items: ${reason}`);
            for (const id of batch) {
              failed.set(id, reason);
            }
          }
        }),
      ),
    );

    return (parentId: string): ParentResolution => {
      const item = found.get(parentId);
      if (item) {
        return { status: 'found', item };
      }
      const reason = failed.get(parentId);
      if (reason !== undefined) {
        return { status: 'failed', reason };
      }
      return { status: 'missing' };
    };
  }

  private async fetchInfo(ids: string[]): Promise<RawItem[]> {
    const path = '/api/info';
    const query = new URLSearchParams({ id: ids.join(','), raw_json: '1' });
    const checksum = checksumFrom({ path, ids, method: 'GET' });

    const cached = this.cache ? await this.cache.read(this.namespace, checksum) : null;
    if (cached) {
      return this.parse(JSON.parse(cached.body), path).things.map(toRawItem);
    }

    const payload = await this.getJson(path, query);
    const items = this.parse(payload, path).things.map(toRawItem);
    await this.cache?.write(this.namespace, {
      checksum,
      body: JSON.stringify(payload),
      metadata: { path, count: ids.length },
    });
    return items;
  }

  private parse(payload: unknown, path: string): ParsedListing {
    try {
      return parseListing(payload);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RedditApiError(`Unexpected response from ${path}: ${message}`);
    }
  }

  private async getJson(path: string, query: URLSearchParams): Promise<unknown> {
    const headers: Record<string, string> = { 'User-Agent': this.userAgent };
    let url: string;
    if (this.credentials) {
      headers.Authorization = `Bearer ${await this.accessToken(this.credentials)}`;
      url = `${OAUTH_BASE_URL}${path}?${query.toString()}`;
    } else {
      url = `${PUBLIC_BASE_URL}${path}.json?${query.toString()}`;
    }

    const response = await fetch(url, { headers });
    if (response.status === 401 || response.status === 403) {
      throw new RedditAuthError(`Reddit API rejected the request to ${path} with status ${response.status}`, response.status);
    }
    if (!response.ok) {
      throw new RedditApiError(`Reddit API request to ${path} failed with status ${response.status}`, response.status);
    }

    return response.json();
  }

  /** Concurrent callers share one token request. */
  private async accessToken(credentials: RedditCredentials): Promise<string> {
    if (this.token && this.token.expiresAt > Date.now()) {
      return this.token.value;
    }

    if (!this.pendingToken) {
      this.pendingToken = this.requestToken(credentials).finally(() => {
        this.pendingToken = null;
      });
    }
    return this.pendingToken;
  }

  private async requestToken(credentials: RedditCredentials): Promise<string> {
    const body = new URLSearchParams(
      credentials.username && credentials.password
        ? { grant_type: 'password', username: credentials.username, password: credentials.password }
        : { grant_type: 'client_credentials' },
    );
    const basic = Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`).toString('base64');
    const response = await fetch(TOKEN_URL, {
      method: 'POST',
      headers: {
        Authorization: `Basic ${basic}`,
        'Content-Type': 'application/x-www-form-urlencoded',
        'User-Agent': this.userAgent,
      },
      body,
    });

    if (!response.ok) {
      throw new RedditAuthError(`Failed to authenticate with Reddit API (status ${response.status})`, response.status);
    }

    let token: TokenPayload;
    try {
      token = parseToken(await response.json());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RedditAuthError(`Failed to authenticate with Reddit API: ${message}`);
    }

    this.token = {
      value: token.access_token,
      expiresAt: Date.now() + token.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS,
    };
    this.logger?.(`Obtained ${credentials.username ? 'user' : 'application'} access token`);
    return this.token.value;
  }
}

function toRawItem(thing: ParsedThing): RawItem {
  const { data } = thing;
  const base = {
    id: data.name,
    author: data.author,
    createdUtc: Math.floor(data.created_utc),
    score: data.score,
  };

  if (thing.kind === 't3') {
    return { ...base, kind: 'post', body: data.selftext, title: data.title ?? '', parentId: null };
  }
  return { ...base, kind: 'comment', body: data.body, parentId: data.parent_id };
}
