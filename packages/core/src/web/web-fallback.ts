/**
 * @module web/web-fallback
 * Live web search, tried backend by backend until one yields results.
 *
 * `search` never rejects: a failing backend (network error, timeout,
 * non-2xx, unexpected body, no results) hands over to the next one, and
 * when all are exhausted the caller gets {@link NO_WEB_RESULTS}.
 */

import { TimeoutError, errorMessage } from '../errors.js';
import type { EventSink, Lang } from '../types.js';
import { DuckDuckGoBackend } from './duckduckgo.js';
import type { BackendConfig, SearchBackend, WebResult } from './types.js';
import { WikipediaBackend } from './wikipedia.js';

export const NO_WEB_RESULTS = '🔍 No relevant results online.';
export const DEFAULT_WEB_TIMEOUT_MS = 8_000;
export const MAX_WEB_RESULTS = 3;

const ACCEPT_LANGUAGE: Record<Lang, string> = { en: 'en', np: 'ne' };

export type FetchLike = (input: URL, init: RequestInit) => Promise<Response>;

export interface WebFallbackOptions {
  backends?: SearchBackend[];
  /** Per-backend time budget in ms. Default: 8000. */
  timeout?: number;
  fetch?: FetchLike;
  eventBus?: EventSink;
}

export function createBackend(config: BackendConfig): SearchBackend {
  switch (config.type) {
    case 'duckduckgo':
      return new DuckDuckGoBackend(config.name, config.endpoint);
    case 'wikipedia':
      return new WikipediaBackend(config.name, config.endpoint);
  }
}

export function defaultBackends(): SearchBackend[] {
  return [new DuckDuckGoBackend(), new WikipediaBackend()];
}

/** `🔎 title\n📝 snippet\n🔗 link` blocks separated by a blank line. */
export function formatResults(results: readonly WebResult[]): string {
  return results
    .slice(0, MAX_WEB_RESULTS)
    .map((r) => `🔎 ${r.title}\n📝 ${r.snippet}\n🔗 ${r.link}`)
    .join('\n\n');
}

export class WebFallback {
  private readonly backends: SearchBackend[];
  private readonly timeout: number;
  private readonly fetchFn: FetchLike;
  private readonly eventBus?: EventSink;
  private lookupCount = 0;

  constructor(options: WebFallbackOptions = {}) {
    this.backends = options.backends ?? defaultBackends();
    this.timeout = options.timeout ?? DEFAULT_WEB_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.eventBus = options.eventBus;
  }

  /** Number of `search` calls so far. */
  get lookups(): number {
    return this.lookupCount;
  }

  async search(query: string, lang: Lang): Promise<string> {
    this.lookupCount++;

    for (const backend of this.backends) {
      try {
        const results = await this.query(backend, query, lang);
        if (results.length === 0) {
          this.emit('backend_empty', { backend: backend.name });
          continue;
        }
        this.emit('backend_hit', { backend: backend.name, results: results.length });
        return formatResults(results);
      } catch (err) {
        if (err instanceof TimeoutError) {
          console.warn(`[web] ${err.message}`);
        }
        this.emit('backend_failed', { backend: backend.name, error: errorMessage(err) });
      }
    }

    this.emit('exhausted', { backends: this.backends.length });
    return NO_WEB_RESULTS;
  }

  private async query(backend: SearchBackend, query: string, lang: Lang): Promise<WebResult[]> {
    const url = backend.buildUrl(query, lang);
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);

    try {
      const response = await this.fetchFn(url, {
        method: backend.method,
        headers: { Accept: 'application/json', 'Accept-Language': ACCEPT_LANGUAGE[lang] },
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new Error(`${backend.name} returned ${response.status}: ${response.statusText}`);
      }
      const body: unknown = await response.json();
      return backend.parse(body, url);
    } catch (err) {
      if (timedOut) {
        throw new TimeoutError(`${backend.name} did not answer within ${this.timeout}ms`, {
          backend: backend.name,
          timeout: this.timeout,
        });
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  private emit(event: string, data: Record<string, unknown>): void {
    this.eventBus?.emit('web', { event, data });
  }
}
