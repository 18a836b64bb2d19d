/**
 * @module web/types
 * Search backend contract for the web fallback.
 */

import type { Lang } from '../types.js';

export interface WebResult {
  title: string;
  snippet: string;
  link: string;
}

export type BackendType = 'duckduckgo' | 'wikipedia';

export interface SearchBackend {
  readonly name: string;
  readonly endpoint: string;
  readonly method: 'GET';
  /** Full request URL for `query`, shaped for `lang`. */
  buildUrl(query: string, lang: Lang): URL;
  /**
   * Extract results from the decoded JSON body of `request`.
   * @throws when the body does not have the expected shape
   */
  parse(body: unknown, request: URL): WebResult[];
}

export interface BackendConfig {
  type: BackendType;
  name?: string;
  endpoint?: string;
}
