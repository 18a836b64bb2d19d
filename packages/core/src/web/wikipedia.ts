/**
 * @module web/wikipedia
 * MediaWiki full-text search backend; Nepali queries go to ne.wikipedia.org.
 */

import { z } from 'zod';
import type { Lang } from '../types.js';
import { stripHtml } from './html.js';
import type { SearchBackend, WebResult } from './types.js';

const WIKI_HOST: Record<Lang, string> = { en: 'en.wikipedia.org', np: 'ne.wikipedia.org' };

const SearchResponseSchema = z.object({
  query: z.object({
    search: z.array(z.object({
      title: z.string(),
      snippet: z.string().default(''),
    })),
  }),
});

export class WikipediaBackend implements SearchBackend {
  readonly method = 'GET';

  /**
   * @param endpoint Fixed API URL. When omitted the host follows the query language.
   */
  constructor(
    readonly name = 'wikipedia',
    private readonly fixedEndpoint?: string,
  ) {}

  get endpoint(): string {
    return this.fixedEndpoint ?? `https://${WIKI_HOST.en}/w/api.php`;
  }

  buildUrl(query: string, lang: Lang): URL {
    const url = new URL(this.fixedEndpoint ?? `https://${WIKI_HOST[lang]}/w/api.php`);
    url.searchParams.set('action', 'query');
    url.searchParams.set('list', 'search');
    url.searchParams.set('srsearch', query);
    url.searchParams.set('srlimit', '3');
    url.searchParams.set('format', 'json');
    url.searchParams.set('utf8', '1');
    return url;
  }

  parse(body: unknown, request: URL): WebResult[] {
    const { query } = SearchResponseSchema.parse(body);
    return query.search.map((hit) => ({
      title: hit.title,
      snippet: stripHtml(hit.snippet),
      link: `https://${request.host}/wiki/${encodeURIComponent(hit.title.replace(/ /g, '_'))}`,
    }));
  }
}
