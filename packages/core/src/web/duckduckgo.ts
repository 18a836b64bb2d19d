/**
 * @module web/duckduckgo
 * DuckDuckGo instant-answer API backend.
 */

import { z } from 'zod';
import type { Lang } from '../types.js';
import { stripHtml } from './html.js';
import type { SearchBackend, WebResult } from './types.js';

export const DUCKDUCKGO_ENDPOINT = 'https://api.duckduckgo.com/';

const REGION: Record<Lang, string> = { en: 'us-en', np: 'wt-wt' };

const TopicSchema = z.object({
  Text: z.string().optional(),
  FirstURL: z.string().optional(),
});

/** A topic, or a named group of topics. */
const RelatedSchema = TopicSchema.extend({
  Topics: z.array(TopicSchema).optional(),
});

const InstantAnswerSchema = z.object({
  Heading: z.string().optional(),
  AbstractText: z.string().optional(),
  AbstractURL: z.string().optional(),
  RelatedTopics: z.array(RelatedSchema).default([]),
});

type Topic = z.infer<typeof TopicSchema>;

export class DuckDuckGoBackend implements SearchBackend {
  readonly method = 'GET';

  constructor(
    readonly name = 'duckduckgo',
    readonly endpoint = DUCKDUCKGO_ENDPOINT,
  ) {}

  buildUrl(query: string, lang: Lang): URL {
    const url = new URL(this.endpoint);
    url.searchParams.set('q', query);
    url.searchParams.set('format', 'json');
    url.searchParams.set('no_html', '1');
    url.searchParams.set('skip_disambig', '1');
    url.searchParams.set('kl', REGION[lang]);
    return url;
  }

  parse(body: unknown): WebResult[] {
    const answer = InstantAnswerSchema.parse(body);
    const results: WebResult[] = [];

    const abstract = stripHtml(answer.AbstractText ?? '');
    if (abstract && answer.AbstractURL) {
      results.push({ title: answer.Heading || titleFromUrl(answer.AbstractURL), snippet: abstract, link: answer.AbstractURL });
    }

    const topics = answer.RelatedTopics.flatMap((entry): Topic[] => entry.Topics ?? [entry]);
    for (const topic of topics) {
      const text = stripHtml(topic.Text ?? '');
      if (!text || !topic.FirstURL) continue;
      results.push({ title: titleFromUrl(topic.FirstURL), snippet: text, link: topic.FirstURL });
    }

    return results;
  }
}

/** "https://duckduckgo.com/Wi-Fi_Protected_Setup" → "Wi-Fi Protected Setup" */
function titleFromUrl(link: string): string {
  const segment = link.split('/').filter(Boolean).pop() ?? link;
  try {
    return decodeURIComponent(segment).replace(/_/g, ' ');
  } catch {
    return segment.replace(/_/g, ' ');
  }
}
