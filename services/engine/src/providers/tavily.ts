import { z } from 'zod';
import type { ProviderSettings } from '../config';
import { failure, success } from '../contracts/results';
import type { NewsArticle } from '../types';
import { describeZodError, HttpProviderAdapter, type AdapterDeps } from './httpAdapter';
import { nullableString } from './schemas';

export interface NewsSearchParams {
  query: string;
  days: number;
  maxResults: number;
}

export type TavilyOps = {
  news_search: { params: NewsSearchParams; result: NewsArticle[] };
};

export type TavilyAdapter = HttpProviderAdapter<TavilyOps>;

const resultSchema = z.object({
  title: z.string(),
  url: z.string().url(),
  content: z.string().default(''),
  published_date: nullableString,
});

// Items are checked one by one so a single malformed article is dropped, not fatal.
const searchSchema = z.object({ results: z.array(z.unknown()) });

export function sourceFromUrl(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return '';
  }
}

function toIsoOrNull(value: string | null): string | null {
  if (!value) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
}

export function createTavilyAdapter(settings: ProviderSettings, deps: AdapterDeps = {}): TavilyAdapter {
  return new HttpProviderAdapter<TavilyOps>(
    {
      id: 'tavily',
      auth: { in: 'header', name: 'authorization', prefix: 'Bearer ' },
      operations: {
        news_search: {
          request: (params) => ({
            method: 'POST',
            path: 'search',
            body: {
              query: params.query,
              topic: 'news',
              days: params.days,
              max_results: params.maxResults,
              search_depth: 'basic',
              include_answer: false,
              include_images: false,
            },
          }),
          normalize: (body) => {
            const parsed = searchSchema.safeParse(body);
            if (!parsed.success) {
              return failure('InvalidUpstreamResponse', `tavily news_search: ${describeZodError(parsed.error)}`);
            }
            const articles: NewsArticle[] = [];
            for (const item of parsed.data.results) {
              const r = resultSchema.safeParse(item);
              if (!r.success) continue;
              articles.push({
                title: r.data.title,
                url: r.data.url,
                summary: r.data.content,
                publishedAt: toIsoOrNull(r.data.published_date),
                source: sourceFromUrl(r.data.url),
              });
            }
            return success(articles);
          },
        },
      },
    },
    settings,
    deps,
  );
}
