import type { NewsArticle, NewsEvent, NewsImpact, NewsSentiment, NewsState } from '../types';
import lexicon from './newsLexicon.json';

const POSITIVE: ReadonlySet<string> = new Set(lexicon.positive);
const NEGATIVE: ReadonlySet<string> = new Set(lexicon.negative);
const HIGH_IMPACT: ReadonlySet<string> = new Set(lexicon.highImpact);

const SIGNIFICANT_CONFIDENCE = 0.7;

// Tie-break order when counts are equal: first listed wins.
const SENTIMENT_ORDER: readonly NewsSentiment[] = ['positive', 'neutral', 'negative'];
const IMPACT_ORDER: readonly NewsImpact[] = ['low', 'medium', 'high'];

function words(text: string): string[] {
  return text.toLowerCase().match(/[a-z]+/g) ?? [];
}

/** Keyword read of one article's title and summary. */
export function classifyArticle(article: Pick<NewsArticle, 'title' | 'url' | 'summary'>): NewsEvent {
  const tokens = words(`${article.title} ${article.summary}`);
  let pos = 0;
  let neg = 0;
  let highImpact = false;
  for (const token of tokens) {
    if (POSITIVE.has(token)) pos++;
    if (NEGATIVE.has(token)) neg++;
    if (HIGH_IMPACT.has(token)) highImpact = true;
  }

  const sentiment: NewsSentiment = pos > neg ? 'positive' : neg > pos ? 'negative' : 'neutral';
  const impact: NewsImpact = highImpact ? 'high' : pos + neg >= 2 ? 'medium' : 'low';
  return {
    title: article.title,
    url: article.url,
    sentiment,
    impact,
    confidence: Math.abs(pos - neg) / (pos + neg + 1),
  };
}

function mostFrequent<K extends string>(order: readonly K[], counts: Record<K, number>): K | null {
  let best: K | null = null;
  for (const key of order) {
    if (counts[key] > 0 && (best === null || counts[key] > counts[best])) best = key;
  }
  return best;
}

/**
 * Rolls classified articles up into one state. Headlines count as
 * significant when their impact is high or their wording is strongly one-sided.
 */
export function newsState(events: NewsEvent[]): NewsState {
  const counts: Record<NewsSentiment, number> = { positive: 0, neutral: 0, negative: 0 };
  const impacts: Record<NewsImpact, number> = { low: 0, medium: 0, high: 0 };
  const significant = new Set<string>();

  for (const event of events) {
    counts[event.sentiment]++;
    impacts[event.impact]++;
    if (event.impact === 'high' || event.confidence > SIGNIFICANT_CONFIDENCE) significant.add(event.title);
  }

  return {
    overallSentiment: mostFrequent(SENTIMENT_ORDER, counts) ?? 'neutral',
    overallImpact: mostFrequent(IMPACT_ORDER, impacts) ?? 'unknown',
    counts,
    significantHeadlines: [...significant],
  };
}
