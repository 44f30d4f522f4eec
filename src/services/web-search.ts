// Web search and page scraping
// DuckDuckGo instant answers for search; html-to-text for readable page content

import { convert } from 'html-to-text';
import { z } from 'zod';

const SEARCH_ENDPOINT = 'https://api.duckduckgo.com/';
const USER_AGENT = 'Mozilla/5.0 (compatible; DatadeskAgents/1.0)';
const MAX_TOPICS = 5;
const MAX_TOPIC_LENGTH = 100;

export const DEFAULT_WEB_TIMEOUT_MS = 10_000;
export const MAX_PAGE_TEXT = 2000;

export interface WebSearchTopic {
  text: string;
  url: string;
}

export interface WebSearchResult {
  query: string;
  summary: string;
  topics: WebSearchTopic[];
}

// Grouped topics ({Name, Topics}) carry no Text and are skipped
const InstantAnswerSchema = z.object({
  AbstractText: z.string().optional(),
  RelatedTopics: z
    .array(
      z.object({
        Text: z.string().optional(),
        FirstURL: z.string().optional(),
      }),
    )
    .optional(),
});

function normalizeText(value: unknown): string {
  return String(value ?? '').trim();
}

export async function searchWeb(query: string, timeoutMs = DEFAULT_WEB_TIMEOUT_MS): Promise<WebSearchResult> {
  const q = normalizeText(query);

  const endpoint = new URL(SEARCH_ENDPOINT);
  endpoint.searchParams.set('q', q);
  endpoint.searchParams.set('format', 'json');
  endpoint.searchParams.set('no_html', '1');

  const response = await fetch(endpoint.toString(), {
    method: 'GET',
    headers: { Accept: 'application/json' },
    redirect: 'follow',
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    throw new Error(`DuckDuckGo error (${response.status})`);
  }

  const payload = InstantAnswerSchema.parse(await response.json());

  const topics = (payload.RelatedTopics ?? [])
    .slice(0, MAX_TOPICS)
    .filter(topic => topic.Text)
    .map(topic => ({
      text: normalizeText(topic.Text).slice(0, MAX_TOPIC_LENGTH),
      url: normalizeText(topic.FirstURL),
    }));

  return {
    query: q,
    summary: normalizeText(payload.AbstractText),
    topics,
  };
}

export function formatWebSearchResult(result: WebSearchResult): string {
  const lines: string[] = [];

  if (result.summary) {
    lines.push(`Summary: ${result.summary}`, '');
  }

  if (result.topics.length > 0) {
    lines.push('Related Results:');
    result.topics.forEach((topic, idx) => {
      lines.push(`${idx + 1}. ${topic.text}`);
      if (topic.url) {
        lines.push(`   URL: ${topic.url}`);
      }
    });
  }

  if (lines.length === 0) {
    return `No results found for query: ${result.query}`;
  }

  return lines.join('\n');
}

export function htmlToText(html: string, maxLength = MAX_PAGE_TEXT): string {
  const text = convert(html, {
    wordwrap: false,
    selectors: [
      { selector: 'a', options: { ignoreHref: true } },
      { selector: 'img', format: 'skip' },
      { selector: 'script', format: 'skip' },
      { selector: 'style', format: 'skip' },
      { selector: 'noscript', format: 'skip' },
    ],
  })
    .replace(/\s+/g, ' ')
    .trim();

  return text.length > maxLength ? text.slice(0, maxLength) + '...' : text;
}

export async function scrapeWebpage(url: string, timeoutMs = DEFAULT_WEB_TIMEOUT_MS): Promise<string> {
  const response = await fetch(url, {
    headers: {
      'User-Agent': USER_AGENT,
      Accept: 'text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8',
    },
    redirect: 'follow',
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status} fetching ${url}`);
  }

  return htmlToText(await response.text());
}
