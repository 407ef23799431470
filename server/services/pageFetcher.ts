import { load } from 'cheerio';
import type { PageRecord } from '../../types';
import { errorMessage } from '../errors';
import { logger } from '../logger';

export interface CrawlOptions {
  maxPages?: number;
  timeoutMs?: number;
}

export interface CrawlResult {
  /** Page records keyed by the URL they were fetched from, in visit order. */
  pages: Record<string, PageRecord>;
  warnings: string[];
}

export const UNTITLED_PLACEHOLDER = 'Untitled';
export const SUMMARY_FALLBACK_CHARS = 500;
export const BODY_MAX_CHARS = 2000;

const DEFAULT_TIMEOUT_MS = 5000;

const USER_AGENT = 'Mozilla/5.0 (compatible; LiterarySearchAssistant/0.1; +https://localhost)';

interface ParsedPage {
  title: string;
  summary: string;
  body: string;
  links: string[];
}

const fetchPageHtml = async (url: string, timeoutMs: number): Promise<string> => {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`GET ${url} failed with status ${response.status}`);
    }

    return await response.text();
  } finally {
    clearTimeout(timeoutId);
  }
};

const resolveLink = (href: string, baseUrl: string): string | null => {
  try {
    return new URL(href, baseUrl).href;
  } catch {
    return null;
  }
};

/**
 * Extracts the record fields from one page. Links are made absolute against
 * `baseUrl`, which the crawler sets to the seed URL for every page.
 */
export const parseBookPage = (html: string, baseUrl: string): ParsedPage => {
  const $ = load(html);

  const title = $('title').first().text().trim() || UNTITLED_PLACEHOLDER;
  const description = $('meta[name="description"]').attr('content');

  const links = $('a[href]')
    .map((_, el) => $(el).attr('href') ?? '')
    .get()
    .map((href) => resolveLink(href, baseUrl))
    .filter((href): href is string => href !== null);

  $('script, style, noscript, template').remove();
  const text = $('body').text().replace(/\s+/g, ' ').trim();

  return {
    title,
    summary: description !== undefined ? description : text.slice(0, SUMMARY_FALLBACK_CHARS),
    body: text.slice(0, BODY_MAX_CHARS),
    links,
  };
};

/**
 * Breadth-first crawl from `seedUrl`, visiting at most `maxPages` pages and
 * only following links whose absolute form starts with the seed URL.
 *
 * Any failure aborts the whole crawl: no partial results are kept and a single
 * warning is returned. No retries.
 */
export const crawlBookPages = async (seedUrl: string, options: CrawlOptions = {}): Promise<CrawlResult> => {
  const maxPages = Math.max(1, options.maxPages ?? 1);
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  try {
    const platform = new URL(seedUrl).host;
    const pages: Record<string, PageRecord> = {};
    const visited = new Set<string>();
    const queue: string[] = [seedUrl];

    while (queue.length > 0 && visited.size < maxPages) {
      const currentUrl = queue.shift();
      if (currentUrl === undefined || visited.has(currentUrl)) continue;

      logger.debug(`🌐 Fetching ${currentUrl}`);
      const html = await fetchPageHtml(currentUrl, timeoutMs);
      const parsed = parseBookPage(html, seedUrl);

      pages[currentUrl] = {
        url: currentUrl,
        title: parsed.title,
        summary: parsed.summary,
        body: parsed.body,
        platform,
        externalLinks: [currentUrl],
      };
      visited.add(currentUrl);

      for (const link of parsed.links) {
        if (link.startsWith(seedUrl) && !visited.has(link) && !queue.includes(link)) {
          queue.push(link);
        }
      }
    }

    logger.info(`📚 Crawled ${visited.size} page(s) from ${platform}`);
    return { pages, warnings: [] };
  } catch (error) {
    const warning = `Crawl failed: ${errorMessage(error)}`;
    logger.warn(`⚠️ ${warning}`);
    return { pages: {}, warnings: [warning] };
  }
};
