import type { BookMetadata } from '../../types';
import { logger } from '../logger';
import type { TextModel } from './geminiService';
import { generateMetadata } from './metadataExtractor';
import { CrawlOptions, crawlBookPages } from './pageFetcher';
import type { SessionStore } from './sessionStore';

export interface SearchResult {
  books: BookMetadata[];
  warnings: string[];
}

/**
 * Crawl, analyse every page, attach loan placeholders and store the books in
 * the session. Pages are analysed one after another.
 */
export async function searchAndExtract(
  session: SessionStore,
  model: TextModel,
  url: string,
  options: CrawlOptions = {},
): Promise<SearchResult> {
  const crawled = await crawlBookPages(url, options);
  const books: BookMetadata[] = [];

  for (const page of Object.values(crawled.pages)) {
    const aiMetadata = await generateMetadata(model, page.body);
    const { rank, count } = session.loanStatsFor(page.title);
    const book: BookMetadata = {
      ...page,
      aiMetadata,
      loanRank: rank,
      loanCount: count,
    };
    session.upsertBook(book);
    books.push(book);
  }

  logger.info(`✨ Search for ${url} produced ${books.length} book record(s)`);
  return { books, warnings: crawled.warnings };
}
