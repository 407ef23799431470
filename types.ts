// Shapes shared by the API server and the web client.

export interface PageRecord {
  url: string;
  title: string;
  summary: string;
  /** Plain text of the page, capped at 2000 characters. */
  body: string;
  /** Host segment of the seed URL, e.g. "example.com". */
  platform: string;
  externalLinks: string[];
}

export interface BookMetadata extends PageRecord {
  aiMetadata: string;
  loanRank: number;
  loanCount: number;
}

export const FEEDBACK_CATEGORIES = ['overall', 'keywords', 'review', 'adaptation', 'external-links'] as const;

export type FeedbackCategory = (typeof FEEDBACK_CATEGORIES)[number];

export interface FeedbackEntry {
  title: string;
  category: string;
  comments: string[];
}

export interface FeedbackReportLine extends FeedbackEntry {
  count: number;
}

export type TranscriptTab = 'query' | 'chat';

export type TranscriptRole = 'user' | 'ai';

export interface TranscriptEntry {
  role: TranscriptRole;
  text: string;
}

export interface SearchResponse {
  books: BookMetadata[];
  warnings: string[];
}

export interface QueryResponse {
  answered: boolean;
  answer?: string;
  notice?: string;
}

export interface ChatResponse {
  answer: string;
}

export interface ApiErrorBody {
  error: string;
  code?: string;
  message?: string;
  details?: Array<{ field: string; message: string }>;
}
