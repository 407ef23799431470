import type {
  BookMetadata,
  FeedbackEntry,
  FeedbackReportLine,
  TranscriptEntry,
  TranscriptRole,
  TranscriptTab,
} from '../../types';
import { LoanStats, LoanStatsProvider, SeededLoanStatsProvider } from './loanStatsProvider';

const feedbackKey = (title: string, category: string): string => JSON.stringify([title, category]);

/**
 * Everything one user session knows: books fetched so far, feedback, loan
 * placeholders and both transcripts. Lives only as long as the session.
 */
export class SessionStore {
  readonly id: string;
  readonly createdAt: Date;
  lastSeenAt: Date;

  private readonly books = new Map<string, BookMetadata>();
  private readonly feedback = new Map<string, FeedbackEntry>();
  private readonly loanStats = new Map<string, LoanStats>();
  private readonly transcripts: Record<TranscriptTab, TranscriptEntry[]> = { query: [], chat: [] };

  constructor(
    id: string,
    private readonly statsProvider: LoanStatsProvider = new SeededLoanStatsProvider(),
    now: Date = new Date(),
  ) {
    this.id = id;
    this.createdAt = now;
    this.lastSeenAt = now;
  }

  touch(now: Date = new Date()): void {
    this.lastSeenAt = now;
  }

  /**
   * Books are keyed by their page title, so two books sharing a title
   * overwrite one another. A rewritten title keeps its first-insertion slot.
   */
  upsertBook(book: BookMetadata): void {
    this.books.set(book.title, book);
  }

  getBook(title: string): BookMetadata | undefined {
    return this.books.get(title);
  }

  latestBook(): BookMetadata | undefined {
    let latest: BookMetadata | undefined;
    for (const book of this.books.values()) latest = book;
    return latest;
  }

  listBooks(): BookMetadata[] {
    return Array.from(this.books.values());
  }

  get bookCount(): number {
    return this.books.size;
  }

  appendFeedback(title: string, category: string, comment: string): FeedbackEntry {
    const key = feedbackKey(title, category);
    let entry = this.feedback.get(key);
    if (!entry) {
      entry = { title, category, comments: [] };
      this.feedback.set(key, entry);
    }
    entry.comments.push(comment);
    return entry;
  }

  feedbackFor(title: string, category: string): string[] {
    return [...(this.feedback.get(feedbackKey(title, category))?.comments ?? [])];
  }

  feedbackReport(): FeedbackReportLine[] {
    return Array.from(this.feedback.values()).map((entry) => ({
      title: entry.title,
      category: entry.category,
      count: entry.comments.length,
      comments: [...entry.comments],
    }));
  }

  loanStatsFor(title: string): LoanStats {
    const cached = this.loanStats.get(title);
    if (cached) return cached;
    const stats = this.statsProvider.statsFor(title);
    this.loanStats.set(title, stats);
    return stats;
  }

  appendTranscript(tab: TranscriptTab, role: TranscriptRole, text: string): void {
    this.transcripts[tab].push({ role, text });
  }

  transcript(tab: TranscriptTab): TranscriptEntry[] {
    return this.transcripts[tab].map((entry) => ({ ...entry }));
  }
}
