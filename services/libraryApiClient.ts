import type {
  ApiErrorBody,
  ChatResponse,
  FeedbackReportLine,
  QueryResponse,
  SearchResponse,
  TranscriptEntry,
  TranscriptTab,
} from '../types';

export class ApiRequestError extends Error {
  constructor(message: string, readonly status: number, readonly code?: string) {
    super(message);
    this.name = 'ApiRequestError';
  }
}

interface RequestOptions {
  method?: string;
  body?: string;
  sessionId?: string;
  apiKey?: string;
  keepalive?: boolean;
}

interface ClientOptions {
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

const isApiErrorBody = (value: unknown): value is ApiErrorBody =>
  typeof value === 'object' && value !== null && 'error' in value && typeof value.error === 'string';

/**
 * Thin wrapper over the server's /api routes. The Gemini key lives only in
 * component state and travels in a header on each request.
 */
export class LibraryApiClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? '';
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  private async send(path: string, init: RequestOptions = {}): Promise<Response> {
    const { sessionId, apiKey, method, body, keepalive } = init;
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      body,
      keepalive,
      headers: {
        'Content-Type': 'application/json',
        ...(sessionId ? { 'x-session-id': sessionId } : {}),
        ...(apiKey ? { 'x-gemini-api-key': apiKey } : {}),
      },
    });

    if (!response.ok) {
      const payload: unknown = await response.json().catch(() => null);
      if (isApiErrorBody(payload)) {
        const detail = payload.details?.map((d) => d.message).join('; ');
        throw new ApiRequestError(detail || payload.message || payload.error, response.status, payload.code);
      }
      throw new ApiRequestError(`Request failed with status ${response.status}`, response.status);
    }
    return response;
  }

  private async request<T>(path: string, init: RequestOptions = {}): Promise<T> {
    const response = await this.send(path, init);
    return response.json();
  }

  async createSession(): Promise<string> {
    const { sessionId } = await this.request<{ sessionId: string }>('/api/sessions', { method: 'POST' });
    return sessionId;
  }

  /** `keepalive` lets the request outlive the page, for use from `pagehide`. */
  async endSession(sessionId: string, options: { keepalive?: boolean } = {}): Promise<void> {
    await this.send(`/api/sessions/${encodeURIComponent(sessionId)}`, {
      method: 'DELETE',
      keepalive: options.keepalive,
    });
  }

  search(sessionId: string, apiKey: string, url: string, maxPages?: number): Promise<SearchResponse> {
    return this.request<SearchResponse>('/api/search', {
      method: 'POST',
      sessionId,
      apiKey,
      body: JSON.stringify({ url, ...(maxPages ? { maxPages } : {}) }),
    });
  }

  query(sessionId: string, apiKey: string, question: string): Promise<QueryResponse> {
    return this.request<QueryResponse>('/api/query', {
      method: 'POST',
      sessionId,
      apiKey,
      body: JSON.stringify({ question }),
    });
  }

  chat(sessionId: string, apiKey: string, message: string): Promise<ChatResponse> {
    return this.request<ChatResponse>('/api/chat', {
      method: 'POST',
      sessionId,
      apiKey,
      body: JSON.stringify({ message }),
    });
  }

  async transcript(sessionId: string, tab: TranscriptTab): Promise<TranscriptEntry[]> {
    const { entries } = await this.request<{ entries: TranscriptEntry[] }>(`/api/transcripts/${tab}`, { sessionId });
    return entries;
  }

  submitFeedback(sessionId: string, title: string, category: string, comment: string): Promise<{ count: number }> {
    return this.request<{ count: number }>('/api/feedback', {
      method: 'POST',
      sessionId,
      body: JSON.stringify({ title, category, comment }),
    });
  }

  async feedbackReport(sessionId: string): Promise<FeedbackReportLine[]> {
    const { entries } = await this.request<{ entries: FeedbackReportLine[] }>('/api/feedback', { sessionId });
    return entries;
  }
}
