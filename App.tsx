import React, { useCallback, useEffect, useMemo, useState } from 'react';
import type { BookMetadata, FeedbackCategory, FeedbackReportLine, TranscriptEntry } from './types';
import { ApiRequestError, LibraryApiClient } from './services/libraryApiClient';
import { BookCard } from './components/BookCard';
import { ChatPanel } from './components/ChatPanel';
import { ErrorMessage } from './components/ErrorMessage';
import { Loader } from './components/Loader';
import { QueryPanel } from './components/QueryPanel';
import { Sidebar } from './components/Sidebar';

type Status = 'idle' | 'searching' | 'success' | 'error';
type Tab = 'query' | 'chat';

const API_KEY_WARNING = 'Enter your Gemini API key in the sidebar.';

const describeError = (err: unknown): string => {
  if (err instanceof ApiRequestError && err.code === 'API_KEY_REQUIRED') return API_KEY_WARNING;
  return err instanceof Error ? err.message : 'An unknown error occurred.';
};

export default function App({ client: providedClient }: { client?: LibraryApiClient }) {
  const client = useMemo(() => providedClient ?? new LibraryApiClient(), [providedClient]);

  const [sessionId, setSessionId] = useState<string | null>(null);
  const [apiKey, setApiKey] = useState('');
  const [tab, setTab] = useState<Tab>('query');
  const [url, setUrl] = useState('');
  const [status, setStatus] = useState<Status>('idle');
  const [books, setBooks] = useState<BookMetadata[]>([]);
  const [warning, setWarning] = useState<string | null>(null);
  const [errorMessage, setErrorMessage] = useState('');
  const [queryEntries, setQueryEntries] = useState<TranscriptEntry[]>([]);
  const [queryNotice, setQueryNotice] = useState<string | null>(null);
  const [chatEntries, setChatEntries] = useState<TranscriptEntry[]>([]);
  const [chatError, setChatError] = useState('');
  const [feedbackReport, setFeedbackReport] = useState<FeedbackReportLine[] | null>(null);

  // One server-side session per mount, ended on unmount or when the page is hidden for good
  useEffect(() => {
    let active = true;
    let createdId: string | null = null;

    const endCreatedSession = () => {
      if (!createdId) return;
      const id = createdId;
      createdId = null;
      client.endSession(id, { keepalive: true }).catch((err) => console.warn('Failed to end session:', err));
    };

    // A persisted page can come back from the back/forward cache with its session
    const handlePageHide = (event: PageTransitionEvent) => {
      if (!event.persisted) endCreatedSession();
    };
    window.addEventListener('pagehide', handlePageHide);

    client.createSession()
      .then((id) => {
        createdId = id;
        if (active) {
          setSessionId(id);
        } else {
          // Unmounted while the request was in flight
          endCreatedSession();
        }
      })
      .catch((err) => {
        console.error('Failed to start session:', err);
        if (active) {
          setErrorMessage(`Could not reach the server. ${describeError(err)}`);
          setStatus('error');
        }
      });

    return () => {
      active = false;
      window.removeEventListener('pagehide', handlePageHide);
      endCreatedSession();
    };
  }, [client]);

  const handleSearch = useCallback(async (event: React.FormEvent) => {
    event.preventDefault();
    if (!sessionId) return;
    if (!apiKey.trim()) {
      setWarning(API_KEY_WARNING);
      return;
    }
    if (!url.trim()) return;

    setWarning(null);
    setErrorMessage('');
    setBooks([]);
    setStatus('searching');
    try {
      const result = await client.search(sessionId, apiKey.trim(), url.trim());
      setBooks(result.books);
      setWarning(result.warnings[0] ?? null);
      setStatus('success');
    } catch (err) {
      console.error(err);
      setErrorMessage(`Failed to analyze the page. ${describeError(err)}`);
      setStatus('error');
    }
  }, [client, sessionId, apiKey, url]);

  const handleFeedback = useCallback(async (title: string, category: FeedbackCategory, comment: string) => {
    if (!sessionId) return;
    await client.submitFeedback(sessionId, title, category, comment);
  }, [client, sessionId]);

  const handleAsk = useCallback(async (question: string) => {
    if (!sessionId) return;
    if (!apiKey.trim()) {
      setQueryNotice(API_KEY_WARNING);
      return;
    }
    try {
      const result = await client.query(sessionId, apiKey.trim(), question);
      if (result.answered) {
        setQueryNotice(null);
        setQueryEntries(await client.transcript(sessionId, 'query'));
      } else {
        setQueryNotice(result.notice ?? 'Search for a book first.');
      }
    } catch (err) {
      console.error(err);
      setQueryNotice(describeError(err));
    }
  }, [client, sessionId, apiKey]);

  const handleChat = useCallback(async (message: string) => {
    if (!sessionId) return;
    if (!apiKey.trim()) {
      setChatError(API_KEY_WARNING);
      return;
    }
    try {
      await client.chat(sessionId, apiKey.trim(), message);
      setChatError('');
      setChatEntries(await client.transcript(sessionId, 'chat'));
    } catch (err) {
      console.error(err);
      setChatError(describeError(err));
    }
  }, [client, sessionId, apiKey]);

  const handleShowFeedback = useCallback(async () => {
    if (!sessionId) return;
    try {
      setFeedbackReport(await client.feedbackReport(sessionId));
    } catch (err) {
      console.error('Failed to load feedback statistics:', err);
    }
  }, [client, sessionId]);

  const isSearching = status === 'searching';
  const tabClass = (value: Tab) =>
    `px-4 py-2 rounded-t-lg font-semibold ${tab === value ? 'bg-slate-800 text-cyan-400' : 'text-slate-400 hover:text-slate-200'}`;

  return (
    <div className="min-h-screen bg-slate-900 text-slate-100 flex flex-col items-center p-4 sm:p-6 lg:p-8">
      <div className="w-full max-w-6xl mx-auto flex flex-col lg:flex-row gap-6">
        <Sidebar
          apiKey={apiKey}
          onApiKeyChange={setApiKey}
          feedback={feedbackReport}
          onShowFeedback={handleShowFeedback}
        />

        <div className="flex-1">
          <header className="text-center mb-8">
            <h1 className="text-4xl font-bold text-transparent bg-clip-text bg-gradient-to-r from-indigo-400 to-cyan-400">
              Literary Search Assistant
            </h1>
            <ul className="mt-4 text-slate-400 text-sm space-y-1">
              <li>Crawls bookstore and library pages and extracts metadata with AI.</li>
              <li>Characters, events, setting, emotions, adaptations, reviews, external links and loan rank.</li>
              <li>Query tab: deep analysis. Chat tab: open discussion.</li>
            </ul>
          </header>

          <nav className="flex gap-2" role="tablist">
            <button type="button" role="tab" aria-selected={tab === 'query'} className={tabClass('query')} onClick={() => setTab('query')}>
              Query (deep analysis)
            </button>
            <button type="button" role="tab" aria-selected={tab === 'chat'} className={tabClass('chat')} onClick={() => setTab('chat')}>
              Chat (open discussion)
            </button>
          </nav>

          <main className="bg-slate-800/50 rounded-b-2xl rounded-tr-2xl shadow-2xl shadow-indigo-500/10 p-6 md:p-8 border border-slate-700">
            {tab === 'query' && (
              <>
                <h2 className="text-xl font-bold text-slate-200 mb-3">Enter a book platform link</h2>
                <form onSubmit={handleSearch} className="flex flex-col sm:flex-row gap-2">
                  <input
                    type="url"
                    value={url}
                    onChange={(e) => setUrl(e.target.value)}
                    placeholder="Book detail page URL (online bookstore, university library...)"
                    aria-label="Book detail page URL"
                    disabled={isSearching}
                    className="flex-1 bg-slate-900 border border-slate-600 rounded-lg p-2 text-sm"
                  />
                  <button
                    type="submit"
                    disabled={!sessionId || isSearching || !url.trim()}
                    className="bg-indigo-600 text-white font-bold py-2 px-4 rounded-lg hover:bg-indigo-500 disabled:bg-slate-600 disabled:cursor-not-allowed"
                  >
                    {isSearching ? 'Processing...' : 'Crawl & analyze'}
                  </button>
                </form>

                <div className="mt-6 flex flex-col gap-6">
                  {isSearching && <Loader message="Analyzing the book..." />}
                  {warning && <ErrorMessage tone="warning" message={warning} />}
                  {status === 'error' && <ErrorMessage message={errorMessage} />}
                  {status === 'success' && books.length === 0 && (
                    <ErrorMessage tone="info" message="No book information found. Please check the URL." />
                  )}
                  {books.map((book) => (
                    <BookCard key={book.url} book={book} onFeedback={handleFeedback} />
                  ))}
                </div>

                <QueryPanel entries={queryEntries} notice={queryNotice} disabled={!sessionId} onAsk={handleAsk} />
              </>
            )}

            {tab === 'chat' && (
              <>
                {chatError && <div className="mb-4"><ErrorMessage message={chatError} /></div>}
                <ChatPanel entries={chatEntries} disabled={!sessionId} onSend={handleChat} />
              </>
            )}
          </main>

          <footer className="text-center mt-8 text-slate-500 text-sm">
            <p>Powered by Google Gemini and React.</p>
          </footer>
        </div>
      </div>
    </div>
  );
}
