/**
 * @jest-environment jsdom
 */
import React from 'react';
import { fireEvent, render, screen, waitFor } from '@testing-library/react';
import App from '../../App';
import { LibraryApiClient } from '../../services/libraryApiClient';
import { makeBook } from '../helpers/fakes';

const jsonResponse = (payload: unknown, status = 200) =>
  ({
    ok: status >= 200 && status < 300,
    status,
    json: async () => payload,
  } as Response);

const routeFetch = (routes: Record<string, unknown>) =>
  jest.fn(async (input: RequestInfo | URL) => {
    const path = String(input);
    if (path in routes) return jsonResponse(routes[path], path === '/api/sessions' ? 201 : 200);
    return jsonResponse({ error: 'not found' }, 404);
  });

describe('App', () => {
  it('warns about the missing API key instead of searching', async () => {
    const fetchMock = routeFetch({ '/api/sessions': { sessionId: 'session-1' } });
    render(<App client={new LibraryApiClient({ fetchImpl: fetchMock })} />);

    const button = screen.getByRole('button', { name: 'Crawl & analyze' });
    fireEvent.change(screen.getByLabelText('Book detail page URL'), { target: { value: 'https://example.com/book/42' } });
    await waitFor(() => expect((button as HTMLButtonElement).disabled).toBe(false));

    fireEvent.click(button);

    expect(screen.getByText('Enter your Gemini API key in the sidebar.')).toBeTruthy();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('renders a result card after a search', async () => {
    const fetchMock = routeFetch({
      '/api/sessions': { sessionId: 'session-1' },
      '/api/search': { books: [makeBook()], warnings: [] },
    });
    render(<App client={new LibraryApiClient({ fetchImpl: fetchMock })} />);

    fireEvent.change(screen.getByLabelText('Gemini API Key'), { target: { value: 'test-key' } });
    fireEvent.change(screen.getByLabelText('Book detail page URL'), { target: { value: 'https://books.test/item/1' } });
    const button = screen.getByRole('button', { name: 'Crawl & analyze' });
    await waitFor(() => expect((button as HTMLButtonElement).disabled).toBe(false));

    fireEvent.click(button);

    await waitFor(() => expect(screen.getByRole('heading', { name: 'The Quiet River' })).toBeTruthy());
    expect(screen.getByText('Rank #3 / 120 loans')).toBeTruthy();
  });

  it('shows the crawl warning when nothing was found', async () => {
    const fetchMock = routeFetch({
      '/api/sessions': { sessionId: 'session-1' },
      '/api/search': { books: [], warnings: ['Crawl failed: timeout'] },
    });
    render(<App client={new LibraryApiClient({ fetchImpl: fetchMock })} />);

    fireEvent.change(screen.getByLabelText('Gemini API Key'), { target: { value: 'test-key' } });
    fireEvent.change(screen.getByLabelText('Book detail page URL'), { target: { value: 'https://books.test/item/1' } });
    const button = screen.getByRole('button', { name: 'Crawl & analyze' });
    await waitFor(() => expect((button as HTMLButtonElement).disabled).toBe(false));

    fireEvent.click(button);

    await waitFor(() => expect(screen.getByText('Crawl failed: timeout')).toBeTruthy());
    expect(screen.getByText('No book information found. Please check the URL.')).toBeTruthy();
  });

  it('shows the query transcript as the server records it', async () => {
    const fetchMock = routeFetch({
      '/api/sessions': { sessionId: 'session-1' },
      '/api/query': { answered: true, answer: 'Mira is the narrator.' },
      '/api/transcripts/query': {
        tab: 'query',
        entries: [
          { role: 'user', text: 'Which era?' },
          { role: 'ai', text: '1950s' },
          { role: 'user', text: 'Who is Mira?' },
          { role: 'ai', text: 'Mira is the narrator.' },
        ],
      },
    });
    render(<App client={new LibraryApiClient({ fetchImpl: fetchMock })} />);

    fireEvent.change(screen.getByLabelText('Gemini API Key'), { target: { value: 'test-key' } });
    const input = screen.getByLabelText('Question about the book');
    await waitFor(() => expect((input as HTMLInputElement).disabled).toBe(false));
    fireEvent.change(input, { target: { value: 'Who is Mira?' } });
    fireEvent.click(screen.getByRole('button', { name: 'Ask' }));

    const conversation = await screen.findByRole('list', { name: 'Conversation' });
    expect(conversation.textContent).toBe('YouWhich era?AI1950sYouWho is Mira?AIMira is the narrator.');
    expect(fetchMock.mock.calls.map((call) => String(call[0]))).toContain('/api/transcripts/query');
  });

  it('ends a session that finishes starting after the app unmounted', async () => {
    let resolveSession: (response: Response) => void = () => undefined;
    const fetchMock = jest.fn((input: RequestInfo | URL) =>
      String(input) === '/api/sessions'
        ? new Promise<Response>((resolve) => {
          resolveSession = resolve;
        })
        : Promise.resolve(jsonResponse(null, 204)),
    );
    const { unmount } = render(<App client={new LibraryApiClient({ fetchImpl: fetchMock })} />);

    unmount();
    resolveSession(jsonResponse({ sessionId: 'late-session' }, 201));

    await waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(2));
    expect(fetchMock.mock.calls[1]?.[0]).toBe('/api/sessions/late-session');
  });

  it('ends the session with a keepalive request when the page is hidden', async () => {
    const fetchMock = routeFetch({
      '/api/sessions': { sessionId: 'session-1' },
      '/api/sessions/session-1': null,
    });
    const { unmount } = render(<App client={new LibraryApiClient({ fetchImpl: fetchMock })} />);
    const input = screen.getByLabelText('Question about the book');
    await waitFor(() => expect((input as HTMLInputElement).disabled).toBe(false));

    window.dispatchEvent(new PageTransitionEvent('pagehide', { persisted: true }));
    expect(fetchMock).toHaveBeenCalledTimes(1);

    window.dispatchEvent(new PageTransitionEvent('pagehide', { persisted: false }));
    unmount();

    const deletes = fetchMock.mock.calls.filter((call) => String(call[0]) === '/api/sessions/session-1');
    expect(deletes).toHaveLength(1);
    expect(fetchMock).toHaveBeenCalledWith(
      '/api/sessions/session-1',
      expect.objectContaining({ method: 'DELETE', keepalive: true }),
    );
  });
});
