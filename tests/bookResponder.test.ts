import {
  answerQuery,
  CHAT_CONTEXT_CHARS,
  chatAboutBooks,
  SEARCH_FIRST_NOTICE,
} from '../server/services/bookResponder';
import { ModelInvocationError } from '../server/errors';
import { SessionStore } from '../server/services/sessionStore';
import { FakeTextModel, makeBook } from './helpers/fakes';

describe('Query responder', () => {
  it('asks the user to search first and makes no model call without a book', async () => {
    const session = new SessionStore('s1');
    const model = new FakeTextModel('never used');

    const outcome = await answerQuery(session, model, 'Who is the narrator?');

    expect(outcome).toEqual({ answered: false, notice: SEARCH_FIRST_NOTICE });
    expect(model.prompts).toEqual([]);
    expect(session.transcript('query')).toEqual([]);
  });

  it('includes the full metadata of the latest book and records the exchange', async () => {
    const session = new SessionStore('s1');
    const longMetadata = 'Themes: grief. '.repeat(40);
    session.upsertBook(makeBook({ title: 'Older', aiMetadata: 'old metadata' }));
    session.upsertBook(makeBook({ title: 'Newer', aiMetadata: longMetadata }));
    const model = new FakeTextModel('The narrator is Mira.');

    const outcome = await answerQuery(session, model, 'Who is the narrator?');

    expect(outcome).toEqual({ answered: true, answer: 'The narrator is Mira.' });
    expect(model.prompts[0]).toContain(`[Book metadata]\n${longMetadata}\n[Question]\nWho is the narrator?\n`);
    expect(model.prompts[0]).not.toContain('old metadata');
    expect(session.transcript('query')).toEqual([
      { role: 'user', text: 'Who is the narrator?' },
      { role: 'ai', text: 'The narrator is Mira.' },
    ]);
    expect(session.transcript('chat')).toEqual([]);
  });

  it('lets model failures propagate and keeps earlier transcript entries', async () => {
    const session = new SessionStore('s1');
    session.upsertBook(makeBook());
    const model = new FakeTextModel('first answer', new ModelInvocationError('Gemini request failed: boom'));

    await answerQuery(session, model, 'first?');
    await expect(answerQuery(session, model, 'second?')).rejects.toThrow('Gemini request failed: boom');

    expect(session.transcript('query')).toEqual([
      { role: 'user', text: 'first?' },
      { role: 'ai', text: 'first answer' },
    ]);
  });
});

describe('Chat responder', () => {
  it('proceeds with empty context when no book exists', async () => {
    const session = new SessionStore('s1');
    const model = new FakeTextModel('Happy to talk!');

    const answer = await chatAboutBooks(session, model, 'I love sad novels');

    expect(answer).toBe('Happy to talk!');
    expect(model.prompts[0]).toContain('Remark or question from the user: I love sad novels\n\n');
    expect(model.prompts[0]).not.toContain('Reference book keywords');
    expect(session.transcript('chat')).toEqual([
      { role: 'user', text: 'I love sad novels' },
      { role: 'ai', text: 'Happy to talk!' },
    ]);
  });

  it('uses only the first 200 characters of the latest metadata', async () => {
    const session = new SessionStore('s1');
    const metadata = 'k'.repeat(CHAT_CONTEXT_CHARS) + 'BEYOND_CONTEXT';
    session.upsertBook(makeBook({ aiMetadata: metadata }));
    const model = new FakeTextModel('Interesting.');

    await chatAboutBooks(session, model, 'Thoughts?');

    expect(model.prompts[0]).toContain(`Reference book keywords: ${'k'.repeat(CHAT_CONTEXT_CHARS)}\n`);
    expect(model.prompts[0]).not.toContain('BEYOND_CONTEXT');
  });
});
