import type { TextModel } from './geminiService';
import type { SessionStore } from './sessionStore';

export const CHAT_CONTEXT_CHARS = 200;

export const SEARCH_FIRST_NOTICE = 'Search for a book first, then ask about it.';

export type QueryOutcome =
  | { answered: true; answer: string }
  | { answered: false; notice: string };

export const buildQueryPrompt = (aiMetadata: string, question: string) => `
Using the metadata and content of the book below, answer the question that follows. Include direct quotations (sentences) from the book in your answer.
[Book metadata]
${aiMetadata}
[Question]
${question}
`;

export const buildChatPrompt = (remark: string, context: string) => `
Remark or question from the user: ${remark}
${context}
Please respond with open literary discussion, shared feelings, and a range of perspectives.
`;

/**
 * Deep query against the most recent book. Makes no model call when the
 * session has no book yet. Model failures propagate to the caller.
 */
export async function answerQuery(session: SessionStore, model: TextModel, question: string): Promise<QueryOutcome> {
  const book = session.latestBook();
  if (!book) {
    return { answered: false, notice: SEARCH_FIRST_NOTICE };
  }

  const answer = await model.generate(buildQueryPrompt(book.aiMetadata, question));
  session.appendTranscript('query', 'user', question);
  session.appendTranscript('query', 'ai', answer);
  return { answered: true, answer };
}

/**
 * Free discussion. Uses only the first 200 characters of the latest book's
 * metadata as context, or none.
 */
export async function chatAboutBooks(session: SessionStore, model: TextModel, remark: string): Promise<string> {
  const book = session.latestBook();
  const context = book ? `Reference book keywords: ${book.aiMetadata.slice(0, CHAT_CONTEXT_CHARS)}` : '';

  const answer = await model.generate(buildChatPrompt(remark, context));
  session.appendTranscript('chat', 'user', remark);
  session.appendTranscript('chat', 'ai', answer);
  return answer;
}
