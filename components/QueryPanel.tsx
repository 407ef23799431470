import React, { useState } from 'react';
import type { TranscriptEntry } from '../types';
import { ErrorMessage } from './ErrorMessage';
import { Loader } from './Loader';
import { TranscriptView } from './TranscriptView';

interface QueryPanelProps {
  entries: TranscriptEntry[];
  notice: string | null;
  disabled: boolean;
  onAsk: (question: string) => Promise<void>;
}

/**
 * Deep questions about the most recently analysed book.
 */
export const QueryPanel: React.FC<QueryPanelProps> = ({ entries, notice, disabled, onAsk }) => {
  const [question, setQuestion] = useState('');
  const [isAsking, setIsAsking] = useState(false);

  const handleSubmit = async (event: React.FormEvent) => {
    event.preventDefault();
    const trimmed = question.trim();
    if (!trimmed) return;
    setIsAsking(true);
    try {
      await onAsk(trimmed);
      setQuestion('');
    } finally {
      setIsAsking(false);
    }
  };

  return (
    <section className="mt-8 pt-6 border-t border-slate-700">
      <h2 className="text-xl font-bold text-slate-200 mb-3">Deep query</h2>
      <form onSubmit={handleSubmit} className="flex gap-2">
        <input
          type="text"
          value={question}
          onChange={(e) => setQuestion(e.target.value)}
          placeholder="Ask about the book, its era, emotions, keywords..."
          aria-label="Question about the book"
          disabled={disabled || isAsking}
          className="flex-1 bg-slate-900 border border-slate-600 rounded-lg p-2 text-sm"
        />
        <button
          type="submit"
          disabled={disabled || isAsking || !question.trim()}
          className="bg-indigo-600 text-white font-bold py-2 px-4 rounded-lg hover:bg-indigo-500 disabled:bg-slate-600 disabled:cursor-not-allowed"
        >
          Ask
        </button>
      </form>
      <div className="mt-4 flex flex-col gap-4">
        {isAsking && <Loader message="Consulting Gemini..." />}
        {notice && <ErrorMessage tone="info" message={notice} />}
        <TranscriptView entries={entries} emptyText="Answers to your questions will appear here." />
      </div>
    </section>
  );
};
