import React, { useState } from 'react';
import type { TranscriptEntry } from '../types';
import { Loader } from './Loader';
import { TranscriptView } from './TranscriptView';

interface ChatPanelProps {
  entries: TranscriptEntry[];
  disabled: boolean;
  onSend: (message: string) => Promise<void>;
}

export const ChatPanel: React.FC<ChatPanelProps> = ({ entries, disabled, onSend }) => {
  const [message, setMessage] = useState('');
  const [isSending, setIsSending] = useState(false);

  const handleSubmit = async (event: React.FormEvent) => {
    event.preventDefault();
    const trimmed = message.trim();
    if (!trimmed) return;
    setIsSending(true);
    try {
      await onSend(trimmed);
      setMessage('');
    } finally {
      setIsSending(false);
    }
  };

  return (
    <section>
      <h2 className="text-xl font-bold text-slate-200 mb-4">Open discussion (books, literature, feelings)</h2>
      <div className="min-h-[240px] bg-slate-900 rounded-lg p-4 border border-slate-700 flex flex-col gap-4">
        <TranscriptView entries={entries} emptyText="Share a thought to start the conversation." />
        {isSending && <Loader message="Gemini is thinking..." />}
      </div>
      <form onSubmit={handleSubmit} className="mt-4 flex gap-2">
        <input
          type="text"
          value={message}
          onChange={(e) => setMessage(e.target.value)}
          placeholder="Share your opinion freely!"
          aria-label="Chat message"
          disabled={disabled || isSending}
          className="flex-1 bg-slate-900 border border-slate-600 rounded-lg p-2 text-sm"
        />
        <button
          type="submit"
          disabled={disabled || isSending || !message.trim()}
          className="bg-indigo-600 text-white font-bold py-2 px-4 rounded-lg hover:bg-indigo-500 disabled:bg-slate-600 disabled:cursor-not-allowed"
        >
          Send
        </button>
      </form>
    </section>
  );
};
