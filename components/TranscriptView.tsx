import React from 'react';
import type { TranscriptEntry } from '../types';

export const TranscriptView: React.FC<{ entries: TranscriptEntry[]; emptyText: string }> = ({ entries, emptyText }) => {
  if (entries.length === 0) {
    return <p className="text-center text-slate-500 text-sm">{emptyText}</p>;
  }

  return (
    <ol className="flex flex-col gap-3" aria-label="Conversation">
      {entries.map((entry, index) => (
        <li
          key={index}
          className={`rounded-lg p-3 text-sm whitespace-pre-wrap ${entry.role === 'user'
            ? 'self-end bg-indigo-600/40 text-slate-100 max-w-[80%]'
            : 'self-start bg-slate-700/60 text-slate-200 max-w-[90%]'}`}
        >
          <span className="block text-xs font-semibold text-slate-400 mb-1">{entry.role === 'user' ? 'You' : 'AI'}</span>
          {entry.text}
        </li>
      ))}
    </ol>
  );
};
