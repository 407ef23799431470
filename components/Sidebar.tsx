import React from 'react';
import type { FeedbackReportLine } from '../types';

interface SidebarProps {
  apiKey: string;
  onApiKeyChange: (value: string) => void;
  feedback: FeedbackReportLine[] | null;
  onShowFeedback: () => void;
}

const USAGE_NOTICE = [
  "Crawling must respect each platform's robots.txt and copyright policy.",
  'AI answers aim for direct quotations, keyword consistency and feedback-driven improvement.',
  'A production service would need a database plus deeper log and feedback analysis.',
];

export const Sidebar: React.FC<SidebarProps> = ({ apiKey, onApiKeyChange, feedback, onShowFeedback }) => (
  <aside className="w-full lg:w-72 flex-shrink-0 flex flex-col gap-6 bg-slate-800/50 rounded-2xl border border-slate-700 p-5">
    <section>
      <h2 className="text-base font-semibold text-cyan-400 mb-2">API settings</h2>
      <label htmlFor="gemini-api-key" className="text-sm text-slate-400">Gemini API Key</label>
      <input
        id="gemini-api-key"
        type="password"
        autoComplete="off"
        value={apiKey}
        onChange={(e) => onApiKeyChange(e.target.value)}
        className="mt-1 w-full bg-slate-900 border border-slate-600 rounded-md p-2 text-sm"
      />
      <p className="mt-1 text-xs text-slate-500">Kept in this tab only; never saved.</p>
    </section>

    <section>
      <h2 className="text-base font-semibold text-cyan-400 mb-2">Feedback statistics</h2>
      <button
        type="button"
        onClick={onShowFeedback}
        className="w-full bg-slate-700 hover:bg-slate-600 text-slate-100 font-semibold py-2 rounded-lg text-sm"
      >
        Show feedback statistics
      </button>
      {feedback && (
        <ul className="mt-3 space-y-3 text-sm text-slate-300">
          {feedback.length === 0 && <li className="text-slate-500">No feedback yet.</li>}
          {feedback.map((line) => (
            <li key={`${line.title}::${line.category}`}>
              <p>Book: {line.title} / Category: {line.category} / Feedback count: {line.count}</p>
              <ul className="list-disc list-inside text-slate-400">
                {line.comments.map((comment, index) => <li key={index}>{comment}</li>)}
              </ul>
            </li>
          ))}
        </ul>
      )}
    </section>

    <section className="rounded-lg bg-sky-900/30 border border-sky-500/40 p-3 text-xs text-sky-200">
      <ul className="list-disc list-inside space-y-1">
        {USAGE_NOTICE.map((line) => <li key={line}>{line}</li>)}
      </ul>
    </section>
  </aside>
);
