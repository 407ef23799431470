import React, { useState } from 'react';
import { FEEDBACK_CATEGORIES, FeedbackCategory } from '../types';

const CATEGORY_LABELS: Record<FeedbackCategory, string> = {
  overall: 'Overall',
  keywords: 'Keywords',
  review: 'Review',
  adaptation: 'Adaptation',
  'external-links': 'External links',
};

interface FeedbackFormProps {
  title: string;
  onSubmit: (category: FeedbackCategory, comment: string) => Promise<void>;
}

const isFeedbackCategory = (value: string): value is FeedbackCategory =>
  FEEDBACK_CATEGORIES.some((category) => category === value);

export const FeedbackForm: React.FC<FeedbackFormProps> = ({ title, onSubmit }) => {
  const [category, setCategory] = useState<FeedbackCategory>('overall');
  const [comment, setComment] = useState('');
  const [status, setStatus] = useState<'idle' | 'saving' | 'saved' | 'error'>('idle');

  const handleSubmit = async (event: React.FormEvent) => {
    event.preventDefault();
    setStatus('saving');
    try {
      await onSubmit(category, comment);
      setComment('');
      setStatus('saved');
    } catch (err) {
      console.error('Failed to save feedback:', err);
      setStatus('error');
    }
  };

  const fieldId = `feedback-${title.replace(/\s+/g, '-')}`;

  return (
    <details className="mt-4 rounded-lg border border-slate-700 p-3">
      <summary className="cursor-pointer text-sm font-semibold text-cyan-400">Leave feedback on this book's metadata</summary>
      <form onSubmit={handleSubmit} className="mt-3 flex flex-col gap-2">
        <label htmlFor={`${fieldId}-category`} className="text-sm text-slate-400">Feedback category</label>
        <select
          id={`${fieldId}-category`}
          value={category}
          onChange={(e) => {
            if (isFeedbackCategory(e.target.value)) setCategory(e.target.value);
          }}
          className="bg-slate-900 border border-slate-600 rounded-md p-2 text-sm"
        >
          {FEEDBACK_CATEGORIES.map((value) => (
            <option key={value} value={value}>{CATEGORY_LABELS[value]}</option>
          ))}
        </select>
        <label htmlFor={`${fieldId}-comment`} className="text-sm text-slate-400">Your feedback</label>
        <textarea
          id={`${fieldId}-comment`}
          value={comment}
          onChange={(e) => setComment(e.target.value)}
          rows={3}
          className="bg-slate-900 border border-slate-600 rounded-md p-2 text-sm"
        />
        <button
          type="submit"
          disabled={status === 'saving'}
          className="self-end bg-indigo-600 text-white font-semibold py-1.5 px-4 rounded-lg hover:bg-indigo-500 disabled:bg-slate-600 text-sm"
        >
          Submit feedback
        </button>
        {status === 'saved' && <p className="text-sm text-emerald-400" role="status">Feedback saved.</p>}
        {status === 'error' && <p className="text-sm text-red-400" role="alert">Could not save feedback.</p>}
      </form>
    </details>
  );
};
