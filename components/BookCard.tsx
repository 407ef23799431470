import React from 'react';
import type { BookMetadata, FeedbackCategory } from '../types';
import { ExportButton } from './ExportButton';
import { FeedbackForm } from './FeedbackForm';

interface BookCardProps {
  book: BookMetadata;
  onFeedback: (title: string, category: FeedbackCategory, comment: string) => Promise<void>;
}

export const BookCard: React.FC<BookCardProps> = ({ book, onFeedback }) => (
  <article className="w-full rounded-xl bg-slate-900 border border-slate-700 p-6 animate-fade-in">
    <h3 className="text-xl font-bold text-slate-100">{book.title}</h3>

    <dl className="mt-4 space-y-4 text-sm">
      <div>
        <dt className="font-medium text-slate-400">Summary</dt>
        <dd className="mt-1 text-slate-200">{book.summary}</dd>
      </div>
      <div>
        <dt className="font-medium text-slate-400">AI metadata</dt>
        <dd className="mt-1 text-slate-200 whitespace-pre-wrap">{book.aiMetadata}</dd>
      </div>
      <div>
        <dt className="font-medium text-slate-400">Loans</dt>
        <dd className="mt-1 text-slate-200">Rank #{book.loanRank} / {book.loanCount} loans</dd>
      </div>
      <div>
        <dt className="font-medium text-slate-400">External links</dt>
        <dd className="mt-1">
          <ul className="list-disc list-inside space-y-1">
            {book.externalLinks.map((link) => (
              <li key={link}>
                <a href={link} target="_blank" rel="noreferrer" className="text-cyan-400 hover:underline">{book.platform}</a>
              </li>
            ))}
          </ul>
        </dd>
      </div>
    </dl>

    <div className="mt-4 text-right">
      <ExportButton book={book} />
    </div>

    <FeedbackForm title={book.title} onSubmit={(category, comment) => onFeedback(book.title, category, comment)} />
  </article>
);
