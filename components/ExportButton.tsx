import React from 'react';
import type { BookMetadata } from '../types';

interface ExportButtonProps {
  book: BookMetadata;
}

const fileNameFor = (title: string) =>
  `${title.replace(/[^\p{L}\p{N}]+/gu, '_').replace(/^_+|_+$/g, '') || 'book'}_metadata.json`;

export const ExportButton: React.FC<ExportButtonProps> = ({ book }) => {
  const handleExport = () => {
    const exportData = {
      sourceUrl: book.url,
      generatedAt: new Date().toISOString(),
      details: {
        title: book.title,
        platform: book.platform,
        summary: book.summary,
        loanRank: book.loanRank,
        loanCount: book.loanCount,
        externalLinks: book.externalLinks,
      },
      analysis: {
        aiMetadata: book.aiMetadata,
      },
    };

    const jsonString = JSON.stringify(exportData, null, 2);
    const blob = new Blob([jsonString], { type: 'application/json' });
    const url = URL.createObjectURL(blob);
    const link = document.createElement('a');
    link.href = url;
    link.download = fileNameFor(book.title);

    document.body.appendChild(link);
    link.click();
    document.body.removeChild(link);
    URL.revokeObjectURL(url);
  };

  return (
    <button
      type="button"
      onClick={handleExport}
      className="bg-cyan-600 text-white font-bold py-2 px-4 rounded-lg hover:bg-cyan-500 transition-all duration-300 focus:outline-none focus:ring-2 focus:ring-offset-2 focus:ring-offset-slate-800 focus:ring-cyan-500 shadow-lg inline-flex items-center gap-2 text-sm"
    >
      <svg xmlns="http://www.w3.org/2000/svg" className="h-4 w-4" viewBox="0 0 20 20" fill="currentColor">
        <path fillRule="evenodd" d="M3 17a1 1 0 011-1h12a1 1 0 110 2H4a1 1 0 01-1-1zm3.293-7.707a1 1 0 011.414 0L9 10.586V3a1 1 0 112 0v7.586l1.293-1.293a1 1 0 111.414 1.414l-3 3a1 1 0 01-1.414 0l-3-3a1 1 0 010-1.414z" clipRule="evenodd" />
      </svg>
      Export JSON
    </button>
  );
};
