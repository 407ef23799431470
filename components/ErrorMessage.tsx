import React from 'react';

interface ErrorMessageProps {
  message: string;
  tone?: 'error' | 'warning' | 'info';
}

const TONES = {
  error: { box: 'bg-red-900/30 border-red-500/50 text-red-300', heading: 'An Error Occurred' },
  warning: { box: 'bg-amber-900/30 border-amber-500/50 text-amber-200', heading: 'Warning' },
  info: { box: 'bg-sky-900/30 border-sky-500/50 text-sky-200', heading: 'Note' },
};

export const ErrorMessage: React.FC<ErrorMessageProps> = ({ message, tone = 'error' }) => {
  const { box, heading } = TONES[tone];
  return (
    <div role={tone === 'info' ? 'status' : 'alert'} className={`w-full border p-4 rounded-lg text-center ${box}`}>
      <p className="font-semibold">{heading}</p>
      <p className="text-sm mt-1">{message}</p>
    </div>
  );
};
