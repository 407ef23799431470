import React from 'react';

export const Loader: React.FC<{ message: string }> = ({ message }) => (
  <div className="flex flex-col items-center gap-3 text-slate-400" role="status">
    <div className="h-8 w-8 rounded-full border-4 border-slate-600 border-t-cyan-400 animate-spin" />
    <p className="text-sm">{message}</p>
  </div>
);
