import { useEffect, useState } from 'react';

interface NumberFieldProps {
  value: number;
  onCommit: (value: number) => void;
  step?: number;
  className?: string;
  highlight?: boolean;
  'aria-label'?: string;
}

/** Holds the typed text locally and commits a parsed number on blur or Enter. */
export default function NumberField({ value, onCommit, step, className = '', highlight, ...rest }: NumberFieldProps) {
  const [draft, setDraft] = useState(String(value));

  useEffect(() => {
    setDraft(String(value));
  }, [value]);

  const commit = () => {
    const parsed = Number(draft);
    if (draft.trim() === '' || !Number.isFinite(parsed)) {
      setDraft(String(value));
      return;
    }
    if (parsed !== value) onCommit(parsed);
  };

  return (
    <input
      type="number"
      step={step}
      value={draft}
      onChange={(e) => setDraft(e.target.value)}
      onBlur={commit}
      onKeyDown={(e) => {
        if (e.key === 'Enter') commit();
      }}
      aria-label={rest['aria-label']}
      className={`px-2 py-1 text-sm border rounded-md focus:outline-none focus:ring-2 focus:ring-teal-500 ${
        highlight ? 'border-amber-400 bg-amber-50' : 'border-slate-200'
      } ${className}`}
    />
  );
}
