'use client';

/**
 * DEPENDENCIES
 * Consumed by: RiskRewardForm.tsx, ResultMetrics.tsx
 * Consumes: glossary.ts
 * Risk-sensitive: NO — display only
 * Notes: No tooltip library. Dotted underline text with hover/tap tooltip.
 */

import { useState, useRef, useEffect, type ReactNode } from 'react';
import { GLOSSARY } from '@/lib/glossary';

interface GlossaryTermProps {
  term: string;
  children: ReactNode;
}

export default function GlossaryTerm({ term, children }: GlossaryTermProps) {
  const definition = GLOSSARY[term];
  const [visible, setVisible] = useState(false);
  const ref = useRef<HTMLSpanElement>(null);

  // Close on outside click/tap
  useEffect(() => {
    if (!visible) return;
    const handleClickOutside = (e: MouseEvent | TouchEvent) => {
      if (ref.current && e.target instanceof Node && !ref.current.contains(e.target)) {
        setVisible(false);
      }
    };
    document.addEventListener('mousedown', handleClickOutside);
    document.addEventListener('touchstart', handleClickOutside);
    return () => {
      document.removeEventListener('mousedown', handleClickOutside);
      document.removeEventListener('touchstart', handleClickOutside);
    };
  }, [visible]);

  // If no definition found, render children without tooltip
  if (!definition) return <>{children}</>;

  return (
    <span
      ref={ref}
      className="relative inline cursor-help underline decoration-dotted underline-offset-2"
      onMouseEnter={() => setVisible(true)}
      onMouseLeave={() => setVisible(false)}
      onClick={() => setVisible((v) => !v)}
    >
      {children}
      {visible && (
        <span
          role="tooltip"
          className="absolute bottom-[calc(100%+6px)] left-1/2 -translate-x-1/2 z-50 flex flex-col gap-1 min-w-[180px] max-w-[280px] px-3 py-2.5 rounded-lg bg-slate-800 border border-white/10 shadow-lg pointer-events-none whitespace-normal text-left no-underline"
        >
          <span className="text-xs font-semibold text-slate-100">{term}</span>
          <span className="text-[11px] leading-relaxed text-slate-400">{definition}</span>
        </span>
      )}
    </span>
  );
}
