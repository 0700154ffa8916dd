'use client';

import { INSIGHT_LABELS } from '@/lib/risk-reward-insight';
import { cn } from '@/lib/utils';
import type { InsightClassification, RatioDelta } from '@/types';

interface StatusBadgeProps {
  status: InsightClassification | RatioDelta;
  className?: string;
}

const statusStyles: Record<InsightClassification | RatioDelta, string> = {
  // Insight classification
  excellent: 'bg-emerald-500/20 text-emerald-400 border border-emerald-500/30',
  good: 'bg-profit/20 text-profit border border-profit/30',
  moderate: 'bg-warning/20 text-warning border border-warning/30',
  poor: 'bg-loss/20 text-loss border border-loss/30',
  undefined: 'bg-muted/50 text-muted-foreground border border-border/50',
  // Ratio delta
  Good: 'bg-profit/20 text-profit border border-profit/30',
  Poor: 'bg-warning/20 text-warning border border-warning/30',
  Bad: 'bg-loss/20 text-loss border border-loss/30',
  'Risk is zero': 'bg-muted/50 text-muted-foreground border border-border/50',
};

const statusLabels: Partial<Record<InsightClassification | RatioDelta, string>> = INSIGHT_LABELS;

export default function StatusBadge({ status, className }: StatusBadgeProps) {
  const style = statusStyles[status];
  const label = statusLabels[status] ?? status;

  return (
    <span
      className={cn(
        'inline-flex items-center px-2.5 py-0.5 rounded-full text-xs font-medium',
        style,
        className
      )}
    >
      {label}
    </span>
  );
}
