'use client';

import { AlertTriangle, CheckCircle2, Info, XCircle } from 'lucide-react';
import type { ReactNode } from 'react';
import StatusBadge from '@/components/shared/StatusBadge';
import { cn } from '@/lib/utils';
import type { FinancialSummary, InsightTone, RiskRewardInsight } from '@/types';

const toneStyles: Record<InsightTone, { box: string; icon: ReactNode }> = {
  success: {
    box: 'bg-profit/10 border-profit/30 text-profit',
    icon: <CheckCircle2 className="w-4 h-4 shrink-0" />,
  },
  warning: {
    box: 'bg-warning/10 border-warning/30 text-warning',
    icon: <AlertTriangle className="w-4 h-4 shrink-0" />,
  },
  error: {
    box: 'bg-loss/10 border-loss/30 text-loss',
    icon: <XCircle className="w-4 h-4 shrink-0" />,
  },
  info: {
    box: 'bg-blue-500/10 border-blue-500/30 text-blue-400',
    icon: <Info className="w-4 h-4 shrink-0" />,
  },
};

function SummaryItem({ label, value }: { label: string; value: string }) {
  return (
    <div className="bg-navy-800 p-3 rounded-lg">
      <div className="text-xs text-muted-foreground">{label}</div>
      <div className="text-sm font-bold font-mono text-foreground">{value}</div>
    </div>
  );
}

interface AnalysisInsightProps {
  insight: RiskRewardInsight;
  summary: FinancialSummary;
}

export default function AnalysisInsight({ insight, summary }: AnalysisInsightProps) {
  const tone = toneStyles[insight.tone];

  return (
    <div className="card-surface p-4 space-y-4">
      <div className="flex items-center justify-between">
        <h3 className="text-sm font-semibold text-foreground">Analysis Insights</h3>
        <StatusBadge status={insight.classification} />
      </div>

      <div className={cn('flex items-start gap-2 text-sm border rounded-lg p-3', tone.box)}>
        {tone.icon}
        <span>{insight.message}</span>
      </div>

      <div>
        <h4 className="text-xs font-semibold text-muted-foreground uppercase tracking-wide mb-2">
          Financial Summary
        </h4>
        <div className="grid grid-cols-2 gap-3">
          <SummaryItem label="Maximum Loss" value={summary.maximumLoss} />
          <SummaryItem label="Potential Profit" value={summary.potentialProfit} />
          {summary.profitPotentialPercent && (
            <SummaryItem label="Profit Potential" value={summary.profitPotentialPercent} />
          )}
          {summary.riskPercentOfPosition && (
            <SummaryItem label="Risk as % of Position" value={summary.riskPercentOfPosition} />
          )}
        </div>
      </div>
    </div>
  );
}
