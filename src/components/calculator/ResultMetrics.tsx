'use client';

import { Scale, ShieldAlert, Target } from 'lucide-react';
import GlossaryTerm from '@/components/GlossaryTerm';
import StatusBadge from '@/components/shared/StatusBadge';
import { cn } from '@/lib/utils';
import type { RiskRewardReport } from '@/types';

export default function ResultMetrics({ report }: { report: RiskRewardReport }) {
  return (
    <div className="grid grid-cols-1 md:grid-cols-3 gap-3">
      <div className="card-surface p-4">
        <div className="text-xs text-muted-foreground flex items-center gap-1.5">
          <ShieldAlert className="w-3.5 h-3.5 text-loss" />
          Total Risk
        </div>
        <div className="text-2xl font-bold font-mono text-loss mt-1">{report.totalRiskDisplay}</div>
      </div>

      <div className="card-surface p-4">
        <div className="text-xs text-muted-foreground flex items-center gap-1.5">
          <Target className="w-3.5 h-3.5 text-profit" />
          Total Reward
        </div>
        <div className="text-2xl font-bold font-mono text-profit mt-1">{report.totalRewardDisplay}</div>
      </div>

      <div className="card-surface p-4">
        <div className="text-xs text-muted-foreground flex items-center gap-1.5">
          <Scale className="w-3.5 h-3.5 text-primary-400" />
          <GlossaryTerm term="Risk:Reward">Risk:Reward Ratio</GlossaryTerm>
        </div>
        <div className="flex items-center gap-2 mt-1">
          <span
            className={cn(
              'text-2xl font-bold font-mono',
              report.ratio === null ? 'text-muted-foreground' : 'text-primary-400'
            )}
          >
            {report.ratioDisplay}
          </span>
          <StatusBadge status={report.ratioDelta} />
        </div>
      </div>
    </div>
  );
}
