'use client';

import { AlertCircle } from 'lucide-react';
import Navbar from '@/components/shared/Navbar';
import RiskRewardForm from '@/components/calculator/RiskRewardForm';
import ResultMetrics from '@/components/calculator/ResultMetrics';
import BreakdownTable from '@/components/calculator/BreakdownTable';
import AnalysisInsight from '@/components/calculator/AnalysisInsight';
import HowToUsePanel from '@/components/calculator/HowToUsePanel';
import { useRiskRewardCalculation } from '@/hooks/useRiskRewardCalculation';

export default function RiskRewardPage() {
  const { values, report, error, isCalculating, setValue, calculate, reset } = useRiskRewardCalculation();

  return (
    <div className="min-h-screen">
      <Navbar />

      <main className="max-w-5xl mx-auto px-4 py-6 space-y-6">
        <RiskRewardForm
          values={values}
          isCalculating={isCalculating}
          onChange={setValue}
          onSubmit={() => void calculate()}
          onReset={reset}
        />

        {error && (
          <div className="flex items-start gap-2 text-sm text-loss bg-loss/10 border border-loss/30 rounded-lg p-3" role="alert">
            <AlertCircle className="w-4 h-4 shrink-0 mt-0.5" />
            <span>{error.message}</span>
          </div>
        )}

        {report && (
          <section className="space-y-4 animate-fade-in">
            <h2 className="text-lg font-semibold text-foreground">Results</h2>
            <ResultMetrics report={report} />
            <BreakdownTable rows={report.breakdown} />
            <AnalysisInsight insight={report.insight} summary={report.summary} />
          </section>
        )}

        <HowToUsePanel />
      </main>
    </div>
  );
}
