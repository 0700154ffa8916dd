/**
 * DEPENDENCIES
 * Consumed by: risk-reward-report.ts, StatusBadge.tsx
 * Consumes: risk-reward.ts, utils.ts, @/types
 * Risk-sensitive: NO — display classification only
 * Notes: Two threshold scales. The insight text uses 3 / 2 / 1; the delta
 *        label next to the ratio uses 2 / 1, so 1.5 is "moderate" but "Poor".
 */

import { calculateRewardRatio } from '@/lib/risk-reward';
import { formatCurrency, formatFixed, formatPercent } from '@/lib/utils';
import type {
  FinancialSummary,
  InsightClassification,
  InsightTone,
  RatioDelta,
  RiskRewardInputs,
  RiskRewardInsight,
  RiskRewardResult,
} from '@/types';

export const RATIO_NOT_AVAILABLE = 'N/A';

// ---- Insight scale ----
const INSIGHT_THRESHOLDS: { min: number; classification: InsightClassification }[] = [
  { min: 3, classification: 'excellent' },
  { min: 2, classification: 'good' },
  { min: 1, classification: 'moderate' },
];

const INSIGHT_TONES: Record<InsightClassification, InsightTone> = {
  excellent: 'success',
  good: 'success',
  moderate: 'warning',
  poor: 'error',
  undefined: 'info',
};

export const INSIGHT_LABELS: Record<InsightClassification, string> = {
  excellent: 'Excellent',
  good: 'Good',
  moderate: 'Moderate',
  poor: 'Poor',
  undefined: 'N/A',
};

/** "1:2.000" */
export function formatRatioValue(ratio: number): string {
  return `1:${formatFixed(ratio, 3)}`;
}

export function formatRiskRewardRatio(totalRisk: number, totalReward: number): string {
  const ratio = calculateRewardRatio(totalRisk, totalReward);
  return ratio === null ? RATIO_NOT_AVAILABLE : formatRatioValue(ratio);
}

export function classifyRatio(ratio: number | null): InsightClassification {
  if (ratio === null) return 'undefined';
  const match = INSIGHT_THRESHOLDS.find((t) => ratio >= t.min);
  return match ? match.classification : 'poor';
}

function insightMessage(classification: InsightClassification, ratio: number | null): string {
  if (ratio === null) return 'Risk is zero - please verify your inputs.';
  const r = formatRatioValue(ratio);
  switch (classification) {
    case 'excellent':
      return `Excellent Risk-Reward ratio of ${r}! This is a very favorable trade setup.`;
    case 'good':
      return `Good Risk-Reward ratio of ${r}. This trade has favorable odds.`;
    case 'moderate':
      return `Moderate Risk-Reward ratio of ${r}. Consider if the probability of success justifies this ratio.`;
    default:
      return `Poor Risk-Reward ratio of ${r}. This trade setup is not favorable.`;
  }
}

export function deriveInsight(totalRisk: number, totalReward: number): RiskRewardInsight {
  const ratio = calculateRewardRatio(totalRisk, totalReward);
  const classification = classifyRatio(ratio);
  return {
    classification,
    ratio,
    tone: INSIGHT_TONES[classification],
    message: insightMessage(classification, ratio),
  };
}

// ---- Delta label scale ----
export function deriveRatioDelta(totalRisk: number, totalReward: number): RatioDelta {
  const ratio = calculateRewardRatio(totalRisk, totalReward);
  if (ratio === null) return 'Risk is zero';
  if (ratio < 1) return 'Bad';
  return ratio >= 2 ? 'Good' : 'Poor';
}

// ---- Financial summary ----
export function buildFinancialSummary(
  inputs: Pick<RiskRewardInputs, 'avgPrice' | 'numLots'>,
  result: RiskRewardResult
): FinancialSummary {
  const { totalRisk, totalReward } = result;

  const profitPotentialPercent = totalRisk > 0
    ? `${formatPercent((totalReward / totalRisk) * 100, 1)} of risk`
    : null;

  // Notional only — ignores tick value
  const positionValue = inputs.avgPrice * inputs.numLots;
  const riskPercentOfPosition = positionValue > 0
    ? formatPercent((totalRisk / positionValue) * 100, 2)
    : null;

  return {
    maximumLoss: formatCurrency(totalRisk),
    potentialProfit: formatCurrency(totalReward),
    profitPotentialPercent,
    riskPercentOfPosition,
  };
}
