import { calculateRiskRewardBreakdown, calculateRewardRatio } from '@/lib/risk-reward';
import {
  buildFinancialSummary,
  deriveInsight,
  deriveRatioDelta,
  formatRiskRewardRatio,
} from '@/lib/risk-reward-insight';
import {
  INVALID_NUMBER_MESSAGE,
  validateRiskRewardForm,
  type RiskRewardFormValues,
  type RiskRewardValidationError,
} from '@/lib/risk-reward-input';
import { formatCurrency } from '@/lib/utils';
import type { BreakdownRow, RiskRewardBreakdown, RiskRewardInputs, RiskRewardReport } from '@/types';

const EMPTY_CELL = '-';

export function buildBreakdownRows(b: RiskRewardBreakdown): BreakdownRow[] {
  return [
    { component: 'Price Movement (Risk)', risk: formatCurrency(b.riskFromPrice), reward: EMPTY_CELL },
    { component: 'Price Movement (Reward)', risk: EMPTY_CELL, reward: formatCurrency(b.rewardFromPrice) },
    { component: 'Transaction Costs', risk: formatCurrency(b.transactionCost), reward: formatCurrency(-b.transactionCost) },
    { component: 'Rebate Benefits', risk: formatCurrency(-b.rebateBenefit), reward: formatCurrency(b.rebateBenefit) },
    { component: 'Net Risk', risk: formatCurrency(b.totalRisk), reward: EMPTY_CELL },
    { component: 'Net Reward', risk: EMPTY_CELL, reward: formatCurrency(b.totalReward) },
  ];
}

/**
 * Everything the results panel shows, from already-validated inputs.
 */
export function analyzeRiskReward(inputs: RiskRewardInputs): RiskRewardReport {
  const normalized: Required<RiskRewardInputs> = {
    ...inputs,
    costPerLot: inputs.costPerLot ?? 0,
    rebatePerLot: inputs.rebatePerLot ?? 0,
  };
  const breakdown = calculateRiskRewardBreakdown(normalized);
  const result = { totalRisk: breakdown.totalRisk, totalReward: breakdown.totalReward };

  return {
    inputs: normalized,
    result,
    totalRiskDisplay: formatCurrency(result.totalRisk),
    totalRewardDisplay: formatCurrency(result.totalReward),
    ratio: calculateRewardRatio(result.totalRisk, result.totalReward),
    ratioDisplay: formatRiskRewardRatio(result.totalRisk, result.totalReward),
    ratioDelta: deriveRatioDelta(result.totalRisk, result.totalReward),
    breakdown: buildBreakdownRows(breakdown),
    insight: deriveInsight(result.totalRisk, result.totalReward),
    summary: buildFinancialSummary(normalized, result),
  };
}

export type RiskRewardFormOutcome =
  | { ok: true; report: RiskRewardReport }
  | { ok: false; error: RiskRewardValidationError };

export function analyzeRiskRewardForm(values: RiskRewardFormValues): RiskRewardFormOutcome {
  const validated = validateRiskRewardForm(values);
  if (!validated.ok) return validated;

  const report = analyzeRiskReward(validated.inputs);
  // Finite inputs can still overflow, e.g. a 1e308 price against -1e308
  if (!Number.isFinite(report.result.totalRisk) || !Number.isFinite(report.result.totalReward)) {
    return { ok: false, error: { code: 'INVALID_NUMBER', message: INVALID_NUMBER_MESSAGE } };
  }
  return { ok: true, report };
}
