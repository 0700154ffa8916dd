/**
 * DEPENDENCIES
 * Consumed by: risk-reward-report.ts, risk-reward-insight.ts
 * Consumes: @/types
 * Risk-sensitive: YES
 * Notes: Pure arithmetic — no rounding here, formatting happens at display time.
 *        Caller must reject tickSize === 0 before calling (see risk-reward-input.ts).
 */
// ============================================================
// Risk / Reward Calculator
// ============================================================
// Risk   = (|Avg - MaxAgainst| / TickSize) × Lots × TickValue
//          + (TC/lot × EntryExitLots × 2 × Lots)
//          − (Rebate/lot × EntryExitLots × 2 × Lots)
// Reward = (|Avg - Target| / TickSize) × Lots × TickValue
//          − (TC/lot × EntryExitLots × 2 × Lots)
//          + (Rebate/lot × EntryExitLots × 2 × Lots)
//
// Cost and rebate are computed once and applied with opposite signs:
// cost makes the trade riskier and less rewarding, rebate the reverse.

import type { RiskRewardBreakdown, RiskRewardInputs, RiskRewardResult } from '@/types';

/**
 * Every intermediate term of the calculation. `calculateRiskReward` is the
 * two-number view of the same arithmetic.
 */
export function calculateRiskRewardBreakdown(inputs: RiskRewardInputs): RiskRewardBreakdown {
  const {
    avgPrice,
    maxAgainstPrice,
    targetPrice,
    tickSize,
    numLots,
    tickValue,
    totalLotsEntryExit,
    costPerLot = 0,
    rebatePerLot = 0,
  } = inputs;

  const priceMovementRisk = Math.abs(avgPrice - maxAgainstPrice) / tickSize;
  const riskFromPrice = priceMovementRisk * numLots * tickValue;

  // Round trip: entry + exit
  const transactionCost = costPerLot * totalLotsEntryExit * 2 * numLots;
  const rebateBenefit = rebatePerLot * totalLotsEntryExit * 2 * numLots;

  const totalRisk = riskFromPrice + transactionCost - rebateBenefit;

  const priceMovementReward = Math.abs(avgPrice - targetPrice) / tickSize;
  const rewardFromPrice = priceMovementReward * numLots * tickValue;

  const totalReward = rewardFromPrice - transactionCost + rebateBenefit;

  return {
    priceMovementRisk,
    riskFromPrice,
    priceMovementReward,
    rewardFromPrice,
    transactionCost,
    rebateBenefit,
    totalRisk,
    totalReward,
  };
}

export function calculateRiskReward(inputs: RiskRewardInputs): RiskRewardResult {
  const { totalRisk, totalReward } = calculateRiskRewardBreakdown(inputs);
  return { totalRisk, totalReward };
}

/**
 * |reward / risk|, or null when risk is zero (ratio undefined).
 */
export function calculateRewardRatio(totalRisk: number, totalReward: number): number | null {
  if (totalRisk === 0) return null;
  return Math.abs(totalReward / totalRisk);
}
